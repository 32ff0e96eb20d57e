import type { SessionAction } from "./session";

export interface SelectionState {
  selectedNamespace: string | null;
  selectedContext: string | null;
  selectedPod: string | null;
}

export type SelectionAction =
  | { type: "SET_SELECTED_NAMESPACE"; payload: string | null }
  | { type: "SET_SELECTED_CONTEXT"; payload: string | null }
  | { type: "SET_SELECTED_POD"; payload: string | null };

export const initialSelectionState: SelectionState = {
  selectedNamespace: null,
  selectedContext: null,
  selectedPod: null,
};

/**
 * Pure reducer for namespace/context/pod selection
 */
export function selectionReducer(
  state: SelectionState,
  action: SessionAction,
): SelectionState {
  switch (action.type) {
    case "SET_SELECTED_NAMESPACE":
      return {
        ...state,
        selectedNamespace: action.payload,
      };

    case "SET_SELECTED_CONTEXT":
      return {
        ...state,
        selectedContext: action.payload,
      };

    case "SET_SELECTED_POD":
      return {
        ...state,
        selectedPod: action.payload,
      };

    default:
      return state;
  }
}
