import type { SessionAction } from "./session";

export interface UIState {
  inputBuffer: string;
  message: string;
  output: string;
  lastPreviewedIndex: number | null;
}

export type UIAction =
  | { type: "APPEND_INPUT"; payload: string }
  | { type: "DELETE_LAST_INPUT_CHAR" }
  | { type: "CLEAR_INPUT" }
  | { type: "SET_MESSAGE"; payload: string }
  | { type: "SET_OUTPUT"; payload: string }
  | { type: "SET_LAST_PREVIEWED_INDEX"; payload: number | null };

export const initialUIState: UIState = {
  inputBuffer: "",
  message: "",
  output: "",
  lastPreviewedIndex: null,
};

/**
 * Pure reducer for UI state
 * Handles the pod-name buffer, message/output text and the preview marker
 */
export function uiReducer(state: UIState, action: SessionAction): UIState {
  switch (action.type) {
    case "APPEND_INPUT":
      return {
        ...state,
        inputBuffer: state.inputBuffer + action.payload,
      };

    case "DELETE_LAST_INPUT_CHAR":
      // Drop one code point, not one UTF-16 unit
      return {
        ...state,
        inputBuffer: Array.from(state.inputBuffer).slice(0, -1).join(""),
      };

    case "CLEAR_INPUT":
      return {
        ...state,
        inputBuffer: "",
      };

    case "SET_MESSAGE":
      return {
        ...state,
        message: action.payload,
      };

    case "SET_OUTPUT":
      return {
        ...state,
        output: action.payload,
      };

    case "SET_LAST_PREVIEWED_INDEX":
      return {
        ...state,
        lastPreviewedIndex: action.payload,
      };

    default:
      return state;
  }
}
