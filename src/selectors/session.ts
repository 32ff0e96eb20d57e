import type { SelectionList } from "../state/selection-list";
import type { SessionState } from "../state/session";
import type { ListName, Screen } from "../types/domain";

export function currentNamespace(state: SessionState): string {
  return state.selections.selectedNamespace ?? state.defaultNamespace;
}

// Picker screens and the list each one navigates; both pod pickers share "pods"
export const PICKER_LISTS = {
  "namespace-picker": "namespaces",
  "context-picker": "contexts",
  "exec-pod-picker": "pods",
  "copy-pod-picker": "pods",
} as const satisfies Partial<Record<Screen, ListName>>;

export type PickerScreen = keyof typeof PICKER_LISTS;

export function pickerList(
  state: SessionState,
  screen: PickerScreen,
): SelectionList<string> {
  return state.navigation[PICKER_LISTS[screen]];
}
