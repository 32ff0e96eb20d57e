// Domain types used across the app (stable)

export type Screen =
  | "main-menu"
  | "namespace-picker"
  | "context-picker"
  | "exec-pod-picker"
  | "copy-pod-picker"
  | "copy-pod-name-input"
  | "message"
  | "output";

export type ListName = "commands" | "namespaces" | "contexts" | "pods";

// Order matters: the controller dispatches on the index
export const MAIN_COMMANDS = [
  "Choose Context",
  "Choose Namespace",
  "Pods",
  "Copy Pod",
] as const;

export const PODS_PREVIEW_INDEX = MAIN_COMMANDS.indexOf("Pods");

export const EMPTY_POD_NAME_MESSAGE = "Please enter a new pod name";

/**
 * Terminal-independent key event, produced by the keyboard adapter
 */
export type KeyEvent =
  | { kind: "up" }
  | { kind: "down" }
  | { kind: "right" }
  | { kind: "enter" }
  | { kind: "escape" }
  | { kind: "backspace" }
  | { kind: "char"; char: string }
  | { kind: "other" };

export type ControllerOutcome = "continue" | "quit";

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
