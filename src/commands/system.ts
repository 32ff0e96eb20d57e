import type { KeyEvent } from "../types/domain";
import type { CommandContext, ScreenHandler } from "./types";

export const QUIT_KEY = "q";

// Checked before any screen sees the event
export function isQuitKey(event: KeyEvent): boolean {
  return event.kind === "char" && event.char === QUIT_KEY;
}

/**
 * Message and output screens: any key returns to the main menu
 */
export class DismissHandler implements ScreenHandler {
  handleKey(_event: KeyEvent, { store }: CommandContext): void {
    store.dispatch({ type: "SET_SCREEN", payload: "main-menu" });
  }
}
