import type { Key } from "ink";
import type { KeyEvent } from "../../types/domain";

/**
 * Translate an Ink useInput callback into a controller key event
 */
export function toKeyEvent(input: string, key: Key): KeyEvent {
  if (key.upArrow) return { kind: "up" };
  if (key.downArrow) return { kind: "down" };
  if (key.rightArrow) return { kind: "right" };
  if (key.return) return { kind: "enter" };
  if (key.escape) return { kind: "escape" };
  // Most terminals send DEL for Backspace, which Ink reports as `delete`
  if (key.backspace || key.delete) return { kind: "backspace" };

  if (input.length > 0 && !key.ctrl && !key.meta && !key.tab && !isControlText(input)) {
    return { kind: "char", char: input };
  }
  return { kind: "other" };
}

function isControlText(input: string): boolean {
  return /[\u0000-\u001f\u007f]/.test(input);
}
