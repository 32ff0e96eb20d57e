import type { ClusterControl } from "../services/cluster-control";
import type { PreviewDebouncer } from "../services/preview-debouncer";
import type { SessionStore } from "../state/session";
import type { KeyEvent } from "../types/domain";

export interface CommandContext {
  store: SessionStore;
  backend: ClusterControl;
  preview: PreviewDebouncer;
}

/**
 * Input handling for one screen. Resolves once every state change and
 * backend call caused by the event has finished.
 */
export interface ScreenHandler {
  handleKey(event: KeyEvent, context: CommandContext): Promise<void> | void;
}
