import { currentNamespace } from "../selectors/session";
import { log } from "../services/logger";
import { EMPTY_POD_NAME_MESSAGE, type KeyEvent } from "../types/domain";
import { reportBackendError } from "./loaders";
import type { CommandContext, ScreenHandler } from "./types";

/**
 * Free-text entry of the name for a debug copy of the selected pod
 */
export class CopyPodNameInputHandler implements ScreenHandler {
  async handleKey(event: KeyEvent, context: CommandContext): Promise<void> {
    const { store } = context;

    switch (event.kind) {
      case "char":
        store.dispatch({ type: "APPEND_INPUT", payload: event.char });
        return;
      case "backspace":
        store.dispatch({ type: "DELETE_LAST_INPUT_CHAR" });
        return;
      case "escape":
        store.dispatch({ type: "SET_SCREEN", payload: "copy-pod-picker" });
        return;
      case "enter":
        await this.submit(context);
        return;
      default:
        return;
    }
  }

  private async submit({ store, backend }: CommandContext): Promise<void> {
    const state = store.getState();
    const newName = state.ui.inputBuffer;
    const sourcePod = state.selections.selectedPod;

    if (newName.length === 0) {
      store.dispatch({ type: "SHOW_MESSAGE", payload: EMPTY_POD_NAME_MESSAGE });
      return;
    }
    if (sourcePod === null) {
      log.warn("Pod name submitted without a source pod", "copy-pod", { newName });
      return;
    }

    const namespace = currentNamespace(state);
    log.info("Copying pod", "copy-pod", { namespace, sourcePod, newName });
    const result = await backend.copyPod(namespace, sourcePod, newName);

    if (result.isErr()) {
      reportBackendError("Error copying pod", result.error, store.dispatch);
    } else {
      store.dispatch({ type: "SHOW_OUTPUT", payload: result.value });
    }

    store.dispatch({ type: "SET_SELECTED_POD", payload: null });
    store.dispatch({ type: "CLEAR_INPUT" });
  }
}
