import { currentNamespace } from "../selectors/session";
import { log } from "../services/logger";
import { selectedItem } from "../state/selection-list";
import type { KeyEvent, ListName } from "../types/domain";
import { reportBackendError } from "./loaders";
import { isSelectKey, navigationDirection } from "./navigation";
import type { CommandContext, ScreenHandler } from "./types";

/**
 * Cursor movement, selection and Escape shared by every picker screen
 */
abstract class PickerHandler implements ScreenHandler {
  protected abstract readonly list: ListName;

  protected abstract choose(item: string, context: CommandContext): Promise<void> | void;

  async handleKey(event: KeyEvent, context: CommandContext): Promise<void> {
    const { store } = context;

    const direction = navigationDirection(event);
    if (direction) {
      store.dispatch({
        type: "MOVE_CURSOR",
        payload: { list: this.list, direction },
      });
      return;
    }

    if (isSelectKey(event)) {
      const item = selectedItem(store.getState().navigation[this.list]);
      if (item === undefined) return;
      await this.choose(item, context);
      return;
    }

    if (event.kind === "escape") {
      store.dispatch({ type: "SET_SCREEN", payload: "main-menu" });
    }
  }
}

export class NamespacePickerHandler extends PickerHandler {
  protected readonly list = "namespaces";

  protected choose(namespace: string, { store }: CommandContext): void {
    log.info("Namespace selected", "pickers", { namespace });
    store.dispatch({ type: "SET_SELECTED_NAMESPACE", payload: namespace });
    store.dispatch({ type: "SET_SCREEN", payload: "main-menu" });
  }
}

export class ContextPickerHandler extends PickerHandler {
  protected readonly list = "contexts";

  protected async choose(context: string, { store, backend }: CommandContext): Promise<void> {
    const result = await backend.switchContext(context);
    if (result.isErr()) {
      reportBackendError("Error switching context", result.error, store.dispatch);
      return;
    }

    log.info("Switched context", "pickers", { context });
    store.dispatch({ type: "SET_SELECTED_CONTEXT", payload: context });
    store.dispatch({ type: "SET_SCREEN", payload: "main-menu" });
  }
}

export class ExecPodPickerHandler extends PickerHandler {
  protected readonly list = "pods";

  protected async choose(pod: string, { store, backend }: CommandContext): Promise<void> {
    const namespace = currentNamespace(store.getState());
    log.info("Exec into pod", "pickers", { namespace, pod });

    const result = await backend.execInteractive(namespace, pod);
    if (result.isErr()) {
      reportBackendError("Error exec into pod", result.error, store.dispatch);
      return;
    }
    store.dispatch({ type: "SHOW_OUTPUT", payload: result.value });
  }
}

export class CopyPodPickerHandler extends PickerHandler {
  protected readonly list = "pods";

  protected choose(pod: string, { store }: CommandContext): void {
    store.dispatch({ type: "SET_SELECTED_POD", payload: pod });
    store.dispatch({ type: "CLEAR_INPUT" });
    store.dispatch({ type: "SET_SCREEN", payload: "copy-pod-name-input" });
  }
}
