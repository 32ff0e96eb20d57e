import { currentNamespace } from "../selectors/session";
import { cursorIndex } from "../state/selection-list";
import type { KeyEvent } from "../types/domain";
import { loadListAndEnter } from "./loaders";
import type { CommandContext, ScreenHandler } from "./types";

/**
 * Arrow keys, plus vim-style j/k on list screens
 */
export function navigationDirection(event: KeyEvent): "up" | "down" | null {
  if (event.kind === "up") return "up";
  if (event.kind === "down") return "down";
  if (event.kind === "char") {
    if (event.char === "k") return "up";
    if (event.char === "j") return "down";
  }
  return null;
}

export function isSelectKey(event: KeyEvent): boolean {
  return event.kind === "enter" || event.kind === "right";
}

export class MainMenuHandler implements ScreenHandler {
  async handleKey(event: KeyEvent, context: CommandContext): Promise<void> {
    const { store, preview } = context;

    const direction = navigationDirection(event);
    if (direction) {
      store.dispatch({
        type: "MOVE_CURSOR",
        payload: { list: "commands", direction },
      });
      await preview.onIndexChanged(
        cursorIndex(store.getState().navigation.commands),
      );
      return;
    }

    if (isSelectKey(event)) {
      await this.runCommand(
        cursorIndex(store.getState().navigation.commands),
        context,
      );
    }
  }

  private async runCommand(index: number, context: CommandContext): Promise<void> {
    const { backend, store } = context;

    switch (index) {
      case 0:
        await loadListAndEnter(
          {
            list: "contexts",
            load: () => backend.listContexts(),
            errorLabel: "Error loading contexts",
            target: "context-picker",
          },
          context,
        );
        break;
      case 1:
        await loadListAndEnter(
          {
            list: "namespaces",
            load: () => backend.listNamespaces(),
            errorLabel: "Error loading namespaces",
            target: "namespace-picker",
          },
          context,
        );
        break;
      case 2:
      case 3: {
        const namespace = currentNamespace(store.getState());
        await loadListAndEnter(
          {
            list: "pods",
            load: () => backend.listPods(namespace),
            errorLabel: "Error loading pods",
            target: index === 2 ? "exec-pod-picker" : "copy-pod-picker",
          },
          context,
        );
        break;
      }
      default:
        break;
    }
  }
}
