import type { ClusterControl } from "../services/cluster-control";
import { log } from "../services/logger";
import { PreviewDebouncer } from "../services/preview-debouncer";
import type { SessionStore } from "../state/session";
import type { ControllerOutcome, KeyEvent, Screen } from "../types/domain";
import { CopyPodNameInputHandler } from "./copy-pod";
import { MainMenuHandler } from "./navigation";
import {
  ContextPickerHandler,
  CopyPodPickerHandler,
  ExecPodPickerHandler,
  NamespacePickerHandler,
} from "./pickers";
import { DismissHandler, isQuitKey } from "./system";
import type { CommandContext, ScreenHandler } from "./types";

/**
 * Routes each key event to the handler of the active screen.
 *
 * Events are processed strictly one at a time: a call made while an earlier
 * event (and its backend call) is still running waits for it to finish.
 */
export class NavigationController {
  private readonly context: CommandContext;
  private readonly handlers: Record<Screen, ScreenHandler>;
  private pending: Promise<unknown> = Promise.resolve();

  constructor(store: SessionStore, backend: ClusterControl) {
    this.context = {
      store,
      backend,
      preview: new PreviewDebouncer(store, backend),
    };

    const dismiss = new DismissHandler();
    this.handlers = {
      "main-menu": new MainMenuHandler(),
      "namespace-picker": new NamespacePickerHandler(),
      "context-picker": new ContextPickerHandler(),
      "exec-pod-picker": new ExecPodPickerHandler(),
      "copy-pod-picker": new CopyPodPickerHandler(),
      "copy-pod-name-input": new CopyPodNameInputHandler(),
      message: dismiss,
      output: dismiss,
    };
  }

  handleKey(event: KeyEvent): Promise<ControllerOutcome> {
    const run = this.pending.then(() => this.process(event));
    // A failed event must not block the ones queued behind it; the caller
    // still sees the rejection through `run`
    this.pending = run.catch((error: unknown) => {
      log.error("Key handling failed", "controller", {
        event,
        message: error instanceof Error ? error.message : String(error),
      });
    });
    return run;
  }

  private async process(event: KeyEvent): Promise<ControllerOutcome> {
    if (isQuitKey(event)) {
      log.info("Quit requested", "controller");
      return "quit";
    }

    const { store } = this.context;
    const from = store.getState().navigation.screen;
    await this.handlers[from].handleKey(event, this.context);

    const to = store.getState().navigation.screen;
    if (to !== from) {
      log.debug("Screen transition", "controller", { from, to, event: event.kind });
    }
    return "continue";
  }
}
