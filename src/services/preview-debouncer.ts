import { currentNamespace } from "../selectors/session";
import type { SessionStore } from "../state/session";
import { PODS_PREVIEW_INDEX } from "../types/domain";
import { formatBackendError } from "./backend-errors";
import type { ClusterControl } from "./cluster-control";
import { log } from "./logger";

/**
 * Loads the inline preview for the highlighted main-menu entry.
 * The backend is asked at most once per distinct highlighted index, and
 * failures stay in the preview pane instead of the message screen.
 */
export class PreviewDebouncer {
  constructor(
    private readonly store: SessionStore,
    private readonly backend: ClusterControl,
  ) {}

  async onIndexChanged(newIndex: number): Promise<void> {
    const { dispatch, getState } = this.store;
    if (getState().ui.lastPreviewedIndex === newIndex) return;

    dispatch({ type: "SET_OUTPUT", payload: "" });

    if (newIndex === PODS_PREVIEW_INDEX) {
      const namespace = currentNamespace(getState());
      log.debug("Loading pods preview", "preview", { namespace });
      const result = await this.backend.previewPods(namespace);
      dispatch({
        type: "SET_OUTPUT",
        payload: result.match(
          (text) => text,
          (error) => formatBackendError("Error listing pods", error),
        ),
      });
    }

    dispatch({ type: "SET_LAST_PREVIEWED_INDEX", payload: newIndex });
  }
}
