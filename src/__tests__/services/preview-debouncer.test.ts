import { errAsync } from "neverthrow";
import { beforeEach, describe, expect, test } from "vitest";
import {
  type BackendError,
  backendUnavailable,
} from "../../services/backend-errors";
import { PreviewDebouncer } from "../../services/preview-debouncer";
import type { SessionStore } from "../../state/session";
import {
  createFakeBackend,
  createTestStore,
  type FakeBackend,
} from "../test-utils";

describe("PreviewDebouncer", () => {
  let backend: FakeBackend;
  let store: SessionStore;
  let debouncer: PreviewDebouncer;

  beforeEach(() => {
    backend = createFakeBackend();
    store = createTestStore();
    debouncer = new PreviewDebouncer(store, backend);
  });

  test("should call the preview backend once for repeated index 2", async () => {
    await debouncer.onIndexChanged(2);
    await debouncer.onIndexChanged(2);

    expect(backend.previewPods).toHaveBeenCalledTimes(1);
  });

  test("should store the preview text in output for the pods entry", async () => {
    await debouncer.onIndexChanged(2);

    expect(backend.previewPods).toHaveBeenCalledWith("default");
    expect(store.getState().ui.output).toBe("NAME     READY\napi-0    1/1");
    expect(store.getState().ui.lastPreviewedIndex).toBe(2);
  });

  test("should preview the selected namespace", async () => {
    store.dispatch({ type: "SET_SELECTED_NAMESPACE", payload: "kube-system" });
    await debouncer.onIndexChanged(2);

    expect(backend.previewPods).toHaveBeenCalledWith("kube-system");
  });

  test("should clear output and skip the backend for other entries", async () => {
    store.dispatch({ type: "SET_OUTPUT", payload: "stale" });
    await debouncer.onIndexChanged(1);

    expect(backend.previewPods).not.toHaveBeenCalled();
    expect(store.getState().ui.output).toBe("");
    expect(store.getState().ui.lastPreviewedIndex).toBe(1);
  });

  test("should reload after moving away and back", async () => {
    await debouncer.onIndexChanged(2);
    await debouncer.onIndexChanged(3);
    await debouncer.onIndexChanged(2);

    expect(backend.previewPods).toHaveBeenCalledTimes(2);
  });

  test("should keep failures inline instead of showing a message", async () => {
    backend.previewPods.mockReturnValue(
      errAsync<string, BackendError>(backendUnavailable("spawn kubectl ENOENT")),
    );

    await debouncer.onIndexChanged(2);

    const state = store.getState();
    expect(state.ui.output).toBe("Error listing pods: spawn kubectl ENOENT");
    expect(state.ui.message).toBe("");
    expect(state.navigation.screen).toBe("main-menu");
  });
});
