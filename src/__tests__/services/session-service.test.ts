import { describe, expect, test } from "vitest";
import { createSessionStore } from "../../services/session-service";
import { createFakeBackend } from "../test-utils";

describe("createSessionStore", () => {
  test("should seed the current context and default namespace", async () => {
    const backend = createFakeBackend();

    const store = await createSessionStore(backend, { defaultNamespace: "team-a" });

    const state = store.getState();
    expect(backend.currentContext).toHaveBeenCalledTimes(1);
    expect(state.selections.selectedContext).toBe("kind-dev");
    expect(state.defaultNamespace).toBe("team-a");
    expect(state.navigation.screen).toBe("main-menu");
  });

  test("should start without a context when none is set", async () => {
    const backend = createFakeBackend();
    backend.currentContext.mockResolvedValue(null);

    const store = await createSessionStore(backend, { defaultNamespace: "default" });

    expect(store.getState().selections.selectedContext).toBeNull();
  });
});
