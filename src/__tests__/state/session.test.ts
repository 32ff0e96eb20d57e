import { describe, expect, test, vi } from "vitest";
import { currentNamespace } from "../../selectors/session";
import {
  createInitialSession,
  sessionReducer,
  SessionStore,
} from "../../state/session";
import { MAIN_COMMANDS } from "../../types/domain";

describe("session state", () => {
  describe("createInitialSession", () => {
    test("should start on the main menu with the command list selected at 0", () => {
      const state = createInitialSession();
      expect(state.navigation.screen).toBe("main-menu");
      expect(state.navigation.commands.items).toEqual([...MAIN_COMMANDS]);
      expect(state.navigation.commands.cursor).toBe(0);
      expect(state.navigation.pods.cursor).toBeNull();
      expect(state.defaultNamespace).toBe("default");
      expect(state.ui.lastPreviewedIndex).toBeNull();
    });

    test("should seed the context and default namespace", () => {
      const state = createInitialSession({
        selectedContext: "kind-dev",
        defaultNamespace: "team-a",
      });
      expect(state.selections.selectedContext).toBe("kind-dev");
      expect(currentNamespace(state)).toBe("team-a");
    });
  });

  describe("currentNamespace", () => {
    test("should prefer the selected namespace over the default", () => {
      const state = sessionReducer(createInitialSession(), {
        type: "SET_SELECTED_NAMESPACE",
        payload: "kube-system",
      });
      expect(currentNamespace(state)).toBe("kube-system");
    });
  });

  describe("sessionReducer", () => {
    test("SHOW_MESSAGE should set the message and switch to the message screen", () => {
      const state = sessionReducer(createInitialSession(), {
        type: "SHOW_MESSAGE",
        payload: "boom",
      });
      expect(state.navigation.screen).toBe("message");
      expect(state.ui.message).toBe("boom");
    });

    test("SHOW_OUTPUT should set the output and switch to the output screen", () => {
      const state = sessionReducer(createInitialSession(), {
        type: "SHOW_OUTPUT",
        payload: "done",
      });
      expect(state.navigation.screen).toBe("output");
      expect(state.ui.output).toBe("done");
    });

    test("MOVE_CURSOR should only touch the named list", () => {
      let state = sessionReducer(createInitialSession(), {
        type: "REPLACE_LIST",
        payload: { list: "pods", items: ["a", "b"] },
      });
      state = sessionReducer(state, {
        type: "MOVE_CURSOR",
        payload: { list: "pods", direction: "down" },
      });
      expect(state.navigation.pods.cursor).toBe(1);
      expect(state.navigation.commands.cursor).toBe(0);
    });

    test("DELETE_LAST_INPUT_CHAR should remove one character", () => {
      let state = sessionReducer(createInitialSession(), {
        type: "APPEND_INPUT",
        payload: "w2",
      });
      state = sessionReducer(state, { type: "DELETE_LAST_INPUT_CHAR" });
      expect(state.ui.inputBuffer).toBe("w");
    });

    test("DELETE_LAST_INPUT_CHAR should be a no-op on an empty buffer", () => {
      const state = sessionReducer(createInitialSession(), {
        type: "DELETE_LAST_INPUT_CHAR",
      });
      expect(state.ui.inputBuffer).toBe("");
    });
  });

  describe("SessionStore", () => {
    test("should notify subscribers on dispatch until unsubscribed", () => {
      const store = new SessionStore();
      const listener = vi.fn();
      const unsubscribe = store.subscribe(listener);

      store.dispatch({ type: "SET_SCREEN", payload: "output" });
      unsubscribe();
      store.dispatch({ type: "SET_SCREEN", payload: "main-menu" });

      expect(listener).toHaveBeenCalledTimes(1);
      expect(store.getState().navigation.screen).toBe("main-menu");
    });
  });
});
