import type { ResultAsync } from "neverthrow";
import {
  type BackendError,
  formatBackendError,
} from "../services/backend-errors";
import { log } from "../services/logger";
import type { ListName, Screen } from "../types/domain";
import type { CommandContext } from "./types";

export interface ListLoad {
  list: ListName;
  load: () => ResultAsync<string[], BackendError>;
  // Prefix for the message screen when the load fails
  errorLabel: string;
  target: Screen;
}

/**
 * Replace a list from a fresh backend query and enter its screen,
 * or show the failure on the message screen
 */
export async function loadListAndEnter(
  { list, load, errorLabel, target }: ListLoad,
  { store }: CommandContext,
): Promise<void> {
  const result = await load();

  if (result.isErr()) {
    reportBackendError(errorLabel, result.error, store.dispatch);
    return;
  }

  log.debug(`Loaded ${list}`, "loaders", { count: result.value.length });
  store.dispatch({
    type: "REPLACE_LIST",
    payload: { list, items: result.value },
  });
  store.dispatch({ type: "SET_SCREEN", payload: target });
}

export function reportBackendError(
  label: string,
  error: BackendError,
  dispatch: CommandContext["store"]["dispatch"],
): void {
  log.warn(label, "backend", error);
  dispatch({ type: "SHOW_MESSAGE", payload: formatBackendError(label, error) });
}
