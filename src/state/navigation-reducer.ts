import { MAIN_COMMANDS, type ListName, type Screen } from "../types/domain";
import type { SessionAction } from "./session";
import {
  createSelectionList,
  moveDown,
  moveUp,
  replaceItems,
  type SelectionList,
} from "./selection-list";

export interface NavigationState {
  screen: Screen;
  commands: SelectionList<string>;
  namespaces: SelectionList<string>;
  contexts: SelectionList<string>;
  pods: SelectionList<string>;
}

export type NavigationAction =
  | { type: "SET_SCREEN"; payload: Screen }
  | { type: "MOVE_CURSOR"; payload: { list: ListName; direction: "up" | "down" } }
  | { type: "REPLACE_LIST"; payload: { list: ListName; items: string[] } };

export const initialNavigationState: NavigationState = {
  screen: "main-menu",
  commands: createSelectionList<string>(MAIN_COMMANDS),
  namespaces: createSelectionList<string>(),
  contexts: createSelectionList<string>(),
  pods: createSelectionList<string>(),
};

/**
 * Pure reducer for the active screen and the four selection lists
 */
export function navigationReducer(
  state: NavigationState,
  action: SessionAction,
): NavigationState {
  switch (action.type) {
    case "SET_SCREEN":
      return {
        ...state,
        screen: action.payload,
      };

    case "MOVE_CURSOR": {
      const { list, direction } = action.payload;
      const move = direction === "up" ? moveUp : moveDown;
      return {
        ...state,
        [list]: move(state[list]),
      };
    }

    case "REPLACE_LIST": {
      const { list, items } = action.payload;
      return {
        ...state,
        [list]: replaceItems(state[list], items),
      };
    }

    default:
      return state;
  }
}
