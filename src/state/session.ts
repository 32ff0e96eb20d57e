import {
  initialNavigationState,
  type NavigationAction,
  type NavigationState,
  navigationReducer,
} from "./navigation-reducer";
import {
  initialSelectionState,
  type SelectionAction,
  type SelectionState,
  selectionReducer,
} from "./selection-reducer";
import {
  initialUIState,
  type UIAction,
  type UIState,
  uiReducer,
} from "./ui-reducer";

// Re-export types from individual reducers
export type { NavigationState, SelectionState, UIState };

export const DEFAULT_NAMESPACE = "default";

export interface SessionState {
  navigation: NavigationState;
  selections: SelectionState;
  ui: UIState;
  // Used whenever no namespace has been picked
  defaultNamespace: string;
}

// Combined action type
export type SessionAction =
  | { type: "SHOW_MESSAGE"; payload: string }
  | { type: "SHOW_OUTPUT"; payload: string }
  | NavigationAction
  | SelectionAction
  | UIAction;

export interface SessionOptions {
  defaultNamespace?: string;
  selectedContext?: string | null;
}

export function createInitialSession(
  options: SessionOptions = {},
): SessionState {
  return {
    navigation: initialNavigationState,
    selections: {
      ...initialSelectionState,
      selectedContext: options.selectedContext ?? null,
    },
    ui: initialUIState,
    defaultNamespace: options.defaultNamespace ?? DEFAULT_NAMESPACE,
  };
}

// Combined reducer using individual reducers
export function sessionReducer(
  state: SessionState,
  action: SessionAction,
): SessionState {
  switch (action.type) {
    case "SHOW_MESSAGE":
      return {
        ...state,
        navigation: { ...state.navigation, screen: "message" },
        ui: { ...state.ui, message: action.payload },
      };

    case "SHOW_OUTPUT":
      return {
        ...state,
        navigation: { ...state.navigation, screen: "output" },
        ui: { ...state.ui, output: action.payload },
      };

    default:
      return {
        ...state,
        navigation: navigationReducer(state.navigation, action),
        selections: selectionReducer(state.selections, action),
        ui: uiReducer(state.ui, action),
      };
  }
}

type Listener = () => void;

/**
 * Owns the session for the lifetime of the process.
 * The controller is the only writer; the renderer subscribes.
 */
export class SessionStore {
  private state: SessionState;
  private listeners = new Set<Listener>();

  constructor(initial: SessionState = createInitialSession()) {
    this.state = initial;
  }

  getState = (): SessionState => this.state;

  dispatch = (action: SessionAction): void => {
    this.state = sessionReducer(this.state, action);
    for (const listener of this.listeners) {
      listener();
    }
  };

  subscribe = (listener: Listener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };
}
