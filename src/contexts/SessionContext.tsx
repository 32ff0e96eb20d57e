import React, {
  createContext,
  type ReactNode,
  useContext,
  useSyncExternalStore,
} from "react";
import type { SessionState, SessionStore } from "../state/session";

export const SessionContext = createContext<SessionStore | null>(null);

export interface SessionProviderProps {
  store: SessionStore;
  children: ReactNode;
}

export const SessionProvider: React.FC<SessionProviderProps> = ({
  store,
  children,
}) => (
  <SessionContext.Provider value={store}>{children}</SessionContext.Provider>
);

// Read-only view of the session; re-renders on every store change
export const useSession = (): SessionState => {
  const store = useContext(SessionContext);
  if (!store) {
    throw new Error("useSession must be used within a SessionProvider");
  }
  return useSyncExternalStore(store.subscribe, store.getState, store.getState);
};
