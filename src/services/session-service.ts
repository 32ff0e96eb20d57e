import { createInitialSession, SessionStore } from "../state/session";
import type { ClusterControl } from "./cluster-control";
import { log } from "./logger";

/**
 * Build the session for a new run. The current-context lookup is best
 * effort; a missing context never blocks startup.
 */
export async function createSessionStore(
  backend: ClusterControl,
  { defaultNamespace }: { defaultNamespace: string },
): Promise<SessionStore> {
  const selectedContext = await backend.currentContext();
  log.info("Session seeded", "session", { selectedContext, defaultNamespace });
  return new SessionStore(
    createInitialSession({ defaultNamespace, selectedContext }),
  );
}
