import type { ResultAsync } from "neverthrow";
import type { BackendError } from "./backend-errors";

/**
 * Read/write operations against the cluster backend.
 *
 * Operations that spawn an interactive session (exec, copy) and the pod
 * preview resolve with the captured text even when the command exits
 * non-zero; they only fail when the backend cannot be launched.
 */
export interface ClusterControl {
  /** Best effort; `null` when unknown or the lookup fails */
  currentContext(): Promise<string | null>;
  listContexts(): ResultAsync<string[], BackendError>;
  switchContext(name: string): ResultAsync<void, BackendError>;
  listNamespaces(): ResultAsync<string[], BackendError>;
  listPods(namespace: string): ResultAsync<string[], BackendError>;
  previewPods(namespace: string): ResultAsync<string, BackendError>;
  execInteractive(namespace: string, pod: string): ResultAsync<string, BackendError>;
  copyPod(
    namespace: string,
    sourcePod: string,
    newName: string,
  ): ResultAsync<string, BackendError>;
}
