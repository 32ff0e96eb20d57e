/**
 * Errors produced by the cluster-control backend
 */
export type BackendError =
  | { type: "backend-unavailable"; message: string }
  | {
      type: "command-failed";
      message: string;
      stderr: string;
      exitCode: number;
    };

export function backendUnavailable(message: string): BackendError {
  return { type: "backend-unavailable", message };
}

export function commandFailed(
  message: string,
  stderr: string,
  exitCode: number,
): BackendError {
  return { type: "command-failed", message, stderr, exitCode };
}

// Backend text is shown verbatim, with kubectl's stderr when the message lacks it
export function getDisplayMessage(error: BackendError): string {
  if (error.type === "backend-unavailable") return error.message;

  const stderr = error.stderr.trim();
  if (stderr.length === 0 || error.message.includes(stderr)) {
    return error.message;
  }
  return `${error.message}: ${stderr}`;
}

/**
 * Label + verbatim backend text, as shown on the message screen
 */
export function formatBackendError(label: string, error: BackendError): string {
  return `${label}: ${getDisplayMessage(error)}`;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
