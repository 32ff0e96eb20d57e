import { log } from "./services/logger";

export const ALT_SCREEN_ON = "\u001B[?1049h";
export const ALT_SCREEN_OFF = "\u001B[?1049l";

type ScreenOutput = Pick<NodeJS.WriteStream, "isTTY" | "write">;

interface TerminalStreams {
  stdin: NodeJS.ReadStream;
  stdout: NodeJS.WriteStream;
}

// The parts of `process` the screen cleanup hooks into
export interface ProcessHooks {
  on(event: string, listener: (...args: unknown[]) => void): unknown;
  exit(code: number): void;
}

// 128 + signal number, as shells report it
const SIGNAL_EXIT_CODES = {
  SIGINT: 130,
  SIGTERM: 143,
  SIGHUP: 129,
} as const;

const defaultStreams: TerminalStreams = {
  stdin: process.stdin,
  stdout: process.stdout,
};

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function writeSafely(stdout: ScreenOutput, chunk: string): void {
  try {
    stdout.write(chunk);
  } catch (error) {
    log.warn("Terminal write failed", "ink-control", {
      message: describeError(error),
    });
  }
}

/**
 * Switch to the alternate screen for the session and restore the main
 * screen on exit, on SIGINT/SIGTERM/SIGHUP and on a crash. Returns the
 * restore function.
 */
export function setupAlternateScreen(
  stdout: ScreenOutput = process.stdout,
  proc: ProcessHooks = process,
): () => void {
  if (!stdout.isTTY) return () => {};

  let cleaned = false;
  const disable = () => {
    if (cleaned) return;
    cleaned = true;
    writeSafely(stdout, ALT_SCREEN_OFF);
  };

  const crash = (error: unknown) => {
    disable();
    log.error("Fatal error, exiting", "ink-control", {
      message: describeError(error),
    });
    console.error(error);
    proc.exit(1);
  };

  writeSafely(stdout, ALT_SCREEN_ON);

  proc.on("exit", disable);
  for (const [signal, code] of Object.entries(SIGNAL_EXIT_CODES)) {
    proc.on(signal, () => {
      disable();
      log.error(`Received ${signal}, exiting`, "ink-control", { exitCode: code });
      proc.exit(code);
    });
  }
  proc.on("uncaughtException", crash);
  proc.on("unhandledRejection", crash);

  return disable;
}

// Hand the terminal to an interactive child (kubectl exec/debug)
export function enterExternal({ stdin, stdout }: TerminalStreams = defaultStreams): void {
  if (stdin.isTTY) {
    stdin.setRawMode(false);
    stdin.pause();
  }
  if (stdout.isTTY) writeSafely(stdout, ALT_SCREEN_OFF);
}

// Take the terminal back so Ink receives keys again
export function exitExternal({ stdin, stdout }: TerminalStreams = defaultStreams): void {
  if (stdout.isTTY) writeSafely(stdout, ALT_SCREEN_ON);
  if (stdin.isTTY) {
    stdin.setRawMode(true);
    stdin.resume();
  }
}
