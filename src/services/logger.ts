import { promises as fs } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { okAsync, ResultAsync } from "neverthrow";
import pino from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LoggerConfig {
  sessionId: string;
  directory?: string;
  keepSessions?: number; // Number of old sessions to keep (default: 5)
}

const SESSION_PREFIX = "kubenav-session-";

/**
 * Per-session JSON log file. Ink owns the terminal, so nothing goes to stdout.
 */
class Logger {
  private pinoLogger: pino.Logger;
  private sessionId: string;
  private directory: string;
  private logFilePath: string;
  private keepSessions: number;

  constructor(config: LoggerConfig) {
    this.sessionId = config.sessionId;
    this.directory = config.directory ?? tmpdir();
    this.keepSessions = config.keepSessions ?? 5;
    this.logFilePath = Logger.getSessionFilePath(this.sessionId, this.directory);

    this.pinoLogger = pino(
      {
        level: "debug",
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({
        dest: this.logFilePath,
        sync: false,
      }),
    );
  }

  debug(message: string, context?: string, data?: unknown): void {
    this.pinoLogger.debug({ context, data }, message);
  }

  info(message: string, context?: string, data?: unknown): void {
    this.pinoLogger.info({ context, data }, message);
  }

  warn(message: string, context?: string, data?: unknown): void {
    this.pinoLogger.warn({ context, data }, message);
  }

  error(message: string, context?: string, data?: unknown): void {
    this.pinoLogger.error({ context, data }, message);
  }

  getSessionId(): string {
    return this.sessionId;
  }

  getLogFilePath(): string {
    return this.logFilePath;
  }

  // Keep only the most recent N session files
  cleanupOldSessions(): ResultAsync<void, { message: string }> {
    return ResultAsync.fromPromise(fs.readdir(this.directory), () => ({
      message: "Failed to read log directory",
    })).andThen((files) => {
      const stale = files
        .filter((f) => f.startsWith(SESSION_PREFIX) && f.endsWith(".log"))
        .sort((a, b) => b.localeCompare(a)) // session ids sort by timestamp
        .slice(this.keepSessions);

      return ResultAsync.combine(
        stale.map((name) =>
          ResultAsync.fromPromise(fs.unlink(join(this.directory, name)), () => ({
            message: `Failed to delete old log file: ${name}`,
          })),
        ),
      ).map(() => undefined);
    });
  }

  static getSessionFilePath(sessionId: string, directory = tmpdir()): string {
    return join(directory, `${SESSION_PREFIX}${sessionId}.log`);
  }

  // Flush any pending writes
  close(): ResultAsync<void, { message: string }> {
    return ResultAsync.fromPromise(
      new Promise<void>((resolve, reject) => {
        this.pinoLogger.flush((error) => {
          if (error) reject(error);
          else resolve();
        });
      }),
      (error) => ({
        message: error instanceof Error ? error.message : "Failed to flush logger",
      }),
    );
  }
}

// Singleton logger instance
let globalLogger: Logger | null = null;

export function createSessionId(now: Date = new Date()): string {
  return now.toISOString().replace(/[:.]/g, "-").replace("T", "-").split("Z")[0];
}

// Initialize the global logger with a session ID based on current timestamp
export function initializeLogger(
  options: Partial<LoggerConfig> = {},
): ResultAsync<Logger, { message: string }> {
  const sessionId = options.sessionId ?? createSessionId();

  return ResultAsync.fromPromise(
    fs.mkdir(options.directory ?? tmpdir(), { recursive: true }),
    () => ({ message: "Logger initialization failed" }),
  ).andThen(() => {
    globalLogger = new Logger({ ...options, sessionId });
    const logger = globalLogger;

    return logger
      .cleanupOldSessions()
      .orElse((error) => {
        logger.warn("Failed to cleanup old log sessions", "logger", error);
        return okAsync(undefined);
      })
      .map(() => logger);
  });
}

export function getLogger(): Logger | null {
  return globalLogger;
}

// No-ops until initializeLogger has run
export const log = {
  debug: (message: string, context?: string, data?: unknown) =>
    globalLogger?.debug(message, context, data),
  info: (message: string, context?: string, data?: unknown) =>
    globalLogger?.info(message, context, data),
  warn: (message: string, context?: string, data?: unknown) =>
    globalLogger?.warn(message, context, data),
  error: (message: string, context?: string, data?: unknown) =>
    globalLogger?.error(message, context, data),
};

export { Logger };
