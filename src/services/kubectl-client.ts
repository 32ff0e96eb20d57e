import { execa } from "execa";
import { err, ok, ResultAsync } from "neverthrow";
import {
  type BackendError,
  backendUnavailable,
  commandFailed,
  errorMessage,
} from "./backend-errors";
import type { ClusterControl } from "./cluster-control";
import { log } from "./logger";

export interface CommandOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Spawns a process and captures its output.
 * Rejects only when the process cannot be started.
 */
export type CommandRunner = (
  file: string,
  args: string[],
  options: { interactive: boolean },
) => Promise<CommandOutput>;

export interface KubectlClientOptions {
  kubectlPath: string;
  kubeconfig?: string;
  execShell: string;
  copyContainer: string;
  // Hooks for callers to hand the terminal over to interactive commands
  onEnterExternal?: () => void;
  onExitExternal?: () => void;
}

const NAME_JSONPATH = "-o=jsonpath={.items[*].metadata.name}";

export const runWithExeca: CommandRunner = async (file, args, { interactive }) => {
  const result = await execa(file, args, {
    reject: false,
    stdin: interactive ? "inherit" : "ignore",
  });
  // Launch failures (ENOENT, EACCES) come back without an exit code
  if (typeof result.exitCode !== "number") {
    throw result instanceof Error
      ? result
      : new Error(`Failed to launch ${result.command}`);
  }
  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode,
  };
};

// jsonpath output: names separated by spaces
export function parseNameList(stdout: string): string[] {
  return stdout.split(/\s+/).filter(Boolean);
}

export function parseLines(stdout: string): string[] {
  return stdout
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
}

// Captured text for display: stdout on success, stderr otherwise
export function displayText(output: CommandOutput): string {
  return output.exitCode === 0 ? output.stdout : output.stderr;
}

/**
 * ClusterControl backed by the kubectl binary
 */
export class KubectlClient implements ClusterControl {
  constructor(
    private readonly options: KubectlClientOptions,
    private readonly runner: CommandRunner = runWithExeca,
  ) {}

  async currentContext(): Promise<string | null> {
    const result = await this.run(["config", "current-context"]);
    if (result.isErr() || result.value.exitCode !== 0) {
      return null;
    }
    const context = result.value.stdout.trim();
    return context.length > 0 ? context : null;
  }

  listContexts(): ResultAsync<string[], BackendError> {
    return this.run(["config", "get-contexts", "-o=name"]).andThen((output) =>
      output.exitCode === 0
        ? ok(parseLines(output.stdout))
        : err(this.failure("Failed to load contexts", output)),
    );
  }

  switchContext(name: string): ResultAsync<void, BackendError> {
    return this.run(["config", "use-context", name]).andThen((output) =>
      output.exitCode === 0
        ? ok(undefined)
        : err(this.failure("Failed to switch context", output)),
    );
  }

  listNamespaces(): ResultAsync<string[], BackendError> {
    return this.run(["get", "namespaces", NAME_JSONPATH]).andThen((output) =>
      output.exitCode === 0
        ? ok(parseNameList(output.stdout))
        : err(
            this.failure(`Failed to get namespaces: ${output.stderr.trim()}`, output),
          ),
    );
  }

  listPods(namespace: string): ResultAsync<string[], BackendError> {
    return this.run(["get", "pods", "-n", namespace, NAME_JSONPATH]).andThen(
      (output) =>
        output.exitCode === 0
          ? ok(parseNameList(output.stdout))
          : err(this.failure(`Failed to get pods: ${output.stderr.trim()}`, output)),
    );
  }

  previewPods(namespace: string): ResultAsync<string, BackendError> {
    return this.run(["get", "pods", "-n", namespace]).map(displayText);
  }

  execInteractive(
    namespace: string,
    pod: string,
  ): ResultAsync<string, BackendError> {
    return this.runInteractive([
      "exec",
      "-it",
      "-n",
      namespace,
      pod,
      "--",
      this.options.execShell,
    ]).map(displayText);
  }

  copyPod(
    namespace: string,
    sourcePod: string,
    newName: string,
  ): ResultAsync<string, BackendError> {
    return this.runInteractive([
      "debug",
      "-it",
      "-n",
      namespace,
      sourcePod,
      "--copy-to",
      newName,
      `--container=${this.options.copyContainer}`,
      "--",
      this.options.execShell,
    ]).map(displayText);
  }

  private withKubeconfig(args: string[]): string[] {
    const { kubeconfig } = this.options;
    return kubeconfig ? ["--kubeconfig", kubeconfig, ...args] : args;
  }

  private run(
    args: string[],
    interactive = false,
  ): ResultAsync<CommandOutput, BackendError> {
    const fullArgs = this.withKubeconfig(args);
    log.debug("Running kubectl", "kubectl", { args: fullArgs, interactive });

    return ResultAsync.fromPromise(
      this.runner(this.options.kubectlPath, fullArgs, { interactive }),
      (error) => {
        const message = errorMessage(error);
        log.error("Failed to launch kubectl", "kubectl", {
          path: this.options.kubectlPath,
          message,
        });
        return backendUnavailable(message);
      },
    );
  }

  private runInteractive(args: string[]): ResultAsync<CommandOutput, BackendError> {
    this.options.onEnterExternal?.();
    const restore = () => this.options.onExitExternal?.();
    return this.run(args, true)
      .map((output) => {
        restore();
        return output;
      })
      .mapErr((error) => {
        restore();
        return error;
      });
  }

  private failure(message: string, output: CommandOutput): BackendError {
    log.warn("kubectl exited with non-zero status", "kubectl", {
      exitCode: output.exitCode,
      stderr: output.stderr,
    });
    return commandFailed(message, output.stderr, output.exitCode);
  }
}
