import { err, ok, type Result } from "neverthrow";
import type { KubenavConfig } from "./kubenav-config";

export interface CLIOptions {
  help: boolean;
  version: boolean;
  namespace?: string;
  kubectl?: string;
  kubeconfig?: string;
}

const VALUE_FLAGS = {
  "-n": "namespace",
  "--namespace": "namespace",
  "--kubectl": "kubectl",
  "--kubeconfig": "kubeconfig",
} as const;

type ValueFlag = keyof typeof VALUE_FLAGS;

function isValueFlag(flag: string): flag is ValueFlag {
  return flag in VALUE_FLAGS;
}

export const USAGE = `Usage: kubenav [options]

Browse kubectl contexts, namespaces and pods from the terminal.

Options:
  -n, --namespace <name>  namespace used until one is picked (default: "default")
      --kubectl <path>    kubectl binary to run
      --kubeconfig <path> kubeconfig file passed to kubectl
  -v, --version           print the version and exit
  -h, --help              print this help and exit`;

export function parseCLIArgs(args: string[]): Result<CLIOptions, string> {
  const options: CLIOptions = { help: false, version: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      options.help = true;
      continue;
    }
    if (arg === "-v" || arg === "--version") {
      options.version = true;
      continue;
    }

    // --flag=value
    const eq = arg.indexOf("=");
    const flag = eq > 0 ? arg.slice(0, eq) : arg;
    if (!isValueFlag(flag)) {
      return err(`Unknown option: ${arg}`);
    }

    let value: string | undefined;
    if (eq > 0) {
      value = arg.slice(eq + 1);
    } else {
      value = args[i + 1];
      i++;
    }
    if (value === undefined || value.length === 0 || value.startsWith("-")) {
      return err(`Option ${flag} requires a value`);
    }
    options[VALUE_FLAGS[flag]] = value;
  }

  return ok(options);
}

/**
 * Command-line flags win over the config file
 */
export function applyCLIOverrides(
  config: KubenavConfig,
  options: CLIOptions,
): KubenavConfig {
  return {
    ...config,
    ...(options.namespace !== undefined && { defaultNamespace: options.namespace }),
    ...(options.kubectl !== undefined && { kubectlPath: options.kubectl }),
    ...(options.kubeconfig !== undefined && { kubeconfig: options.kubeconfig }),
  };
}
