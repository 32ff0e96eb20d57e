import fs from "node:fs/promises";
import YAML from "yaml";
import { log } from "../services/logger";
import { DEFAULT_NAMESPACE } from "../state/session";
import { configPath } from "./paths";

export interface KubenavConfig {
  kubectlPath: string;
  kubeconfig?: string;
  defaultNamespace: string;
  execShell: string;
  copyContainer: string;
}

export const CONFIG_VERSION = 1;

export const DEFAULT_CONFIG: KubenavConfig = {
  kubectlPath: "kubectl",
  defaultNamespace: DEFAULT_NAMESPACE,
  execShell: "bash",
  copyContainer: "worker",
};

export interface ParsedConfig {
  config: KubenavConfig;
  warnings: string[];
}

type StringField = Exclude<keyof KubenavConfig, "kubeconfig">;

const STRING_FIELDS: StringField[] = [
  "kubectlPath",
  "defaultNamespace",
  "execShell",
  "copyContainer",
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * Parse the YAML config file contents. Bad fields fall back to defaults
 * and are reported as warnings.
 */
export function parseConfig(text: string): ParsedConfig {
  let doc: unknown;
  try {
    doc = YAML.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { config: { ...DEFAULT_CONFIG }, warnings: [`Invalid YAML: ${reason}`] };
  }

  // Empty file
  if (doc === null || doc === undefined) {
    return { config: { ...DEFAULT_CONFIG }, warnings: [] };
  }
  if (!isRecord(doc)) {
    return {
      config: { ...DEFAULT_CONFIG },
      warnings: ["Config must be a mapping"],
    };
  }
  if (doc.version !== undefined && doc.version !== CONFIG_VERSION) {
    return {
      config: { ...DEFAULT_CONFIG },
      warnings: [`Unsupported kubenav config version: ${String(doc.version)}`],
    };
  }

  const config: KubenavConfig = { ...DEFAULT_CONFIG };
  const warnings: string[] = [];

  for (const field of STRING_FIELDS) {
    const value = doc[field];
    if (value === undefined) continue;
    if (nonEmptyString(value)) {
      config[field] = value.trim();
    } else {
      warnings.push(`Ignoring ${field}: expected a non-empty string`);
    }
  }

  if (doc.kubeconfig !== undefined) {
    if (nonEmptyString(doc.kubeconfig)) {
      config.kubeconfig = doc.kubeconfig.trim();
    } else {
      warnings.push("Ignoring kubeconfig: expected a non-empty string");
    }
  }

  return { config, warnings };
}

export async function readKubenavConfig(
  file: string = configPath(),
): Promise<KubenavConfig> {
  let text: string;
  try {
    text = await fs.readFile(file, "utf8");
  } catch {
    log.debug("No config file, using defaults", "config", { file });
    return { ...DEFAULT_CONFIG };
  }

  const { config, warnings } = parseConfig(text);
  for (const warning of warnings) {
    log.warn(warning, "config", { file });
  }
  return config;
}
