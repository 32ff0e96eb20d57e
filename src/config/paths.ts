import os from "node:os";
import path from "node:path";

export function configPath(env: NodeJS.ProcessEnv = process.env): string {
  return (
    env.KUBENAV_CONFIG ??
    path.join(
      env.XDG_CONFIG_HOME || path.join(os.homedir(), ".config"),
      "kubenav",
      "config",
    )
  );
}
