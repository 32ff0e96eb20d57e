import fs from "node:fs/promises";

const PACKAGE_JSON = new URL("../../package.json", import.meta.url);

export async function readPackageVersion(): Promise<string> {
  const pkg: unknown = JSON.parse(await fs.readFile(PACKAGE_JSON, "utf8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}
