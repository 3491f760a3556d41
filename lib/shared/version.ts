/**
 * Version constant read from package.json at module load time
 */
import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

function findPackageJson(from: string): string | undefined {
  for (let dir = from; ; dir = dirname(dir)) {
    const candidate = join(dir, "package.json");
    if (existsSync(candidate)) {
      return candidate;
    }
    if (dirname(dir) === dir) {
      return undefined;
    }
  }
}

function readVersion(): string {
  const packageJsonPath = findPackageJson(
    dirname(fileURLToPath(import.meta.url)),
  );
  if (packageJsonPath === undefined) {
    return "unknown";
  }
  const json: unknown = JSON.parse(readFileSync(packageJsonPath, "utf8"));
  if (
    typeof json === "object" && json !== null && "version" in json &&
    typeof json.version === "string"
  ) {
    return json.version;
  }
  return "unknown";
}

export const VERSION: string = readVersion();
