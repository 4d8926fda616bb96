import { readFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { isRecord } from "./utils/guards.js";
import { findPackageRoot } from "./utils/package-root.js";

/** Read version from package.json. */
function readVersion(): string {
  const p = join(findPackageRoot(), "package.json");
  if (!existsSync(p)) return "unknown";
  try {
    const pkg: unknown = JSON.parse(readFileSync(p, "utf-8"));
    if (isRecord(pkg) && pkg.name === "tasker" && typeof pkg.version === "string") return pkg.version;
  } catch {
    // unreadable package.json; fall through
  }
  return "unknown";
}

const VERSION = readVersion();

export function getVersion(): string {
  return VERSION;
}
