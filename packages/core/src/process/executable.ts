/**
 * Locating external tools (capture and remux binaries).
 */

import * as fs from "node:fs";
import * as path from "node:path";

/** Fallback directories searched after PATH */
export const WELL_KNOWN_BIN_DIRS = [
  "/opt/homebrew/bin",
  "/usr/local/bin",
  "/usr/bin",
] as const;

export function isExecutableFile(filePath: string): boolean {
  try {
    if (!fs.statSync(filePath).isFile()) return false;
    fs.accessSync(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export interface ResolveExecutableOptions {
  /** Explicit path; used when it points at an executable file */
  override?: string | null;

  /** Search PATH before the well-known directories (default true) */
  searchPath?: boolean;

  /** PATH value to search (defaults to process.env.PATH) */
  pathEnv?: string;

  /** Directories searched after PATH */
  fallbackDirs?: readonly string[];
}

/**
 * Resolve a binary by name: override first, then PATH, then the
 * well-known directories. First match wins; null when none is found.
 */
export function resolveExecutable(
  name: string,
  options: ResolveExecutableOptions = {}
): string | null {
  const override = options.override?.trim();
  if (override && isExecutableFile(override)) {
    return override;
  }

  const searchDirs: string[] = [];
  if (options.searchPath ?? true) {
    const pathEnv = options.pathEnv ?? process.env["PATH"] ?? "";
    searchDirs.push(...pathEnv.split(path.delimiter).filter((d) => d.length > 0));
  }
  searchDirs.push(...(options.fallbackDirs ?? WELL_KNOWN_BIN_DIRS));

  for (const dir of searchDirs) {
    const candidate = path.join(dir, name);
    if (isExecutableFile(candidate)) {
      return candidate;
    }
  }
  return null;
}
