/**
 * Single-directory glob listing. Patterns never cross directories, so one
 * readdir plus a picomatch test per entry is enough.
 */

import { readdir } from "node:fs/promises";
import { join } from "node:path";

import { isNodeError } from "@agentsync/errors";
import picomatch from "picomatch";

/** `file` lists regular files only; `entry` also lists directories. */
export type MatchKind = "file" | "entry";

function byCodePoint(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Absolute paths of entries in `directory` whose names match `pattern`,
 * sorted by name. A missing directory has no matches.
 */
export async function listMatches(
  directory: string,
  pattern: string,
  kind: MatchKind = "file",
): Promise<string[]> {
  const isMatch = picomatch(pattern, { dot: true });
  try {
    const entries = await readdir(directory, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() || (kind === "entry" && entry.isDirectory()))
      .map((entry) => entry.name)
      .filter((name) => isMatch(name))
      .sort(byCodePoint)
      .map((name) => join(directory, name));
  } catch (error: unknown) {
    if (isNodeError(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return [];
    }
    throw error;
  }
}
