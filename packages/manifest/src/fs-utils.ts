/**
 * Small async filesystem checks shared by the loader and the resolver.
 */

import { readFile, stat } from "node:fs/promises";
import { resolve } from "node:path";

import { isNodeError } from "@agentsync/errors";

export type PathKind = "file" | "directory" | "missing";

/**
 * Classifies a path without throwing for the common "does not exist" cases
 * (ENOENT, ENOTDIR). Other errors (e.g. EACCES) propagate.
 */
export async function pathKind(filePath: string): Promise<PathKind> {
  try {
    const s = await stat(resolve(filePath));
    if (s.isDirectory()) return "directory";
    if (s.isFile()) return "file";
    return "missing";
  } catch (error: unknown) {
    if (isNodeError(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return "missing";
    }
    throw error;
  }
}

/** Checks whether a path points to an existing regular file. */
export async function fileExists(filePath: string): Promise<boolean> {
  return (await pathKind(filePath)) === "file";
}

/** Checks whether a path points to an existing directory. */
export async function directoryExists(filePath: string): Promise<boolean> {
  return (await pathKind(filePath)) === "directory";
}

/**
 * Reads a UTF-8 text file and strips a leading BOM (manifests saved by
 * Windows editors often carry one).
 */
export async function readTextFile(filePath: string): Promise<string> {
  const content = await readFile(resolve(filePath), "utf-8");
  return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}
