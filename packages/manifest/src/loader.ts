/**
 * Async file-based manifest loader.
 * Reads the manifest from disk and delegates to parseManifestDocument().
 */

import { resolve } from "node:path";

import type { ParsedManifest } from "@agentsync/core";
import { isNodeError, ManifestFileNotFoundError } from "@agentsync/errors";

import { readTextFile } from "./fs-utils.js";
import { parseManifestDocument } from "./parser.js";

/**
 * Reads a manifest file and returns a validated, frozen ParsedManifest.
 *
 * @param filePath - path to the YAML or JSON file (relative or absolute)
 */
export async function loadManifest(filePath: string): Promise<ParsedManifest> {
  const absolutePath = resolve(filePath);

  let content: string;
  try {
    content = await readTextFile(absolutePath);
  } catch (error: unknown) {
    if (isNodeError(error) && (error.code === "ENOENT" || error.code === "EISDIR")) {
      throw new ManifestFileNotFoundError(absolutePath);
    }
    throw error;
  }

  return parseManifestDocument(content, { filePath: absolutePath });
}

/** Sorted, distinct, non-utility value streams the manifest declares. */
export function listValueStreams(manifest: ParsedManifest): readonly string[] {
  return manifest.valueStreams;
}
