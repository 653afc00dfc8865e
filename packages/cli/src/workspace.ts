/**
 * Workspace bootstrap: the artifact subtrees, the log and scratch
 * directories, and their .gitignore entries.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import {
  ARTIFACT_CATEGORIES,
  DEFAULT_WORKSPACE_LAYOUT,
  type WorkspaceLayout,
} from "@agentsync/core";
import { isNodeError } from "@agentsync/errors";
import { directoryExists, readTextFile } from "@agentsync/manifest";

export interface InitWorkspaceOptions {
  readonly layout?: WorkspaceLayout;
  readonly logDir?: string;
  readonly tempDir?: string;
}

export interface InitWorkspaceResult {
  /** Workspace-relative directories that were created. */
  readonly created: readonly string[];
  /** Workspace-relative directories that already existed. */
  readonly existing: readonly string[];
  /** Entries appended to .gitignore (empty when it was already complete). */
  readonly gitignoreAdded: readonly string[];
}

const GITIGNORE_HEADER = "# agentsync run logs and scratch files";

async function readOptional(path: string): Promise<string | undefined> {
  try {
    return await readTextFile(path);
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}

function asDirEntry(dir: string): string {
  return `${dir.replace(/\\/g, "/").replace(/\/+$/, "")}/`;
}

/**
 * Ensures each entry is ignored, keeping the existing lines as they are.
 * Returns the entries that were added.
 */
export async function ensureGitignore(root: string, entries: readonly string[]): Promise<string[]> {
  const path = join(root, ".gitignore");
  const content = await readOptional(path);
  const present = new Set(
    (content ?? "")
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !line.startsWith("#"))
      .map(asDirEntry),
  );

  const missing = entries.map(asDirEntry).filter((entry) => !present.has(entry));
  if (missing.length === 0) {
    return [];
  }

  let base = content ?? "";
  if (base.length > 0 && !base.endsWith("\n")) {
    base = `${base}\n`;
  }
  const separator = base.length > 0 ? "\n" : "";
  await writeFile(path, `${base}${separator}${GITIGNORE_HEADER}\n${missing.join("\n")}\n`, "utf-8");
  return missing;
}

/**
 * Creates the workspace directories (idempotent) and the .gitignore entries
 * for the log and temp directories.
 */
export async function initWorkspace(
  root: string,
  options: InitWorkspaceOptions = {},
): Promise<InitWorkspaceResult> {
  const layout = options.layout ?? DEFAULT_WORKSPACE_LAYOUT;
  const logDir = options.logDir ?? "logs";
  const tempDir = options.tempDir ?? "temp";

  const created: string[] = [];
  const existing: string[] = [];
  for (const dir of [...ARTIFACT_CATEGORIES.map((c) => layout[c]), logDir, tempDir]) {
    const path = join(root, dir);
    if (await directoryExists(path)) {
      existing.push(dir);
    } else {
      await mkdir(path, { recursive: true });
      created.push(dir);
    }
  }

  const gitignoreAdded = await ensureGitignore(root, [logDir, tempDir]);
  return { created, existing, gitignoreAdded };
}
