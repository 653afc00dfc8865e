/**
 * Source acquisition: a local directory is used in place; a git repository
 * is shallow-cloned into the cache directory once and fast-forwarded after.
 * A cached clone of another remote is discarded and cloned afresh.
 */

import { spawnSync } from "node:child_process";
import { mkdir, rm } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";

import { logWarn } from "@agentsync/core";
import { ManifestFileNotFoundError, SourceUnavailableError } from "@agentsync/errors";
import { directoryExists, fileExists } from "@agentsync/manifest";

export interface GitResult {
  readonly ok: boolean;
  /** Combined diagnostic output, used in error messages. */
  readonly output: string;
}

export type GitRunner = (args: readonly string[], cwd: string) => GitResult;

export const spawnGit: GitRunner = (args, cwd) => {
  const result = spawnSync("git", [...args], { cwd, encoding: "utf-8" });
  if (result.error) {
    return { ok: false, output: result.error.message };
  }
  return { ok: result.status === 0, output: `${result.stderr}${result.stdout}`.trim() };
};

const GIT_URL_PREFIXES = ["https://", "http://", "git@", "ssh://", "git://"];

export function isGitLocator(locator: string): boolean {
  return GIT_URL_PREFIXES.some((prefix) => locator.startsWith(prefix)) || locator.endsWith(".git");
}

export interface AcquireOptions {
  /** Clone target for git sources. */
  readonly cacheDir: string;
  /** Manifest path relative to the source root; it must exist there. */
  readonly manifestFile: string;
  readonly git?: GitRunner;
}

export interface AcquiredSource {
  readonly kind: "local" | "git";
  readonly locator: string;
  /** Absolute root of the source tree. */
  readonly root: string;
}

/** Remote URLs compare equal regardless of a trailing slash or `.git`. */
function sameRemote(a: string, b: string): boolean {
  const canonical = (url: string) => url.trim().replace(/\/+$/, "").replace(/\.git$/, "");
  return canonical(a) === canonical(b);
}

async function acquireGit(
  locator: string,
  cacheDir: string,
  git: GitRunner,
): Promise<AcquiredSource> {
  if (await directoryExists(join(cacheDir, ".git"))) {
    const remote = git(["remote", "get-url", "origin"], cacheDir);
    if (remote.ok && sameRemote(remote.output, locator)) {
      const pull = git(["pull", "--ff-only"], cacheDir);
      if (!pull.ok) {
        throw new SourceUnavailableError(locator, `git pull failed: ${pull.output}`);
      }
      return { kind: "git", locator, root: cacheDir };
    }
    logWarn(
      "source",
      `Cache ${cacheDir} holds a clone of ${remote.ok ? remote.output : "an unknown remote"}; cloning ${locator} again`,
    );
    await rm(cacheDir, { recursive: true, force: true });
  }

  await mkdir(dirname(cacheDir), { recursive: true });
  const clone = git(["clone", "--depth", "1", locator, cacheDir], dirname(cacheDir));
  if (!clone.ok) {
    throw new SourceUnavailableError(locator, `git clone failed: ${clone.output}`);
  }
  return { kind: "git", locator, root: cacheDir };
}

/**
 * Makes the source tree available and checks that it holds the manifest.
 *
 * @throws {SourceUnavailableError} when the directory is missing or git fails
 * @throws {ManifestFileNotFoundError} when the manifest is absent from the root
 */
export async function acquireSource(
  locator: string,
  options: AcquireOptions,
): Promise<AcquiredSource> {
  let source: AcquiredSource;
  if (isGitLocator(locator)) {
    source = await acquireGit(locator, resolve(options.cacheDir), options.git ?? spawnGit);
  } else {
    const root = resolve(locator);
    if (!(await directoryExists(root))) {
      throw new SourceUnavailableError(locator, "directory does not exist");
    }
    source = { kind: "local", locator, root };
  }

  const manifestPath = resolve(source.root, options.manifestFile);
  if (!(await fileExists(manifestPath))) {
    throw new ManifestFileNotFoundError(manifestPath);
  }
  return source;
}
