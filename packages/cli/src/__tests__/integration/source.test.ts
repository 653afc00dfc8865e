import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { mkdir, rm } from "node:fs/promises";
import { dirname, join } from "node:path";
import { ManifestFileNotFoundError, SourceUnavailableError } from "@agentsync/errors";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { acquireSource, type GitRunner, isGitLocator } from "../../source.js";
import { makeTempDir, writeTree } from "../helpers/tree.js";

const REPO_URL = "https://example.com/org/agents.git";

interface GitCall {
  readonly args: readonly string[];
  readonly cwd: string;
}

interface FakeGitOptions {
  /** URL reported by `git remote get-url origin`. */
  readonly remote?: string;
  readonly onClone?: (dest: string) => void;
}

function fakeGit(calls: GitCall[], options: FakeGitOptions = {}): GitRunner {
  return (args, cwd) => {
    calls.push({ args, cwd });
    if (args[0] === "remote") {
      return options.remote !== undefined
        ? { ok: true, output: options.remote }
        : { ok: false, output: "error: No such remote 'origin'" };
    }
    const dest = args[args.length - 1];
    if (args[0] === "clone" && dest !== undefined && options.onClone) {
      options.onClone(dest);
    }
    return { ok: true, output: "" };
  };
}

describe("isGitLocator", () => {
  it.each([
    ["https://example.com/org/agents.git", true],
    ["https://example.com/org/agents", true],
    ["git@example.com:org/agents.git", true],
    ["ssh://git@example.com/org/agents", true],
    ["../agents.git", true],
    ["../agents", false],
    ["/srv/agents", false],
  ])("%s → %s", (locator, expected) => {
    expect(isGitLocator(locator)).toBe(expected);
  });
});

describe("acquireSource", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir("source");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("uses a local directory in place", async () => {
    const root = join(dir, "agents");
    await writeTree(root, { "agents-publicatie.json": "{}" });

    const source = await acquireSource(root, {
      cacheDir: join(dir, "cache"),
      manifestFile: "agents-publicatie.json",
    });

    expect(source).toEqual({ kind: "local", locator: root, root });
  });

  it("fails for a missing local directory", async () => {
    const root = join(dir, "missing");
    await expect(
      acquireSource(root, { cacheDir: join(dir, "cache"), manifestFile: "m.json" }),
    ).rejects.toThrow(`Source "${root}" is unavailable: directory does not exist`);
  });

  it("fails when the manifest is absent", async () => {
    const root = join(dir, "agents");
    await mkdir(root);
    await expect(
      acquireSource(root, { cacheDir: join(dir, "cache"), manifestFile: "m.json" }),
    ).rejects.toBeInstanceOf(ManifestFileNotFoundError);
  });

  it("shallow-clones a git source into the cache directory", async () => {
    const calls: GitCall[] = [];
    const cacheDir = join(dir, ".agentsync", "source");
    const git = fakeGit(calls, {
      onClone: (dest) => {
        mkdirSync(join(dest, ".git"), { recursive: true });
        writeFileSync(join(dest, "agents-publicatie.json"), "{}");
      },
    });

    const source = await acquireSource(REPO_URL, {
      cacheDir,
      manifestFile: "agents-publicatie.json",
      git,
    });

    expect(source).toEqual({ kind: "git", locator: REPO_URL, root: cacheDir });
    expect(calls).toEqual([
      { args: ["clone", "--depth", "1", REPO_URL, cacheDir], cwd: dirname(cacheDir) },
    ]);
  });

  it("fast-forwards an existing clone", async () => {
    const calls: GitCall[] = [];
    const cacheDir = join(dir, "cache");
    await writeTree(cacheDir, { ".git/HEAD": "ref", "agents-publicatie.json": "{}" });

    await acquireSource(REPO_URL, {
      cacheDir,
      manifestFile: "agents-publicatie.json",
      git: fakeGit(calls, { remote: "https://example.com/org/agents" }),
    });

    expect(calls).toEqual([
      { args: ["remote", "get-url", "origin"], cwd: cacheDir },
      { args: ["pull", "--ff-only"], cwd: cacheDir },
    ]);
  });

  it("re-clones a cache that holds another repository", async () => {
    const calls: GitCall[] = [];
    const cacheDir = join(dir, "cache");
    await writeTree(cacheDir, {
      ".git/HEAD": "ref",
      "stale.md": "old",
      "agents-publicatie.json": "{}",
    });
    const otherUrl = "https://example.com/org/other-agents.git";
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const git = fakeGit(calls, {
      remote: REPO_URL,
      onClone: (dest) => {
        mkdirSync(dest, { recursive: true });
        writeFileSync(join(dest, "agents-publicatie.json"), "{}");
      },
    });

    const source = await acquireSource(otherUrl, {
      cacheDir,
      manifestFile: "agents-publicatie.json",
      git,
    });

    expect(source).toEqual({ kind: "git", locator: otherUrl, root: cacheDir });
    expect(calls).toEqual([
      { args: ["remote", "get-url", "origin"], cwd: cacheDir },
      { args: ["clone", "--depth", "1", otherUrl, cacheDir], cwd: dir },
    ]);
    expect(existsSync(join(cacheDir, "stale.md"))).toBe(false);
    expect(warn).toHaveBeenCalledWith(
      `[agentsync:source] Cache ${cacheDir} holds a clone of ${REPO_URL}; cloning ${otherUrl} again`,
    );
  });

  it("re-clones a cache without an origin remote", async () => {
    const calls: GitCall[] = [];
    const cacheDir = join(dir, "cache");
    await writeTree(cacheDir, { ".git/HEAD": "ref" });
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const git = fakeGit(calls, {
      onClone: (dest) => {
        mkdirSync(dest, { recursive: true });
        writeFileSync(join(dest, "agents-publicatie.json"), "{}");
      },
    });

    await acquireSource(REPO_URL, { cacheDir, manifestFile: "agents-publicatie.json", git });

    expect(calls.map((c) => c.args[0])).toEqual(["remote", "clone"]);
  });

  it("reports git failures", async () => {
    const failing: GitRunner = () => ({ ok: false, output: "fatal: repository not found" });

    await expect(
      acquireSource(REPO_URL, { cacheDir: join(dir, "cache"), manifestFile: "m.json", git: failing }),
    ).rejects.toThrow(
      `Source "${REPO_URL}" is unavailable: git clone failed: fatal: repository not found`,
    );
    await expect(
      acquireSource(REPO_URL, { cacheDir: join(dir, "cache"), manifestFile: "m.json", git: failing }),
    ).rejects.toBeInstanceOf(SourceUnavailableError);
  });
});
