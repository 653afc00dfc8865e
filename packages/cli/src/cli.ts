/**
 * CLI pipeline: parse args -> load config -> acquire source -> synchronize
 * -> report -> write run log.
 */

import { resolve } from "node:path";

import { InvalidArgumentError, wrapError } from "@agentsync/errors";
import { listAvailableValueStreams, synchronize } from "@agentsync/sync";
import pc from "picocolors";

import { parseArgv } from "./args.js";
import { applyOverrides, loadConfig, type SyncConfig } from "./config.js";
import { type Colors, renderInit, renderReport, renderValueStreams } from "./reporter.js";
import { writeRunLog } from "./run-log.js";
import { acquireSource, type GitRunner, isGitLocator, spawnGit } from "./source.js";
import { initWorkspace } from "./workspace.js";

export type Command = "sync" | "list" | "init" | "help";

export interface CliArgs {
  readonly command: Command;
  readonly valueStream: string | undefined;
  readonly source: string | undefined;
  readonly manifest: string | undefined;
  readonly target: string | undefined;
  readonly config: string | undefined;
  readonly dryRun: boolean;
}

/** Process-level collaborators, replaceable in tests. */
export interface CliIo {
  readonly out: (text: string) => void;
  readonly err: (text: string) => void;
  readonly cwd: string;
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly now: () => Date;
  readonly git: GitRunner;
  readonly colors: Colors;
}

function stringFlag(value: string | boolean | undefined): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/**
 * @throws {InvalidArgumentError} for unknown flags, stray positionals or a
 * value stream that contains a path separator
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const { positionals, flags } = parseArgv(argv);

  let command: Command = "sync";
  let rest = positionals;
  if (flags.help === true) {
    command = "help";
  } else if (positionals[0] === "init") {
    command = "init";
    rest = positionals.slice(1);
  } else if (flags.list === true) {
    command = "list";
  }

  if (rest.length > 1) {
    throw new InvalidArgumentError(rest[1] ?? "", "unexpected argument");
  }
  const valueStream = rest[0]?.trim();
  if (valueStream !== undefined && /[\\/]/.test(valueStream)) {
    throw new InvalidArgumentError(valueStream, "value stream must not contain path separators");
  }

  return {
    command,
    valueStream: valueStream === "" ? undefined : valueStream,
    source: stringFlag(flags.source),
    manifest: stringFlag(flags.manifest),
    target: stringFlag(flags.target),
    config: stringFlag(flags.config),
    dryRun: flags["dry-run"] === true,
  };
}

export const HELP_TEXT = `
  agentsync - Synchronize agent artifacts into a workspace

  Usage:
    agentsync <value-stream> [options]
    agentsync --list [options]
    agentsync init [value-stream] [options]

  Options:
    -s, --source <path|url>  Source tree: a local directory or a git URL
    -m, --manifest <file>    Manifest file relative to the source root
    -t, --target <dir>       Workspace to synchronize into (default: current directory)
    -c, --config <file>      Configuration file (default: <target>/agentsync.yaml)
    -n, --dry-run            Resolve and classify without writing
    -l, --list               List the value streams the manifest declares
    -h, --help               Show this help message

  Examples:
    agentsync docs --source ../agents
    agentsync docs --source https://example.com/org/agents.git --dry-run
    agentsync --list --source ../agents
`;

/** Local paths given on the command line are relative to the working directory. */
function flagLocator(locator: string, cwd: string): string {
  return isGitLocator(locator) ? locator : resolve(cwd, locator);
}

/**
 * Local paths from the config file are relative to the workspace. A
 * `--source` flag has already been made absolute by `flagLocator`.
 */
async function resolveSource(config: SyncConfig, target: string, io: CliIo) {
  if (config.source === undefined) {
    throw new InvalidArgumentError(
      "--source",
      "no source given on the command line or in the config file",
    );
  }
  const locator = isGitLocator(config.source) ? config.source : resolve(target, config.source);
  return acquireSource(locator, {
    cacheDir: resolve(target, config.cacheDir),
    manifestFile: config.manifest,
    git: io.git,
  });
}

async function run(args: CliArgs, io: CliIo): Promise<number> {
  const c = io.colors;
  if (args.command === "help") {
    io.out(HELP_TEXT);
    return 0;
  }

  const target = resolve(io.cwd, args.target ?? ".");
  const loaded = await loadConfig(target, {
    ...(args.config !== undefined ? { configPath: resolve(io.cwd, args.config) } : {}),
    env: io.env,
  });
  const config = applyOverrides(loaded, {
    ...(args.source !== undefined ? { source: flagLocator(args.source, io.cwd) } : {}),
    ...(args.manifest !== undefined ? { manifest: args.manifest } : {}),
  });

  if (args.command === "init") {
    const result = await initWorkspace(target, {
      layout: config.layout,
      logDir: config.logDir,
      tempDir: config.tempDir,
    });
    io.out(renderInit(result, args.valueStream, c));
    return 0;
  }

  const source = await resolveSource(config, target, io);

  if (args.command === "list") {
    const streams = await listAvailableValueStreams({
      sourceRoot: source.root,
      manifestFile: config.manifest,
    });
    io.out(renderValueStreams(streams, c));
    return 0;
  }

  if (args.valueStream === undefined) {
    throw new InvalidArgumentError("<value-stream>", "a value stream is required (see --help)");
  }

  const report = await synchronize({
    sourceRoot: source.root,
    destinationRoot: target,
    valueStream: args.valueStream,
    manifestFile: config.manifest,
    layout: config.layout,
    conventions: config.conventions,
    dryRun: args.dryRun,
  });
  io.out(renderReport(report, target, c));

  if (!report.dryRun) {
    const logPath = await writeRunLog(resolve(target, config.logDir), {
      report,
      source: source.locator,
      target,
      manifestFile: config.manifest,
      now: io.now(),
    });
    io.out(c.dim(`Log written to ${logPath}`));
  }
  return 0;
}

/**
 * Runs the command line and returns the process exit code: 0 once at least
 * one operation resolved, the error's catalog exit code otherwise. Errors
 * from outside the catalog exit as internal errors.
 */
export async function main(
  argv: readonly string[],
  overrides: Partial<CliIo> = {},
): Promise<number> {
  const io: CliIo = {
    out: (text) => console.log(text),
    err: (text) => console.error(text),
    cwd: process.cwd(),
    env: process.env,
    now: () => new Date(),
    git: spawnGit,
    colors: pc,
    ...overrides,
  };

  try {
    return await run(parseArgs(argv), io);
  } catch (error: unknown) {
    const wrapped = wrapError(error);
    io.err(io.colors.red(`error: ${wrapped.message}`));
    return wrapped.exitCode;
  }
}
