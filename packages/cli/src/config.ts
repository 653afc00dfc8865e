/**
 * Workspace configuration: `agentsync.yaml` in the target workspace,
 * env-interpolated and validated with Zod. Command-line flags override it.
 */

import { posix, resolve } from "node:path";

import {
  DEFAULT_CONVENTIONS,
  DEFAULT_MANIFEST_FILE,
  DEFAULT_WORKSPACE_LAYOUT,
} from "@agentsync/core";
import { ConfigError, getErrorMessage, isNodeError } from "@agentsync/errors";
import { interpolateEnvVars, isPlainObject, readTextFile } from "@agentsync/manifest";
import { parse as parseYaml, YAMLParseError } from "yaml";
import { z } from "zod";

export const CONFIG_FILE = "agentsync.yaml";

const PathSchema = z.string().trim().min(1);

/** True when `path` is relative and stays below the directory it is joined to. */
function isContainedPath(path: string): boolean {
  const normalized = posix.normalize(path.replace(/\\/g, "/"));
  if (normalized.startsWith("/") || /^[A-Za-z]:/.test(normalized)) {
    return false;
  }
  return normalized !== ".." && !normalized.startsWith("../");
}

/** Workspace subdirectories; destinations must not leave the workspace. */
const WorkspacePathSchema = PathSchema.refine(isContainedPath, {
  message: "Must be a relative path inside the workspace",
});

const LayoutSchema = z
  .object({
    charters: WorkspacePathSchema.default(DEFAULT_WORKSPACE_LAYOUT.charters),
    definitions: WorkspacePathSchema.default(DEFAULT_WORKSPACE_LAYOUT.definitions),
    prompts: WorkspacePathSchema.default(DEFAULT_WORKSPACE_LAYOUT.prompts),
    runners: WorkspacePathSchema.default(DEFAULT_WORKSPACE_LAYOUT.runners),
  })
  .strict();

const ConventionsSchema = z
  .object({
    definitions: PathSchema.default(DEFAULT_CONVENTIONS.definitions),
    runners: PathSchema.default(DEFAULT_CONVENTIONS.runners),
  })
  .strict();

export const SyncConfigSchema = z
  .object({
    /** Local directory or git URL of the source tree. */
    source: PathSchema.optional(),
    manifest: PathSchema.default(DEFAULT_MANIFEST_FILE),
    cacheDir: PathSchema.default(".agentsync/source"),
    logDir: WorkspacePathSchema.default("logs"),
    tempDir: WorkspacePathSchema.default("temp"),
    layout: LayoutSchema.default({}),
    conventions: ConventionsSchema.default({}),
  })
  .strict();

export type SyncConfig = z.infer<typeof SyncConfigSchema>;

export interface LoadConfigOptions {
  /** Explicit config file; it must exist. Defaults to `<workspace>/agentsync.yaml`. */
  readonly configPath?: string;
  readonly env?: Readonly<Record<string, string | undefined>>;
}

export interface ConfigOverrides {
  readonly source?: string;
  readonly manifest?: string;
}

/** Validates a raw config object (already interpolated and parsed). */
export function parseConfig(raw: unknown, configPath?: string): SyncConfig {
  const result = SyncConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(
      configPath,
      result.error.issues.map((i) =>
        i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message,
      ),
      result.error,
    );
  }
  return result.data;
}

/**
 * Loads the workspace configuration. A missing default file yields the
 * defaults; a missing explicit file is an error.
 *
 * @throws {ConfigError} when the file is unreadable, unparsable or invalid
 * @throws {InterpolationError} when a referenced variable is unset without a default
 */
export async function loadConfig(
  workspaceRoot: string,
  options: LoadConfigOptions = {},
): Promise<SyncConfig> {
  const explicit = options.configPath !== undefined;
  const configPath = resolve(workspaceRoot, options.configPath ?? CONFIG_FILE);

  let text: string;
  try {
    text = await readTextFile(configPath);
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === "ENOENT" && !explicit) {
      return parseConfig({});
    }
    throw new ConfigError(configPath, [`cannot read file: ${getErrorMessage(error)}`], error);
  }

  const interpolated = interpolateEnvVars(text, options.env ?? process.env);

  let raw: unknown;
  try {
    raw = parseYaml(interpolated);
  } catch (error: unknown) {
    if (error instanceof YAMLParseError) {
      throw new ConfigError(configPath, [error.message], error);
    }
    throw error;
  }

  if (raw !== null && raw !== undefined && !isPlainObject(raw)) {
    throw new ConfigError(configPath, ["Expected a mapping at the document root"]);
  }
  return parseConfig(raw, configPath);
}

/** Returns a copy of `config` with the given flags taking precedence. */
export function applyOverrides(config: SyncConfig, overrides: ConfigOverrides): SyncConfig {
  return {
    ...config,
    ...(overrides.source !== undefined ? { source: overrides.source } : {}),
    ...(overrides.manifest !== undefined ? { manifest: overrides.manifest } : {}),
  };
}
