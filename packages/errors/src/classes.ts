/**
 * Domain error classes. Each one pins a catalog code on a base type and
 * builds its message from the structured fields it carries.
 */

import { ExternalError } from "./bases/external-error.js";
import { NotFoundError } from "./bases/not-found-error.js";
import { ValidationError } from "./bases/validation-error.js";

// ============================================================================
// MANIFEST
// ============================================================================

export class ManifestFileNotFoundError extends NotFoundError<"MANIFEST_FILE_NOT_FOUND"> {
  constructor(readonly filePath: string) {
    super({
      code: "MANIFEST_FILE_NOT_FOUND",
      message: `Manifest file not found: ${filePath}`,
      metadata: { filePath },
    });
  }
}

export class ManifestParseError extends ValidationError<"MANIFEST_PARSE_FAILED"> {
  constructor(
    readonly filePath: string | undefined,
    detail: string,
    readonly line?: number,
    readonly column?: number,
    cause?: unknown,
  ) {
    const location =
      line !== undefined ? ` at line ${line}${column !== undefined ? `:${column}` : ""}` : "";
    super({
      code: "MANIFEST_PARSE_FAILED",
      message: `Manifest parse failed${filePath ? ` (${filePath})` : ""}${location}: ${detail}`,
      cause,
    });
  }
}

export class ManifestSchemaError extends ValidationError<"MANIFEST_VALIDATION_FAILED"> {
  constructor(
    readonly schemaIssues: readonly string[],
    cause?: unknown,
  ) {
    super({
      code: "MANIFEST_VALIDATION_FAILED",
      message: `Manifest validation failed:\n${schemaIssues.map((i) => `  - ${i}`).join("\n")}`,
      cause,
      issues: schemaIssues.map((i) => ({ field: "manifest", message: i, code: "SCHEMA_ISSUE" })),
    });
  }
}

/**
 * A flat-form agent record that cannot become an Agent. `index` is the
 * zero-based position in the `agents` list.
 */
export class ManifestAgentEntryError extends ValidationError<"MANIFEST_AGENT_INVALID"> {
  constructor(
    readonly index: number,
    readonly problems: readonly string[],
  ) {
    super({
      code: "MANIFEST_AGENT_INVALID",
      message: `Invalid agent entry at index ${index}: ${problems.join("; ")}`,
      metadata: { index: String(index) },
      issues: problems.map((p) => ({ field: `agents[${index}]`, message: p, code: "AGENT_ENTRY" })),
    });
  }
}

// ============================================================================
// CONFIG
// ============================================================================

export class InterpolationError extends ValidationError<"CONFIG_INTERPOLATION_FAILED"> {
  constructor(readonly missingVars: readonly string[]) {
    super({
      code: "CONFIG_INTERPOLATION_FAILED",
      message: `Missing environment variables: ${missingVars.join(", ")}`,
      issues: missingVars.map((v) => ({
        field: v,
        message: `Environment variable ${v} is not set`,
        code: "MISSING_ENV_VAR",
      })),
    });
  }
}

export class ConfigError extends ValidationError<"CONFIG_INVALID"> {
  constructor(
    readonly configPath: string | undefined,
    readonly problems: readonly string[],
    cause?: unknown,
  ) {
    super({
      code: "CONFIG_INVALID",
      message: `Invalid configuration${configPath ? ` (${configPath})` : ""}:\n${problems
        .map((p) => `  - ${p}`)
        .join("\n")}`,
      cause,
      issues: problems.map((p) => ({ field: "config", message: p, code: "CONFIG_ISSUE" })),
    });
  }
}

// ============================================================================
// SOURCE
// ============================================================================

export class SourceUnavailableError extends ExternalError<"SOURCE_UNAVAILABLE"> {
  constructor(
    readonly locator: string,
    reason: string,
    cause?: unknown,
  ) {
    super({
      code: "SOURCE_UNAVAILABLE",
      message: `Source "${locator}" is unavailable: ${reason}`,
      metadata: { locator },
      cause,
    });
  }
}

// ============================================================================
// SYNC
// ============================================================================

export class NoApplicableAgentsError extends NotFoundError<"SYNC_NO_APPLICABLE_AGENTS"> {
  constructor(
    readonly valueStream: string,
    readonly available: readonly string[],
  ) {
    const hint = available.length > 0 ? ` Available value streams: ${available.join(", ")}` : "";
    super({
      code: "SYNC_NO_APPLICABLE_AGENTS",
      message: `No agents found for value stream "${valueStream}".${hint}`,
      metadata: { valueStream },
    });
  }
}

export class NothingResolvedError extends NotFoundError<"SYNC_NOTHING_RESOLVED"> {
  constructor(
    readonly valueStream: string,
    readonly gapCount: number,
  ) {
    super({
      code: "SYNC_NOTHING_RESOLVED",
      message: `No artifacts resolved for value stream "${valueStream}" (${gapCount} gap(s) reported)`,
      metadata: { valueStream },
    });
  }
}

// ============================================================================
// CLI
// ============================================================================

export class InvalidArgumentError extends ValidationError<"CLI_INVALID_ARGUMENT"> {
  constructor(
    readonly argument: string,
    reason: string,
  ) {
    super({
      code: "CLI_INVALID_ARGUMENT",
      message: `Invalid argument ${argument}: ${reason}`,
      metadata: { argument },
    });
  }
}
