/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code raised by agentsync is declared here once. A code maps to
 * its domain, the base error type that carries it, whether it is an expected
 * (operator-facing) condition, and the process exit code the CLI reports.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: manifest, config, source, sync, cli, internal
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType = "ValidationError" | "NotFoundError" | "ExternalError" | "InternalError";

export type ErrorDomain = "manifest" | "config" | "source" | "sync" | "cli" | "internal";

export interface ErrorCatalogEntry {
  readonly domain: ErrorDomain;
  readonly baseType: BaseErrorType;
  readonly isExpected: boolean;
  readonly exitCode: number;
  readonly title: string;
  readonly description: string;
}

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    baseType: "InternalError",
    isExpected: false,
    exitCode: 1,
    title: "Internal error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // MANIFEST ERRORS
  // ============================================================================
  MANIFEST_FILE_NOT_FOUND: {
    domain: "manifest",
    baseType: "NotFoundError",
    isExpected: true,
    exitCode: 3,
    title: "Manifest file not found",
    description: "The manifest document does not exist in the source root",
  },
  MANIFEST_PARSE_FAILED: {
    domain: "manifest",
    baseType: "ValidationError",
    isExpected: true,
    exitCode: 2,
    title: "Manifest parse failed",
    description: "The manifest document is not valid YAML or JSON",
  },
  MANIFEST_VALIDATION_FAILED: {
    domain: "manifest",
    baseType: "ValidationError",
    isExpected: true,
    exitCode: 2,
    title: "Manifest validation failed",
    description: "The manifest document does not match the manifest schema",
  },
  MANIFEST_AGENT_INVALID: {
    domain: "manifest",
    baseType: "ValidationError",
    isExpected: true,
    exitCode: 2,
    title: "Invalid agent entry",
    description: "A flat-form agent entry is missing required fields or is a duplicate",
  },

  // ============================================================================
  // CONFIG ERRORS
  // ============================================================================
  CONFIG_INTERPOLATION_FAILED: {
    domain: "config",
    baseType: "ValidationError",
    isExpected: true,
    exitCode: 2,
    title: "Interpolation failed",
    description: "A referenced environment variable is not set and has no default",
  },
  CONFIG_INVALID: {
    domain: "config",
    baseType: "ValidationError",
    isExpected: true,
    exitCode: 2,
    title: "Invalid configuration",
    description: "The configuration file or command-line options are invalid",
  },

  // ============================================================================
  // SOURCE ERRORS
  // ============================================================================
  SOURCE_UNAVAILABLE: {
    domain: "source",
    baseType: "ExternalError",
    isExpected: true,
    exitCode: 4,
    title: "Source unavailable",
    description: "The source tree could not be acquired",
  },

  // ============================================================================
  // SYNC ERRORS
  // ============================================================================
  SYNC_NO_APPLICABLE_AGENTS: {
    domain: "sync",
    baseType: "NotFoundError",
    isExpected: true,
    exitCode: 3,
    title: "No applicable agents",
    description: "The manifest declares no agents for the requested value stream",
  },
  SYNC_NOTHING_RESOLVED: {
    domain: "sync",
    baseType: "NotFoundError",
    isExpected: true,
    exitCode: 3,
    title: "Nothing resolved",
    description: "No artifact in the source tree matched the manifest",
  },

  // ============================================================================
  // CLI ERRORS
  // ============================================================================
  CLI_INVALID_ARGUMENT: {
    domain: "cli",
    baseType: "ValidationError",
    isExpected: true,
    exitCode: 2,
    title: "Invalid argument",
    description: "A command-line argument is missing or malformed",
  },
} as const satisfies Readonly<Record<string, ErrorCatalogEntry>>;

export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Error codes whose catalog entry maps to the given base type.
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
