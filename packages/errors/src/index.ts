/**
 * @agentsync/errors
 *
 * Shared error taxonomy for agentsync.
 *
 * The error system is built on 4 behavioral base types:
 * ValidationError, NotFoundError, ExternalError, InternalError
 *
 * Each error carries a `.code` from the catalog that discriminates
 * the specific error condition and decides the CLI exit code. Use
 * `error.code === "XXX"` for fine-grained matching, or
 * `instanceof BaseType` for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { AgentSyncError, type ErrorJSON, isAgentSyncError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";

export { getErrorMessage, isNodeError, wrapError } from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export { ExternalError, InternalError, NotFoundError, ValidationError } from "./bases/index.js";

export type {
  AgentSyncErrorOptions,
  ExternalCodes,
  InternalCodes,
  NotFoundCodes,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// DOMAIN ERRORS
// ============================================================================

export {
  ConfigError,
  InterpolationError,
  InvalidArgumentError,
  ManifestAgentEntryError,
  ManifestFileNotFoundError,
  ManifestParseError,
  ManifestSchemaError,
  NoApplicableAgentsError,
  NothingResolvedError,
  SourceUnavailableError,
} from "./classes.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export const PACKAGE_NAME = "@agentsync/errors";
