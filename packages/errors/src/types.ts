/**
 * Type infrastructure for the error system.
 */

import type { CodesForBase, ErrorCode } from "./catalog.js";

/**
 * Structured validation issue (field-level detail)
 */
export interface ValidationIssue {
  readonly field: string;
  readonly message: string;
  readonly code: string;
}

/**
 * Options for constructing a base error type.
 * The code determines domain, exit code and isExpected via catalog lookup.
 */
export interface AgentSyncErrorOptions<C extends ErrorCode> {
  readonly code: C;
  readonly message: string;
  readonly metadata?: Readonly<Record<string, string>> | undefined;
  readonly cause?: unknown;
}

export type ValidationCodes = CodesForBase<"ValidationError">;
export type NotFoundCodes = CodesForBase<"NotFoundError">;
export type ExternalCodes = CodesForBase<"ExternalError">;
export type InternalCodes = CodesForBase<"InternalError">;
