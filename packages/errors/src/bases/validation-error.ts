import { AgentSyncError } from "../base.js";
import type { AgentSyncErrorOptions, ValidationCodes, ValidationIssue } from "../types.js";

/**
 * Errors caused by invalid input, manifest content, or configuration.
 * The `.code` field discriminates the specific error.
 */
export class ValidationError<C extends ValidationCodes = ValidationCodes> extends AgentSyncError<C> {
  override readonly _tag = "ValidationError" as const;

  /** Structured validation issues (may be empty) */
  readonly issues: readonly ValidationIssue[];

  constructor(options: AgentSyncErrorOptions<C> & { readonly issues?: readonly ValidationIssue[] }) {
    super(options);
    this.issues = options.issues ?? [];
  }
}
