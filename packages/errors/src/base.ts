import {
  type BaseErrorType,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";
import type { AgentSyncErrorOptions } from "./types.js";

export interface ErrorJSON {
  readonly _tag: BaseErrorType;
  readonly code: ErrorCode;
  readonly domain: ErrorDomain;
  readonly message: string;
  readonly exitCode: number;
  readonly metadata?: Readonly<Record<string, string>>;
}

/**
 * Root of the agentsync error hierarchy. Subclasses fix `_tag`; everything
 * else is looked up from the catalog entry of `code`.
 */
export abstract class AgentSyncError<C extends ErrorCode = ErrorCode> extends Error {
  abstract readonly _tag: BaseErrorType;
  readonly code: C;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly exitCode: number;
  readonly metadata: Readonly<Record<string, string>> | undefined;

  constructor(options: AgentSyncErrorOptions<C>) {
    super(options.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    const entry: ErrorCatalogEntry = ERROR_CATALOG[options.code];
    this.code = options.code;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.exitCode = entry.exitCode;
    this.metadata = options.metadata;
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      code: this.code,
      domain: this.domain,
      message: this.message,
      exitCode: this.exitCode,
      ...(this.metadata ? { metadata: this.metadata } : {}),
    };
  }
}

export function isAgentSyncError(error: unknown): error is AgentSyncError {
  return error instanceof AgentSyncError;
}
