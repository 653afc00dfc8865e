import { AgentSyncError } from "../base.js";
import type { InternalCodes } from "../types.js";

/**
 * Unexpected failures (bugs). Unknown thrown values are wrapped into this type.
 */
export class InternalError<C extends InternalCodes = "INTERNAL_ERROR"> extends AgentSyncError<C> {
  override readonly _tag = "InternalError" as const;
}
