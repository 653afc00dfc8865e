import { AgentSyncError } from "../base.js";
import type { NotFoundCodes } from "../types.js";

/**
 * Errors when a required document, source tree, or result set does not exist.
 */
export class NotFoundError<C extends NotFoundCodes = NotFoundCodes> extends AgentSyncError<C> {
  override readonly _tag = "NotFoundError" as const;
}
