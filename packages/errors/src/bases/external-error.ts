import { AgentSyncError } from "../base.js";
import type { ExternalCodes } from "../types.js";

/**
 * Errors raised by a dependency outside the process (git, the filesystem of a
 * remote checkout).
 */
export class ExternalError<C extends ExternalCodes = ExternalCodes> extends AgentSyncError<C> {
  override readonly _tag = "ExternalError" as const;
}
