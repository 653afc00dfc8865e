import { type AgentSyncError, isAgentSyncError } from "./base.js";
import { InternalError } from "./bases/internal-error.js";

/**
 * Wrap an unknown error into an AgentSyncError.
 * If the error is already an AgentSyncError, return it as-is.
 * Otherwise, wrap it in an InternalError.
 */
export function wrapError(error: unknown): AgentSyncError {
  if (isAgentSyncError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError({
      code: "INTERNAL_ERROR",
      message: error.message,
      metadata: { originalName: error.name },
      cause: error,
    });
  }

  const message = typeof error === "string" ? error : "An unknown error occurred";
  return new InternalError({ code: "INTERNAL_ERROR", message });
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "An unknown error occurred";
}

/**
 * Narrow an unknown value to a Node.js system error (has `.code`).
 */
export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
