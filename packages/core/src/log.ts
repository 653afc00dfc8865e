/**
 * Log a warning with a consistent format: [agentsync:tag] message
 */
export function logWarn(tag: string, message: string): void {
  console.warn(`[agentsync:${tag}] ${message}`);
}
