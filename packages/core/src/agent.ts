import { UTILITY_VALUE_STREAM } from "./constants.js";
import type { Agent } from "./manifest-types.js";

/** Case-insensitive value stream comparison. */
export function sameValueStream(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

export function isUtilityStream(valueStream: string): boolean {
  return sameValueStream(valueStream, UTILITY_VALUE_STREAM);
}

/**
 * Utility agents apply to every stream; any other agent only to its own.
 */
export function appliesTo(agent: Agent, targetStream: string): boolean {
  return isUtilityStream(agent.valueStream) || sameValueStream(agent.valueStream, targetStream);
}
