import { type Agent, isUtilityStream } from "@agentsync/core";

/**
 * Sorted, case-insensitively distinct, non-utility stream names. The first
 * spelling seen is kept.
 */
export function distinctValueStreams(names: Iterable<string>): string[] {
  const byKey = new Map<string, string>();
  for (const raw of names) {
    const name = raw.trim();
    const key = name.toLowerCase();
    if (name === "" || isUtilityStream(name) || byKey.has(key)) {
      continue;
    }
    byKey.set(key, name);
  }
  return [...byKey.values()].sort((a, b) => a.localeCompare(b));
}

/**
 * Streams derived from parsed agents, used for flat-form manifests, where no
 * grouping keys exist.
 */
export function valueStreamsFromAgents(agents: readonly Agent[]): string[] {
  return distinctValueStreams(agents.map((a) => a.valueStream));
}
