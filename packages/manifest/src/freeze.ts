/**
 * Deep freeze for parsed manifests and resolution results.
 */

/**
 * Freezes `value` and every object or array reachable from it, in place.
 * Shared and circular references are visited once.
 */
export function deepFreeze<T>(value: T): T {
  const seen = new WeakSet<object>();
  const pending: unknown[] = [value];

  while (pending.length > 0) {
    const next = pending.pop();
    if (next === null || typeof next !== "object" || seen.has(next)) {
      continue;
    }
    seen.add(next);
    Object.freeze(next);
    pending.push(...Object.values(next));
  }

  return value;
}
