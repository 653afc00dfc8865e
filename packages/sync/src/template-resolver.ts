/**
 * Pure path-template helpers. Nothing here touches the filesystem.
 */

import {
  AGENT_PLACEHOLDER,
  type ArtifactCategory,
  type LocationTemplate,
  sameValueStream,
  VALUE_STREAM_PLACEHOLDER,
} from "@agentsync/core";

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const PLACEHOLDER_REGEX = new RegExp(
  `${escapeRegex(AGENT_PLACEHOLDER)}|${escapeRegex(VALUE_STREAM_PLACEHOLDER)}`,
  "g",
);
const WILDCARD_REGEX = /[*?]/;

const CHARTER_SUFFIX = ".charter.md";
const CHARTER_PREFIX = "charter.";

/**
 * Replaces `{agent}` and `{value_stream}` in one pass. Substituted values are
 * never re-scanned, and any other `{...}` text is left as written.
 */
export function substitute(template: string, agentName: string, valueStream: string): string {
  return template.replace(PLACEHOLDER_REGEX, (match: string) =>
    match === AGENT_PLACEHOLDER ? agentName : valueStream,
  );
}

export function hasWildcard(path: string): boolean {
  return WILDCARD_REGEX.test(path);
}

/** File-name pattern used when a template names no wildcard, per category. */
export const DEFAULT_PATTERNS: Readonly<Record<ArtifactCategory, (agentName: string) => string>> = {
  charters: (agentName) => `${agentName}${CHARTER_SUFFIX}`,
  definitions: (agentName) => `${agentName}*.agent.md`,
  prompts: (agentName) => `${agentName}*.prompt.md`,
  runners: (agentName) => `${agentName}.runner.*`,
};

export interface GlobSplit {
  /** `/`-separated directory, `.` when the path had no separator. */
  readonly directory: string;
  readonly pattern: string;
  /** True when the pattern came from DEFAULT_PATTERNS rather than the path. */
  readonly synthesized: boolean;
}

export interface SplitGlobOptions {
  readonly category: ArtifactCategory;
  readonly agentName: string;
}

/**
 * Splits a substituted path into a directory and a file-name pattern.
 *
 * With a wildcard the final segment is the pattern. Without one the final
 * segment is dropped and the category's default pattern takes its place.
 */
export function splitGlob(path: string, options: SplitGlobOptions): GlobSplit {
  const normalized = path.replace(/\\/g, "/");
  const cut = normalized.lastIndexOf("/");
  const directory = cut < 0 ? "." : cut === 0 ? "/" : normalized.slice(0, cut);

  if (hasWildcard(normalized)) {
    return { directory, pattern: normalized.slice(cut + 1), synthesized: false };
  }
  return {
    directory,
    pattern: DEFAULT_PATTERNS[options.category](options.agentName),
    synthesized: true,
  };
}

/**
 * Picks the template for a stream: a single template always applies; a
 * per-stream mapping uses the exact stream key, then a key that differs only
 * in case, then its fallback.
 */
export function selectTemplate(
  location: LocationTemplate | undefined,
  valueStream: string,
): string | undefined {
  if (location === undefined) {
    return undefined;
  }
  if (location.kind === "single") {
    return location.template;
  }
  if (Object.hasOwn(location.templates, valueStream)) {
    return location.templates[valueStream];
  }
  const key = Object.keys(location.templates).find((k) => sameValueStream(k, valueStream));
  return key !== undefined ? location.templates[key] : location.fallback;
}

/**
 * The same charter under the other naming convention:
 * `<agent>.charter.md` and `charter.<agent>.md` map onto each other within
 * one directory. Other file names have no alternate.
 */
export function charterFallback(path: string): string | undefined {
  const cut = Math.max(path.lastIndexOf("/"), path.lastIndexOf("\\"));
  const directory = path.slice(0, cut + 1);
  const base = path.slice(cut + 1);

  if (base.endsWith(CHARTER_SUFFIX) && base.length > CHARTER_SUFFIX.length) {
    const agentName = base.slice(0, -CHARTER_SUFFIX.length);
    return `${directory}${CHARTER_PREFIX}${agentName}.md`;
  }
  if (base.startsWith(CHARTER_PREFIX) && base.endsWith(".md")) {
    const agentName = base.slice(CHARTER_PREFIX.length, -".md".length);
    return agentName.length > 0 ? `${directory}${agentName}${CHARTER_SUFFIX}` : undefined;
  }
  return undefined;
}
