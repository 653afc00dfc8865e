/**
 * Key-alias normalizer for manifest documents.
 *
 * Publication manifests exist with Dutch and English keys. This maps every
 * accepted alias onto the canonical key before schema validation. When both
 * spellings are present the canonical one wins. Always returns new objects;
 * never mutates the input.
 */

type Aliases = Readonly<Record<string, string>>;

const TOP_LEVEL_ALIASES: Aliases = {
  versie: "version",
  publicatiedatum: "published_at",
  locaties: "locations",
};

const LOCATION_ALIASES: Aliases = {
  agent_definitions: "definitions",
  "agent-contracten": "definitions",
  runner_units: "runners",
};

const COUNT_ALIASES: Aliases = {
  prompt_count: "prompts",
  definition_count: "definitions",
  runner_count: "runners",
};

const FLAT_AGENT_ALIASES: Aliases = {
  ...COUNT_ALIASES,
  naam: "name",
};

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function renameKeys(obj: Record<string, unknown>, aliases: Aliases): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    const canonical = aliases[key];
    if (canonical === undefined) {
      result[key] = value;
    } else if (!(canonical in obj)) {
      result[canonical] = value;
    }
  }
  return result;
}

function normalizeCounts(entry: unknown): unknown {
  return isPlainObject(entry) ? renameKeys(entry, COUNT_ALIASES) : entry;
}

function normalizeNested(valueStreams: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [stream, agents] of Object.entries(valueStreams)) {
    if (!isPlainObject(agents)) {
      result[stream] = agents;
      continue;
    }
    const normalizedAgents: Record<string, unknown> = {};
    for (const [name, counts] of Object.entries(agents)) {
      normalizedAgents[name] = normalizeCounts(counts);
    }
    result[stream] = normalizedAgents;
  }
  return result;
}

/**
 * Normalizes alias keys in a raw manifest object:
 *
 * - `versie` / `publicatiedatum` / `locaties` → `version` / `published_at` / `locations`
 * - `locations.agent_definitions` / `agent-contracten` → `locations.definitions`
 * - `locations.runner_units` → `locations.runners`
 * - counts `prompt_count` / `definition_count` / `runner_count` → `prompts` / `definitions` / `runners`
 * - flat agent `naam` → `name`
 */
export function normalizeManifest(raw: Record<string, unknown>): Record<string, unknown> {
  const normalized = renameKeys(raw, TOP_LEVEL_ALIASES);

  if (isPlainObject(normalized.locations)) {
    normalized.locations = renameKeys(normalized.locations, LOCATION_ALIASES);
  }

  if (isPlainObject(normalized.value_streams)) {
    normalized.value_streams = normalizeNested(normalized.value_streams);
  }

  if (Array.isArray(normalized.agents)) {
    normalized.agents = normalized.agents.map((entry: unknown) =>
      isPlainObject(entry) ? renameKeys(entry, FLAT_AGENT_ALIASES) : entry,
    );
  }

  return normalized;
}
