/**
 * Synchronous manifest parser.
 * Parses YAML (or JSON), normalizes key aliases, validates with Zod, turns
 * either agents form into one Agent list, and deep-freezes the result.
 */

import {
  type Agent,
  ARTIFACT_CATEGORIES,
  type LocationTemplate,
  type ManifestSchemaKind,
  type ParsedManifest,
  type ArtifactCategory,
  sameValueStream,
} from "@agentsync/core";
import { ManifestAgentEntryError, ManifestParseError, ManifestSchemaError } from "@agentsync/errors";
import { parse as parseYaml, YAMLParseError } from "yaml";
import type { ZodIssue } from "zod";

import { deepFreeze } from "./freeze.js";
import { isPlainObject, normalizeManifest } from "./normalize.js";
import {
  type AgentCounts,
  FlatAgentSchema,
  FlatAgentsSchema,
  type ManifestDocument,
  ManifestDocumentSchema,
  NestedAgentsSchema,
} from "./schema.js";
import { distinctValueStreams, valueStreamsFromAgents } from "./value-streams.js";

export interface ParseManifestOptions {
  /** Reported in parse errors. */
  readonly filePath?: string;
}

function formatIssue(issue: ZodIssue, prefix: readonly (string | number)[] = []): string {
  const path = [...prefix, ...issue.path].join(".");
  return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
}

function toAgent(name: string, valueStream: string, counts: AgentCounts): Agent {
  return {
    name,
    valueStream,
    expected: {
      charters: 1,
      definitions: counts.definitions,
      prompts: counts.prompts,
      runners: counts.runners,
    },
  };
}

const NO_COUNTS: AgentCounts = { definitions: 0, prompts: 0, runners: 0 };

function agentsFromNested(raw: Record<string, unknown>): {
  agents: Agent[];
  valueStreams: string[];
} {
  const result = NestedAgentsSchema.safeParse(raw);
  if (!result.success) {
    throw new ManifestSchemaError(
      result.error.issues.map((i) => formatIssue(i, ["value_streams"])),
      result.error,
    );
  }

  const agents: Agent[] = [];
  const issues: string[] = [];
  for (const [stream, members] of Object.entries(result.data)) {
    for (const [name, counts] of Object.entries(members ?? {})) {
      if (agents.some((a) => a.name === name && sameValueStream(a.valueStream, stream))) {
        issues.push(`value_streams.${stream}.${name}: duplicate agent "${name}" in value stream "${stream}"`);
        continue;
      }
      agents.push(toAgent(name, stream, counts ?? NO_COUNTS));
    }
  }
  if (issues.length > 0) {
    throw new ManifestSchemaError(issues);
  }

  // Grouping keys are authoritative: a stream with no agents is still listed.
  return { agents, valueStreams: distinctValueStreams(Object.keys(result.data)) };
}

function agentsFromFlat(raw: unknown): { agents: Agent[]; valueStreams: string[] } {
  const list = FlatAgentsSchema.safeParse(raw);
  if (!list.success) {
    throw new ManifestSchemaError(
      list.error.issues.map((i) => formatIssue(i, ["agents"])),
      list.error,
    );
  }

  const agents: Agent[] = [];
  list.data.forEach((entry, index) => {
    const record = FlatAgentSchema.safeParse(entry);
    if (!record.success) {
      throw new ManifestAgentEntryError(
        index,
        record.error.issues.map((i) => formatIssue(i)),
      );
    }
    const { name, value_stream: stream } = record.data;
    if (agents.some((a) => a.name === name && sameValueStream(a.valueStream, stream))) {
      throw new ManifestAgentEntryError(index, [
        `duplicate agent "${name}" in value stream "${stream}"`,
      ]);
    }
    agents.push(toAgent(name, stream, record.data));
  });

  return { agents, valueStreams: valueStreamsFromAgents(agents) };
}

function collectLocations(
  document: ManifestDocument,
): Partial<Record<ArtifactCategory, LocationTemplate>> {
  const locations: Partial<Record<ArtifactCategory, LocationTemplate>> = {};
  for (const category of ARTIFACT_CATEGORIES) {
    const template = document.locations?.[category];
    if (template !== undefined) {
      locations[category] = template;
    }
  }
  return locations;
}

/**
 * Parses a manifest document into a validated, frozen ParsedManifest.
 *
 * Pipeline:
 * 1. Parse YAML (JSON is a subset)
 * 2. Normalize alias keys
 * 3. Validate metadata and locations
 * 4. Detect the agents form: `value_streams` as a mapping → nested, else flat
 * 5. Build Agents and the value stream listing
 * 6. Deep freeze
 */
export function parseManifestDocument(text: string, options?: ParseManifestOptions): ParsedManifest {
  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (error: unknown) {
    if (error instanceof YAMLParseError) {
      const pos = error.linePos?.[0];
      throw new ManifestParseError(options?.filePath, error.message, pos?.line, pos?.col, error);
    }
    throw new ManifestParseError(options?.filePath, String(error), undefined, undefined, error);
  }

  if (!isPlainObject(parsed)) {
    throw new ManifestSchemaError(["Expected a mapping at the document root"]);
  }

  const normalized = normalizeManifest(parsed);
  const result = ManifestDocumentSchema.safeParse(normalized);
  if (!result.success) {
    throw new ManifestSchemaError(
      result.error.issues.map((i) => formatIssue(i)),
      result.error,
    );
  }
  const document = result.data;

  const schema: ManifestSchemaKind = isPlainObject(document.value_streams) ? "nested" : "flat";
  const { agents, valueStreams } = isPlainObject(document.value_streams)
    ? agentsFromNested(document.value_streams)
    : agentsFromFlat(document.agents);

  return deepFreeze({
    schema,
    metadata: {
      version: document.version,
      publishedAt: document.published_at,
    },
    locations: collectLocations(document),
    agents,
    valueStreams,
  });
}
