/**
 * @agentsync/manifest
 *
 * Agent publication manifest loader. Reads YAML or JSON manifests in either
 * the nested (grouped by value stream) or flat (agent list) form, validates
 * them with Zod, and returns typed, frozen ParsedManifest objects.
 */

// ============================================================================
// PRIMARY API
// ============================================================================

export { listValueStreams, loadManifest } from "./loader.js";
export { isPlainObject, normalizeManifest } from "./normalize.js";
export { type ParseManifestOptions, parseManifestDocument } from "./parser.js";
export { distinctValueStreams, valueStreamsFromAgents } from "./value-streams.js";

// ============================================================================
// SCHEMA
// ============================================================================

export {
  type AgentCounts,
  AgentCountsSchema,
  CountSchema,
  type FlatAgentRecord,
  FlatAgentSchema,
  LocationTemplateSchema,
  LocationsSchema,
  ManifestDocumentSchema,
  NestedAgentsSchema,
} from "./schema.js";

// ============================================================================
// UTILITIES
// ============================================================================

export { deepFreeze } from "./freeze.js";
export { directoryExists, fileExists, type PathKind, pathKind, readTextFile } from "./fs-utils.js";
export { interpolateEnvVars } from "./interpolation.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export const PACKAGE_NAME = "@agentsync/manifest";
