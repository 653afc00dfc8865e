/**
 * @agentsync/core
 *
 * Types and invariants shared by the manifest parser, the resolver, the
 * executor and the CLI.
 */

export const PACKAGE_NAME = "@agentsync/core" as const;

export { appliesTo, isUtilityStream, sameValueStream } from "./agent.js";
export {
  AGENT_PLACEHOLDER,
  DEFAULT_CONVENTIONS,
  DEFAULT_MANIFEST_FILE,
  DEFAULT_WORKSPACE_LAYOUT,
  UTILITY_VALUE_STREAM,
  VALUE_STREAM_PLACEHOLDER,
} from "./constants.js";
export { logWarn } from "./log.js";
export {
  type Agent,
  ARTIFACT_CATEGORIES,
  type ArtifactCategory,
  type ExpectedCounts,
  type LocationTemplate,
  type LocationTemplates,
  type ManifestMetadata,
  type ManifestSchemaKind,
  type ParsedManifest,
} from "./manifest-types.js";
export type {
  ConventionTemplates,
  ExecutedOperation,
  GapReason,
  OperationStatus,
  PlannedOperation,
  ResolutionGap,
  SyncReport,
  SyncStats,
  TerminalStatus,
  WorkspaceLayout,
} from "./sync-types.js";
