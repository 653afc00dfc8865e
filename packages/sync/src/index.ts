/**
 * @agentsync/sync
 *
 * Resolves manifest location templates against a source tree and applies
 * the resulting copy operations to a workspace.
 */

export {
  type ResolutionResult,
  type ResolveOptions,
  resolveArtifacts,
} from "./artifact-resolver.js";
export { listMatches, type MatchKind } from "./glob.js";
export {
  emptyStats,
  type ExecuteOptions,
  type ExecutionResult,
  executeOperations,
} from "./sync-executor.js";
export {
  countByCategory,
  listAvailableValueStreams,
  type ManifestLocation,
  type SynchronizeOptions,
  synchronize,
} from "./synchronize.js";
export {
  charterFallback,
  DEFAULT_PATTERNS,
  type GlobSplit,
  hasWildcard,
  selectTemplate,
  type SplitGlobOptions,
  splitGlob,
  substitute,
} from "./template-resolver.js";

export const PACKAGE_NAME = "@agentsync/sync";
