import type { Agent, ArtifactCategory, ManifestMetadata } from "./manifest-types.js";

export type TerminalStatus = "new" | "updated" | "unchanged" | "error" | "module_replaced";

export type OperationStatus = "pending" | TerminalStatus;

/**
 * A copy the resolver decided on. `isModule` marks a directory source that is
 * replaced wholesale at the destination.
 */
export interface PlannedOperation {
  readonly agent: string;
  readonly category: ArtifactCategory;
  readonly source: string;
  readonly destination: string;
  readonly isModule: boolean;
  readonly status: "pending";
}

export interface ExecutedOperation extends Omit<PlannedOperation, "status"> {
  readonly status: TerminalStatus;
  /** Failure message, present only when `status` is `error`. */
  readonly error?: string;
}

export type SyncStats = Readonly<Record<TerminalStatus, number>>;

/**
 * Why an expected artifact produced no (or too few) operations.
 *
 * - `not-found`: the template resolved but nothing exists at the path(s) tried
 * - `no-template`: the manifest has no location for this category and stream
 * - `count-mismatch`: fewer files matched than the manifest declares
 * - `outside-source`: the substituted path leaves the source root
 */
export type GapReason = "not-found" | "no-template" | "count-mismatch" | "outside-source";

export interface ResolutionGap {
  readonly agent: string;
  readonly category: ArtifactCategory;
  readonly reason: GapReason;
  readonly message: string;
  readonly expected?: number;
  readonly found?: number;
  /** Absolute paths (or directory + pattern) that were checked. */
  readonly tried?: readonly string[];
}

/**
 * Workspace-relative directories that receive each category. Destinations are
 * always placed under the directory of their category.
 */
export type WorkspaceLayout = Readonly<Record<ArtifactCategory, string>>;

/**
 * Fallback templates used when the manifest declares no location for
 * definitions, or the runner template does not resolve.
 */
export interface ConventionTemplates {
  readonly definitions: string;
  readonly runners: string;
}

export interface SyncReport {
  readonly valueStream: string;
  readonly metadata: ManifestMetadata;
  readonly agents: readonly Agent[];
  readonly operations: readonly ExecutedOperation[];
  readonly gaps: readonly ResolutionGap[];
  readonly stats: SyncStats;
  readonly categoryCounts: Readonly<Record<ArtifactCategory, number>>;
  readonly dryRun: boolean;
}
