/**
 * Run pipeline: load manifest → resolve → execute → report.
 */

import { resolve } from "node:path";

import {
  type ArtifactCategory,
  type ConventionTemplates,
  DEFAULT_MANIFEST_FILE,
  type ExecutedOperation,
  logWarn,
  sameValueStream,
  type SyncReport,
  type WorkspaceLayout,
} from "@agentsync/core";
import { NoApplicableAgentsError, NothingResolvedError } from "@agentsync/errors";
import { listValueStreams, loadManifest } from "@agentsync/manifest";

import { resolveArtifacts } from "./artifact-resolver.js";
import { executeOperations } from "./sync-executor.js";

export interface ManifestLocation {
  readonly sourceRoot: string;
  /** Relative to `sourceRoot` unless absolute. Defaults to DEFAULT_MANIFEST_FILE. */
  readonly manifestFile?: string;
}

export interface SynchronizeOptions extends ManifestLocation {
  readonly destinationRoot: string;
  readonly valueStream: string;
  readonly layout?: WorkspaceLayout;
  readonly conventions?: ConventionTemplates;
  readonly dryRun?: boolean;
}

function manifestPath(location: ManifestLocation): string {
  return resolve(location.sourceRoot, location.manifestFile ?? DEFAULT_MANIFEST_FILE);
}

export function countByCategory(
  operations: readonly ExecutedOperation[],
): Record<ArtifactCategory, number> {
  const counts: Record<ArtifactCategory, number> = {
    charters: 0,
    definitions: 0,
    prompts: 0,
    runners: 0,
  };
  for (const op of operations) {
    counts[op.category] += 1;
  }
  return counts;
}

/**
 * Synchronizes the artifacts of one value stream into the workspace.
 *
 * @throws {ManifestFileNotFoundError | ManifestParseError | ManifestSchemaError} when the manifest is unusable
 * @throws {NoApplicableAgentsError} when no agent applies to the stream
 * @throws {NothingResolvedError} when resolution produced no operations
 */
export async function synchronize(options: SynchronizeOptions): Promise<SyncReport> {
  const manifest = await loadManifest(manifestPath(options));
  const { valueStream } = options;

  const resolution = await resolveArtifacts(manifest, valueStream, {
    sourceRoot: options.sourceRoot,
    destinationRoot: options.destinationRoot,
    ...(options.layout ? { layout: options.layout } : {}),
    ...(options.conventions ? { conventions: options.conventions } : {}),
  });

  if (resolution.agents.length === 0) {
    throw new NoApplicableAgentsError(valueStream, listValueStreams(manifest));
  }
  if (!listValueStreams(manifest).some((s) => sameValueStream(s, valueStream))) {
    logWarn(
      "sync",
      `Value stream "${valueStream}" is not declared in the manifest; only utility agents apply`,
    );
  }
  if (resolution.operations.length === 0) {
    throw new NothingResolvedError(valueStream, resolution.gaps.length);
  }

  const dryRun = options.dryRun ?? false;
  const { operations, stats } = await executeOperations(resolution.operations, { dryRun });

  return {
    valueStream,
    metadata: manifest.metadata,
    agents: resolution.agents,
    operations,
    gaps: resolution.gaps,
    stats,
    categoryCounts: countByCategory(operations),
    dryRun,
  };
}

/** Value streams the manifest under `sourceRoot` declares. */
export async function listAvailableValueStreams(
  location: ManifestLocation,
): Promise<readonly string[]> {
  return listValueStreams(await loadManifest(manifestPath(location)));
}
