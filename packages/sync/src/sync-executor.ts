/**
 * Sync executor: applies planned operations to the workspace, one at a
 * time and in order. A failed operation is recorded and the run goes on.
 */

import { copyFile, cp, mkdir, readFile, rm, stat, utimes } from "node:fs/promises";
import { dirname } from "node:path";

import {
  type ExecutedOperation,
  logWarn,
  type PlannedOperation,
  type SyncStats,
  type TerminalStatus,
} from "@agentsync/core";
import { getErrorMessage, isNodeError } from "@agentsync/errors";

export interface ExecuteOptions {
  /** Classify every operation without writing to the workspace. */
  readonly dryRun?: boolean;
}

export interface ExecutionResult {
  readonly operations: readonly ExecutedOperation[];
  readonly stats: SyncStats;
}

export function emptyStats(): Record<TerminalStatus, number> {
  return { new: 0, updated: 0, unchanged: 0, error: 0, module_replaced: 0 };
}

async function readIfExists(path: string): Promise<Buffer | undefined> {
  try {
    return await readFile(path);
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}

/** Replaces the destination directory wholesale; nothing of the old tree survives. */
async function replaceModule(op: PlannedOperation, dryRun: boolean): Promise<TerminalStatus> {
  const source = await stat(op.source);
  if (!source.isDirectory()) {
    throw new Error(`Module source is not a directory: ${op.source}`);
  }
  if (dryRun) {
    return "module_replaced";
  }

  await rm(op.destination, { recursive: true, force: true });
  await mkdir(dirname(op.destination), { recursive: true });
  await cp(op.source, op.destination, { recursive: true, preserveTimestamps: true });
  return "module_replaced";
}

async function updateFile(op: PlannedOperation, dryRun: boolean): Promise<TerminalStatus> {
  const content = await readFile(op.source);
  const existing = await readIfExists(op.destination);
  const status: TerminalStatus =
    existing === undefined ? "new" : existing.equals(content) ? "unchanged" : "updated";
  if (dryRun) {
    return status;
  }

  await mkdir(dirname(op.destination), { recursive: true });
  await copyFile(op.source, op.destination);
  const times = await stat(op.source);
  await utimes(op.destination, times.atime, times.mtime);
  return status;
}

async function executeOne(op: PlannedOperation, dryRun: boolean): Promise<ExecutedOperation> {
  const { agent, category, source, destination, isModule } = op;
  try {
    const status = isModule ? await replaceModule(op, dryRun) : await updateFile(op, dryRun);
    return { agent, category, source, destination, isModule, status };
  } catch (error: unknown) {
    const message = getErrorMessage(error);
    logWarn("sync", `${agent}: copying ${source} to ${destination} failed: ${message}`);
    return { agent, category, source, destination, isModule, status: "error", error: message };
  }
}

/**
 * Executes operations sequentially in input order and tallies their
 * terminal statuses.
 */
export async function executeOperations(
  operations: readonly PlannedOperation[],
  options: ExecuteOptions = {},
): Promise<ExecutionResult> {
  const dryRun = options.dryRun ?? false;
  const stats = emptyStats();
  const executed: ExecutedOperation[] = [];

  for (const op of operations) {
    const result = await executeOne(op, dryRun);
    stats[result.status] += 1;
    executed.push(result);
  }

  return { operations: executed, stats };
}
