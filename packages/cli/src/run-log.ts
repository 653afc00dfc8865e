/**
 * Plain-text record of one synchronization run, written under the
 * workspace's log directory.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { ARTIFACT_CATEGORIES, type SyncReport } from "@agentsync/core";
import { isNodeError } from "@agentsync/errors";

export interface RunLogContext {
  readonly report: SyncReport;
  readonly source: string;
  readonly target: string;
  readonly manifestFile: string;
  readonly now: Date;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `YYYYMMDD-HHmmss` in UTC. */
export function formatStamp(now: Date): string {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `${date}-${time}`;
}

/** `attempt` > 0 adds a `-<attempt>` suffix for runs within the same second. */
export function runLogFileName(valueStream: string, now: Date, attempt = 0): string {
  const suffix = attempt > 0 ? `-${attempt}` : "";
  return `sync-${valueStream}-${formatStamp(now)}${suffix}.log`;
}

export function formatRunLog(ctx: RunLogContext): string {
  const { report } = ctx;
  const lines: string[] = [];

  lines.push("agentsync synchronization log");
  lines.push(`Timestamp: ${ctx.now.toISOString()}`);
  lines.push(`Value stream: ${report.valueStream}`);
  lines.push(`Source: ${ctx.source}`);
  lines.push(`Target: ${ctx.target}`);
  lines.push(
    `Manifest: ${ctx.manifestFile} (version ${report.metadata.version ?? "unknown"}, published ${report.metadata.publishedAt ?? "unknown"})`,
  );
  lines.push("");

  lines.push(`Agents (${report.agents.length}):`);
  for (const agent of report.agents) {
    lines.push(`  - ${agent.name} [${agent.valueStream}]`);
  }
  lines.push("");

  lines.push("Files per category:");
  for (const category of ARTIFACT_CATEGORIES) {
    lines.push(`  ${category}: ${report.categoryCounts[category]}`);
  }
  lines.push("");

  const { stats } = report;
  lines.push(
    `Stats: new=${stats.new} updated=${stats.updated} unchanged=${stats.unchanged} error=${stats.error} module_replaced=${stats.module_replaced}`,
  );
  lines.push("");

  lines.push("Operations:");
  for (const op of report.operations) {
    const suffix = op.error !== undefined ? ` (${op.error})` : "";
    lines.push(`  [${op.status}] ${op.category} ${op.agent}: ${op.source} -> ${op.destination}${suffix}`);
  }
  lines.push("");

  lines.push(`Gaps (${report.gaps.length}):`);
  for (const gap of report.gaps) {
    lines.push(`  - ${gap.message}`);
  }

  return `${lines.join("\n")}\n`;
}

/**
 * Writes the log into `logDir` (created on demand) and returns its path. An
 * existing log is never overwritten; the next free suffix is used instead.
 */
export async function writeRunLog(logDir: string, ctx: RunLogContext): Promise<string> {
  await mkdir(logDir, { recursive: true });
  const content = formatRunLog(ctx);
  for (let attempt = 0; ; attempt++) {
    const path = join(logDir, runLogFileName(ctx.report.valueStream, ctx.now, attempt));
    try {
      await writeFile(path, content, { encoding: "utf-8", flag: "wx" });
      return path;
    } catch (error: unknown) {
      if (!(isNodeError(error) && error.code === "EEXIST")) {
        throw error;
      }
    }
  }
}
