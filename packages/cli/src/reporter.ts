import { relative } from "node:path";

import type { SyncReport, TerminalStatus } from "@agentsync/core";
import pc from "picocolors";

import type { InitWorkspaceResult } from "./workspace.js";

export type Colors = ReturnType<typeof pc.createColors>;

const STATUS_ICONS: Readonly<Record<TerminalStatus, (c: Colors) => string>> = {
  new: (c) => c.green("+"),
  updated: (c) => c.cyan("~"),
  unchanged: (c) => c.dim("="),
  error: (c) => c.red("!"),
  module_replaced: (c) => c.magenta("*"),
};

const STATUS_WIDTH = "module_replaced".length;

/**
 * Renders a run summary for the terminal. Destinations are shown relative
 * to the workspace root.
 */
export function renderReport(report: SyncReport, workspaceRoot: string, c: Colors = pc): string {
  const lines: string[] = [];

  lines.push(c.bold(`agentsync ${report.valueStream}${report.dryRun ? " (dry run)" : ""}`));
  lines.push(
    c.dim(
      `manifest version ${report.metadata.version ?? "unknown"}, published ${report.metadata.publishedAt ?? "unknown"}`,
    ),
  );
  lines.push(`Agents (${report.agents.length}): ${report.agents.map((a) => a.name).join(", ")}`);
  lines.push("");

  for (const op of report.operations) {
    const icon = STATUS_ICONS[op.status](c);
    const path = relative(workspaceRoot, op.destination);
    lines.push(`  ${icon} ${op.status.padEnd(STATUS_WIDTH)} ${path}`);
    if (op.error !== undefined) {
      lines.push(`    ${c.red(op.error)}`);
    }
  }

  if (report.gaps.length > 0) {
    lines.push("");
    lines.push(c.yellow(`Gaps (${report.gaps.length}):`));
    for (const gap of report.gaps) {
      lines.push(`  ${c.yellow("!")} ${gap.message}`);
    }
  }

  const { stats } = report;
  lines.push("");
  lines.push(
    `${c.green(`${stats.new} new`)}, ${stats.updated} updated, ${stats.unchanged} unchanged, ${stats.module_replaced} module(s) replaced, ${stats.error > 0 ? c.red(`${stats.error} error(s)`) : "0 error(s)"}`,
  );

  return lines.join("\n");
}

export function renderValueStreams(streams: readonly string[], c: Colors = pc): string {
  if (streams.length === 0) {
    return c.yellow("The manifest declares no value streams.");
  }
  return [c.bold("Available value streams:"), ...streams.map((s) => `  - ${s}`)].join("\n");
}

export function renderInit(
  result: InitWorkspaceResult,
  valueStream: string | undefined,
  c: Colors = pc,
): string {
  const lines: string[] = [];
  for (const dir of result.created) {
    lines.push(`  ${c.green("+")} ${dir}/`);
  }
  lines.push(
    `Folder structure ready (${result.created.length} created, ${result.existing.length} existed)`,
  );
  if (result.gitignoreAdded.length > 0) {
    lines.push(`Added to .gitignore: ${result.gitignoreAdded.join(", ")}`);
  }
  if (valueStream !== undefined) {
    lines.push("");
    lines.push(`Next: ${c.cyan(`agentsync ${valueStream} --source <path|url>`)}`);
  }
  return lines.join("\n");
}
