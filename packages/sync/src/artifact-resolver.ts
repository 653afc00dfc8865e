/**
 * Artifact resolver: turns a parsed manifest and a target value stream into
 * planned copy operations plus the gaps found on the way.
 *
 * Resolution never throws for a missing artifact: every miss becomes a
 * ResolutionGap and the remaining categories and agents are still resolved.
 */

import { basename, isAbsolute, join, relative, resolve, sep } from "node:path";

import {
  type Agent,
  type ArtifactCategory,
  appliesTo,
  type ConventionTemplates,
  DEFAULT_CONVENTIONS,
  DEFAULT_WORKSPACE_LAYOUT,
  type ParsedManifest,
  type PlannedOperation,
  type ResolutionGap,
  type WorkspaceLayout,
} from "@agentsync/core";
import { deepFreeze, pathKind } from "@agentsync/manifest";

import { listMatches } from "./glob.js";
import {
  charterFallback,
  hasWildcard,
  selectTemplate,
  splitGlob,
  substitute,
} from "./template-resolver.js";

export interface ResolveOptions {
  /** Root of the source tree; templates resolve relative to it. */
  readonly sourceRoot: string;
  /** Root of the consumer workspace. */
  readonly destinationRoot: string;
  readonly layout?: WorkspaceLayout;
  readonly conventions?: ConventionTemplates;
}

export interface ResolutionResult {
  /** Agents that apply to the target stream, in manifest order. */
  readonly agents: readonly Agent[];
  readonly operations: readonly PlannedOperation[];
  readonly gaps: readonly ResolutionGap[];
}

const CATEGORY_NOUN: Readonly<Record<ArtifactCategory, string>> = {
  charters: "charter",
  definitions: "definition",
  prompts: "prompt",
  runners: "runner",
};

/** Per-run state shared by the category resolvers. */
interface Resolution {
  readonly sourceRoot: string;
  readonly destinationRoot: string;
  readonly layout: WorkspaceLayout;
  readonly conventions: ConventionTemplates;
  readonly manifest: ParsedManifest;
  readonly operations: PlannedOperation[];
  readonly gaps: ResolutionGap[];
}

type SourcePath = { readonly inside: true; readonly path: string } | { readonly inside: false };

/** Resolves a substituted template against the source root, refusing escapes. */
function toSourcePath(sourceRoot: string, template: string): SourcePath {
  const path = resolve(sourceRoot, template);
  const rel = relative(sourceRoot, path);
  if (rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    return { inside: false };
  }
  return { inside: true, path };
}

function destinationFor(ctx: Resolution, category: ArtifactCategory, name: string): string {
  return join(ctx.destinationRoot, ctx.layout[category], name);
}

function plan(
  ctx: Resolution,
  agent: Agent,
  category: ArtifactCategory,
  source: string,
  destinationName: string,
  isModule = false,
): void {
  ctx.operations.push({
    agent: agent.name,
    category,
    source,
    destination: destinationFor(ctx, category, destinationName),
    isModule,
    status: "pending",
  });
}

function outsideSource(
  ctx: Resolution,
  agent: Agent,
  category: ArtifactCategory,
  template: string,
): void {
  ctx.gaps.push({
    agent: agent.name,
    category,
    reason: "outside-source",
    message: `${agent.name}: ${CATEGORY_NOUN[category]} path "${template}" resolves outside the source root`,
  });
}

function notFound(
  ctx: Resolution,
  agent: Agent,
  category: "charters" | "runners",
  tried: readonly string[],
): void {
  ctx.gaps.push({
    agent: agent.name,
    category,
    reason: "not-found",
    message: `${agent.name}: ${CATEGORY_NOUN[category]} not found`,
    expected: 1,
    found: 0,
    tried,
  });
}

async function firstExisting(candidates: readonly string[]): Promise<string | undefined> {
  for (const candidate of candidates) {
    if ((await pathKind(candidate)) === "file") {
      return candidate;
    }
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Categories
// ---------------------------------------------------------------------------

async function resolveCharter(ctx: Resolution, agent: Agent): Promise<void> {
  const template = selectTemplate(ctx.manifest.locations.charters, agent.valueStream);
  if (template === undefined) {
    ctx.gaps.push({
      agent: agent.name,
      category: "charters",
      reason: "no-template",
      message: `${agent.name}: charter not found`,
      expected: 1,
      found: 0,
    });
    return;
  }

  const substituted = substitute(template, agent.name, agent.valueStream);
  const primary = toSourcePath(ctx.sourceRoot, substituted);
  if (!primary.inside) {
    outsideSource(ctx, agent, "charters", substituted);
    return;
  }

  let tried: string[];
  let found: string | undefined = undefined;
  if (hasWildcard(substituted)) {
    const { directory, pattern } = splitGlob(primary.path, {
      category: "charters",
      agentName: agent.name,
    });
    const alternate = charterFallback(pattern);
    const patterns = alternate === undefined ? [pattern] : [pattern, alternate];
    tried = patterns.map((p) => join(directory, p));
    for (const p of patterns) {
      found = (await listMatches(directory, p))[0];
      if (found !== undefined) {
        break;
      }
    }
  } else {
    const alternate = charterFallback(primary.path);
    tried = alternate === undefined ? [primary.path] : [primary.path, alternate];
    found = await firstExisting(tried);
  }

  if (found === undefined) {
    notFound(ctx, agent, "charters", tried);
    return;
  }
  plan(ctx, agent, "charters", found, `${agent.name}.md`);
}

/** Definitions and prompts: every matched file becomes one operation. */
async function resolveFileSet(
  ctx: Resolution,
  agent: Agent,
  category: "definitions" | "prompts",
  template: string,
): Promise<void> {
  const expected = agent.expected[category];
  const substituted = substitute(template, agent.name, agent.valueStream);
  const target = toSourcePath(ctx.sourceRoot, substituted);
  if (!target.inside) {
    outsideSource(ctx, agent, category, substituted);
    return;
  }

  const { directory, pattern } = splitGlob(target.path, { category, agentName: agent.name });
  const matches = await listMatches(directory, pattern);
  for (const match of matches) {
    plan(ctx, agent, category, match, basename(match));
  }

  if (expected > 0 && matches.length < expected) {
    ctx.gaps.push({
      agent: agent.name,
      category,
      reason: "count-mismatch",
      message: `${agent.name}: expected ${expected} ${CATEGORY_NOUN[category]} file(s), found ${matches.length}`,
      expected,
      found: matches.length,
      tried: [join(directory, pattern)],
    });
  }
}

async function resolveDefinitions(ctx: Resolution, agent: Agent): Promise<void> {
  const template =
    selectTemplate(ctx.manifest.locations.definitions, agent.valueStream) ??
    ctx.conventions.definitions;
  await resolveFileSet(ctx, agent, "definitions", template);
}

async function resolvePrompts(ctx: Resolution, agent: Agent): Promise<void> {
  const expected = agent.expected.prompts;
  if (expected <= 0) {
    return;
  }

  const template = selectTemplate(ctx.manifest.locations.prompts, agent.valueStream);
  if (template === undefined) {
    ctx.gaps.push({
      agent: agent.name,
      category: "prompts",
      reason: "no-template",
      message: `${agent.name}: expected ${expected} prompt file(s), found 0 (no prompts location for value stream "${agent.valueStream}")`,
      expected,
      found: 0,
    });
    return;
  }
  await resolveFileSet(ctx, agent, "prompts", template);
}

type RunnerSource = { readonly path: string; readonly isModule: boolean };

/**
 * Tries the runner template: a wildcard takes the first sorted match, a plain
 * path is used when it exists, else `<agent>.runner.*` in its directory.
 */
async function findRunnerFromTemplate(
  path: string,
  agentName: string,
  tried: string[],
): Promise<RunnerSource | undefined> {
  const { directory, pattern, synthesized } = splitGlob(path, { category: "runners", agentName });

  if (!synthesized) {
    tried.push(join(directory, pattern));
    const [match] = await listMatches(directory, pattern, "entry");
    if (match === undefined) {
      return undefined;
    }
    return { path: match, isModule: (await pathKind(match)) === "directory" };
  }

  tried.push(path);
  const kind = await pathKind(path);
  if (kind !== "missing") {
    return { path, isModule: kind === "directory" };
  }

  tried.push(join(directory, pattern));
  const [match] = await listMatches(directory, pattern);
  return match === undefined ? undefined : { path: match, isModule: false };
}

async function resolveRunner(ctx: Resolution, agent: Agent): Promise<void> {
  if (agent.expected.runners <= 0) {
    return;
  }

  const tried: string[] = [];
  let found: RunnerSource | undefined;

  const template = selectTemplate(ctx.manifest.locations.runners, agent.valueStream);
  if (template !== undefined) {
    const substituted = substitute(template, agent.name, agent.valueStream);
    const primary = toSourcePath(ctx.sourceRoot, substituted);
    if (!primary.inside) {
      outsideSource(ctx, agent, "runners", substituted);
      return;
    }
    found = await findRunnerFromTemplate(primary.path, agent.name, tried);
  }

  if (found === undefined) {
    const conventional = substitute(ctx.conventions.runners, agent.name, agent.valueStream);
    const fallback = toSourcePath(ctx.sourceRoot, conventional);
    if (fallback.inside) {
      tried.push(fallback.path);
      const kind = await pathKind(fallback.path);
      if (kind !== "missing") {
        found = { path: fallback.path, isModule: kind === "directory" };
      }
    }
  }

  if (found === undefined) {
    notFound(ctx, agent, "runners", tried);
    return;
  }
  if (found.isModule) {
    plan(ctx, agent, "runners", found.path, agent.name, true);
  } else {
    plan(ctx, agent, "runners", found.path, basename(found.path));
  }
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/**
 * Resolves every artifact of the agents that apply to `targetStream`.
 *
 * Agents are visited in manifest order; per agent the order is charter,
 * definitions, prompts, runner. The result is frozen.
 */
export async function resolveArtifacts(
  manifest: ParsedManifest,
  targetStream: string,
  options: ResolveOptions,
): Promise<ResolutionResult> {
  const ctx: Resolution = {
    sourceRoot: resolve(options.sourceRoot),
    destinationRoot: resolve(options.destinationRoot),
    layout: options.layout ?? DEFAULT_WORKSPACE_LAYOUT,
    conventions: options.conventions ?? DEFAULT_CONVENTIONS,
    manifest,
    operations: [],
    gaps: [],
  };

  const agents = manifest.agents.filter((agent) => appliesTo(agent, targetStream));
  for (const agent of agents) {
    await resolveCharter(ctx, agent);
    await resolveDefinitions(ctx, agent);
    await resolvePrompts(ctx, agent);
    await resolveRunner(ctx, agent);
  }

  return deepFreeze({ agents, operations: ctx.operations, gaps: ctx.gaps });
}
