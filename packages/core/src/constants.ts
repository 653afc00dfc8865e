import type { ConventionTemplates, WorkspaceLayout } from "./sync-types.js";

/** Value stream whose agents apply to every target stream. */
export const UTILITY_VALUE_STREAM = "utility";

export const AGENT_PLACEHOLDER = "{agent}";
export const VALUE_STREAM_PLACEHOLDER = "{value_stream}";

export const DEFAULT_WORKSPACE_LAYOUT: WorkspaceLayout = {
  charters: "charters-agents",
  definitions: ".github/agents",
  prompts: ".github/prompts",
  runners: "scripts/runners",
};

export const DEFAULT_CONVENTIONS: ConventionTemplates = {
  definitions: "artifacts/{value_stream}/definitions/{agent}.agent.md",
  runners: "artifacts/{value_stream}/runners/{agent}",
};

export const DEFAULT_MANIFEST_FILE = "agents-publicatie.json";
