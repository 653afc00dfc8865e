/**
 * Manifest fixture strings for manifest tests.
 */

export const NESTED_YAML = `
version: 3.1.0
published_at: "2026-02-06"
locations:
  charters: artifacts/{value_stream}/{agent}/{agent}.charter.md
  definitions:
    docs: artifacts/docs/{agent}/definitions/*.agent.md
    default: artifacts/{value_stream}/{agent}/{agent}.agent.md
  prompts: artifacts/{value_stream}/{agent}/prompts/*.prompt.md
  runners: artifacts/{value_stream}/{agent}/runner
value_streams:
  docs:
    writer:
      prompts: 2
      definitions: 1
      runners: 0
    reviewer:
      prompts: "1"
  utility:
    helper: null
  ops: {}
`;

export const FLAT_JSON = JSON.stringify({
  versie: "2.0",
  publicatiedatum: "2026-01-15",
  locaties: {
    charters: "charters/{agent}.charter.md",
    "agent-contracten": "definitions/{value_stream}/*.agent.md",
  },
  agents: [
    { naam: "writer", value_stream: "docs", prompt_count: 2 },
    { name: "helper", value_stream: "Utility", definitions: 1 },
    { name: "deployer", value_stream: "ops", runner_count: 1 },
  ],
});

export const FLAT_MISSING_NAME_YAML = `
version: "1"
agents:
  - name: writer
    value_stream: docs
  - value_stream: docs
    prompts: 1
`;

export const FLAT_MISSING_STREAM_YAML = `
agents:
  - name: writer
`;

export const FLAT_DUPLICATE_YAML = `
agents:
  - name: writer
    value_stream: docs
  - name: writer
    value_stream: DOCS
`;

export const NON_NUMERIC_COUNT_YAML = `
value_streams:
  docs:
    writer:
      prompts: many
`;

export const INVALID_YAML_SYNTAX = `
version: 1
locations:
  charters: [unclosed
`;

export const NO_AGENTS_YAML = `
version: 1
`;
