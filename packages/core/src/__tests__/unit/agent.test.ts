import { describe, expect, it } from "vitest";
import type { Agent } from "../../index.js";
import { appliesTo, isUtilityStream, sameValueStream } from "../../index.js";

function agent(name: string, valueStream: string): Agent {
  return {
    name,
    valueStream,
    expected: { charters: 1, definitions: 0, prompts: 0, runners: 0 },
  };
}

describe("sameValueStream", () => {
  it("ignores case and surrounding whitespace", () => {
    expect(sameValueStream("Docs", " docs ")).toBe(true);
    expect(sameValueStream("docs", "ops")).toBe(false);
  });
});

describe("isUtilityStream", () => {
  it("matches the utility stream in any case", () => {
    expect(isUtilityStream("UTILITY")).toBe(true);
    expect(isUtilityStream("utilities")).toBe(false);
  });
});

describe("appliesTo", () => {
  it("applies an agent to its own stream", () => {
    expect(appliesTo(agent("writer", "docs"), "DOCS")).toBe(true);
    expect(appliesTo(agent("writer", "docs"), "ops")).toBe(false);
  });

  it("applies utility agents to every stream", () => {
    expect(appliesTo(agent("helper", "utility"), "docs")).toBe(true);
    expect(appliesTo(agent("helper", "Utility"), "anything")).toBe(true);
  });
});
