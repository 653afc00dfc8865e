import { describe, expect, it } from "vitest";
import { formatRunLog, formatStamp, runLogFileName } from "../../run-log.js";
import { SAMPLE_REPORT } from "../helpers/report.js";

const NOW = new Date("2026-03-01T09:05:07Z");

describe("run log naming", () => {
  it("formats a UTC stamp", () => {
    expect(formatStamp(NOW)).toBe("20260301-090507");
  });

  it("names the file after the stream and the stamp", () => {
    expect(runLogFileName("docs", NOW)).toBe("sync-docs-20260301-090507.log");
  });

  it("adds a suffix for later runs in the same second", () => {
    expect(runLogFileName("docs", NOW, 2)).toBe("sync-docs-20260301-090507-2.log");
  });
});

describe("formatRunLog", () => {
  it("records the whole run", () => {
    const text = formatRunLog({
      report: SAMPLE_REPORT,
      source: "/src",
      target: "/dst",
      manifestFile: "agents-publicatie.json",
      now: NOW,
    });

    expect(text).toBe(
      [
        "agentsync synchronization log",
        "Timestamp: 2026-03-01T09:05:07.000Z",
        "Value stream: docs",
        "Source: /src",
        "Target: /dst",
        "Manifest: agents-publicatie.json (version 4.2, published unknown)",
        "",
        "Agents (1):",
        "  - writer [docs]",
        "",
        "Files per category:",
        "  charters: 0",
        "  definitions: 0",
        "  prompts: 2",
        "  runners: 0",
        "",
        "Stats: new=1 updated=0 unchanged=0 error=1 module_replaced=0",
        "",
        "Operations:",
        "  [new] prompts writer: /src/p/a.prompt.md -> /dst/.github/prompts/a.prompt.md",
        "  [error] prompts writer: /src/p/b.prompt.md -> /dst/.github/prompts/b.prompt.md (EACCES: permission denied)",
        "",
        "Gaps (1):",
        "  - writer: charter not found",
        "",
      ].join("\n"),
    );
  });
});
