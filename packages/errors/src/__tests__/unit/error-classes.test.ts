import { describe, expect, it } from "vitest";
import {
  AgentSyncError,
  ConfigError,
  ExternalError,
  InterpolationError,
  InvalidArgumentError,
  isAgentSyncError,
  ManifestAgentEntryError,
  ManifestFileNotFoundError,
  ManifestParseError,
  ManifestSchemaError,
  NoApplicableAgentsError,
  NotFoundError,
  NothingResolvedError,
  SourceUnavailableError,
  ValidationError,
} from "../../index.js";

describe("AgentSyncError base class", () => {
  it("should take domain and exit code from the catalog", () => {
    const error = new ManifestFileNotFoundError("/src/agents.json");

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(AgentSyncError);
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.name).toBe("ManifestFileNotFoundError");
    expect(error._tag).toBe("NotFoundError");
    expect(error.code).toBe("MANIFEST_FILE_NOT_FOUND");
    expect(error.domain).toBe("manifest");
    expect(error.exitCode).toBe(3);
    expect(error.isExpected).toBe(true);
    expect(error.message).toBe("Manifest file not found: /src/agents.json");
  });

  it("should serialize to JSON", () => {
    const error = new SourceUnavailableError("../agents", "directory does not exist");

    expect(error.toJSON()).toEqual({
      _tag: "ExternalError",
      code: "SOURCE_UNAVAILABLE",
      domain: "source",
      message: 'Source "../agents" is unavailable: directory does not exist',
      exitCode: 4,
      metadata: { locator: "../agents" },
    });
  });

  it("should omit metadata from JSON when absent", () => {
    const json = new ManifestSchemaError(["value_streams: Required"]).toJSON();
    expect("metadata" in json).toBe(false);
  });

  it("should keep the cause", () => {
    const cause = new Error("EACCES");
    const error = new ConfigError("/ws/agentsync.yaml", ["cannot read file: EACCES"], cause);
    expect(error.cause).toBe(cause);
  });
});

describe("manifest errors", () => {
  it("ManifestParseError includes file and position", () => {
    const error = new ManifestParseError("agents.yaml", "bad indentation", 3, 7);
    expect(error.message).toBe("Manifest parse failed (agents.yaml) at line 3:7: bad indentation");
  });

  it("ManifestParseError without a file or position", () => {
    expect(new ManifestParseError(undefined, "unexpected token").message).toBe(
      "Manifest parse failed: unexpected token",
    );
  });

  it("ManifestSchemaError lists every issue", () => {
    const error = new ManifestSchemaError(["locations: Expected object", "value_streams: Required"]);

    expect(error.message).toBe(
      "Manifest validation failed:\n  - locations: Expected object\n  - value_streams: Required",
    );
    expect(error.issues).toHaveLength(2);
  });

  it("ManifestAgentEntryError carries the entry index", () => {
    const error = new ManifestAgentEntryError(2, ["name is required", "value_stream is required"]);

    expect(error.message).toBe(
      "Invalid agent entry at index 2: name is required; value_stream is required",
    );
    expect(error.issues.map((i) => i.field)).toEqual(["agents[2]", "agents[2]"]);
  });
});

describe("config and cli errors", () => {
  it("InterpolationError names the missing variables", () => {
    const error = new InterpolationError(["TOKEN", "HOST"]);
    expect(error.message).toBe("Missing environment variables: TOKEN, HOST");
    expect(error.exitCode).toBe(2);
  });

  it("ConfigError lists problems under the path", () => {
    expect(new ConfigError("cfg.yaml", ["source: Expected string"]).message).toBe(
      "Invalid configuration (cfg.yaml):\n  - source: Expected string",
    );
  });

  it("InvalidArgumentError names the argument", () => {
    const error = new InvalidArgumentError("--target", "expects a value");
    expect(error.message).toBe("Invalid argument --target: expects a value");
    expect(error.exitCode).toBe(2);
  });
});

describe("sync errors", () => {
  it("NoApplicableAgentsError lists available streams", () => {
    expect(new NoApplicableAgentsError("finance", ["docs", "ops"]).message).toBe(
      'No agents found for value stream "finance". Available value streams: docs, ops',
    );
  });

  it("NoApplicableAgentsError without streams to suggest", () => {
    expect(new NoApplicableAgentsError("finance", []).message).toBe(
      'No agents found for value stream "finance".',
    );
  });

  it("NothingResolvedError reports the gap count", () => {
    const error = new NothingResolvedError("docs", 4);
    expect(error.message).toBe('No artifacts resolved for value stream "docs" (4 gap(s) reported)');
    expect(error.exitCode).toBe(3);
  });
});

describe("base types", () => {
  it("place each domain error under its base type", () => {
    expect(new NothingResolvedError("docs", 0)).toBeInstanceOf(NotFoundError);
    expect(new SourceUnavailableError("x", "y")).toBeInstanceOf(ExternalError);
    expect(new InvalidArgumentError("x", "y")).toBeInstanceOf(ValidationError);
    expect(new InvalidArgumentError("x", "y")).not.toBeInstanceOf(NotFoundError);
  });

  it("isAgentSyncError rejects plain errors", () => {
    expect(isAgentSyncError(new NothingResolvedError("docs", 0))).toBe(true);
    expect(isAgentSyncError(new Error("plain"))).toBe(false);
    expect(isAgentSyncError("text")).toBe(false);
  });
});
