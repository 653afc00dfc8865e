import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ManifestFileNotFoundError, ManifestParseError } from "@agentsync/errors";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { listValueStreams, loadManifest } from "../../loader.js";
import { FLAT_JSON, INVALID_YAML_SYNTAX, NESTED_YAML } from "../helpers/fixtures.js";

describe("loadManifest", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "agentsync-manifest-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads a YAML manifest from disk", async () => {
    const file = join(dir, "agents.yaml");
    await writeFile(file, NESTED_YAML);
    const manifest = await loadManifest(file);
    expect(manifest.schema).toBe("nested");
    expect(listValueStreams(manifest)).toEqual(["docs", "ops"]);
  });

  it("loads a JSON manifest with a BOM", async () => {
    const file = join(dir, "agents-publicatie.json");
    await writeFile(file, `\uFEFF${FLAT_JSON}`);
    const manifest = await loadManifest(file);
    expect(manifest.schema).toBe("flat");
    expect(manifest.agents).toHaveLength(3);
  });

  it("throws ManifestFileNotFoundError for a missing file", async () => {
    const file = join(dir, "missing.json");
    await expect(loadManifest(file)).rejects.toBeInstanceOf(ManifestFileNotFoundError);
    await expect(loadManifest(file)).rejects.toThrow(`Manifest file not found: ${file}`);
  });

  it("throws ManifestFileNotFoundError for a directory", async () => {
    const sub = join(dir, "sub");
    await mkdir(sub);
    await expect(loadManifest(sub)).rejects.toBeInstanceOf(ManifestFileNotFoundError);
  });

  it("reports the file path on parse errors", async () => {
    const file = join(dir, "broken.yaml");
    await writeFile(file, INVALID_YAML_SYNTAX);
    try {
      await loadManifest(file);
      expect.fail("should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ManifestParseError);
      expect((error as ManifestParseError).filePath).toBe(file);
    }
  });
});
