import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

export function makeTempDir(label: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `agentsync-cli-${label}-`));
}

export async function writeTree(root: string, files: Readonly<Record<string, string>>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const path = join(root, relativePath);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content);
  }
}

export const SOURCE_MANIFEST = JSON.stringify({
  version: "1.0",
  published_at: "2026-02-01",
  locations: {
    charters: "charters/{agent}.charter.md",
    prompts: "prompts/{value_stream}/{agent}*.prompt.md",
  },
  value_streams: {
    docs: { writer: { prompts: 2 } },
    ops: { deployer: { runners: 1 } },
  },
});

export const SOURCE_FILES: Readonly<Record<string, string>> = {
  "agents-publicatie.json": SOURCE_MANIFEST,
  "prompts/docs/writer.draft.prompt.md": "draft",
  "prompts/docs/writer.review.prompt.md": "review",
};
