import pc from "picocolors";
import type { CliIo } from "../../cli.js";
import type { GitRunner } from "../../source.js";

export interface CapturedIo extends CliIo {
  readonly stdout: string[];
  readonly stderr: string[];
}

const noGit: GitRunner = () => {
  throw new Error("git must not run in this test");
};

export function captureIo(cwd: string, overrides: Partial<CliIo> = {}): CapturedIo {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (text) => stdout.push(text),
    err: (text) => stderr.push(text),
    cwd,
    env: {},
    now: () => new Date("2026-03-01T09:05:07Z"),
    git: noGit,
    colors: pc.createColors(false),
    ...overrides,
  };
}
