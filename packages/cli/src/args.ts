/**
 * Minimal argument parser.
 */

import { InvalidArgumentError } from "@agentsync/errors";

export interface ParsedArgs {
  readonly positionals: readonly string[];
  readonly flags: Readonly<Record<string, string | boolean>>;
}

const ALIASES: Readonly<Record<string, string>> = {
  s: "source",
  m: "manifest",
  t: "target",
  c: "config",
  l: "list",
  n: "dry-run",
  h: "help",
};

const BOOLEAN_FLAGS = new Set(["list", "dry-run", "help"]);
const VALUE_FLAGS = new Set(["source", "manifest", "target", "config"]);

function isKnownFlag(key: string): boolean {
  return BOOLEAN_FLAGS.has(key) || VALUE_FLAGS.has(key);
}

/**
 * Splits argv into positionals and flags. `--key value`, `--key=value` and
 * the short aliases are accepted; unknown flags are rejected.
 *
 * @throws {InvalidArgumentError} for unknown flags or a missing flag value
 */
export function parseArgv(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags: Record<string, string | boolean> = {};

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];
    if (arg === undefined) break;

    if (arg === "--") {
      // Everything after -- is positional
      positionals.push(...argv.slice(i + 1));
      break;
    }

    let key: string | undefined;
    let inline: string | undefined;
    if (arg.startsWith("--")) {
      const eq = arg.indexOf("=");
      key = eq < 0 ? arg.slice(2) : arg.slice(2, eq);
      inline = eq < 0 ? undefined : arg.slice(eq + 1);
    } else if (arg.startsWith("-") && arg.length === 2) {
      const short = arg.slice(1);
      key = ALIASES[short] ?? short;
    }

    if (key === undefined) {
      positionals.push(arg);
      i++;
      continue;
    }

    if (!isKnownFlag(key)) {
      throw new InvalidArgumentError(arg, "unknown option");
    }

    if (BOOLEAN_FLAGS.has(key)) {
      flags[key] = true;
    } else if (inline !== undefined) {
      flags[key] = inline;
    } else {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith("-")) {
        throw new InvalidArgumentError(arg, "expects a value");
      }
      flags[key] = next;
      i++;
    }

    i++;
  }

  return { positionals, flags };
}
