/**
 * Environment variable interpolation for configuration text.
 * Supports `${VAR}` and `${VAR:default}` (Docker Compose convention); `$${`
 * escapes a literal `${`.
 */

import { InterpolationError } from "@agentsync/errors";

const ENV_VAR_REGEX = /\$(\$?)\{([^}:]+?)(?::([^}]*))?\}/g;

/**
 * Replaces `${VAR}` and `${VAR:default}` tokens with values from `env`.
 *
 * - `${VAR}`: resolved from env; error if missing
 * - `${VAR:fallback}`: falls back to `fallback` if missing
 * - Empty string env value is valid (not treated as missing)
 * - No recursive expansion
 *
 * @throws {InterpolationError} listing every missing variable
 */
export function interpolateEnvVars(
  template: string,
  env: Readonly<Record<string, string | undefined>> = process.env,
): string {
  const missingVars: string[] = [];

  const result = template.replace(
    ENV_VAR_REGEX,
    (match: string, escape: string, name: string, defaultValue: string | undefined) => {
      if (escape === "$") {
        return match.slice(1);
      }

      const value = env[name.trim()];
      if (value !== undefined) {
        return value;
      }
      if (defaultValue !== undefined) {
        return defaultValue;
      }

      missingVars.push(name.trim());
      return "";
    },
  );

  if (missingVars.length > 0) {
    throw new InterpolationError(missingVars);
  }

  return result;
}
