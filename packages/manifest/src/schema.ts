/**
 * Zod schemas for the agent publication manifest. Validation runs on the
 * normalized document (see normalize.ts), so only canonical keys appear here.
 */

import type { LocationTemplate } from "@agentsync/core";
import { z } from "zod";

/**
 * Expected-file count. Accepts integers, numeric strings and fractional
 * numbers (truncated); absent or null means 0.
 */
export const CountSchema = z
  .union([z.number(), z.string(), z.null()])
  .optional()
  .transform((value, ctx): number => {
    if (value === undefined || value === null) {
      return 0;
    }
    const trimmed = typeof value === "string" ? value.trim() : value;
    const n = trimmed === "" ? Number.NaN : Number(trimmed);
    if (!Number.isFinite(n)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected a numeric count, received ${JSON.stringify(value)}`,
      });
      return z.NEVER;
    }
    if (n < 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Count must be non-negative, received ${n}`,
      });
      return z.NEVER;
    }
    return Math.trunc(n);
  });

export const AgentCountsSchema = z.object({
  definitions: CountSchema,
  prompts: CountSchema,
  runners: CountSchema,
});

/** Agent and stream names become path segments, so separators are rejected. */
const NameSchema = z
  .string()
  .trim()
  .min(1)
  .refine((name) => !/[\\/]/.test(name) && name !== "." && name !== "..", {
    message: "Must be a plain name without path separators",
  });

/** `value_streams: { <stream>: { <agent>: counts | null } | null }` */
export const NestedAgentsSchema = z.record(
  NameSchema,
  z.record(NameSchema, AgentCountsSchema.nullable()).nullable(),
);

export const FlatAgentSchema = AgentCountsSchema.extend({
  name: NameSchema,
  value_stream: NameSchema,
});

export const FlatAgentsSchema = z.array(z.unknown());

function toLocationTemplate(value: string | Record<string, string>): LocationTemplate {
  if (typeof value === "string") {
    return { kind: "single", template: value };
  }
  const { default: fallback, ...templates } = value;
  return fallback !== undefined
    ? { kind: "per-stream", templates, fallback }
    : { kind: "per-stream", templates };
}

export const LocationTemplateSchema = z
  .union([z.string().min(1), z.record(z.string().min(1), z.string().min(1))])
  .transform(toLocationTemplate);

export const LocationsSchema = z.object({
  charters: LocationTemplateSchema.optional(),
  definitions: LocationTemplateSchema.optional(),
  prompts: LocationTemplateSchema.optional(),
  runners: LocationTemplateSchema.optional(),
});

const MetadataValueSchema = z
  .union([z.string(), z.number()])
  .transform((v) => String(v))
  .optional();

/**
 * Top-level document. The agents section is validated separately once the
 * parser has decided between the nested and the flat form.
 */
export const ManifestDocumentSchema = z.object({
  version: MetadataValueSchema,
  published_at: MetadataValueSchema,
  locations: LocationsSchema.optional(),
  value_streams: z.unknown().optional(),
  agents: z.unknown().optional(),
});

export type ManifestDocument = z.infer<typeof ManifestDocumentSchema>;
export type FlatAgentRecord = z.infer<typeof FlatAgentSchema>;
export type AgentCounts = z.infer<typeof AgentCountsSchema>;
