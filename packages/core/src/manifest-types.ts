/**
 * Manifest model: typed view of a parsed agent publication manifest.
 * Produced once by @agentsync/manifest and deep-frozen; never mutated.
 */

/** The four artifact categories a manifest can locate. */
export const ARTIFACT_CATEGORIES = ["charters", "definitions", "prompts", "runners"] as const;

export type ArtifactCategory = (typeof ARTIFACT_CATEGORIES)[number];

/**
 * Number of files of each category an agent is expected to publish.
 * `charters` is always 1.
 */
export interface ExpectedCounts {
  readonly charters: 1;
  readonly definitions: number;
  readonly prompts: number;
  readonly runners: number;
}

export interface Agent {
  readonly name: string;
  readonly valueStream: string;
  readonly expected: ExpectedCounts;
}

/**
 * A location template is either one template for every stream, or a
 * per-stream mapping with an optional `default` fallback.
 */
export type LocationTemplate =
  | { readonly kind: "single"; readonly template: string }
  | {
      readonly kind: "per-stream";
      readonly templates: Readonly<Record<string, string>>;
      readonly fallback?: string;
    };

export type LocationTemplates = Readonly<Partial<Record<ArtifactCategory, LocationTemplate>>>;

export interface ManifestMetadata {
  readonly version: string | undefined;
  readonly publishedAt: string | undefined;
}

/** Which of the two document shapes the manifest was written in. */
export type ManifestSchemaKind = "nested" | "flat";

export interface ParsedManifest {
  readonly schema: ManifestSchemaKind;
  readonly metadata: ManifestMetadata;
  readonly locations: LocationTemplates;
  readonly agents: readonly Agent[];
  /** Sorted, distinct, non-utility value streams declared by the manifest. */
  readonly valueStreams: readonly string[];
}
