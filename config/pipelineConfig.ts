// ─────────────────────────────────────────────────────────────
// Pipeline Configuration — Taxonomies, thresholds and caps
//
// Central configuration for every pipeline component:
//   • Keyword taxonomies (stop terms, categories, phases, domains, units)
//   • Quality dimension breakpoints and tier table
//   • Terminology caps and imbalance thresholds
//   • Prompt excerpt limits, token ratio, ceiling and usage table
//
// A configuration is validated and frozen once, then injected into each
// component's constructor. Invalid values fail here, before any processing.
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import { z } from "zod";
import taxonomyData from "./taxonomy.json";
import { BucketTable } from "./bucketLookup";
import { CredibilityHint } from "../schema/corpusSchema";
import {
  DimensionScore,
  LearningPhase,
  QualityTier,
  TermCategory,
} from "../schema/reportSchema";
import { UsageLevel } from "../schema/promptSchema";

// ── Types ────────────────────────────────────────────────────

export type PatternCategory = Exclude<TermCategory, "general">;

export interface Taxonomy {
  /** Function words, compared case-insensitively */
  readonly stopTerms: readonly string[];
  /** Regex sources per category, tested in technical → business → learning order */
  readonly categoryPatterns: Readonly<Record<PatternCategory, readonly string[]>>;
  /** Regex sources per phase, tested in introduction → understanding → application order */
  readonly phaseCues: Readonly<Record<LearningPhase, readonly string[]>>;
  /** Host patterns; a leading dot means "any subdomain of" */
  readonly credibleDomains: Readonly<Record<"high" | "medium", readonly string[]>>;
  readonly numericUnits: readonly string[];
}

export interface QualityConfig {
  readonly sourceCount: BucketTable<DimensionScore>;
  readonly dataPoints: BucketTable<DimensionScore>;
  readonly credibleSources: BucketTable<DimensionScore>;
  readonly contentVolume: BucketTable<DimensionScore>;
  readonly tiers: BucketTable<QualityTier>;
  /** Hints that count toward the credible-source dimension */
  readonly credibleHints: readonly CredibilityHint[];
  /** Below this many characters/words a source counts as empty */
  readonly minContentLength: number;
  readonly minVideoMinutes: number;
}

export interface TerminologyConfig {
  readonly minTermLength: number;
  readonly minFrequency: number;
  readonly candidateCap: number;
  readonly topTermCap: number;
  /** Category share above which a "dominant" recommendation fires */
  readonly dominantCategoryShare: number;
  /** Phase share below which a "too few" recommendation fires */
  readonly minPhaseShare: number;
  /** How many top terms the closing recommendation names */
  readonly highlightCount: number;
}

export interface PromptConfig {
  readonly charsPerToken: number;
  readonly tokenCeiling: number;
  readonly usage: BucketTable<UsageLevel>;
  /** Include full document text instead of bounded previews */
  readonly unabridged: boolean;
  readonly excerptLength: Readonly<{ web: number; video: number }>;
  readonly maxExcerpts: Readonly<{ web: number; video: number }>;
  readonly qualityRecommendationLimit: number;
  readonly terminologyRecommendationLimit: number;
  readonly keyTermLimit: number;
}

export interface PipelineConfig {
  readonly taxonomy: Taxonomy;
  readonly quality: QualityConfig;
  readonly terminology: TerminologyConfig;
  readonly prompt: PromptConfig;
}

export type PipelineConfigOverrides = {
  -readonly [K in keyof PipelineConfig]?: Partial<PipelineConfig[K]>;
};

/** Thrown when a configuration cannot be used */
export class ConfigurationError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid pipeline configuration: ${problems.join("; ")}`);
    this.name = "ConfigurationError";
  }
}

// ── Defaults ─────────────────────────────────────────────────

export const DEFAULT_TAXONOMY: Taxonomy = taxonomyData;

export const DEFAULT_QUALITY: QualityConfig = {
  sourceCount: { buckets: [{ lowerBound: 3, label: 1 }, { lowerBound: 5, label: 2 }], fallback: 0 },
  dataPoints: { buckets: [{ lowerBound: 10, label: 1 }, { lowerBound: 20, label: 2 }], fallback: 0 },
  credibleSources: { buckets: [{ lowerBound: 1, label: 1 }, { lowerBound: 3, label: 2 }], fallback: 0 },
  contentVolume: { buckets: [{ lowerBound: 5000, label: 1 }, { lowerBound: 10000, label: 2 }], fallback: 0 },
  tiers: {
    buckets: [
      { lowerBound: 3, label: "acceptable" },
      { lowerBound: 5, label: "good" },
      { lowerBound: 7, label: "excellent" },
    ],
    fallback: "needs_improvement",
  },
  credibleHints: ["high", "medium"],
  minContentLength: 100,
  minVideoMinutes: 10,
};

export const DEFAULT_TERMINOLOGY: TerminologyConfig = {
  minTermLength: 2,
  minFrequency: 2,
  candidateCap: 50,
  topTermCap: 30,
  dominantCategoryShare: 0.5,
  minPhaseShare: 0.2,
  highlightCount: 5,
};

export const DEFAULT_PROMPT: PromptConfig = {
  charsPerToken: 4,
  tokenCeiling: 1_000_000,
  usage: {
    buckets: [
      { lowerBound: 0.25, label: "fine" },
      { lowerBound: 0.5, label: "caution" },
      { lowerBound: 0.75, label: "high" },
      { lowerBound: 1, label: "over-limit" },
    ],
    fallback: "comfortable",
  },
  unabridged: false,
  excerptLength: { web: 500, video: 800 },
  maxExcerpts: { web: 5, video: 3 },
  qualityRecommendationLimit: 3,
  terminologyRecommendationLimit: 2,
  keyTermLimit: 10,
};

// ── Validation ───────────────────────────────────────────────

const count = z.number().int().nonnegative();
const positiveInt = z.number().int().positive();
const share = z.number().min(0).max(1);
const dimensionScore = z.union([z.literal(0), z.literal(1), z.literal(2)]);

function bucketTableSchema<T extends z.ZodTypeAny>(label: T) {
  return z.object({
    buckets: z.array(z.object({ lowerBound: z.number().finite().nonnegative(), label })),
    fallback: label,
  });
}

const patternList = z.array(z.string().min(1)).superRefine((patterns, ctx) => {
  patterns.forEach((pattern, i) => {
    try {
      new RegExp(pattern, "iu");
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [i],
        message: `invalid pattern "${pattern}": ${err instanceof Error ? err.message : String(err)}`,
      });
    }
  });
});

export const TaxonomySchema = z.object({
  stopTerms: z.array(z.string()),
  categoryPatterns: z.object({
    technical: patternList,
    business: patternList,
    learning: patternList,
  }),
  phaseCues: z.object({
    introduction: patternList,
    understanding: patternList,
    application: patternList,
  }),
  credibleDomains: z.object({
    high: z.array(z.string().min(1)),
    medium: z.array(z.string().min(1)),
  }),
  numericUnits: z.array(z.string().min(1)),
});

const PipelineConfigSchema = z.object({
  taxonomy: TaxonomySchema,
  quality: z.object({
    sourceCount: bucketTableSchema(dimensionScore),
    dataPoints: bucketTableSchema(dimensionScore),
    credibleSources: bucketTableSchema(dimensionScore),
    contentVolume: bucketTableSchema(dimensionScore),
    tiers: bucketTableSchema(z.enum(["excellent", "good", "acceptable", "needs_improvement"])),
    credibleHints: z.array(z.enum(["high", "medium", "low", "unknown"])),
    minContentLength: count,
    minVideoMinutes: z.number().nonnegative(),
  }),
  terminology: z
    .object({
      minTermLength: positiveInt,
      minFrequency: positiveInt,
      candidateCap: positiveInt,
      topTermCap: positiveInt,
      dominantCategoryShare: share,
      minPhaseShare: share,
      highlightCount: count,
    })
    .refine((t) => t.topTermCap <= t.candidateCap, {
      message: "topTermCap must not exceed candidateCap",
      path: ["topTermCap"],
    }),
  prompt: z.object({
    charsPerToken: z.number().positive(),
    tokenCeiling: positiveInt,
    usage: bucketTableSchema(z.enum(["comfortable", "fine", "caution", "high", "over-limit"])),
    unabridged: z.boolean(),
    excerptLength: z.object({ web: positiveInt, video: positiveInt }),
    maxExcerpts: z.object({ web: count, video: count }),
    qualityRecommendationLimit: count,
    terminologyRecommendationLimit: count,
    keyTermLimit: count,
  }),
});

// ── Factory ──────────────────────────────────────────────────

/**
 * Build a validated, frozen configuration. Each section of `overrides` is
 * merged over the matching default section.
 */
export function createPipelineConfig(overrides: PipelineConfigOverrides = {}): PipelineConfig {
  const config: PipelineConfig = {
    taxonomy: { ...DEFAULT_TAXONOMY, ...overrides.taxonomy },
    quality: { ...DEFAULT_QUALITY, ...overrides.quality },
    terminology: { ...DEFAULT_TERMINOLOGY, ...overrides.terminology },
    prompt: { ...DEFAULT_PROMPT, ...overrides.prompt },
  };

  const result = PipelineConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  return deepFreeze(config);
}

/**
 * Load a replacement taxonomy from a JSON file.
 */
export function loadTaxonomy(filePath: string): Taxonomy {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError([`taxonomy file not found: ${filePath}`]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigurationError([
      `taxonomy file is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    ]);
  }

  const result = TaxonomySchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `taxonomy.${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return result.data;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    const children: unknown[] = Object.values(value);
    for (const child of children) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}
