// ─────────────────────────────────────────────────────────────
// Report Schema — Quality & terminology analysis results
// ─────────────────────────────────────────────────────────────

import { DocumentOrigin } from "./corpusSchema";

// ── Quality ──────────────────────────────────────────────────

export type QualityDimension =
  | "sourceCount"
  | "dataPoints"
  | "credibleSources"
  | "contentVolume";

export type DimensionScore = 0 | 1 | 2;

export type QualityTier =
  | "excellent"
  | "good"
  | "acceptable"
  | "needs_improvement";

/** Aggregate figures the dimension scores are computed from */
export interface QualitySummary {
  totalSources: number;
  webSources: number;
  videoSources: number;
  /** Documents with more than a trivial amount of text */
  sourcesWithContent: number;
  totalDataPoints: number;
  credibleSources: number;
  contentVolume: {
    webCharacters: number;
    videoWords: number;
    total: number;
  };
  videoMinutes: number;
  languages: string[];
}

export interface QualityReport {
  generatedAt: string;
  dimensionScores: Record<QualityDimension, DimensionScore>;
  /** Always the sum of dimensionScores (0-8) */
  totalScore: number;
  tier: QualityTier;
  summary: QualitySummary;
  recommendations: string[];
}

// ── Terminology ──────────────────────────────────────────────

export type TermCategory = "technical" | "business" | "learning" | "general";

export type LearningPhase = "introduction" | "understanding" | "application";

export interface Term {
  surfaceForm: string;
  /** Occurrences across the whole corpus (>= 2) */
  frequency: number;
  /** Number of documents mentioning the term */
  documentFrequency: number;
  origins: DocumentOrigin[];
  category: TermCategory;
  learningPhase: LearningPhase | "none";
  /** True when the course theme contains this term */
  matchesTheme: boolean;
}

export interface TerminologyReport {
  generatedAt: string;
  courseTheme: string | null;
  /** Distinct terms that survived filtering, before any cap */
  totalUniqueTerms: number;
  candidateTerms: Term[];
  topTerms: Term[];
  categoryCounts: Record<TermCategory, number>;
  /** Counts over phased terms only */
  phaseCounts: Record<LearningPhase, number>;
  /** Top terms whose phase is "none" */
  unphasedTerms: number;
  recommendations: string[];
}
