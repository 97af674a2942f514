// ─────────────────────────────────────────────────────────────
// Quality Scorer — Is the research good enough to build on?
//
// Scores a corpus on four dimensions (0-2 each):
//   sourceCount · dataPoints · credibleSources · contentVolume
// The total (0-8) maps to a tier; weak dimensions become
// recommendations. An empty corpus scores zero, never throws.
// ─────────────────────────────────────────────────────────────

import { lookupBucket } from "../config/bucketLookup";
import { PipelineConfig, QualityConfig } from "../config/pipelineConfig";
import { Corpus, CorpusDocument } from "../schema/corpusSchema";
import {
  DimensionScore,
  QualityDimension,
  QualityReport,
  QualitySummary,
  QualityTier,
} from "../schema/reportSchema";

const TIER_HEADLINES: Record<QualityTier, string> = {
  excellent: "Excellent research quality. There is enough material to generate the course.",
  good: "Good research quality.",
  acceptable: "Acceptable research quality. The improvements below are recommended.",
  needs_improvement: "Research quality needs improvement. Address the points below first.",
};

export class QualityScorer {
  private readonly settings: QualityConfig;

  constructor(config: PipelineConfig, private readonly clock: () => Date = () => new Date()) {
    this.settings = config.quality;
  }

  score(corpus?: Corpus): QualityReport {
    const documents = corpus?.documents ?? [];
    const summary = this.summarize(documents);
    const q = this.settings;

    const dimensionScores: Record<QualityDimension, DimensionScore> = {
      sourceCount: lookupBucket(summary.totalSources, q.sourceCount),
      dataPoints: lookupBucket(summary.totalDataPoints, q.dataPoints),
      credibleSources: lookupBucket(summary.credibleSources, q.credibleSources),
      contentVolume: lookupBucket(summary.contentVolume.total, q.contentVolume),
    };
    const totalScore =
      dimensionScores.sourceCount +
      dimensionScores.dataPoints +
      dimensionScores.credibleSources +
      dimensionScores.contentVolume;
    const tier = lookupBucket(totalScore, q.tiers);

    return {
      generatedAt: this.clock().toISOString(),
      dimensionScores,
      totalScore,
      tier,
      summary,
      recommendations: this.recommend(tier, dimensionScores, summary, documents),
    };
  }

  summarize(documents: readonly CorpusDocument[]): QualitySummary {
    const credible = new Set(this.settings.credibleHints);
    const web = documents.filter((d) => d.origin === "web");
    const video = documents.filter((d) => d.origin === "video");

    const webCharacters = sum(web.map((d) => d.characterOrWordCount));
    const videoWords = sum(video.map((d) => d.characterOrWordCount));
    const videoSeconds = sum(video.map((d) => d.durationSeconds ?? 0));

    const languages: string[] = [];
    for (const doc of video) {
      if (doc.language && !languages.includes(doc.language)) languages.push(doc.language);
    }

    return {
      totalSources: documents.length,
      webSources: web.length,
      videoSources: video.length,
      sourcesWithContent: documents.filter((d) => this.hasContent(d)).length,
      totalDataPoints: sum(documents.map((d) => d.numericMentionCount)),
      credibleSources: documents.filter((d) => credible.has(d.credibilityHint)).length,
      contentVolume: { webCharacters, videoWords, total: webCharacters + videoWords },
      videoMinutes: Math.round((videoSeconds / 60) * 10) / 10,
      languages,
    };
  }

  private hasContent(doc: CorpusDocument): boolean {
    const min = this.settings.minContentLength;
    return doc.characterOrWordCount > min || doc.text.length > min;
  }

  private recommend(
    tier: QualityTier,
    scores: Record<QualityDimension, DimensionScore>,
    summary: QualitySummary,
    documents: readonly CorpusDocument[]
  ): string[] {
    const recs = [TIER_HEADLINES[tier]];

    if (summary.totalSources === 0) {
      recs.push(
        "Insufficient data: no research documents were supplied. " +
          "Collect web sources or video transcripts before generating the course."
      );
      return recs;
    }

    if (scores.sourceCount === 0) {
      recs.push(
        `Few information sources (${summary.totalSources}). Aim for at least 3, ideally 5 or more.`
      );
    }

    const thin = summary.totalSources - summary.sourcesWithContent;
    if (thin > 0) {
      recs.push(
        `${thin} source(s) contain little or no content. Replace them with more substantial material.`
      );
    }

    if (scores.dataPoints === 0) {
      recs.push(
        `Few numeric data points (${summary.totalDataPoints}). Add sources with statistics or survey results.`
      );
    }

    if (scores.credibleSources === 0) {
      recs.push(
        "No credible sources found. Add government, academic or encyclopedic references."
      );
    }

    if (scores.contentVolume === 0) {
      recs.push(
        `Content volume is low (${formatCount(summary.contentVolume.total)} characters/words). ` +
          "Add longer articles or videos."
      );
    }

    const hasDurations = documents.some((d) => d.origin === "video" && d.durationSeconds !== undefined);
    if (hasDurations && summary.videoMinutes < this.settings.minVideoMinutes) {
      recs.push(
        `Total video time is short (${summary.videoMinutes.toFixed(1)} min). Add more in-depth explanatory videos.`
      );
    }

    if (summary.totalDataPoints > 0) {
      recs.push(
        `${summary.totalDataPoints} numeric data point(s) found. Use them as concrete examples in the course.`
      );
    }

    return recs;
  }
}

// ── Helpers ──────────────────────────────────────────────────

function sum(values: number[]): number {
  return values.reduce((total, v) => total + v, 0);
}

/** 22238 → "22,238" */
export function formatCount(value: number): string {
  return String(value).replace(/\B(?=(\d{3})+(?!\d))/g, ",");
}
