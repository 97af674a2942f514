import { describe, it } from "node:test";
import { strict as assert } from "assert";
import { createPipelineConfig } from "../config/pipelineConfig";
import { CorpusNormalizer } from "../ingest";
import { QualityScorer, formatCount } from "../research/qualityScorer";
import { formatQualitySummary } from "../research/reportFormatter";
import { FIXED_NOW, VIDEO_RECORDS, WEB_RECORDS, fixedClock } from "./fixtures";

const config = createPipelineConfig();
const normalizer = new CorpusNormalizer(config);
const scorer = new QualityScorer(config, fixedClock);

describe("QualityScorer", () => {
  it("scores an empty corpus as insufficient without throwing", () => {
    for (const report of [scorer.score(), scorer.score(normalizer.normalize())]) {
      assert.deepEqual(report.dimensionScores, {
        sourceCount: 0,
        dataPoints: 0,
        credibleSources: 0,
        contentVolume: 0,
      });
      assert.equal(report.totalScore, 0);
      assert.equal(report.tier, "needs_improvement");
      assert.deepEqual(report.recommendations, [
        "Research quality needs improvement. Address the points below first.",
        "Insufficient data: no research documents were supplied. " +
          "Collect web sources or video transcripts before generating the course.",
      ]);
    }
  });

  it("scores four web pages and one video as good", () => {
    const report = scorer.score(normalizer.normalize({ web: WEB_RECORDS, video: VIDEO_RECORDS }));

    assert.deepEqual(report.dimensionScores, {
      sourceCount: 2,
      dataPoints: 0,
      credibleSources: 1,
      contentVolume: 2,
    });
    assert.equal(report.totalScore, 5);
    assert.equal(report.tier, "good");
    assert.equal(report.generatedAt, FIXED_NOW);
    assert.deepEqual(report.summary, {
      totalSources: 5,
      webSources: 4,
      videoSources: 1,
      sourcesWithContent: 5,
      totalDataPoints: 3,
      credibleSources: 1,
      contentVolume: { webCharacters: 22238, videoWords: 30041, total: 52279 },
      videoMinutes: 15,
      languages: ["ja"],
    });
    assert.deepEqual(report.recommendations, [
      "Good research quality.",
      "Few numeric data points (3). Add sources with statistics or survey results.",
      "3 numeric data point(s) found. Use them as concrete examples in the course.",
    ]);
  });

  it("flags thin content and short video time", () => {
    const corpus = normalizer.normalize({
      web: [{ url: "https://example.com/a", content: "Short note." }],
      video: [{ video_id: "v2", text: "Quick intro.", word_count: 50, duration: 120 }],
    });
    const report = scorer.score(corpus);
    assert.equal(report.totalScore, 0);
    assert.deepEqual(report.recommendations, [
      "Research quality needs improvement. Address the points below first.",
      "Few information sources (2). Aim for at least 3, ideally 5 or more.",
      "2 source(s) contain little or no content. Replace them with more substantial material.",
      "Few numeric data points (0). Add sources with statistics or survey results.",
      "No credible sources found. Add government, academic or encyclopedic references.",
      "Content volume is low (61 characters/words). Add longer articles or videos.",
      "Total video time is short (2.0 min). Add more in-depth explanatory videos.",
    ]);
  });

  it("keeps the composite equal to the sum of the dimensions", () => {
    const corpus = normalizer.normalize({ web: WEB_RECORDS.slice(0, 3), video: VIDEO_RECORDS });
    const report = scorer.score(corpus);
    const sum = Object.values(report.dimensionScores).reduce<number>((total, s) => total + s, 0);
    assert.equal(report.totalScore, sum);
    assert.ok(report.totalScore >= 0 && report.totalScore <= 8);
  });

  it("honours a custom set of credible hints", () => {
    const strict = new QualityScorer(
      createPipelineConfig({ quality: { credibleHints: ["high"] } }),
      fixedClock
    );
    const corpus = normalizer.normalize({
      web: [
        { url: "https://qiita.com/a", content: "One" },
        { url: "https://www.nasa.gov/b", content: "Two" },
      ],
    });
    assert.equal(scorer.score(corpus).summary.credibleSources, 2);
    assert.equal(strict.score(corpus).summary.credibleSources, 1);
  });
});

describe("formatCount", () => {
  it("groups thousands", () => {
    assert.equal(formatCount(52279), "52,279");
    assert.equal(formatCount(999), "999");
    assert.equal(formatCount(1234567), "1,234,567");
  });
});

describe("formatQualitySummary", () => {
  it("lists the score line and every recommendation", () => {
    const report = scorer.score(normalizer.normalize({ web: WEB_RECORDS, video: VIDEO_RECORDS }));
    const lines = formatQualitySummary(report).split("\n");
    assert.ok(lines.includes("  Score:          5/8 (good)"));
    assert.ok(lines.includes("  Volume:         22,238 chars + 30,041 words"));
    assert.ok(lines.includes("  Credible sources  1/2"));
    assert.ok(lines.includes("  • Good research quality."));
  });
});
