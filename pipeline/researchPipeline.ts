// ─────────────────────────────────────────────────────────────
// Research Pipeline — Normalize → analyze → assemble
//
// One synchronous pass per request:
//   1. Corpus Normalizer merges web and video research
//   2. Quality Scorer and Terminology Extractor read the same corpus
//   3. Prompt Assembler runs last, when an outline is supplied
// Every non-fatal problem is collected as a diagnostic warning.
// ─────────────────────────────────────────────────────────────

import { PipelineConfig, createPipelineConfig } from "../config/pipelineConfig";
import { CorpusNormalizer, RawResearchInput } from "../ingest";
import { PromptAssembler } from "../prompt/promptAssembler";
import { QualityScorer } from "../research/qualityScorer";
import { TerminologyExtractor } from "../research/terminologyExtractor";
import { Corpus } from "../schema/corpusSchema";
import { CourseOutline, CourseSettings, PromptDocument } from "../schema/promptSchema";
import { QualityReport, TerminologyReport } from "../schema/reportSchema";

// ── Types ────────────────────────────────────────────────────

export interface PipelineRequest extends RawResearchInput {
  outline?: CourseOutline;
  settings?: CourseSettings;
  courseTheme?: string;
  /** Skip an analysis entirely; both run by default */
  skipQuality?: boolean;
  skipTerminology?: boolean;
  /** Leave document previews out of the prompt (default: included) */
  omitExcerpts?: boolean;
}

export type PipelineWarningCode = "malformed-record" | "empty-corpus" | "token-usage";

export interface PipelineWarning {
  code: PipelineWarningCode;
  message: string;
}

export interface PipelineResult {
  corpus: Corpus;
  quality?: QualityReport;
  terminology?: TerminologyReport;
  prompt?: PromptDocument;
  warnings: PipelineWarning[];
}

export type PipelineLogger = Pick<Console, "log" | "warn">;

export interface PipelineOptions {
  /** Clock for report timestamps */
  clock?: () => Date;
  logger?: PipelineLogger;
}

// ── Pipeline ─────────────────────────────────────────────────

export class ResearchPipeline {
  private readonly normalizer: CorpusNormalizer;
  private readonly scorer: QualityScorer;
  private readonly extractor: TerminologyExtractor;
  private readonly assembler: PromptAssembler;
  private readonly logger: PipelineLogger;

  constructor(config: PipelineConfig = createPipelineConfig(), options: PipelineOptions = {}) {
    this.normalizer = new CorpusNormalizer(config);
    this.scorer = new QualityScorer(config, options.clock);
    this.extractor = new TerminologyExtractor(config, options.clock);
    this.assembler = new PromptAssembler(config);
    this.logger = options.logger ?? console;
  }

  run(request: PipelineRequest = {}): PipelineResult {
    const warnings: PipelineWarning[] = [];

    const corpus = this.normalizer.normalize(request);
    this.logger.log(
      `[CORPUS] ${corpus.documents.length} document(s) normalized, ${corpus.warnings.length} skipped`
    );

    for (const w of corpus.warnings) {
      const message = `${w.origin} record #${w.index + 1} skipped: ${w.reason}`;
      this.logger.warn(`[CORPUS] ⚠ ${message}`);
      warnings.push({ code: "malformed-record", message });
    }
    if (corpus.documents.length === 0) {
      warnings.push({
        code: "empty-corpus",
        message: "No research documents; analyses reflect an empty corpus.",
      });
    }

    const result: PipelineResult = { corpus, warnings };

    if (!request.skipQuality) {
      result.quality = this.scorer.score(corpus);
      this.logger.log(
        `[PIPELINE] Quality: ${result.quality.totalScore}/8 (${result.quality.tier})`
      );
    }

    if (!request.skipTerminology) {
      result.terminology = this.extractor.extract(corpus, request.courseTheme);
      this.logger.log(
        `[PIPELINE] Terminology: ${result.terminology.totalUniqueTerms} recurring term(s)`
      );
    }

    if (request.outline) {
      const prompt = this.assembler.assemble({
        outline: request.outline,
        settings: request.settings,
        quality: result.quality,
        terminology: result.terminology,
        excerpts: request.omitExcerpts ? undefined : corpus.documents,
      });
      result.prompt = prompt;
      this.logger.log(
        `[PIPELINE] Prompt: ~${prompt.estimatedTokens} tokens (${prompt.usageLevel})`
      );

      if (prompt.usageLevel === "high" || prompt.usageLevel === "over-limit") {
        const message =
          `Estimated prompt size ${prompt.estimatedTokens} tokens is ` +
          `${Math.round(prompt.usageRatio * 100)}% of the ${prompt.tokenCeiling}-token ceiling (${prompt.usageLevel})`;
        this.logger.warn(`[PIPELINE] ⚠ ${message}`);
        warnings.push({ code: "token-usage", message });
      }
    }

    return result;
  }
}
