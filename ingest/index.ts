// ─────────────────────────────────────────────────────────────
// Corpus Normalizer — Unified research ingestion
//
// Merges scraped web pages and video transcripts into one ordered,
// read-only corpus (web first, then video, input order kept).
// Either side may be missing; malformed records are skipped with a
// warning and never abort the run.
// ─────────────────────────────────────────────────────────────

import { Corpus, CorpusDocument, CorpusWarning, DocumentOrigin } from "../schema/corpusSchema";
import {
  VideoTranscriptFileSchema,
  VideoTranscriptRecordSchema,
  WebResearchFileSchema,
  WebResearchRecordSchema,
  describeIssues,
} from "../schema/recordSchema";
import { PipelineConfig } from "../config/pipelineConfig";
import { NumericDetector } from "./numericDetector";
import { NormalizerTools } from "./sourceTools";
import { normalizeWebRecord } from "./webIngest";
import { normalizeTranscriptRecord } from "./transcriptIngest";

/** Raw fetcher output, one optional sequence per origin */
export interface RawResearchInput {
  web?: readonly unknown[];
  video?: readonly unknown[];
}

export class CorpusNormalizer {
  private readonly tools: NormalizerTools;

  constructor(config: PipelineConfig) {
    this.tools = {
      numeric: new NumericDetector(config.taxonomy.numericUnits),
      domains: config.taxonomy.credibleDomains,
    };
  }

  normalize(input: RawResearchInput = {}): Corpus {
    const documents: CorpusDocument[] = [];
    const warnings: CorpusWarning[] = [];

    (input.web ?? []).forEach((raw, index) => {
      const parsed = WebResearchRecordSchema.safeParse(raw);
      if (parsed.success) {
        documents.push(normalizeWebRecord(parsed.data, index, this.tools));
      } else {
        warnings.push(malformed("web", index, describeIssues(parsed.error)));
      }
    });

    (input.video ?? []).forEach((raw, index) => {
      const parsed = VideoTranscriptRecordSchema.safeParse(raw);
      if (parsed.success) {
        documents.push(normalizeTranscriptRecord(parsed.data, index, this.tools));
      } else {
        warnings.push(malformed("video", index, describeIssues(parsed.error)));
      }
    });

    return Object.freeze({
      documents: Object.freeze(documents.map(freezeDocument)),
      warnings: Object.freeze(warnings.map((w) => Object.freeze(w))),
    });
  }
}

// ── File envelopes ───────────────────────────────────────────

/**
 * Pull the record list out of a web research file.
 * Accepts the `{ sources: [...] }` envelope or a bare array.
 */
export function unwrapWebRecords(data: unknown): unknown[] {
  if (Array.isArray(data)) return data;
  const parsed = WebResearchFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`Not a web research file: ${describeIssues(parsed.error)}`);
  }
  return parsed.data.sources;
}

/**
 * Pull the record list out of a transcript file.
 * Accepts the `{ transcriptions: [...] }` envelope or a bare array.
 */
export function unwrapTranscriptRecords(data: unknown): unknown[] {
  if (Array.isArray(data)) return data;
  const parsed = VideoTranscriptFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`Not a transcript file: ${describeIssues(parsed.error)}`);
  }
  return parsed.data.transcriptions;
}

// ── Helpers ──────────────────────────────────────────────────

function malformed(origin: DocumentOrigin, index: number, reason: string): CorpusWarning {
  return { code: "malformed-record", origin, index, reason };
}

function freezeDocument(doc: CorpusDocument): CorpusDocument {
  Object.freeze(doc.numericSamples);
  return Object.freeze(doc);
}

export { NumericDetector } from "./numericDetector";
export { assessCredibility } from "./credibility";
export { extractReadableText, looksLikeHtml } from "./htmlText";
