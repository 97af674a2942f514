// ─────────────────────────────────────────────────────────────
// Web Ingest — Scraped pages → corpus documents
// ─────────────────────────────────────────────────────────────

import { CorpusDocument } from "../schema/corpusSchema";
import { WebResearchRecord } from "../schema/recordSchema";
import { extractReadableText, looksLikeHtml } from "./htmlText";
import { assessCredibility } from "./credibility";
import { NormalizerTools, sourceIdFor } from "./sourceTools";

/**
 * Normalize one validated web research record.
 * Raw HTML content is reduced to readable text first.
 */
export function normalizeWebRecord(
  record: WebResearchRecord,
  index: number,
  tools: NormalizerTools
): CorpusDocument {
  const raw = record.content ?? record.text ?? "";
  let text = raw.trim();
  let title = record.title?.trim() ?? "";

  if (looksLikeHtml(raw)) {
    const page = extractReadableText(raw);
    text = page.text;
    if (!title) title = page.title;
  }

  const numeric = tools.numeric.scan(text);

  return {
    sourceId: sourceIdFor("web", index, record.url),
    origin: "web",
    url: record.url,
    title: title || "Untitled",
    text,
    characterOrWordCount: record.character_count ?? record.word_count ?? text.length,
    credibilityHint: assessCredibility(record.url, tools.domains),
    numericDataPresent: numeric.count > 0,
    numericMentionCount: numeric.count,
    numericSamples: numeric.samples,
    extractedAt: record.extraction_date,
  };
}
