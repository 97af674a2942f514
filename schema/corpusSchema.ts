// ─────────────────────────────────────────────────────────────
// Corpus Schema — Normalized research documents
//
// Types for:
//   • Corpus documents (web pages and video transcripts)
//   • Provenance and credibility hints
//   • Warnings raised while normalizing raw records
// ─────────────────────────────────────────────────────────────

/** Where a document came from */
export type DocumentOrigin = "web" | "video";

/** Host-based trust classification */
export type CredibilityHint = "high" | "medium" | "low" | "unknown";

/** One unit of normalized source material */
export interface CorpusDocument {
  /** Stable 16-hex-char identifier */
  sourceId: string;
  origin: DocumentOrigin;
  url: string;
  title: string;
  /** Readable text (HTML already stripped) */
  text: string;
  /** Characters for web pages, words for transcripts */
  characterOrWordCount: number;
  credibilityHint: CredibilityHint;
  numericDataPresent: boolean;
  numericMentionCount: number;
  /** First few numeric mentions, for reports */
  numericSamples: string[];
  /** Transcript language code, when known */
  language?: string;
  /** Video length in seconds */
  durationSeconds?: number;
  /** Scrape timestamp for web pages */
  extractedAt?: string;
}

/** A record that could not be normalized */
export interface CorpusWarning {
  code: "malformed-record";
  origin: DocumentOrigin;
  /** Zero-based position in the input sequence */
  index: number;
  reason: string;
}

/** The full normalized set of research documents for one request */
export interface Corpus {
  documents: readonly CorpusDocument[];
  warnings: readonly CorpusWarning[];
}
