// ─────────────────────────────────────────────────────────────
// Transcript Ingest — Video transcripts → corpus documents
// ─────────────────────────────────────────────────────────────

import { CorpusDocument } from "../schema/corpusSchema";
import { TranscriptSegment, VideoTranscriptRecord } from "../schema/recordSchema";
import { assessCredibility } from "./credibility";
import { NormalizerTools, sourceIdFor } from "./sourceTools";

const WATCH_URL = "https://www.youtube.com/watch?v=";

/**
 * Normalize one validated transcript record.
 */
export function normalizeTranscriptRecord(
  record: VideoTranscriptRecord,
  index: number,
  tools: NormalizerTools
): CorpusDocument {
  const url = record.source_url?.trim() || `${WATCH_URL}${record.video_id}`;
  const text = record.text.trim();
  const numeric = tools.numeric.scan(text);

  return {
    sourceId: sourceIdFor("video", index, url),
    origin: "video",
    url,
    title: `Video ${record.video_id}`,
    text,
    characterOrWordCount: record.word_count ?? text.length,
    credibilityHint: assessCredibility(url, tools.domains),
    numericDataPresent: numeric.count > 0,
    numericMentionCount: numeric.count,
    numericSamples: numeric.samples,
    language: record.language,
    durationSeconds: record.duration ?? record.total_duration ?? segmentsEnd(record.segments),
  };
}

/** End time of the last segment, the fetcher's own duration fallback */
function segmentsEnd(segments: TranscriptSegment[] | undefined): number | undefined {
  if (!segments || segments.length === 0) return undefined;
  const last = segments[segments.length - 1];
  return last.start + last.duration;
}
