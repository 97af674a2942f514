/**
 * Zod validation schemas for raw research records
 *
 * These are the artifacts the web fetcher and the transcript fetcher write.
 * Each record is validated on its own so one malformed entry never rejects
 * the whole file.
 */

import { z } from "zod";

/**
 * Schema for one scraped web page
 *
 * Older research files carry the page text under `text` and its length under
 * `word_count`; newer ones use `content` / `character_count`.
 */
export const WebResearchRecordSchema = z
  .object({
    url: z.string().min(1, "URL is required"),
    title: z.string().optional(),
    content: z.string().optional(),
    text: z.string().optional(),
    character_count: z.number().int().nonnegative().optional(),
    word_count: z.number().int().nonnegative().optional(),
    extraction_date: z.string().optional(),
  })
  .refine((record) => record.content !== undefined || record.text !== undefined, {
    message: "content or text is required",
  });

export const TranscriptSegmentSchema = z.object({
  start: z.number().nonnegative(),
  duration: z.number().nonnegative(),
  text: z.string(),
});

/**
 * Schema for one video transcript
 */
export const VideoTranscriptRecordSchema = z.object({
  video_id: z.string().min(1, "video_id is required"),
  source_url: z.string().optional(),
  language: z.string().optional(),
  text: z.string(),
  word_count: z.number().int().nonnegative().optional(),
  duration: z.number().nonnegative().optional(),
  total_duration: z.number().nonnegative().optional(),
  segments: z.array(TranscriptSegmentSchema).optional(),
});

/** Web research file: records wrapped in `sources` */
export const WebResearchFileSchema = z
  .object({
    research_date: z.string().optional(),
    sources: z.array(z.unknown()),
  })
  .passthrough();

/** Transcript file: records wrapped in `transcriptions` */
export const VideoTranscriptFileSchema = z
  .object({
    transcription_date: z.string().optional(),
    transcriptions: z.array(z.unknown()),
  })
  .passthrough();

export type WebResearchRecord = z.infer<typeof WebResearchRecordSchema>;
export type VideoTranscriptRecord = z.infer<typeof VideoTranscriptRecordSchema>;
export type TranscriptSegment = z.infer<typeof TranscriptSegmentSchema>;

/** Flatten zod issues into a single human-readable reason */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "record"}: ${issue.message}`)
    .join("; ");
}
