// ─────────────────────────────────────────────────────────────
// Test Fixtures — Shared records, documents and stubs
// ─────────────────────────────────────────────────────────────

import { PipelineLogger } from "../pipeline/researchPipeline";
import { CorpusDocument } from "../schema/corpusSchema";
import { CourseOutline } from "../schema/promptSchema";

export const FIXED_NOW = "2026-01-01T00:00:00.000Z";
export const fixedClock = (): Date => new Date(FIXED_NOW);

export const silentLogger: PipelineLogger = {
  log: () => undefined,
  warn: () => undefined,
};

/** Four pages (one on a government host) totalling 22,238 characters, 2 numeric mentions */
export const WEB_RECORDS = [
  {
    url: "https://www.stat.go.jp/data/report",
    title: "Statistics overview",
    content: "Usage grew to 45% among office workers.",
    character_count: 5000,
  },
  {
    url: "https://example.com/guide",
    title: "Team guide",
    content: "A practical guide for teams adopting new tools.",
    character_count: 6000,
  },
  {
    url: "https://blog.example.net/post",
    title: "Survey notes",
    content: "Survey respondents reported saving 3 hours weekly.",
    character_count: 5238,
  },
  {
    url: "https://example.org/faq",
    title: "FAQ",
    content: "Frequently asked questions about getting started.",
    character_count: 6000,
  },
];

/** One 15-minute video, 30,041 words, 1 numeric mention */
export const VIDEO_RECORDS = [
  {
    video_id: "vid001",
    language: "ja",
    text: "The presenter walks through 12 practical examples.",
    word_count: 30041,
    duration: 900,
  },
];

export const OUTLINE: CourseOutline = {
  courseName: "Workplace AI Basics",
  units: [
    {
      unitNumber: 1,
      unitName: "Getting started",
      slides: [
        { slideNumber: 1, title: "What is generative AI" },
        { slideNumber: 2, title: "Safe use" },
      ],
    },
  ],
};

export function makeDocument(overrides: Partial<CorpusDocument> = {}): CorpusDocument {
  return {
    sourceId: "0000000000000000",
    origin: "web",
    url: "https://example.com/page",
    title: "Example page",
    text: "Example text.",
    characterOrWordCount: 13,
    credibilityHint: "low",
    numericDataPresent: false,
    numericMentionCount: 0,
    numericSamples: [],
    ...overrides,
  };
}
