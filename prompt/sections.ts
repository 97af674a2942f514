// ─────────────────────────────────────────────────────────────
// Prompt Sections — Research excerpts & analysis digests
// ─────────────────────────────────────────────────────────────

import { PromptConfig } from "../config/pipelineConfig";
import { CorpusDocument, DocumentOrigin } from "../schema/corpusSchema";
import { QualityReport, TerminologyReport } from "../schema/reportSchema";

// ── Research excerpts ────────────────────────────────────────

const ORIGIN_HEADINGS: Record<DocumentOrigin, { heading: string; item: string; count: string }> = {
  web: { heading: "## Web research", item: "Source", count: "Characters" },
  video: { heading: "## Video transcripts", item: "Video", count: "Words" },
};

/**
 * Render bounded previews of the corpus, grouped by origin.
 * Returns undefined when there is nothing to show.
 */
export function renderResearchSection(
  documents: readonly CorpusDocument[],
  config: PromptConfig
): string | undefined {
  const blocks: string[] = [];

  for (const origin of ["web", "video"] as const) {
    const docs = documents.filter((d) => d.origin === origin);
    if (docs.length === 0) continue;

    const cap = config.maxExcerpts[origin];
    const shown = docs.slice(0, cap);
    const labels = ORIGIN_HEADINGS[origin];
    const lines = [labels.heading];

    shown.forEach((doc, i) => {
      lines.push("");
      lines.push(`**${labels.item} ${i + 1}: ${doc.title}**`);
      lines.push(`- URL: ${doc.url}`);
      if (doc.language) lines.push(`- Language: ${doc.language}`);
      lines.push(`- ${labels.count}: ${doc.characterOrWordCount}`);
      if (doc.durationSeconds !== undefined) {
        lines.push(`- Duration: ${(doc.durationSeconds / 60).toFixed(1)} min`);
      }
      const excerpt = previewText(doc.text, config.excerptLength[origin], config.unabridged);
      if (excerpt) lines.push(`- Excerpt: ${excerpt}`);
    });

    const omitted = docs.length - shown.length;
    if (omitted > 0) {
      lines.push("");
      lines.push(`(${omitted} more ${origin === "web" ? "source(s)" : "video(s)"} omitted)`);
    }
    blocks.push(lines.join("\n"));
  }

  if (blocks.length === 0) return undefined;

  return [
    "# Research data (reference material)",
    "Use the research below to keep the course accurate and current.",
    "",
    blocks.join("\n\n"),
  ].join("\n");
}

/** Truncate to `limit` code points, marking the cut with "..." */
export function previewText(text: string, limit: number, unabridged: boolean): string {
  const flat = text.replace(/\s+/g, " ").trim();
  if (unabridged) return flat;
  const chars = Array.from(flat);
  return chars.length > limit ? `${chars.slice(0, limit).join("")}...` : flat;
}

// ── Analysis digests ─────────────────────────────────────────

export function renderQualitySection(report: QualityReport, config: PromptConfig): string {
  const lines = [
    "# Research quality",
    `- Quality tier: ${report.tier} (score ${report.totalScore}/8)`,
    `- Numeric data points: ${report.summary.totalDataPoints}`,
    `- Credible sources: ${report.summary.credibleSources}`,
  ];

  const notes = report.recommendations.slice(0, config.qualityRecommendationLimit);
  if (notes.length > 0) {
    lines.push("");
    lines.push("Quality notes:");
    for (const note of notes) lines.push(`- ${note}`);
  }
  return lines.join("\n");
}

export function renderTerminologySection(report: TerminologyReport, config: PromptConfig): string {
  const c = report.categoryCounts;
  const p = report.phaseCounts;
  const lines = [
    "# Terminology analysis",
    `- Recurring terms: ${report.totalUniqueTerms}`,
    `- Categories: technical ${c.technical}, business ${c.business}, learning ${c.learning}, general ${c.general}`,
    `- Learning phases: introduction ${p.introduction}, understanding ${p.understanding}, application ${p.application}`,
  ];

  const keyTerms = report.topTerms.slice(0, config.keyTermLimit);
  if (keyTerms.length > 0) {
    lines.push("");
    lines.push(`Key terms to define and explain (top ${keyTerms.length}):`);
    lines.push(keyTerms.map((t) => t.surfaceForm).join(", "));
  }

  const notes = report.recommendations.slice(0, config.terminologyRecommendationLimit);
  if (notes.length > 0) {
    lines.push("");
    lines.push("Terminology notes:");
    for (const note of notes) lines.push(`- ${note}`);
  }
  return lines.join("\n");
}
