// ─────────────────────────────────────────────────────────────
// Report Formatter — Console summaries for analysis reports
// ─────────────────────────────────────────────────────────────

import { QualityDimension, QualityReport, TerminologyReport } from "../schema/reportSchema";
import { formatCount } from "./qualityScorer";

const RULE = "══════════════════════════════════════════════════════════";

const DIMENSION_ORDER: QualityDimension[] = [
  "sourceCount",
  "dataPoints",
  "credibleSources",
  "contentVolume",
];

const DIMENSION_LABELS: Record<QualityDimension, string> = {
  sourceCount: "Sources",
  dataPoints: "Data points",
  credibleSources: "Credible sources",
  contentVolume: "Content volume",
};

export function formatQualitySummary(report: QualityReport): string {
  const s = report.summary;
  const lines: string[] = [];

  lines.push(RULE);
  lines.push("  RESEARCH QUALITY REPORT");
  lines.push(RULE);
  lines.push("");
  lines.push(`  Score:          ${report.totalScore}/8 (${report.tier})`);
  lines.push(`  Sources:        ${s.totalSources} (web ${s.webSources}, video ${s.videoSources})`);
  lines.push(`  Data points:    ${s.totalDataPoints}`);
  lines.push(`  Credible:       ${s.credibleSources}`);
  lines.push(
    `  Volume:         ${formatCount(s.contentVolume.webCharacters)} chars + ${formatCount(s.contentVolume.videoWords)} words`
  );
  if (s.videoSources > 0) {
    lines.push(`  Video time:     ${s.videoMinutes.toFixed(1)} min`);
  }
  lines.push("");

  lines.push("── DIMENSIONS ────────────────────────────────────────────");
  for (const dimension of DIMENSION_ORDER) {
    lines.push(`  ${DIMENSION_LABELS[dimension].padEnd(18)}${report.dimensionScores[dimension]}/2`);
  }
  lines.push("");

  lines.push("── RECOMMENDATIONS ───────────────────────────────────────");
  for (const rec of report.recommendations) lines.push(`  • ${rec}`);
  lines.push(RULE);

  return lines.join("\n");
}

export function formatTerminologySummary(report: TerminologyReport, limit = 10): string {
  const lines: string[] = [];

  lines.push(RULE);
  lines.push("  TERMINOLOGY REPORT");
  lines.push(RULE);
  lines.push("");
  if (report.courseTheme) lines.push(`  Theme:          ${report.courseTheme}`);
  lines.push(`  Unique terms:   ${report.totalUniqueTerms}`);
  lines.push(`  Top terms:      ${report.topTerms.length}`);
  lines.push("");

  if (report.topTerms.length > 0) {
    lines.push("── TOP TERMS ─────────────────────────────────────────────");
    report.topTerms.slice(0, limit).forEach((term, i) => {
      const phase = term.learningPhase === "none" ? "" : `, ${term.learningPhase}`;
      lines.push(`  ${String(i + 1).padStart(2)}. ${term.surfaceForm} ×${term.frequency} (${term.category}${phase})`);
    });
    lines.push("");
  }

  lines.push("── RECOMMENDATIONS ───────────────────────────────────────");
  for (const rec of report.recommendations) lines.push(`  • ${rec}`);
  lines.push(RULE);

  return lines.join("\n");
}
