// ─────────────────────────────────────────────────────────────
// Course Outline — Ordering, unit selection & prompt rendering
// ─────────────────────────────────────────────────────────────

import { CourseOutline, CourseSettings, OutlineUnit } from "../schema/promptSchema";

/** Sort units by unit number and slides by slide number (stable) */
export function sortOutline(outline: CourseOutline): CourseOutline {
  return {
    courseName: outline.courseName,
    units: [...outline.units]
      .sort((a, b) => a.unitNumber - b.unitNumber)
      .map((unit) => ({
        ...unit,
        slides: [...unit.slides].sort((a, b) => a.slideNumber - b.slideNumber),
      })),
  };
}

/**
 * Keep only the requested units, in outline order.
 * Throws when a requested unit does not exist.
 */
export function selectUnits(outline: CourseOutline, unitNumbers: readonly number[]): CourseOutline {
  const available = outline.units.map((u) => u.unitNumber);
  const missing = unitNumbers.filter((n) => !available.includes(n));
  if (missing.length > 0) {
    throw new Error(
      `Unknown unit number(s): ${missing.join(", ")}. Available units: ${available.join(", ") || "none"}`
    );
  }
  return {
    courseName: outline.courseName,
    units: outline.units.filter((u) => unitNumbers.includes(u.unitNumber)),
  };
}

const SETTING_LABELS: ReadonlyArray<[keyof CourseSettings, string]> = [
  ["learnerProfile", "Learner profile"],
  ["targetBehavior", "Target behavior"],
  ["duration", "Duration"],
  ["tone", "Tone"],
];

/** The course specification and structure block that opens every prompt */
export function renderOutlineSection(outline: CourseOutline, settings: CourseSettings = {}): string {
  const lines: string[] = [];

  lines.push("# Course specification");
  lines.push(`- Course theme: ${outline.courseName}`);
  for (const [key, label] of SETTING_LABELS) {
    const value = settings[key]?.trim();
    if (value) lines.push(`- ${label}: ${value}`);
  }
  lines.push("");

  lines.push("## Course structure (follow this structure exactly)");
  lines.push(`Course: ${outline.courseName}`);
  if (outline.units.length === 0) {
    lines.push("(no units defined)");
  }
  for (const unit of outline.units) {
    lines.push("");
    lines.push(...renderUnit(unit));
  }

  return lines.join("\n");
}

function renderUnit(unit: OutlineUnit): string[] {
  const lines = [`### Unit ${unit.unitNumber}: ${unit.unitName}`];
  for (const slide of unit.slides) {
    lines.push(`- Slide ${slide.slideNumber}: ${slide.title}`);
  }
  return lines;
}
