// ─────────────────────────────────────────────────────────────
// Prompt Schema — Course outline input & assembled prompt output
// ─────────────────────────────────────────────────────────────

import { z } from "zod";

// ── Course Outline ───────────────────────────────────────────

export const OutlineSlideSchema = z.object({
  slideNumber: z.number().int().nonnegative(),
  title: z.string().min(1, "Slide title is required"),
});

export const OutlineUnitSchema = z.object({
  unitNumber: z.number().int().nonnegative(),
  unitName: z.string(),
  slides: z.array(OutlineSlideSchema),
});

/** Ordered unit/slide definitions for one course, supplied by the caller */
export const CourseOutlineSchema = z.object({
  courseName: z.string().min(1, "Course name is required"),
  units: z.array(OutlineUnitSchema),
});

/** Learner-facing settings from the course form */
export const CourseSettingsSchema = z.object({
  learnerProfile: z.string().optional(),
  targetBehavior: z.string().optional(),
  duration: z.string().optional(),
  tone: z.string().optional(),
});

export type OutlineSlide = z.infer<typeof OutlineSlideSchema>;
export type OutlineUnit = z.infer<typeof OutlineUnitSchema>;
export type CourseOutline = z.infer<typeof CourseOutlineSchema>;
export type CourseSettings = z.infer<typeof CourseSettingsSchema>;

// ── Prompt Document ──────────────────────────────────────────

/** Ordered severities, least to most urgent */
export type UsageLevel = "comfortable" | "fine" | "caution" | "high" | "over-limit";

export type PromptSectionId =
  | "outline"
  | "research"
  | "quality"
  | "terminology"
  | "instructions";

export interface PromptSectionSummary {
  id: PromptSectionId;
  heading: string;
  characters: number;
  estimatedTokens: number;
}

export interface PromptDocument {
  text: string;
  estimatedTokens: number;
  usageLevel: UsageLevel;
  /** estimatedTokens / tokenCeiling */
  usageRatio: number;
  tokenCeiling: number;
  sections: PromptSectionSummary[];
}
