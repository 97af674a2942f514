// ─────────────────────────────────────────────────────────────
// Term Classifier — Category & learning-phase assignment
// ─────────────────────────────────────────────────────────────

import { PatternCategory, Taxonomy } from "../config/pipelineConfig";
import { LearningPhase, TermCategory } from "../schema/reportSchema";

/** Priority order: the first matching category wins */
export const CATEGORY_PRIORITY: readonly PatternCategory[] = ["technical", "business", "learning"];

/** Priority order: the first matching cue wins */
export const PHASE_PRIORITY: readonly LearningPhase[] = ["introduction", "understanding", "application"];

interface Rule<L> {
  label: L;
  patterns: RegExp[];
}

function compile<L extends string>(
  order: readonly L[],
  sources: Readonly<Record<L, readonly string[]>>
): Rule<L>[] {
  return order.map((label) => ({
    label,
    patterns: sources[label].map((source) => new RegExp(source, "iu")),
  }));
}

function firstMatch<L>(rules: Rule<L>[], term: string): L | undefined {
  for (const rule of rules) {
    if (rule.patterns.some((pattern) => pattern.test(term))) return rule.label;
  }
  return undefined;
}

export class TermClassifier {
  private readonly categories: Rule<PatternCategory>[];
  private readonly phases: Rule<LearningPhase>[];

  constructor(taxonomy: Taxonomy) {
    this.categories = compile(CATEGORY_PRIORITY, taxonomy.categoryPatterns);
    this.phases = compile(PHASE_PRIORITY, taxonomy.phaseCues);
  }

  /** Every term gets exactly one category; "general" when nothing matches */
  categorize(term: string): TermCategory {
    return firstMatch(this.categories, term) ?? "general";
  }

  /** "none" when no phase cue matches */
  phaseOf(term: string): LearningPhase | "none" {
    return firstMatch(this.phases, term) ?? "none";
  }
}
