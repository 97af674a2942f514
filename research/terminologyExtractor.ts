// ─────────────────────────────────────────────────────────────
// Terminology Extractor — Recurring key terms for course design
//
// Tokenizes every corpus document, keeps terms that recur, ranks
// them by frequency and tags each with a category and learning
// phase. Imbalances in the ranked list become recommendations.
//
// Deterministic: the same corpus and configuration always give
// the same ranked list.
// ─────────────────────────────────────────────────────────────

import { PipelineConfig, TerminologyConfig } from "../config/pipelineConfig";
import { Corpus, CorpusDocument, DocumentOrigin } from "../schema/corpusSchema";
import { LearningPhase, Term, TermCategory, TerminologyReport } from "../schema/reportSchema";
import { PHASE_PRIORITY, TermClassifier } from "./termClassifier";
import { codePointLength, tokenize } from "./tokenizer";

// ── Types ────────────────────────────────────────────────────

interface TermStats {
  surface: string;
  frequency: number;
  documents: Set<number>;
  origins: Set<DocumentOrigin>;
}

const NUMERIC_ONLY = /^\p{N}+$/u;

// ── Extractor ────────────────────────────────────────────────

export class TerminologyExtractor {
  private readonly settings: TerminologyConfig;
  private readonly classifier: TermClassifier;
  private readonly stopTerms: Set<string>;

  constructor(config: PipelineConfig, private readonly clock: () => Date = () => new Date()) {
    this.settings = config.terminology;
    this.classifier = new TermClassifier(config.taxonomy);
    this.stopTerms = new Set(config.taxonomy.stopTerms.map((t) => t.toLowerCase()));
  }

  /**
   * Extract ranked terminology from a corpus. A missing or empty corpus
   * yields an empty report with a single recommendation.
   */
  extract(corpus?: Corpus, courseTheme?: string): TerminologyReport {
    const documents = corpus?.documents ?? [];
    const theme = courseTheme?.trim() || null;

    const recurring = [...this.countTerms(documents).values()]
      .filter((stats) => stats.frequency >= this.settings.minFrequency)
      // Array.prototype.sort is stable: ties keep first-occurrence order
      .sort((a, b) => b.frequency - a.frequency);

    const themeKeywords = theme ? this.themeKeywords(theme) : [];
    const themeSet = new Set(themeKeywords.map((k) => k.toLowerCase()));

    const candidateTerms = recurring
      .slice(0, this.settings.candidateCap)
      .map((stats) => this.toTerm(stats, themeSet));
    const topTerms = candidateTerms.slice(0, this.settings.topTermCap);

    const categoryCounts: Record<TermCategory, number> = {
      technical: 0,
      business: 0,
      learning: 0,
      general: 0,
    };
    const phaseCounts: Record<LearningPhase, number> = {
      introduction: 0,
      understanding: 0,
      application: 0,
    };
    let unphasedTerms = 0;

    for (const term of topTerms) {
      categoryCounts[term.category]++;
      if (term.learningPhase === "none") unphasedTerms++;
      else phaseCounts[term.learningPhase]++;
    }

    const candidateSet = new Set(candidateTerms.map((t) => t.surfaceForm.toLowerCase()));
    const uncoveredTheme = themeKeywords.filter((k) => !candidateSet.has(k.toLowerCase()));

    return {
      generatedAt: this.clock().toISOString(),
      courseTheme: theme,
      totalUniqueTerms: recurring.length,
      candidateTerms,
      topTerms,
      categoryCounts,
      phaseCounts,
      unphasedTerms,
      recommendations: this.recommend(topTerms, categoryCounts, phaseCounts, uncoveredTheme),
    };
  }

  /** Whether a token survives the length, stop-term and numeric filters */
  isCandidate(token: string): boolean {
    return (
      codePointLength(token) >= this.settings.minTermLength &&
      !this.stopTerms.has(token.toLowerCase()) &&
      !NUMERIC_ONLY.test(token)
    );
  }

  // ── Counting ───────────────────────────────────────────────

  private countTerms(documents: readonly CorpusDocument[]): Map<string, TermStats> {
    const stats = new Map<string, TermStats>();

    documents.forEach((doc, docIndex) => {
      for (const token of tokenize(doc.text)) {
        if (!this.isCandidate(token)) continue;

        let entry = stats.get(token);
        if (!entry) {
          entry = { surface: token, frequency: 0, documents: new Set(), origins: new Set() };
          stats.set(token, entry);
        }
        entry.frequency++;
        entry.documents.add(docIndex);
        entry.origins.add(doc.origin);
      }
    });

    return stats;
  }

  private themeKeywords(theme: string): string[] {
    return [...new Set(tokenize(theme).filter((token) => this.isCandidate(token)))];
  }

  private toTerm(stats: TermStats, themeSet: Set<string>): Term {
    return {
      surfaceForm: stats.surface,
      frequency: stats.frequency,
      documentFrequency: stats.documents.size,
      origins: [...stats.origins],
      category: this.classifier.categorize(stats.surface),
      learningPhase: this.classifier.phaseOf(stats.surface),
      matchesTheme: themeSet.has(stats.surface.toLowerCase()),
    };
  }

  // ── Recommendations ────────────────────────────────────────

  private recommend(
    topTerms: Term[],
    categories: Record<TermCategory, number>,
    phases: Record<LearningPhase, number>,
    uncoveredTheme: string[]
  ): string[] {
    const s = this.settings;
    const themeNote =
      uncoveredTheme.length > 0
        ? [
            `Theme keywords rarely mentioned in the research: ${uncoveredTheme.join(", ")}. ` +
              "Add sources that cover them directly.",
          ]
        : [];

    const total = topTerms.length;
    if (total === 0) {
      return [
        `No recurring terminology found (no term appears ${s.minFrequency} or more times). ` +
          "Add more research material before designing the course.",
        ...themeNote,
      ];
    }

    const recs: string[] = [];

    if (categories.technical > total * s.dominantCategoryShare) {
      recs.push(
        `Technical terms dominate (${categories.technical} of ${total}). ` +
          "Add a glossary and plain-language explanations for beginners."
      );
    }
    if (categories.business > total * s.dominantCategoryShare) {
      recs.push(
        `Business terms dominate (${categories.business} of ${total}). ` +
          "Include concrete workplace examples."
      );
    }

    const phased = PHASE_PRIORITY.reduce((sum, phase) => sum + phases[phase], 0);
    if (phased === 0) {
      recs.push(
        "No term signals a learning phase. Structure the course explicitly into introduction, understanding and application."
      );
    } else {
      if (phases.introduction < phased * s.minPhaseShare) {
        recs.push(
          `Few introduction-phase terms (${phases.introduction} of ${phased}). ` +
            "Strengthen the explanation of basic concepts."
        );
      }
      if (phases.application < phased * s.minPhaseShare) {
        recs.push(
          `Few application-phase terms (${phases.application} of ${phased}). ` +
            "Add practical examples and case studies."
        );
      }
    }

    if (recs.length === 0) recs.push("Terminology balance looks good.");
    recs.push(...themeNote);

    if (s.highlightCount > 0) {
      const highlights = topTerms.slice(0, s.highlightCount).map((t) => t.surfaceForm);
      recs.push(`Key terms to explain in the course: ${highlights.join(", ")}.`);
    }

    return recs;
  }
}
