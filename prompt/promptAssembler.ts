// ─────────────────────────────────────────────────────────────
// Prompt Assembler — Outline + research + analyses → one prompt
//
// Section order is fixed:
//   outline → research → quality → terminology → instructions
// Optional inputs that are absent leave no trace in the text.
// ─────────────────────────────────────────────────────────────

import { PipelineConfig, PromptConfig } from "../config/pipelineConfig";
import { CorpusDocument } from "../schema/corpusSchema";
import {
  CourseOutline,
  CourseSettings,
  PromptDocument,
  PromptSectionId,
} from "../schema/promptSchema";
import { QualityReport, TerminologyReport } from "../schema/reportSchema";
import { renderOutlineSection } from "./outline";
import {
  renderQualitySection,
  renderResearchSection,
  renderTerminologySection,
} from "./sections";
import { TASK_INSTRUCTIONS } from "./taskInstructions";
import { assessUsage, estimateTokens } from "./tokenBudget";

export interface AssemblyInput {
  outline: CourseOutline;
  settings?: CourseSettings;
  quality?: QualityReport;
  terminology?: TerminologyReport;
  /** Corpus documents to preview in the research section */
  excerpts?: readonly CorpusDocument[];
}

interface RenderedSection {
  id: PromptSectionId;
  text: string;
}

const SECTION_SEPARATOR = "\n\n---\n\n";

export class PromptAssembler {
  private readonly settings: PromptConfig;

  constructor(config: PipelineConfig) {
    this.settings = config.prompt;
  }

  assemble(input: AssemblyInput): PromptDocument {
    const sections = this.render(input);

    const summaries = sections.map((section) => ({
      id: section.id,
      heading: headingOf(section.text),
      characters: section.text.length,
      estimatedTokens: estimateTokens(section.text, this.settings.charsPerToken),
    }));
    const usage = assessUsage(
      summaries.reduce((total, s) => total + s.estimatedTokens, 0),
      this.settings
    );

    return {
      text: sections.map((s) => s.text).join(SECTION_SEPARATOR),
      estimatedTokens: usage.estimatedTokens,
      usageLevel: usage.usageLevel,
      usageRatio: usage.usageRatio,
      tokenCeiling: this.settings.tokenCeiling,
      sections: summaries,
    };
  }

  private render(input: AssemblyInput): RenderedSection[] {
    const sections: RenderedSection[] = [
      { id: "outline", text: renderOutlineSection(input.outline, input.settings) },
    ];

    if (input.excerpts) {
      const research = renderResearchSection(input.excerpts, this.settings);
      if (research) sections.push({ id: "research", text: research });
    }
    if (input.quality) {
      sections.push({ id: "quality", text: renderQualitySection(input.quality, this.settings) });
    }
    if (input.terminology) {
      sections.push({
        id: "terminology",
        text: renderTerminologySection(input.terminology, this.settings),
      });
    }

    sections.push({ id: "instructions", text: TASK_INSTRUCTIONS });
    return sections;
  }
}

function headingOf(text: string): string {
  const first = text.split("\n", 1)[0];
  return first.replace(/^#+\s*/, "");
}
