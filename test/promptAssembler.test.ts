import { describe, it } from "node:test";
import { strict as assert } from "assert";
import { DEFAULT_PROMPT, createPipelineConfig } from "../config/pipelineConfig";
import { CorpusNormalizer } from "../ingest";
import { renderOutlineSection, selectUnits, sortOutline } from "../prompt/outline";
import { PromptAssembler } from "../prompt/promptAssembler";
import { previewText, renderResearchSection } from "../prompt/sections";
import { TASK_INSTRUCTIONS } from "../prompt/taskInstructions";
import { assessUsage, estimateTokens } from "../prompt/tokenBudget";
import { QualityScorer } from "../research/qualityScorer";
import { TerminologyExtractor } from "../research/terminologyExtractor";
import { CourseOutline } from "../schema/promptSchema";
import { OUTLINE, VIDEO_RECORDS, WEB_RECORDS, fixedClock, makeDocument } from "./fixtures";

const config = createPipelineConfig();
const assembler = new PromptAssembler(config);

describe("outline helpers", () => {
  const unordered: CourseOutline = {
    courseName: "Ordering",
    units: [
      { unitNumber: 2, unitName: "Second", slides: [{ slideNumber: 2, title: "B" }, { slideNumber: 1, title: "A" }] },
      { unitNumber: 1, unitName: "First", slides: [] },
    ],
  };

  it("sorts units and slides by number", () => {
    const sorted = sortOutline(unordered);
    assert.deepEqual(sorted.units.map((u) => u.unitNumber), [1, 2]);
    assert.deepEqual(sorted.units[1].slides.map((s) => s.title), ["A", "B"]);
    assert.deepEqual(unordered.units.map((u) => u.unitNumber), [2, 1]);
  });

  it("selects units by number", () => {
    assert.deepEqual(selectUnits(unordered, [1]).units.map((u) => u.unitName), ["First"]);
  });

  it("lists the available units when a selection is unknown", () => {
    assert.throws(
      () => selectUnits(unordered, [1, 9]),
      { message: "Unknown unit number(s): 9. Available units: 2, 1" }
    );
  });

  it("renders course settings and structure", () => {
    const text = renderOutlineSection(OUTLINE, { learnerProfile: "New employees", tone: "Friendly" });
    assert.equal(
      text,
      [
        "# Course specification",
        "- Course theme: Workplace AI Basics",
        "- Learner profile: New employees",
        "- Tone: Friendly",
        "",
        "## Course structure (follow this structure exactly)",
        "Course: Workplace AI Basics",
        "",
        "### Unit 1: Getting started",
        "- Slide 1: What is generative AI",
        "- Slide 2: Safe use",
      ].join("\n")
    );
  });

  it("notes an outline without units", () => {
    const text = renderOutlineSection({ courseName: "Empty", units: [] });
    assert.ok(text.endsWith("Course: Empty\n(no units defined)"));
  });
});

describe("token budget", () => {
  it("rounds estimates up", () => {
    assert.equal(estimateTokens("", 4), 0);
    assert.equal(estimateTokens("abcd", 4), 1);
    assert.equal(estimateTokens("abcde", 4), 2);
  });

  it("grades usage against the ceiling", () => {
    assert.equal(assessUsage(249_999, DEFAULT_PROMPT).usageLevel, "comfortable");
    assert.equal(assessUsage(250_000, DEFAULT_PROMPT).usageLevel, "fine");
    assert.equal(assessUsage(500_000, DEFAULT_PROMPT).usageLevel, "caution");
    assert.equal(assessUsage(750_000, DEFAULT_PROMPT).usageLevel, "high");
    const over = assessUsage(1_200_000, DEFAULT_PROMPT);
    assert.equal(over.usageLevel, "over-limit");
    assert.equal(over.usageRatio, 1.2);
  });
});

describe("research excerpts", () => {
  it("truncates previews and counts omitted documents", () => {
    const docs = Array.from({ length: 6 }, (_, i) =>
      makeDocument({ title: `Page ${i + 1}`, text: "x".repeat(600) })
    );
    const text = renderResearchSection(docs, DEFAULT_PROMPT) ?? "";
    assert.ok(text.startsWith("# Research data (reference material)\n"));
    assert.ok(text.includes("**Source 5: Page 5**"));
    assert.ok(!text.includes("Page 6"));
    assert.ok(text.includes(`- Excerpt: ${"x".repeat(500)}...\n`));
    assert.ok(text.endsWith("(1 more source(s) omitted)"));
  });

  it("shows full text when unabridged", () => {
    assert.equal(previewText("y".repeat(600), 500, true), "y".repeat(600));
    assert.equal(previewText("y".repeat(600), 500, false), `${"y".repeat(500)}...`);
    assert.equal(previewText("line one\n  line two", 500, false), "line one line two");
  });

  it("renders nothing for an empty document list", () => {
    assert.equal(renderResearchSection([], DEFAULT_PROMPT), undefined);
  });

  it("describes videos with language and duration", () => {
    const text =
      renderResearchSection(
        [makeDocument({ origin: "video", title: "Video v1", language: "ja", durationSeconds: 90, characterOrWordCount: 120 })],
        DEFAULT_PROMPT
      ) ?? "";
    assert.ok(
      text.includes(
        [
          "## Video transcripts",
          "",
          "**Video 1: Video v1**",
          "- URL: https://example.com/page",
          "- Language: ja",
          "- Words: 120",
          "- Duration: 1.5 min",
          "- Excerpt: Example text.",
        ].join("\n")
      )
    );
  });
});

describe("PromptAssembler", () => {
  it("assembles an outline-only prompt with no analysis headings", () => {
    const prompt = assembler.assemble({ outline: OUTLINE });

    assert.deepEqual(prompt.sections.map((s) => s.id), ["outline", "instructions"]);
    assert.ok(prompt.text.startsWith("# Course specification\n"));
    assert.ok(prompt.text.endsWith(TASK_INSTRUCTIONS));
    assert.ok(!prompt.text.includes("# Research data"));
    assert.ok(!prompt.text.includes("# Research quality"));
    assert.ok(!prompt.text.includes("# Terminology analysis"));
    assert.equal(prompt.usageLevel, "comfortable");
    assert.equal(prompt.tokenCeiling, 1_000_000);
    const [outlineSection, instructionsSection] = prompt.sections;
    assert.equal(prompt.estimatedTokens, outlineSection.estimatedTokens + instructionsSection.estimatedTokens);
  });

  it("sums per-section token estimates", () => {
    const prompt = assembler.assemble({ outline: OUTLINE });
    for (const section of prompt.sections) {
      assert.equal(section.estimatedTokens, Math.ceil(section.characters / 4));
    }
    const total = prompt.sections.reduce((sum, s) => sum + s.estimatedTokens, 0);
    assert.equal(prompt.estimatedTokens, total);
    assert.equal(prompt.usageRatio, total / 1_000_000);
    assert.equal(prompt.sections[1].characters, TASK_INSTRUCTIONS.length);
    assert.equal(prompt.sections[1].heading, "Your task");
  });

  it("orders every section when all inputs are present", () => {
    const corpus = new CorpusNormalizer(config).normalize({ web: WEB_RECORDS, video: VIDEO_RECORDS });
    const quality = new QualityScorer(config, fixedClock).score(corpus);
    const terminology = new TerminologyExtractor(config, fixedClock).extract(corpus);

    const prompt = assembler.assemble({
      outline: OUTLINE,
      quality,
      terminology,
      excerpts: corpus.documents,
    });

    assert.deepEqual(
      prompt.sections.map((s) => s.id),
      ["outline", "research", "quality", "terminology", "instructions"]
    );
    assert.ok(
      prompt.text.includes(
        [
          "# Research quality",
          "- Quality tier: good (score 5/8)",
          "- Numeric data points: 3",
          "- Credible sources: 1",
          "",
          "Quality notes:",
          "- Good research quality.",
          "- Few numeric data points (3). Add sources with statistics or survey results.",
          "- 3 numeric data point(s) found. Use them as concrete examples in the course.",
        ].join("\n")
      )
    );
    assert.ok(
      prompt.text.includes(
        [
          "# Terminology analysis",
          "- Recurring terms: 1",
          "- Categories: technical 0, business 0, learning 0, general 1",
          "- Learning phases: introduction 0, understanding 0, application 0",
          "",
          "Key terms to define and explain (top 1):",
          "practical",
        ].join("\n")
      )
    );
  });

  it("limits recommendation lines to the configured counts", () => {
    const limited = new PromptAssembler(
      createPipelineConfig({ prompt: { qualityRecommendationLimit: 1, terminologyRecommendationLimit: 0 } })
    );
    const quality = new QualityScorer(config, fixedClock).score();
    const terminology = new TerminologyExtractor(config, fixedClock).extract();
    const prompt = limited.assemble({ outline: OUTLINE, quality, terminology });

    assert.ok(prompt.text.includes("Quality notes:\n- Research quality needs improvement. Address the points below first.\n\n---"));
    assert.ok(!prompt.text.includes("Terminology notes:"));
    assert.ok(!prompt.text.includes("Key terms to define"));
  });
});
