import { describe, it } from "node:test";
import { strict as assert } from "assert";
import { createPipelineConfig } from "../config/pipelineConfig";
import { ResearchPipeline } from "../pipeline/researchPipeline";
import { OUTLINE, VIDEO_RECORDS, WEB_RECORDS, fixedClock, silentLogger } from "./fixtures";

const options = { clock: fixedClock, logger: silentLogger };

describe("ResearchPipeline", () => {
  it("runs every stage for a full request", () => {
    const result = new ResearchPipeline(createPipelineConfig(), options).run({
      web: WEB_RECORDS,
      video: VIDEO_RECORDS,
      outline: OUTLINE,
      courseTheme: "practical",
    });

    assert.equal(result.corpus.documents.length, 5);
    assert.equal(result.quality?.totalScore, 5);
    assert.equal(result.quality?.tier, "good");
    assert.equal(result.terminology?.topTerms[0].surfaceForm, "practical");
    assert.equal(result.terminology?.topTerms[0].matchesTheme, true);
    assert.deepEqual(
      result.prompt?.sections.map((s) => s.id),
      ["outline", "research", "quality", "terminology", "instructions"]
    );
    assert.deepEqual(result.warnings, []);
  });

  it("skips analyses on request and omits their sections", () => {
    const result = new ResearchPipeline(createPipelineConfig(), options).run({
      web: WEB_RECORDS,
      outline: OUTLINE,
      skipQuality: true,
      skipTerminology: true,
      omitExcerpts: true,
    });

    assert.equal(result.quality, undefined);
    assert.equal(result.terminology, undefined);
    assert.deepEqual(result.prompt?.sections.map((s) => s.id), ["outline", "instructions"]);
  });

  it("produces no prompt without an outline", () => {
    const result = new ResearchPipeline(createPipelineConfig(), options).run({ web: WEB_RECORDS });
    assert.equal(result.prompt, undefined);
    assert.equal(result.quality?.summary.webSources, 4);
  });

  it("reports malformed records and an empty corpus", () => {
    const result = new ResearchPipeline(createPipelineConfig(), options).run({
      web: [{ title: "Missing address", content: "Body" }],
    });

    assert.deepEqual(result.warnings, [
      { code: "malformed-record", message: "web record #1 skipped: url: Required" },
      { code: "empty-corpus", message: "No research documents; analyses reflect an empty corpus." },
    ]);
    assert.equal(result.quality?.tier, "needs_improvement");
    assert.deepEqual(result.terminology?.topTerms, []);
  });

  it("warns when the prompt nears the token ceiling", () => {
    const config = createPipelineConfig({ prompt: { tokenCeiling: 100 } });
    const result = new ResearchPipeline(config, options).run({ outline: OUTLINE });

    assert.equal(result.prompt?.usageLevel, "over-limit");
    const usage = result.warnings.filter((w) => w.code === "token-usage");
    assert.equal(usage.length, 1);
    assert.match(
      usage[0].message,
      /^Estimated prompt size \d+ tokens is \d+% of the 100-token ceiling \(over-limit\)$/
    );
  });

  it("logs through the injected logger", () => {
    const lines: string[] = [];
    const logger = {
      log: (line: string) => {
        lines.push(line);
      },
      warn: (line: string) => {
        lines.push(line);
      },
    };
    new ResearchPipeline(createPipelineConfig(), { clock: fixedClock, logger }).run({ web: WEB_RECORDS });

    assert.deepEqual(lines, [
      "[CORPUS] 4 document(s) normalized, 0 skipped",
      "[PIPELINE] Quality: 4/8 (acceptable)",
      "[PIPELINE] Terminology: 0 recurring term(s)",
    ]);
  });
});
