#!/usr/bin/env node
// ─────────────────────────────────────────────────────────────
// Course Research Pipeline — Command-line entry point
// ─────────────────────────────────────────────────────────────
//
// Usage:
//   npx tsx app.ts --web <file> --video <file> [options]
//   npx tsx app.ts --outline <file> [--web <file>] [--video <file>] [options]
//
// Examples:
//   npx tsx app.ts --web ./research/web.json --video ./research/video.json
//   npx tsx app.ts --web ./research/web.json --outline ./outline.json --unit 1,2
//   npx tsx app.ts --outline ./outline.json --settings ./settings.json --unabridged
//
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import { z } from "zod";
import {
  ConfigurationError,
  PipelineConfigOverrides,
  createPipelineConfig,
  loadTaxonomy,
} from "./config/pipelineConfig";
import { exportFingerprint, exportJSON, exportPrompt, generateFingerprint } from "./export/jsonExport";
import { unwrapTranscriptRecords, unwrapWebRecords } from "./ingest";
import { ResearchPipeline } from "./pipeline/researchPipeline";
import { selectUnits, sortOutline } from "./prompt/outline";
import { formatQualitySummary, formatTerminologySummary } from "./research/reportFormatter";
import {
  CourseOutline,
  CourseOutlineSchema,
  CourseSettings,
  CourseSettingsSchema,
} from "./schema/promptSchema";
import { describeIssues } from "./schema/recordSchema";

// ── CLI Arguments ────────────────────────────────────────────

interface CLIOptions {
  webPath: string | null;
  videoPath: string | null;
  outlinePath: string | null;
  settingsPath: string | null;
  settings: CourseSettings;
  courseTheme: string | null;
  units: number[];
  taxonomyPath: string | null;
  unabridged: boolean;
  omitExcerpts: boolean;
  skipQuality: boolean;
  skipTerminology: boolean;
  outputDir: string;
  name: string;
}

function parseArgs(): CLIOptions {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    printHelp();
    process.exit(0);
  }

  const getFlag = (flag: string): string | null => {
    const idx = args.indexOf(flag);
    return idx !== -1 && idx + 1 < args.length ? args[idx + 1] : null;
  };

  const unitFlag = getFlag("--unit");
  const units = unitFlag
    ? unitFlag.split(",").map((value) => {
        const n = Number(value.trim());
        if (!Number.isInteger(n)) throw new Error(`--unit expects unit numbers, got "${value}"`);
        return n;
      })
    : [];

  const settings: CourseSettings = {};
  const learnerProfile = getFlag("--learner-profile");
  const targetBehavior = getFlag("--target-behavior");
  const duration = getFlag("--duration");
  const tone = getFlag("--tone");
  if (learnerProfile) settings.learnerProfile = learnerProfile;
  if (targetBehavior) settings.targetBehavior = targetBehavior;
  if (duration) settings.duration = duration;
  if (tone) settings.tone = tone;

  return {
    webPath: getFlag("--web"),
    videoPath: getFlag("--video"),
    outlinePath: getFlag("--outline"),
    settingsPath: getFlag("--settings"),
    settings,
    courseTheme: getFlag("--theme"),
    units,
    taxonomyPath: getFlag("--taxonomy"),
    unabridged: args.includes("--unabridged"),
    omitExcerpts: args.includes("--no-excerpts"),
    skipQuality: args.includes("--skip-quality"),
    skipTerminology: args.includes("--skip-terminology"),
    outputDir: getFlag("--output") || "./output",
    name: getFlag("--name") || "course",
  };
}

function printHelp(): void {
  console.log(`
╔══════════════════════════════════════════════════════════════╗
║         COURSE RESEARCH PIPELINE                             ║
║         Research quality, terminology & prompt assembly      ║
╚══════════════════════════════════════════════════════════════╝

USAGE:
  npx tsx app.ts --web <file> --video <file> [options]
  npx tsx app.ts --outline <file> [--web <file>] [--video <file>] [options]

INPUTS:
  --web <file>              Web research JSON ({ sources: [...] } or an array)
  --video <file>            Video transcript JSON ({ transcriptions: [...] } or an array)
  --outline <file>          Course outline JSON; enables prompt assembly
  --settings <file>         Course settings JSON
  --taxonomy <file>         Replacement keyword taxonomy JSON

COURSE OPTIONS:
  --unit <n[,n...]>         Only include these unit numbers
  --theme <text>            Course theme for terminology (default: course name)
  --learner-profile <text>  Overrides the settings file
  --target-behavior <text>
  --duration <text>
  --tone <text>

PROMPT OPTIONS:
  --unabridged              Include full document text in the prompt
  --no-excerpts             Leave research excerpts out of the prompt
  --skip-quality            Do not run the quality analysis
  --skip-terminology        Do not run the terminology analysis

OUTPUT:
  --output <dir>            Output directory (default: ./output)
  --name <name>             Base name for output files (default: course)
`);
}

// ── Input Files ──────────────────────────────────────────────

function readJsonFile(filePath: string, label: string): unknown {
  if (!fs.existsSync(filePath)) {
    throw new Error(`${label} file not found: ${filePath}`);
  }
  try {
    return JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new Error(
      `${label} file is not valid JSON (${filePath}): ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

function parseFile<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, filePath: string, label: string): T {
  const result = schema.safeParse(readJsonFile(filePath, label));
  if (!result.success) {
    throw new Error(`${label} file is invalid (${filePath}): ${describeIssues(result.error)}`);
  }
  return result.data;
}

function loadOutline(options: CLIOptions): CourseOutline | undefined {
  if (!options.outlinePath) return undefined;
  const outline = sortOutline(parseFile(CourseOutlineSchema, options.outlinePath, "Outline"));
  return options.units.length > 0 ? selectUnits(outline, options.units) : outline;
}

// ── Main Pipeline ────────────────────────────────────────────

async function main(): Promise<void> {
  const options = parseArgs();

  if (!options.webPath && !options.videoPath && !options.outlinePath) {
    printHelp();
    throw new Error("Nothing to do: pass --web, --video or --outline");
  }

  const overrides: PipelineConfigOverrides = { prompt: { unabridged: options.unabridged } };
  if (options.taxonomyPath) overrides.taxonomy = loadTaxonomy(options.taxonomyPath);
  const config = createPipelineConfig(overrides);

  const web = options.webPath ? unwrapWebRecords(readJsonFile(options.webPath, "Web research")) : undefined;
  const video = options.videoPath
    ? unwrapTranscriptRecords(readJsonFile(options.videoPath, "Video transcript"))
    : undefined;
  const outline = loadOutline(options);
  const fileSettings = options.settingsPath
    ? parseFile(CourseSettingsSchema, options.settingsPath, "Settings")
    : {};

  console.log("");
  console.log("═══════════════════════════════════════════════════════");
  console.log("  COURSE RESEARCH PIPELINE");
  console.log("═══════════════════════════════════════════════════════");
  console.log("");

  const pipeline = new ResearchPipeline(config);
  const result = pipeline.run({
    web,
    video,
    outline,
    settings: { ...fileSettings, ...options.settings },
    courseTheme: options.courseTheme ?? outline?.courseName,
    skipQuality: options.skipQuality,
    skipTerminology: options.skipTerminology,
    omitExcerpts: options.omitExcerpts,
  });

  console.log("");
  if (result.quality) {
    console.log(formatQualitySummary(result.quality));
    console.log("");
    await exportJSON(result.quality, options.outputDir, { filename: `${options.name}-quality` });
  }
  if (result.terminology) {
    console.log(formatTerminologySummary(result.terminology));
    console.log("");
    await exportJSON(result.terminology, options.outputDir, { filename: `${options.name}-terminology` });
  }
  if (result.prompt) {
    await exportPrompt(result.prompt, options.outputDir, { filename: `${options.name}-prompt` });
  }

  const fingerprint = generateFingerprint({
    quality: result.quality,
    terminology: result.terminology,
    prompt: result.prompt,
  });
  await exportFingerprint(fingerprint, options.outputDir, { filename: options.name });

  console.log("");
  console.log(`[DONE] ${result.warnings.length} warning(s)`);
  for (const warning of result.warnings) {
    console.log(`  - [${warning.code}] ${warning.message}`);
  }
}

// ── Run ──────────────────────────────────────────────────────

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    console.error("\n[CONFIG ERROR]");
    for (const problem of err.problems) console.error(`  - ${problem}`);
  } else {
    console.error("\n[FATAL ERROR]", err instanceof Error ? err.message : err);
  }
  process.exit(1);
});
