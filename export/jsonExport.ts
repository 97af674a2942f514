// ─────────────────────────────────────────────────────────────
// JSON Export — Report files, prompt text & run fingerprint
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import crypto from "crypto";
import CryptoJS from "crypto-js";
import { PromptDocument } from "../schema/promptSchema";
import { QualityReport, TerminologyReport } from "../schema/reportSchema";

/** The artifacts one pipeline run produces */
export interface RunArtifacts {
  quality?: QualityReport;
  terminology?: TerminologyReport;
  prompt?: PromptDocument;
}

export type ArtifactName = keyof RunArtifacts;

/** Fixed hashing order; also the order artifacts are listed in */
const ARTIFACT_ORDER: readonly ArtifactName[] = ["quality", "terminology", "prompt"];

export interface RunFingerprint {
  /** SHA-256 over all artifacts together */
  sha256: string;
  /** SHA-256 of each artifact present in the run */
  artifactHashes: Partial<Record<ArtifactName, string>>;
  /** Hash chained over artifactHashes in fixed order */
  rootHash: string;
  version: string;
  timestamp: number;
}

export interface FingerprintCheck {
  valid: boolean;
  /** Artifacts added, removed or edited since the fingerprint was taken */
  changed: ArtifactName[];
  details: string;
}

/**
 * Write any report object as JSON.
 */
export async function exportJSON(
  data: unknown,
  outputDir: string,
  options: { filename: string; pretty?: boolean }
): Promise<string> {
  ensureDir(outputDir);

  const jsonPath = path.join(outputDir, `${sanitizeFilename(options.filename)}.json`);
  const content = options.pretty !== false ? JSON.stringify(data, null, 2) : JSON.stringify(data);

  fs.writeFileSync(jsonPath, content, "utf-8");
  console.log(`[EXPORT] JSON → ${jsonPath}`);

  return jsonPath;
}

/**
 * Write the prompt text plus a metadata file with its size estimate.
 * Returns [textPath, metaPath].
 */
export async function exportPrompt(
  prompt: PromptDocument,
  outputDir: string,
  options: { filename: string }
): Promise<[string, string]> {
  ensureDir(outputDir);

  const baseName = sanitizeFilename(options.filename);
  const textPath = path.join(outputDir, `${baseName}.txt`);
  const metaPath = path.join(outputDir, `${baseName}.meta.json`);

  const { text, ...meta } = prompt;
  fs.writeFileSync(textPath, text, "utf-8");
  fs.writeFileSync(metaPath, JSON.stringify(meta, null, 2), "utf-8");
  console.log(`[EXPORT] Prompt → ${textPath}`);

  return [textPath, metaPath];
}

/**
 * Fingerprint a run's artifacts for later integrity checks.
 */
export function generateFingerprint(artifacts: RunArtifacts): RunFingerprint {
  const artifactHashes = hashArtifacts(artifacts);
  return {
    sha256: crypto.createHash("sha256").update(JSON.stringify(artifacts)).digest("hex"),
    artifactHashes,
    rootHash: chainHashes(artifactHashes),
    version: "1.0.0",
    timestamp: Date.now(),
  };
}

export async function exportFingerprint(
  fingerprint: RunFingerprint,
  outputDir: string,
  options?: { filename?: string }
): Promise<string> {
  ensureDir(outputDir);

  const baseName = sanitizeFilename(options?.filename || "run");
  const fpPath = path.join(outputDir, `${baseName}.fingerprint.json`);

  fs.writeFileSync(fpPath, JSON.stringify(fingerprint, null, 2), "utf-8");
  console.log(`[EXPORT] Fingerprint → ${fpPath}`);

  return fpPath;
}

/**
 * Verify artifacts against a stored fingerprint, naming every artifact
 * whose hash no longer matches.
 */
export function verifyFingerprint(artifacts: RunArtifacts, stored: RunFingerprint): FingerprintCheck {
  const current = hashArtifacts(artifacts);
  const changed = ARTIFACT_ORDER.filter((name) => current[name] !== stored.artifactHashes[name]);
  const rootMatches = chainHashes(current) === stored.rootHash;

  if (changed.length === 0 && rootMatches) {
    return { valid: true, changed, details: "Artifact integrity verified: every hash matches." };
  }

  const lines = ["Integrity check FAILED."];
  for (const name of changed) {
    lines.push(`  ${name}: expected ${stored.artifactHashes[name] ?? "(absent)"}, actual ${current[name] ?? "(absent)"}`);
  }
  if (!rootMatches) lines.push(`  root: expected ${stored.rootHash}, actual ${chainHashes(current)}`);
  return { valid: false, changed, details: lines.join("\n") };
}

// ── Helpers ──────────────────────────────────────────────────

function hashArtifacts(artifacts: RunArtifacts): Partial<Record<ArtifactName, string>> {
  const hashes: Partial<Record<ArtifactName, string>> = {};
  for (const name of ARTIFACT_ORDER) {
    const value = artifacts[name];
    if (value !== undefined) hashes[name] = CryptoJS.SHA256(JSON.stringify(value)).toString();
  }
  return hashes;
}

/** Fold the per-artifact hashes, tagged with their names, into one value */
function chainHashes(hashes: Partial<Record<ArtifactName, string>>): string {
  return ARTIFACT_ORDER.reduce(
    (acc, name) => CryptoJS.SHA256(`${acc}|${name}:${hashes[name] ?? "-"}`).toString(),
    ""
  );
}

function ensureDir(dir: string): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/** Sanitize filename */
export function sanitizeFilename(name: string): string {
  return (
    name
      .replace(/[^\p{L}\p{N}\s\-_]/gu, "")
      .replace(/\s+/g, "-")
      .toLowerCase()
      .substring(0, 80) || "output"
  );
}
