// ─────────────────────────────────────────────────────────────
// Source Tools — Shared helpers for record normalizers
// ─────────────────────────────────────────────────────────────

import crypto from "crypto";
import { DocumentOrigin } from "../schema/corpusSchema";
import { Taxonomy } from "../config/pipelineConfig";
import { NumericDetector } from "./numericDetector";

export interface NormalizerTools {
  numeric: NumericDetector;
  domains: Taxonomy["credibleDomains"];
}

/** Deterministic id from origin, input position and URL */
export function sourceIdFor(origin: DocumentOrigin, index: number, url: string): string {
  return crypto.createHash("sha256")
    .update(`${origin}:${index}:${url}`)
    .digest("hex")
    .substring(0, 16);
}
