// ─────────────────────────────────────────────────────────────
// Source Credibility — Host-based trust hints
// ─────────────────────────────────────────────────────────────

import { CredibilityHint } from "../schema/corpusSchema";
import { Taxonomy } from "../config/pipelineConfig";

/**
 * Classify a URL by matching its host against the high / medium domain lists.
 *
 * Patterns match on whole labels: ".gov" matches "www.nasa.gov" and
 * "data.gov.uk" but not "evilgov.com"; "scholar.google" matches
 * "scholar.google.com".
 */
export function assessCredibility(
  url: string,
  domains: Taxonomy["credibleDomains"]
): CredibilityHint {
  const host = hostOf(url);
  if (!host) return "unknown";

  const padded = `.${host}.`;
  const matches = (pattern: string) =>
    padded.includes(`.${pattern.toLowerCase().replace(/^\.+|\.+$/g, "")}.`);

  if (domains.high.some(matches)) return "high";
  if (domains.medium.some(matches)) return "medium";
  return "low";
}

function hostOf(url: string): string | null {
  if (!url.trim()) return null;
  try {
    const host = new URL(url.trim()).hostname.toLowerCase();
    return host || null;
  } catch {
    return null;
  }
}
