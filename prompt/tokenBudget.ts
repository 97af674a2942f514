// ─────────────────────────────────────────────────────────────
// Token Budget — Size estimate & usage severity for prompts
//
// Estimates are advisory: a prompt over the ceiling is still
// assembled in full and returned to the caller.
// ─────────────────────────────────────────────────────────────

import { lookupBucket } from "../config/bucketLookup";
import { PromptConfig } from "../config/pipelineConfig";
import { UsageLevel } from "../schema/promptSchema";

export function estimateTokens(text: string, charsPerToken: number): number {
  return Math.ceil(text.length / charsPerToken);
}

export interface TokenUsage {
  estimatedTokens: number;
  usageRatio: number;
  usageLevel: UsageLevel;
}

export function assessUsage(estimatedTokens: number, config: PromptConfig): TokenUsage {
  const usageRatio = estimatedTokens / config.tokenCeiling;
  return {
    estimatedTokens,
    usageRatio,
    usageLevel: lookupBucket(usageRatio, config.usage),
  };
}
