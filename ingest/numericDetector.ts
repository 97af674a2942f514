// ─────────────────────────────────────────────────────────────
// Numeric Detector — Count statistical mentions in free text
// ─────────────────────────────────────────────────────────────

/** Result of scanning one text */
export interface NumericScan {
  count: number;
  samples: string[];
}

const CURRENCY_PREFIX = "(?:[$€£¥￥]\\s?)?";
// Any decimal digit script, so fullwidth "１２０" and "８０％" count too
const NUMBER = "\\p{Nd}+(?:[,，]\\p{Nd}{3})*(?:[.．]\\p{Nd}+)?";
const SAMPLE_LIMIT = 5;

/**
 * Finds digit sequences, optionally prefixed by a currency symbol and
 * optionally followed by `%` or one of the configured unit words.
 * Every match counts as one numeric mention.
 */
export class NumericDetector {
  private readonly pattern: RegExp;

  constructor(units: readonly string[]) {
    const alternatives = [...units]
      .sort((a, b) => b.length - a.length)
      .map(escapeRegExp);
    // Latin unit words must end at a word boundary ("5 years", not "5 yearsold")
    const unitGroup = alternatives.length > 0
      ? `(?:\\s?(?:${alternatives.join("|")})(?![A-Za-z]))?`
      : "";
    this.pattern = new RegExp(`${CURRENCY_PREFIX}${NUMBER}${unitGroup}`, "giu");
  }

  scan(text: string): NumericScan {
    const samples: string[] = [];
    let count = 0;
    for (const match of text.matchAll(this.pattern)) {
      count++;
      if (samples.length < SAMPLE_LIMIT) samples.push(match[0].trim());
    }
    return { count, samples };
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
