// ─────────────────────────────────────────────────────────────
// Tokenizer — Script-aware word splitting
//
// Word runs are split wherever the writing system changes
// (Han / Katakana / everything else). Hiragana acts as a separator,
// since in running Japanese text it carries particles and inflection.
// ─────────────────────────────────────────────────────────────

const WORD_RUN = /[\p{L}\p{N}\p{M}_ー]+/gu;
const HAN = /\p{Script=Han}/u;
const HIRAGANA = /\p{Script=Hiragana}/u;
const KATAKANA = /[\p{Script=Katakana}ー]/u;
const MARK = /\p{M}/u;

type ScriptClass = "han" | "hiragana" | "katakana" | "other";

function scriptOf(ch: string): ScriptClass {
  if (KATAKANA.test(ch)) return "katakana";
  if (HAN.test(ch)) return "han";
  if (HIRAGANA.test(ch)) return "hiragana";
  return "other";
}

/**
 * Split text into candidate tokens, in reading order.
 */
export function tokenize(text: string): string[] {
  const tokens: string[] = [];

  for (const match of text.matchAll(WORD_RUN)) {
    let current = "";
    let currentClass: ScriptClass | null = null;

    const flush = (): void => {
      if (current.length > 0 && currentClass !== "hiragana") tokens.push(current);
      current = "";
    };

    for (const ch of match[0]) {
      // combining marks stay with the character they modify
      const cls: ScriptClass = MARK.test(ch) && currentClass ? currentClass : scriptOf(ch);
      if (cls !== currentClass) {
        flush();
        currentClass = cls;
      }
      current += ch;
    }
    flush();
  }

  return tokens;
}

/** Character length counted in code points */
export function codePointLength(token: string): number {
  return Array.from(token).length;
}
