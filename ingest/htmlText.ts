// ─────────────────────────────────────────────────────────────
// HTML Text — Reduce scraped markup to readable text
// ─────────────────────────────────────────────────────────────

import * as cheerio from "cheerio";

/** A document marker, a closing element tag or a line break; bare "<" and ">" in prose are not enough */
const HTML_MARKER =
  /<!doctype\s+html|<html[\s>]|<br\s*\/?>|<\/(?:html|head|body|title|div|p|span|a|b|i|em|strong|article|main|section|nav|header|footer|aside|h[1-6]|ul|ol|li|table|tr|td|th|script|style|pre|blockquote)\s*>/i;

/** Elements that never carry article text */
const BOILERPLATE = "script, style, noscript, nav, header, footer, aside";

/** Elements that end a line of text */
const BLOCK_ELEMENTS = "p, div, li, h1, h2, h3, h4, h5, h6, tr, section, blockquote, pre";

export interface ReadablePage {
  title: string;
  text: string;
}

/** True when the content contains markup rather than plain text */
export function looksLikeHtml(content: string): boolean {
  return HTML_MARKER.test(content);
}

/**
 * Extract the main text of a page: article, else main, else body.
 * One line per block element, blank lines removed.
 */
export function extractReadableText(html: string): ReadablePage {
  const $ = cheerio.load(html);
  const title = $("title").first().text().trim() || $("h1").first().text().trim();

  $(BOILERPLATE).remove();

  let root = $("article").first();
  if (root.length === 0) root = $("main").first();
  if (root.length === 0) root = $("body").first();

  root.find("br").replaceWith("\n");
  root.find(BLOCK_ELEMENTS).append("\n");

  const text = (root.length > 0 ? root.text() : $.root().text())
    .split("\n")
    .map((line) => line.replace(/[ \t\u00a0]+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n");

  return { title, text };
}
