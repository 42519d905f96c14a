import { load } from "cheerio";
import type { ContentBlob } from "./types";
import { collapseWhitespace, nowIso } from "./utils";

const NOISE = [
  "script",
  "style",
  "noscript",
  "template",
  "nav",
  "header",
  "footer",
  "[role='navigation']",
  "[role='banner']",
  "[role='contentinfo']",
].join(", ");

const PROSE = "p, h1, h2, h3, h4, li";

export const MIN_BLOB_LENGTH = 40;

/** Visible prose of a page, one element per line, in document order. */
export function extractProse(html: string): string {
  const $ = load(html);
  $(NOISE).remove();
  // text() joins across <br> with nothing in between
  $("br").replaceWith(" ");

  const lines: string[] = [];
  $(PROSE).each((_, el) => {
    // an <li> wrapping a <p> is read once, through the outer element
    if ($(el).parents(PROSE).length > 0) return;
    const text = collapseWhitespace($(el).text());
    if (text) lines.push(text);
  });

  return lines.join("\n");
}

/**
 * Returns null when the page has too little prose to be worth a model call;
 * the caller treats that as a skip.
 */
export function normalize(
  html: string,
  url: string,
  fetchedAt: string = nowIso(),
  minLength = MIN_BLOB_LENGTH
): ContentBlob | null {
  const text = extractProse(html);
  if (text.length === 0 || text.length < minLength) return null;
  return { url, text, fetchedAt };
}
