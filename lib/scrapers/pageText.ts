import * as cheerio from "cheerio";

const BLOCKS = "h1, h2, h3, h4, h5, h6, p, li, td, th, dt, dd, div, section, article, header, footer";

/**
 * Visible text of a page as one line per innermost block element, in
 * document order. Scripts, styles and other non-visible nodes are dropped.
 */
export function pageTextLines(html: string): string[] {
  const $ = cheerio.load(html);
  $("script, style, noscript, template, svg, iframe").remove();
  const lines: string[] = [];
  $(BLOCKS).each((_, el) => {
    const node = $(el);
    if (node.find(BLOCKS).length > 0) return;
    const text = node.text().replace(/\s+/g, " ").trim();
    if (text && lines[lines.length - 1] !== text) lines.push(text);
  });
  if (lines.length === 0) {
    const text = $.root().text().replace(/\s+/g, " ").trim();
    if (text) lines.push(text);
  }
  return lines;
}

/** Page text for the fallback extractor, truncated to `maxChars`. */
export function documentToText(html: string, maxChars: number): string {
  const joined = pageTextLines(html).join("\n");
  return joined.length > maxChars ? joined.slice(0, maxChars) : joined;
}
