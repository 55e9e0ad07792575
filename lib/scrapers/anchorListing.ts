import * as cheerio from "cheerio";
import { localIso, parseLongDate, parseTimeRange } from "./eventText";
import {
  collapseWhitespace,
  findAgeText,
  isIrrelevantItemText,
  mentionsDropIn,
  priceMention,
  registrationRequirement,
} from "./filters";
import type { CandidateActivity } from "./types";

export interface AnchorListingOptions {
  /** Links to event detail pages. */
  eventPath: RegExp;
  /** Drop a row by its title and surrounding card text. */
  exclude?: (title: string, cardText: string) => boolean;
  locationText?: string | null;
}

/**
 * Generic listing parse: every link to an event page is one program, and the
 * nearest enclosing card holds its "March 14, 2026 · 2–4 pm" line. Cards with
 * no readable date are skipped.
 */
export function parseAnchorListing(html: string, listUrl: string, opts: AnchorListingOptions): CandidateActivity[] {
  const $ = cheerio.load(html);
  const rows: CandidateActivity[] = [];
  const seen = new Set<string>();

  $("a[href]").each((_, el) => {
    const anchor = $(el);
    const href = anchor.attr("href")?.trim() ?? "";
    if (!opts.eventPath.test(href)) return;
    const title = collapseWhitespace(anchor.text());
    if (!title || isIrrelevantItemText(title)) return;

    const card = anchor.closest("article, li, section, div");
    const cardText = collapseWhitespace((card.length ? card : anchor).text());
    if (opts.exclude?.(title, cardText)) return;

    const date = parseLongDate(cardText);
    if (!date) return;
    const time = parseTimeRange(cardText.slice(date.end));
    const sourceUrl = new URL(href, listUrl).toString();
    const startAt = localIso(date, time?.start);
    const key = `${sourceUrl}|${title}|${startAt}`;
    if (seen.has(key)) return;
    seen.add(key);

    const description = cardText !== title ? cardText : null;
    rows.push({
      title,
      startAt,
      endAt: time?.end ? localIso(date, time.end) : null,
      sourceUrl,
      description,
      priceText: priceMention(cardText),
      ageText: findAgeText(title, cardText),
      locationText: opts.locationText ?? null,
      dropIn: mentionsDropIn(cardText) ? true : null,
      registrationRequired: registrationRequirement(cardText),
      fieldConfidence: time ? { description: 0.6 } : { startAt: 0.6, description: 0.6 },
    });
  });
  return rows;
}
