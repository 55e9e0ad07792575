import * as cheerio from "cheerio";
import { DEFAULT_FALLBACK_THRESHOLD } from "@/lib/pipeline/policy";
import { DEFAULT_HEADERS } from "../fetchHtml";
import { findAgeText, isIrrelevantItemText, mentionsDropIn, registrationRequirement } from "../filters";
import { candidateFromJsonLdEvent, extractJsonLdEvents } from "../jsonLdEvent";
import { localIso, parseTimeRange, parseWeekdayHeading } from "../eventText";
import { inferYear } from "../timezone";
import type { CandidateActivity, RawDocument, SourceAdapter, SourceDefaults } from "../types";

const BASE_URL = "https://www.moma.org";
const TIMEZONE = "America/New_York";
const LOCATION_TEXT = "New York, NY";
const EVENT_PATH_RE = /\/calendar\/events\/\d+/i;

export type MomaAudience = "teens" | "kids";

const AUDIENCES: Record<MomaAudience, { filter: string; ageMin: number | null; ageMax: number }> = {
  teens: { filter: "For teens", ageMin: 13, ageMax: 17 },
  kids: { filter: "For kids", ageMin: null, ageMax: 12 },
};

export function momaCalendarUrl(audience: MomaAudience): string {
  return `${BASE_URL}/calendar/?happening_filter=${AUDIENCES[audience].filter.replace(/ /g, "+")}`;
}

function withAudience(row: CandidateActivity, audience: MomaAudience): CandidateActivity {
  const ageText = row.ageText && findAgeText(row.ageText) ? row.ageText : findAgeText(row.title, row.description);
  if (ageText) return { ...row, ageText };
  // The calendar filter is the only audience signal; the row's own text says nothing.
  return { ...row, ageText: null, ageMin: AUDIENCES[audience].ageMin, ageMax: AUDIENCES[audience].ageMax };
}

function dedupe(rows: CandidateActivity[]): CandidateActivity[] {
  const seen = new Set<string>();
  return rows.filter((r) => {
    const key = `${r.sourceUrl}|${r.title}|${String(r.startAt)}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/** Events from ld+json blocks and the Next.js page payload. */
export function parseStructuredEvents(html: string, listUrl: string, audience: MomaAudience): CandidateActivity[] {
  const rows: CandidateActivity[] = [];
  for (const ld of extractJsonLdEvents(html)) {
    const row = candidateFromJsonLdEvent(ld, listUrl);
    if (row) rows.push(withAudience({ ...row, locationText: row.locationText ?? LOCATION_TEXT }, audience));
  }
  return dedupe(rows);
}

/**
 * Rendered calendar: `h2` day headings ("Sat, Mar 14") followed by event
 * links whose paragraphs hold the title, then time and detail lines.
 */
export function parseCalendarDom(doc: RawDocument, audience: MomaAudience): CandidateActivity[] {
  const $ = cheerio.load(doc.html);
  const rows: CandidateActivity[] = [];
  let day: { year: number; month: number; day: number } | null = null;

  $("h2, a[href]").each((_, el) => {
    const node = $(el);
    if (el.tagName === "h2") {
      const heading = parseWeekdayHeading(node.text());
      if (heading) day = { ...heading, year: inferYear(heading.month, heading.day, doc.fetchedAt, TIMEZONE) };
      return;
    }
    const href = node.attr("href") ?? "";
    if (!EVENT_PATH_RE.test(href) || !day) return;

    let lines = node
      .find("p")
      .map((_, p) => $(p).text().replace(/\s+/g, " ").trim())
      .get()
      .filter(Boolean);
    if (lines.length === 0) lines = [node.text().replace(/\s+/g, " ").trim()].filter(Boolean);
    const [title, ...rest] = lines;
    if (!title || isIrrelevantItemText(title)) return;
    const details = rest.filter((l) => l !== title);

    const time = [title, ...details].map(parseTimeRange).find((t) => t != null) ?? null;
    const description = details.length ? details.join(" | ") : null;
    const blob = `${title} ${description ?? ""}`;
    rows.push(
      withAudience(
        {
          title,
          startAt: localIso(day, time?.start),
          endAt: time?.end ? localIso(day, time.end) : null,
          sourceUrl: new URL(href, doc.finalUrl).toString(),
          description,
          priceText: details.find((l) => /\bfree\b|\$\d/i.test(l)) ?? null,
          locationText: LOCATION_TEXT,
          dropIn: mentionsDropIn(blob) ? true : null,
          registrationRequired: registrationRequirement(blob),
          fieldConfidence: time ? undefined : { startAt: 0.6 },
        },
        audience
      )
    );
  });
  return dedupe(rows);
}

function createMomaAdapter(audience: MomaAudience): SourceAdapter {
  const url = momaCalendarUrl(audience);
  const defaults: SourceDefaults = {
    timezone: TIMEZONE,
    venue: {
      name: "MoMA",
      address: "11 West 53 Street",
      city: "New York",
      state: "NY",
      zip: "10019",
      website: BASE_URL,
    },
    freeListing: true,
    activityType: "workshop",
    tags: [audience],
  };
  return {
    id: `moma-${audience}`,
    name: `MoMA: programs ${AUDIENCES[audience].filter.toLowerCase()}`,
    baseUrl: BASE_URL,
    adapterType: "moma_calendar",
    crawlFrequency: "daily",
    defaults,
    fallbackThreshold: DEFAULT_FALLBACK_THRESHOLD,

    documents() {
      return [
        {
          url,
          strategy: {
            kind: "http",
            headers: { ...DEFAULT_HEADERS, Referer: `${BASE_URL}/calendar/` },
            browserFallback: { kind: "selector", selector: 'a[href*="/calendar/events/"]' },
          },
        },
      ];
    },

    parse(doc) {
      const structured = parseStructuredEvents(doc.html, doc.finalUrl, audience);
      return structured.length ? structured : parseCalendarDom(doc, audience);
    },
  };
}

export const momaTeensAdapter = createMomaAdapter("teens");
export const momaKidsAdapter = createMomaAdapter("kids");
