import * as cheerio from "cheerio";
import { z } from "zod";
import { DEFAULT_FALLBACK_THRESHOLD } from "@/lib/pipeline/policy";
import { DEFAULT_HEADERS } from "../fetchHtml";
import { findAgeText, isIrrelevantItemText, mentionsDropIn, registrationRequirement } from "../filters";
import { plainText } from "../jsonLdEvent";
import { pageTextLines } from "../pageText";
import { parseWeekdayHeading, localIso, parseTimeRange } from "../eventText";
import { inferYear } from "../timezone";
import type { CandidateActivity, RawDocument, SourceAdapter, SourceDefaults } from "../types";

const BASE_URL = "https://www.metmuseum.org";
export const MET_TEENS_URL = `${BASE_URL}/events?audience=teens&price=free&type=workshopsClasses`;

const DEFAULTS: SourceDefaults = {
  timezone: "America/New_York",
  venue: {
    name: "The Metropolitan Museum of Art",
    address: "1000 Fifth Avenue",
    city: "New York",
    state: "NY",
    zip: "10028",
    website: BASE_URL,
  },
  freeListing: true,
  activityType: "workshop",
  tags: ["teens"],
};
const LOCATION_TEXT = "New York, NY";

// Search hits are serialized into a streamed script payload with escaped quotes.
const EMBEDDED_SOURCE_RE = /\\"_source\\":(\{.*?\}),\\"highlight\\"/gs;

const MetSourceSchema = z.object({
  url: z.string().min(1),
  title: z.string().min(1),
  startDate: z.string().min(1),
  endDate: z.string().nullish(),
  teaserText: z.string().nullish(),
  location: z.string().nullish(),
  programs: z.array(z.string()).nullish(),
  audiences: z.array(z.string()).nullish(),
  searchCategories: z.array(z.string()).nullish(),
  paid: z.string().nullish(),
  isPaid: z.boolean().nullish(),
  ticketRequired: z.boolean().nullish(),
});
type MetSource = z.infer<typeof MetSourceSchema>;

function decodeEmbedded(escaped: string): unknown {
  try {
    return JSON.parse(escaped.replace(/\\"/g, '"').replace(/\\\//g, "/"));
  } catch {
    return undefined;
  }
}

function isFreeTeenRecord(r: MetSource): boolean {
  const paid = r.paid?.trim().toLowerCase();
  if (r.isPaid || (paid && paid !== "free")) return false;
  return (r.audiences ?? []).some((a) => a.toLowerCase().includes("teen"));
}

function candidateFromRecord(r: MetSource, listUrl: string): CandidateActivity | null {
  const title = plainText(r.title);
  if (!title || isIrrelevantItemText(title)) return null;
  const teaser = plainText(r.teaserText);
  const location = plainText(r.location);
  const parts = [teaser, location ? `Location: ${location}` : null, r.programs?.length ? `Programs: ${r.programs.join(", ")}` : null];
  const description = parts.filter(Boolean).join(" | ") || null;
  const blob = [title, description, ...(r.searchCategories ?? [])].join(" ");
  return {
    title,
    startAt: r.startDate,
    endAt: r.endDate ?? null,
    sourceUrl: new URL(r.url, listUrl).toString(),
    description,
    priceText: r.paid?.toLowerCase() === "free" ? "Free" : null,
    ageText: findAgeText(title, description) ?? "teens",
    locationText: LOCATION_TEXT,
    dropIn: mentionsDropIn(blob) ? true : null,
    registrationRequired: r.ticketRequired ?? registrationRequirement(blob),
    tags: r.programs ?? undefined,
  };
}

/** Free teen records from the embedded search payload, de-duplicated by url, title and start. */
export function parseEmbeddedSources(html: string, listUrl = MET_TEENS_URL): CandidateActivity[] {
  const rows: CandidateActivity[] = [];
  const seen = new Set<string>();
  for (const match of html.matchAll(EMBEDDED_SOURCE_RE)) {
    const parsed = MetSourceSchema.safeParse(decodeEmbedded(match[1]));
    if (!parsed.success || !isFreeTeenRecord(parsed.data)) continue;
    const row = candidateFromRecord(parsed.data, listUrl);
    if (!row) continue;
    const key = `${row.sourceUrl}|${row.title}|${String(row.startAt)}`;
    if (seen.has(key)) continue;
    seen.add(key);
    rows.push(row);
  }
  return rows;
}

const TIME_LOCATION_RE = /^(\d{1,2}:\d{2}\s*[AP]\.?M\.?)\s*(.*)$/i;

function looksLikePrice(line: string): boolean {
  return /free|\$|member|ticket/i.test(line);
}

/**
 * Listing text for static snapshots: weekday headings, then per program its
 * title link, a teaser, a "10:00 AM Location" line and a price line.
 */
export function parseListingText(doc: RawDocument): CandidateActivity[] {
  const $ = cheerio.load(doc.html);
  const links = new Map<string, string>();
  $("a[href]").each((_, el) => {
    const href = $(el).attr("href")?.trim() ?? "";
    const text = $(el).text().replace(/\s+/g, " ").trim();
    if (!text || !href.includes("engage.metmuseum.org") || links.has(text)) return;
    links.set(text, href);
  });

  const lines = pageTextLines(doc.html);
  const rows: CandidateActivity[] = [];
  let day: { year: number; month: number; day: number } | null = null;

  for (let i = 0; i < lines.length; i++) {
    const heading = parseWeekdayHeading(lines[i]);
    if (heading) {
      day = { ...heading, year: inferYear(heading.month, heading.day, doc.fetchedAt, DEFAULTS.timezone) };
      continue;
    }
    const href = links.get(lines[i]);
    if (!href || isIrrelevantItemText(lines[i])) continue;

    const title = lines[i];
    let teaser: string | null = null;
    let timeLine: string | null = null;
    let priceLine: string | null = null;
    let j = i + 1;
    for (; j < lines.length; j++) {
      const next = lines[j];
      if (parseWeekdayHeading(next) || links.has(next)) break;
      const isTime = TIME_LOCATION_RE.test(next);
      if (isTime) timeLine ??= next;
      else if (looksLikePrice(next)) priceLine ??= next;
      else teaser ??= next;
    }
    i = j - 1;

    if (!day) continue;
    if (priceLine && !/free/i.test(priceLine)) continue;

    const time = timeLine ? parseTimeRange(timeLine) : null;
    const room = timeLine?.match(TIME_LOCATION_RE)?.[2].trim() || null;
    const description = [teaser, room ? `Location: ${room}` : null].filter(Boolean).join(" | ") || null;
    const blob = `${title} ${description ?? ""}`;
    rows.push({
      title,
      startAt: localIso(day, time?.start),
      endAt: time?.end ? localIso(day, time.end) : null,
      sourceUrl: href,
      description,
      priceText: priceLine,
      ageText: findAgeText(title, teaser) ?? "teens",
      locationText: LOCATION_TEXT,
      dropIn: mentionsDropIn(blob) ? true : null,
      registrationRequired: registrationRequirement(blob),
      fieldConfidence: time ? undefined : { startAt: 0.6 },
    });
  }
  return rows;
}

export const metTeensAdapter: SourceAdapter = {
  id: "met-teens",
  name: "The Met: free teen workshops and classes",
  baseUrl: BASE_URL,
  adapterType: "met_events",
  crawlFrequency: "daily",
  defaults: DEFAULTS,
  fallbackThreshold: DEFAULT_FALLBACK_THRESHOLD,

  documents() {
    return [
      {
        url: MET_TEENS_URL,
        strategy: {
          kind: "http",
          headers: { ...DEFAULT_HEADERS, Referer: `${BASE_URL}/events` },
          browserFallback: { kind: "networkidle" },
        },
      },
    ];
  },

  parse(doc) {
    const embedded = parseEmbeddedSources(doc.html, doc.finalUrl);
    return embedded.length ? embedded : parseListingText(doc);
  },
};
