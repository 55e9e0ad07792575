import { parseAnchorListing } from "../anchorListing";
import { DEFAULT_FALLBACK_THRESHOLD } from "@/lib/pipeline/policy";
import { DEFAULT_HEADERS } from "../fetchHtml";
import { candidateFromJsonLdEvent, extractJsonLdEvents } from "../jsonLdEvent";
import type { CandidateActivity, DocumentRequest, SourceAdapter, SourceDefaults } from "../types";

const BASE_URL = "https://www.mfa.org";
const FIRST_PAGE = 0;
const LAST_PAGE = 3;
const LOCATION_TEXT = "Boston, MA";

const EVENT_PATH_RE = /\/(?:event|programs)\/(?!\?)[^\s?#]+/i;
const GUIDED_TOUR_RE = /\bguided\s+tou?rs?\b/i;
const UNAVAILABLE_RE = /\btickets?\s+no\s+longer\s+available\b/i;

const DEFAULTS: SourceDefaults = {
  timezone: "America/New_York",
  venue: {
    name: "Museum of Fine Arts, Boston",
    address: "465 Huntington Avenue",
    city: "Boston",
    state: "MA",
    zip: "02115",
    website: BASE_URL,
  },
  // The programs listing mixes free and ticketed events.
  freeListing: false,
  activityType: "workshop",
};

export function mfaProgramsUrl(page: number): string {
  return `${BASE_URL}/programs?page=${page}`;
}

/** Guided tours and sold-out programs are not catalog material. */
export function isExcludedProgram(title: string, text: string): boolean {
  return GUIDED_TOUR_RE.test(title) || GUIDED_TOUR_RE.test(text) || UNAVAILABLE_RE.test(text);
}

function structuredEvents(html: string, listUrl: string): CandidateActivity[] {
  const rows: CandidateActivity[] = [];
  for (const ld of extractJsonLdEvents(html)) {
    const row = candidateFromJsonLdEvent(ld, listUrl);
    if (!row || !row.title) continue;
    if (isExcludedProgram(row.title, [row.description, row.tags?.join(" ")].filter(Boolean).join(" "))) continue;
    rows.push({ ...row, locationText: row.locationText ?? LOCATION_TEXT });
  }
  return rows;
}

export const mfaProgramsAdapter: SourceAdapter = {
  id: "mfa-programs",
  name: "Museum of Fine Arts, Boston: programs",
  baseUrl: BASE_URL,
  adapterType: "mfa_programs",
  crawlFrequency: "daily",
  defaults: DEFAULTS,
  fallbackThreshold: DEFAULT_FALLBACK_THRESHOLD,

  documents() {
    const requests: DocumentRequest[] = [];
    for (let page = FIRST_PAGE; page <= LAST_PAGE; page++) {
      requests.push({
        url: mfaProgramsUrl(page),
        strategy: { kind: "http", headers: { ...DEFAULT_HEADERS, Referer: `${BASE_URL}/programs` } },
      });
    }
    return requests;
  },

  parse(doc) {
    const structured = structuredEvents(doc.html, doc.finalUrl);
    if (structured.length) return structured;
    return parseAnchorListing(doc.html, doc.finalUrl, {
      eventPath: EVENT_PATH_RE,
      exclude: isExcludedProgram,
      locationText: LOCATION_TEXT,
    });
  },
};
