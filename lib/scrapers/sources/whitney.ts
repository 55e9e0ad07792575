import { parseAnchorListing } from "../anchorListing";
import { DEFAULT_FALLBACK_THRESHOLD } from "@/lib/pipeline/policy";
import { DEFAULT_HEADERS } from "../fetchHtml";
import { candidateFromJsonLdEvent, extractJsonLdEvents } from "../jsonLdEvent";
import type { CandidateActivity, SourceAdapter } from "../types";

const BASE_URL = "https://whitney.org";
export const WHITNEY_TEENS_URL = `${BASE_URL}/events?tags[]=courses_and_workshops&tags[]=teen_events`;
const LOCATION_TEXT = "New York, NY";
const EVENT_PATH_RE = /\/events\/[^\s?#]+/i;

function teenAge(row: CandidateActivity): CandidateActivity {
  return row.ageText ? row : { ...row, ageText: "teens" };
}

export const whitneyTeensAdapter: SourceAdapter = {
  id: "whitney-teens",
  name: "Whitney Museum: teen courses and workshops",
  baseUrl: BASE_URL,
  adapterType: "whitney_events",
  crawlFrequency: "daily",
  defaults: {
    timezone: "America/New_York",
    venue: {
      name: "Whitney Museum of American Art",
      address: "99 Gansevoort Street",
      city: "New York",
      state: "NY",
      zip: "10014",
      website: BASE_URL,
    },
    freeListing: true,
    activityType: "workshop",
    tags: ["teens"],
  },
  fallbackThreshold: DEFAULT_FALLBACK_THRESHOLD,

  documents() {
    return [
      {
        url: WHITNEY_TEENS_URL,
        strategy: {
          kind: "http",
          headers: { ...DEFAULT_HEADERS, Referer: `${BASE_URL}/events` },
          browserFallback: { kind: "networkidle" },
        },
      },
    ];
  },

  parse(doc) {
    const structured = extractJsonLdEvents(doc.html)
      .map((ld) => candidateFromJsonLdEvent(ld, doc.finalUrl))
      .filter((row): row is CandidateActivity => row != null)
      .map((row) => ({ ...row, locationText: row.locationText ?? LOCATION_TEXT }));
    const rows = structured.length
      ? structured
      : parseAnchorListing(doc.html, doc.finalUrl, { eventPath: EVENT_PATH_RE, locationText: LOCATION_TEXT });
    return rows.map(teenAge);
  },
};
