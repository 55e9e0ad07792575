import { z } from "zod";
import type { Activity, FreeVerificationStatus, ExtractionMethod, ActivityStatus, Venue } from "@/types";
import type { CatalogStore } from "./store";

export const ActivityFiltersSchema = z.object({
  age: z.number().int().min(0).max(120).optional(),
  dropIn: z.boolean().optional(),
  venue: z.string().trim().min(1).optional(),
  city: z.string().trim().min(1).optional(),
  state: z.string().trim().length(2).optional(),
  dateFrom: z.date().optional(),
  dateTo: z.date().optional(),
});
export type ActivityFilters = z.infer<typeof ActivityFiltersSchema>;

/** One listing row: the activity with its venue's display fields. */
export interface ActivityListing {
  id: string;
  title: string;
  sourceUrl: string;
  venueName: string | null;
  venueCity: string | null;
  venueState: string | null;
  locationText: string | null;
  activityType: string | null;
  ageMin: number | null;
  ageMax: number | null;
  dropIn: boolean | null;
  registrationRequired: boolean | null;
  startAt: Date;
  endAt: Date | null;
  timezone: string;
  freeVerificationStatus: FreeVerificationStatus;
  extractionMethod: ExtractionMethod;
  status: ActivityStatus;
  confidenceScore: number;
}

export const LIST_LIMIT = 200;
/** Rows per scan page; venue, age and drop-in filters apply in process, so pages continue until LIST_LIMIT matches. */
export const SCAN_PAGE_SIZE = 500;
const VISIBLE_STATUSES: ActivityStatus[] = ["active", "needs_review"];

function includesCi(haystack: string | null, needle: string): boolean {
  return haystack != null && haystack.toLowerCase().includes(needle.toLowerCase());
}

function matches(a: Activity, venue: Venue | null, f: ActivityFilters): boolean {
  if (f.age != null) {
    if (a.ageMin != null && a.ageMin > f.age) return false;
    if (a.ageMax != null && a.ageMax < f.age) return false;
  }
  if (f.dropIn != null && a.dropIn !== f.dropIn) return false;
  if (f.venue && !includesCi(venue?.name ?? null, f.venue)) return false;
  if (f.city && !includesCi(venue?.city ?? null, f.city)) return false;
  if (f.state && (venue?.state ?? "").toUpperCase() !== f.state.toUpperCase()) return false;
  return true;
}

/**
 * Visible free activities (active or under review) matching the filters,
 * soonest first, at most LIST_LIMIT rows. Throws a ZodError on invalid filters.
 */
export async function listActivities(store: CatalogStore, filters: ActivityFilters = {}): Promise<ActivityListing[]> {
  const f = ActivityFiltersSchema.parse(filters);
  const venueById = new Map((await store.listVenues()).map((v) => [v.id, v]));
  const out: ActivityListing[] = [];
  let after: { startAt: Date; id: string } | undefined;
  for (;;) {
    const rows = await store.scanActivities({
      statuses: VISIBLE_STATUSES,
      startFrom: f.dateFrom,
      startTo: f.dateTo,
      after,
      limit: SCAN_PAGE_SIZE,
    });
    for (const a of rows) {
      if (out.length >= LIST_LIMIT) return out;
      const venue = a.venueId ? venueById.get(a.venueId) ?? null : null;
      if (!a.isFree || !matches(a, venue, f)) continue;
      out.push({
        id: a.id,
        title: a.title,
        sourceUrl: a.sourceUrl,
        venueName: venue?.name ?? null,
        venueCity: venue?.city ?? null,
        venueState: venue?.state ?? null,
        locationText: a.locationText,
        activityType: a.activityType,
        ageMin: a.ageMin,
        ageMax: a.ageMax,
        dropIn: a.dropIn,
        registrationRequired: a.registrationRequired,
        startAt: a.startAt,
        endAt: a.endAt,
        timezone: a.timezone,
        freeVerificationStatus: a.freeVerificationStatus,
        extractionMethod: a.extractionMethod,
        status: a.status,
        confidenceScore: a.confidenceScore,
      });
    }
    if (rows.length < SCAN_PAGE_SIZE || out.length >= LIST_LIMIT) return out;
    const last = rows[rows.length - 1];
    after = { startAt: last.startAt, id: last.id };
  }
}

export type SuggestField = "venue" | "city" | "state";

const ARTICLES = ["", "The ", "A ", "An "];

function sortedDistinct(values: (string | null)[]): string[] {
  return [...new Set(values.filter((v): v is string => Boolean(v && v.trim())))].sort((a, b) =>
    a.localeCompare(b)
  );
}

/**
 * Autocomplete values starting with `prefix` (case-insensitive). Venue names
 * also match after a leading article, ranked after direct matches.
 */
export async function suggest(
  store: CatalogStore,
  field: SuggestField,
  prefix: string,
  limit = 10
): Promise<string[]> {
  const q = prefix.trim().toLowerCase();
  if (!q) return [];
  const cap = Math.max(1, Math.min(Math.trunc(limit), 20));
  const venues = await store.listVenues();

  if (field === "venue") {
    const ranked = sortedDistinct(venues.map((v) => v.name))
      .map((name) => ({ name, rank: ARTICLES.findIndex((a) => name.toLowerCase().startsWith(`${a.toLowerCase()}${q}`)) }))
      .filter((r) => r.rank !== -1)
      .sort((a, b) => a.rank - b.rank || a.name.localeCompare(b.name));
    return ranked.slice(0, cap).map((r) => r.name);
  }

  const values = sortedDistinct(venues.map((v) => (field === "city" ? v.city : v.state)));
  return values.filter((v) => v.toLowerCase().startsWith(q)).slice(0, cap);
}

export interface FilterOptions {
  venues: string[];
  cities: string[];
  states: string[];
}

/** Distinct venue names, cities and states for filter pickers. */
export async function filterOptions(store: CatalogStore): Promise<FilterOptions> {
  const venues = await store.listVenues();
  return {
    venues: sortedDistinct(venues.map((v) => v.name)),
    cities: sortedDistinct(venues.map((v) => v.city)),
    states: sortedDistinct(venues.map((v) => v.state?.toUpperCase() ?? null)),
  };
}
