import type { CandidateActivity, VenueDefaults } from "@/lib/scrapers/types";

/** A venue as observed on a page, before it is matched to a catalog row. */
export interface VenueRef {
  name: string;
  address: string | null;
  city: string | null;
  state: string | null;
  zip: string | null;
  website: string | null;
}

const STOP_WORDS = new Set(["the", "a", "an", "of", "and", "at"]);

function clean(value: string | null | undefined): string | null {
  const s = value?.replace(/\s+/g, " ").trim();
  return s ? s : null;
}

/** Lowercased name tokens without punctuation or filler words. */
export function venueNameTokens(name: string): string[] {
  return name
    .toLowerCase()
    .replace(/&/g, " and ")
    .replace(/[‘’']/g, "")
    .split(/[^a-z0-9]+/)
    .filter((t) => t && !STOP_WORDS.has(t));
}

/** Jaccard similarity of the two names' token sets (1 = same tokens). */
export function venueNameSimilarity(a: string, b: string): number {
  const ta = new Set(venueNameTokens(a));
  const tb = new Set(venueNameTokens(b));
  if (ta.size === 0 && tb.size === 0) return a.trim().toLowerCase() === b.trim().toLowerCase() ? 1 : 0;
  let shared = 0;
  for (const t of ta) if (tb.has(t)) shared++;
  return shared / (ta.size + tb.size - shared);
}

function sameLocality(a: string | null, b: string | null): boolean {
  return (a ?? "").trim().toLowerCase() === (b ?? "").trim().toLowerCase();
}

/**
 * Same venue when city and state agree (case-insensitive) and the names are
 * within `tolerance`: 0 accepts identical names only, 0.25 a Jaccard of 0.75.
 */
export function venueMatches(
  existing: { name: string; city: string | null; state: string | null },
  ref: { name: string; city: string | null; state: string | null },
  tolerance: number
): boolean {
  if (!sameLocality(existing.city, ref.city) || !sameLocality(existing.state, ref.state)) return false;
  if (existing.name.trim().toLowerCase() === ref.name.trim().toLowerCase()) return true;
  return venueNameSimilarity(existing.name, ref.name) >= 1 - tolerance;
}

/** The closest stored venue that matches `ref`, if any. */
export function findMatchingVenue<T extends { name: string; city: string | null; state: string | null }>(
  venues: T[],
  ref: { name: string; city: string | null; state: string | null },
  tolerance: number
): T | null {
  let best: T | null = null;
  let bestScore = -1;
  for (const v of venues) {
    if (!venueMatches(v, ref, tolerance)) continue;
    const score = v.name.trim().toLowerCase() === ref.name.trim().toLowerCase() ? 2 : venueNameSimilarity(v.name, ref.name);
    if (score > bestScore) {
      best = v;
      bestScore = score;
    }
  }
  return best;
}

/** Candidate venue fields, filled from the adapter defaults where the page is silent. */
export function venueRefFrom(candidate: CandidateActivity, defaults: VenueDefaults | null): VenueRef | null {
  const name = clean(candidate.venueName) ?? clean(defaults?.name);
  if (!name) return null;
  const usesDefaultVenue = defaults != null && name.toLowerCase() === defaults.name.trim().toLowerCase();
  const fallback = usesDefaultVenue || !clean(candidate.city) ? defaults : null;
  const state = clean(candidate.state) ?? clean(fallback?.state);
  return {
    name,
    address: clean(candidate.address) ?? (usesDefaultVenue ? clean(defaults?.address) : null),
    city: clean(candidate.city) ?? clean(fallback?.city),
    state: state ? state.toUpperCase() : null,
    zip: clean(candidate.zip) ?? (usesDefaultVenue ? clean(defaults?.zip) : null),
    website: usesDefaultVenue ? clean(defaults?.website) : null,
  };
}
