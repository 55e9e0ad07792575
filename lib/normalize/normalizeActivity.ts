import type { ExtractionMethod, FieldConfidence } from "@/types";
import { ValidationError } from "@/lib/errors";
import { aggregateConfidence } from "@/lib/extract/confidence";
import type { LlmProvenance, ScoredCandidate } from "@/lib/extract/types";
import { isValidTimeZone, parseIsoAssumingTimeZone } from "@/lib/scrapers/timezone";
import type { SourceDefaults } from "@/lib/scrapers/types";
import { AGE_DESCRIPTORS, resolveAgeRange, type AgeDescriptor } from "./ageRange";
import { activityIdFromDedupKey, buildDedupKey } from "./dedupKey";
import { classifyFreeStatus, type FreeClassification } from "./freeStatus";
import { venueRefFrom, type VenueRef } from "./venue";

/** A candidate in canonical form, ready for reconciliation. */
export interface NormalizedActivity {
  id: string;
  dedupKey: string;
  sourceId: string;
  sourceUrl: string;
  externalId: string | null;
  title: string;
  description: string | null;
  activityType: string | null;
  ageMin: number | null;
  ageMax: number | null;
  free: FreeClassification;
  dropIn: boolean | null;
  registrationRequired: boolean | null;
  startAt: Date;
  endAt: Date | null;
  timezone: string;
  recurrenceText: string | null;
  locationText: string | null;
  venue: VenueRef | null;
  tags: string[];
  extractionMethod: ExtractionMethod;
  extractorVersion: string | null;
  llm: LlmProvenance | null;
  fieldConfidence: FieldConfidence;
  confidenceScore: number;
}

export interface NormalizeContext {
  sourceId: string;
  defaults: SourceDefaults;
  /** Readable page text the candidate came from. */
  documentText: string | null;
  /** Titles of the other candidates from the same document. */
  siblingTitles?: string[];
  extractorVersion: string | null;
  ageDescriptors?: AgeDescriptor[];
}

function text(value: string | null | undefined): string | null {
  const s = value?.replace(/\s+/g, " ").trim();
  return s ? s : null;
}

function toDate(value: string | Date | null | undefined, tz: string): Date | null {
  if (value == null) return null;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  const iso = parseIsoAssumingTimeZone(value, tz);
  if (!iso) return null;
  const d = new Date(iso);
  return Number.isNaN(d.getTime()) ? null : d;
}

function normalizeTags(...lists: (string[] | undefined)[]): string[] {
  const out = new Set<string>();
  for (const list of lists) {
    for (const tag of list ?? []) {
      const t = tag.trim().toLowerCase().slice(0, 100);
      if (t) out.add(t);
    }
  }
  return [...out];
}

/**
 * Canonicalize one scored candidate: absolute instants in the candidate's (or
 * the source's) timezone, numeric age bounds, a free-status classification, a
 * venue reference and the dedup key. Confidence is recomputed for fields that
 * did not survive.
 *
 * Throws ValidationError when the title or start time is unusable.
 */
export function normalizeCandidate(scored: ScoredCandidate, ctx: NormalizeContext): NormalizedActivity {
  const c = scored.candidate;
  const fieldConfidence: FieldConfidence = { ...scored.fieldConfidence };

  const title = text(c.title);
  if (!title) throw new ValidationError("missing_required", "missing title");

  const tzCandidate = text(c.timezone);
  const timezone = tzCandidate && isValidTimeZone(tzCandidate) ? tzCandidate : ctx.defaults.timezone;

  const startAt = toDate(c.startAt, timezone);
  if (!startAt) {
    if (c.startAt == null) throw new ValidationError("missing_required", `"${title}": missing start time`);
    throw new ValidationError("invalid_value", `"${title}": unparseable start time ${String(c.startAt)}`);
  }

  let endAt = toDate(c.endAt, timezone);
  if (endAt && endAt.getTime() < startAt.getTime()) endAt = null;
  if (!endAt) delete fieldConfidence.endAt;

  const age = resolveAgeRange(c, c.ageText, ctx.ageDescriptors ?? AGE_DESCRIPTORS);
  if (!age || (age.ageMin == null && age.ageMax == null)) delete fieldConfidence.age;

  const free = classifyFreeStatus({
    priceText: c.priceText,
    origin: scored.fieldOrigin.freeStatus ?? scored.method,
    freeListing: ctx.defaults.freeListing,
    documentText: ctx.documentText,
    title,
    siblingTitles: ctx.siblingTitles?.filter((t) => t !== c.title),
  });
  if (free.signal === "none" || free.signal === "paid") delete fieldConfidence.freeStatus;

  const venue = venueRefFrom(c, ctx.defaults.venue);
  if (venue && fieldConfidence.venue == null) {
    // The adapter's own venue is known, not extracted.
    fieldConfidence.venue = c.venueName ? 1 : 0.9;
  }

  const activityType = text(c.activityType) ?? text(ctx.defaults.activityType);
  if (!activityType) delete fieldConfidence.activityType;
  else if (fieldConfidence.activityType == null) fieldConfidence.activityType = 1;

  const sourceUrl = c.sourceUrl.trim();
  const dedupKey = buildDedupKey(ctx.sourceId, sourceUrl, title, startAt);

  return {
    id: activityIdFromDedupKey(ctx.sourceId, dedupKey),
    dedupKey,
    sourceId: ctx.sourceId,
    sourceUrl,
    externalId: text(c.externalId),
    title,
    description: text(c.description),
    activityType,
    ageMin: age?.ageMin ?? null,
    ageMax: age?.ageMax ?? null,
    free,
    dropIn: c.dropIn ?? null,
    registrationRequired: c.registrationRequired ?? null,
    startAt,
    endAt,
    timezone,
    recurrenceText: text(c.recurrenceText),
    locationText: text(c.locationText),
    venue,
    tags: normalizeTags(ctx.defaults.tags, c.tags),
    extractionMethod: scored.method,
    extractorVersion: scored.fieldOrigin.title === "hardcoded" ? ctx.extractorVersion : null,
    llm: scored.llm,
    fieldConfidence,
    confidenceScore: free.signal === "none" ? 0 : aggregateConfidence(fieldConfidence),
  };
}
