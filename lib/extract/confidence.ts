import { CONFIDENCE_FIELDS, type ConfidenceField, type ExtractionMethod, type FieldConfidence } from "@/types";
import type { CandidateActivity, SourceDefaults } from "@/lib/scrapers/types";
import type { LlmProvenance, ScoredCandidate } from "./types";

/**
 * Weight of each field in the aggregate score. Title, start and a free signal
 * carry most of it; the rest only refine.
 */
export const FIELD_WEIGHTS: Record<ConfidenceField, number> = {
  title: 3,
  startAt: 3,
  freeStatus: 2.5,
  description: 0.5,
  age: 0.5,
  venue: 0.5,
  endAt: 0,
  locationText: 0,
  activityType: 0,
  dropIn: 0,
  registrationRequired: 0,
  recurrenceText: 0,
  externalId: 0,
};

export const REQUIRED_FIELDS: readonly ConfidenceField[] = ["title", "startAt", "freeStatus"];

/** Confidence of a free signal that comes only from the listing being pre-filtered. */
export const LISTING_FREE_CONFIDENCE = 0.8;

function hasText(value: string | null | undefined): boolean {
  return typeof value === "string" && value.trim().length > 0;
}

function isPresent(field: ConfidenceField, c: CandidateActivity, defaults: SourceDefaults): boolean {
  switch (field) {
    case "title":
      return hasText(c.title);
    case "startAt":
      return c.startAt instanceof Date ? !Number.isNaN(c.startAt.getTime()) : hasText(c.startAt);
    case "endAt":
      return c.endAt instanceof Date || hasText(c.endAt);
    case "freeStatus":
      return hasText(c.priceText) || defaults.freeListing;
    case "description":
      return hasText(c.description);
    case "age":
      return hasText(c.ageText) || c.ageMin != null || c.ageMax != null;
    case "venue":
      return hasText(c.venueName);
    case "locationText":
      return hasText(c.locationText);
    case "activityType":
      return hasText(c.activityType) || hasText(defaults.activityType);
    case "dropIn":
      return c.dropIn != null;
    case "registrationRequired":
      return c.registrationRequired != null;
    case "recurrenceText":
      return hasText(c.recurrenceText);
    case "externalId":
      return hasText(c.externalId);
  }
}

/** Fields the candidate actually carries. */
export function presentFields(c: CandidateActivity, defaults: SourceDefaults): ConfidenceField[] {
  return CONFIDENCE_FIELDS.filter((f) => isPresent(f, c, defaults));
}

function clamp01(n: number): number {
  if (!Number.isFinite(n)) return 0;
  return Math.min(1, Math.max(0, n));
}

export function roundConfidence(n: number): number {
  return Math.round(clamp01(n) * 10_000) / 10_000;
}

/** Weighted mean over every weighted field; missing fields count as 0. */
export function aggregateConfidence(fieldConfidence: FieldConfidence): number {
  let total = 0;
  let weights = 0;
  for (const field of CONFIDENCE_FIELDS) {
    const w = FIELD_WEIGHTS[field];
    if (w <= 0) continue;
    weights += w;
    total += w * clamp01(fieldConfidence[field] ?? 0);
  }
  return weights === 0 ? 0 : roundConfidence(total / weights);
}

export function hasRequiredFields(fieldConfidence: FieldConfidence): boolean {
  return REQUIRED_FIELDS.every((f) => (fieldConfidence[f] ?? 0) > 0);
}

/** Aggregate, forced to 0 when title, start or a free signal is missing. */
export function candidateConfidence(fieldConfidence: FieldConfidence): number {
  return hasRequiredFields(fieldConfidence) ? aggregateConfidence(fieldConfidence) : 0;
}

/**
 * Per-field confidence for a candidate from one extractor.
 *
 * Located fields score `baseConfidence` unless the parser supplied a lower
 * value in `candidate.fieldConfidence`. A free signal that rests only on the
 * listing scores LISTING_FREE_CONFIDENCE.
 */
export function scoreCandidate(
  candidate: CandidateActivity,
  defaults: SourceDefaults,
  method: ExtractionMethod,
  baseConfidence = 1,
  llm: LlmProvenance | null = null
): ScoredCandidate {
  const fieldConfidence: FieldConfidence = {};
  const fieldOrigin: ScoredCandidate["fieldOrigin"] = {};
  for (const field of presentFields(candidate, defaults)) {
    let value = Math.min(baseConfidence, candidate.fieldConfidence?.[field] ?? baseConfidence);
    if (field === "freeStatus" && !hasText(candidate.priceText)) value = Math.min(value, LISTING_FREE_CONFIDENCE);
    fieldConfidence[field] = roundConfidence(value);
    fieldOrigin[field] = method;
  }
  return {
    candidate,
    fieldConfidence,
    fieldOrigin,
    confidence: candidateConfidence(fieldConfidence),
    method,
    llm,
  };
}
