import { CONFIDENCE_FIELDS, type ConfidenceField, type FieldConfidence } from "@/types";
import type { CandidateActivity } from "@/lib/scrapers/types";
import { normalizeTitle } from "@/lib/normalize/dedupKey";
import { candidateConfidence, REQUIRED_FIELDS } from "./confidence";
import type { ScoredCandidate } from "./types";

/** Candidate properties that travel together with each confidence field. */
const FIELD_PROPERTIES: Record<ConfidenceField, (keyof CandidateActivity)[]> = {
  title: ["title"],
  startAt: ["startAt", "timezone"],
  endAt: ["endAt"],
  freeStatus: ["priceText"],
  description: ["description"],
  age: ["ageText", "ageMin", "ageMax"],
  venue: ["venueName", "address", "city", "state", "zip"],
  locationText: ["locationText"],
  activityType: ["activityType"],
  dropIn: ["dropIn"],
  registrationRequired: ["registrationRequired"],
  recurrenceText: ["recurrenceText"],
  externalId: ["externalId"],
};

function copyProperty<K extends keyof CandidateActivity>(to: CandidateActivity, from: CandidateActivity, key: K): void {
  to[key] = from[key];
}

function startDay(value: CandidateActivity["startAt"]): string | null {
  if (value == null) return null;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString().slice(0, 10);
  const m = value.trim().match(/^(\d{4}-\d{2}-\d{2})/);
  return m ? m[1] : null;
}

/** Same occurrence: equal normalized titles, and the same start day when both have one. */
export function sameOccurrence(a: CandidateActivity, b: CandidateActivity): boolean {
  if (!a.title || !b.title || normalizeTitle(a.title) !== normalizeTitle(b.title)) return false;
  const da = startDay(a.startAt);
  const db = startDay(b.startAt);
  return da == null || db == null || da === db;
}

/**
 * Field-level merge of one hardcoded and one fallback candidate: each field
 * comes from whichever side scored it higher; ties keep the hardcoded value.
 */
export function mergePair(hard: ScoredCandidate, soft: ScoredCandidate): ScoredCandidate {
  const candidate: CandidateActivity = { ...hard.candidate };
  const fieldConfidence: FieldConfidence = {};
  const fieldOrigin: ScoredCandidate["fieldOrigin"] = {};

  for (const field of CONFIDENCE_FIELDS) {
    const h = hard.fieldConfidence[field];
    const s = soft.fieldConfidence[field];
    if (s != null && (h == null || s > h)) {
      for (const key of FIELD_PROPERTIES[field]) copyProperty(candidate, soft.candidate, key);
      fieldConfidence[field] = s;
      fieldOrigin[field] = soft.fieldOrigin[field] ?? soft.method;
    } else if (h != null) {
      fieldConfidence[field] = h;
      fieldOrigin[field] = hard.fieldOrigin[field] ?? hard.method;
    }
  }
  const tags = [...new Set([...(hard.candidate.tags ?? []), ...(soft.candidate.tags ?? [])])];
  if (tags.length) candidate.tags = tags;

  const llmRequired = REQUIRED_FIELDS.some((f) => fieldOrigin[f] === "llm");
  const llmContributed = Object.values(fieldOrigin).includes("llm");
  return {
    candidate,
    fieldConfidence,
    fieldOrigin,
    confidence: candidateConfidence(fieldConfidence),
    method: llmRequired ? "llm" : "hardcoded",
    llm: llmContributed ? soft.llm : null,
  };
}

/**
 * Merge the two candidate sets. Matched pairs are merged field by field;
 * unmatched candidates from either side are kept as they are.
 */
export function mergeCandidateSets(hardcoded: ScoredCandidate[], fallback: ScoredCandidate[]): ScoredCandidate[] {
  const used = new Set<number>();
  const out: ScoredCandidate[] = [];
  for (const hard of hardcoded) {
    const idx = fallback.findIndex((soft, i) => !used.has(i) && sameOccurrence(hard.candidate, soft.candidate));
    if (idx === -1) {
      out.push(hard);
      continue;
    }
    used.add(idx);
    out.push(mergePair(hard, fallback[idx]));
  }
  fallback.forEach((soft, i) => {
    if (!used.has(i)) out.push(soft);
  });
  return out;
}
