export interface AgeRange {
  ageMin: number | null;
  ageMax: number | null;
}

export interface AgeDescriptor {
  pattern: RegExp;
  ageMin: number | null;
  ageMax: number | null;
}

/**
 * Audience words mapped to an age range. Several matches are combined into
 * the widest range; an open bound (null) stays open.
 */
export const AGE_DESCRIPTORS: AgeDescriptor[] = [
  { pattern: /\ball[-\s]ages\b/i, ageMin: null, ageMax: null },
  { pattern: /\bfamil(?:y|ies)\b/i, ageMin: null, ageMax: null },
  { pattern: /\bteens?\b|\bteenagers?\b/i, ageMin: 13, ageMax: 18 },
  { pattern: /\btweens?\b/i, ageMin: 9, ageMax: 12 },
  { pattern: /\bkids?\b|\bchildren\b|\bchild\b/i, ageMin: 0, ageMax: 12 },
  { pattern: /\btoddlers?\b/i, ageMin: 1, ageMax: 3 },
  { pattern: /\bpre-?school(?:ers)?\b/i, ageMin: 3, ageMax: 5 },
];

const DASH = "(?:-|\\u2013|\\u2014|to)";
const RANGE_RE = new RegExp(`\\bages?\\s*(\\d{1,2})\\s*${DASH}\\s*(\\d{1,2})\\b`, "i");
const BARE_RANGE_RE = new RegExp(`\\b(\\d{1,2})\\s*${DASH}\\s*(\\d{1,2})\\s*(?:years?|yrs?)\\b`, "i");
const PLUS_RE = /\bages?\s*(\d{1,2})\s*(?:\+|and\s+(?:up|older|over))/i;
const BARE_PLUS_RE = /\b(\d{1,2})\s*(?:\+|and\s+(?:up|older|over))(?!\s*(?:hours?|hrs?|min))/i;
const UNDER_RE = /\b(?:under|younger than)\s*(\d{1,2})\b/i;
const AND_UNDER_RE = /\bages?\s*(\d{1,2})\s*(?:and\s+(?:under|younger))\b/i;

function int(value: string): number {
  return Number.parseInt(value, 10);
}

function ordered(a: number, b: number): AgeRange {
  return a <= b ? { ageMin: a, ageMax: b } : { ageMin: b, ageMax: a };
}

function fromDescriptors(text: string, descriptors: AgeDescriptor[]): AgeRange | null {
  const hits = descriptors.filter((d) => d.pattern.test(text));
  if (hits.length === 0) return null;
  const openMin = hits.some((h) => h.ageMin == null);
  const openMax = hits.some((h) => h.ageMax == null);
  const mins = hits.flatMap((h) => (h.ageMin == null ? [] : [h.ageMin]));
  const maxes = hits.flatMap((h) => (h.ageMax == null ? [] : [h.ageMax]));
  return {
    ageMin: openMin || mins.length === 0 ? null : Math.min(...mins),
    ageMax: openMax || maxes.length === 0 ? null : Math.max(...maxes),
  };
}

/**
 * Age bounds from audience wording: "Ages 5-12", "5 to 12 years", "ages 13+",
 * "8 and up", "under 5", or descriptor words such as "teens".
 * Returns null when the text says nothing about age.
 */
export function parseAgeRange(text: string | null | undefined, descriptors = AGE_DESCRIPTORS): AgeRange | null {
  const s = text?.trim();
  if (!s) return null;

  const range = s.match(RANGE_RE) ?? s.match(BARE_RANGE_RE);
  if (range) return ordered(int(range[1]), int(range[2]));

  const andUnder = s.match(AND_UNDER_RE);
  if (andUnder) return { ageMin: null, ageMax: int(andUnder[1]) };

  const plus = s.match(PLUS_RE) ?? s.match(BARE_PLUS_RE);
  if (plus) return { ageMin: int(plus[1]), ageMax: null };

  const under = s.match(UNDER_RE);
  if (under) return { ageMin: null, ageMax: Math.max(0, int(under[1]) - 1) };

  return fromDescriptors(s, descriptors);
}

/** Explicit bounds from the extractor win over anything parsed from text. */
export function resolveAgeRange(
  explicit: { ageMin?: number | null; ageMax?: number | null },
  text: string | null | undefined,
  descriptors = AGE_DESCRIPTORS
): AgeRange | null {
  const min = explicit.ageMin ?? null;
  const max = explicit.ageMax ?? null;
  if (min != null || max != null) {
    if (min != null && max != null) return ordered(min, max);
    return { ageMin: min, ageMax: max };
  }
  return parseAgeRange(text, descriptors);
}
