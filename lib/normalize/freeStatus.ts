import type { ExtractionMethod, FreeVerificationStatus } from "@/types";

/**
 * Where a free-status decision came from.
 * - explicit: the price wording says free.
 * - listing: the page itself only lists free programs.
 * - ambiguous: free-ish wording with strings attached ("pay what you wish").
 * - model_claim: the fallback extractor said free but the text around its title does not back it.
 * - paid: an explicit non-zero price.
 * - none: nothing about cost.
 */
export type FreeSignal = "explicit" | "listing" | "ambiguous" | "model_claim" | "paid" | "none";

export interface FreeClassification {
  status: FreeVerificationStatus;
  /** False only for an explicit non-zero price. */
  isFree: boolean;
  /** Uncertain rows with a supporting signal go to review; without one they are rejected. */
  corroborated: boolean;
  signal: FreeSignal;
}

const AMBIGUOUS_RE =
  /pay[-\s]what[-\s]you[-\s](?:wish|can|want)|suggested\s+(?:donation|admission|contribution)|free\s+with\s+(?:\w+\s+)?admission|included\s+with\s+(?:\w+\s+)?admission|free\s+for\s+members|members?\s+only|donations?\s+(?:welcome|encouraged)/i;
const FREE_RE = /\bfree\b|\bno\s+(?:charge|cost)\b|\bcomplimentary\b|\$\s*0(?:\.00)?(?!\.?\d)/i;
const PAID_RE = /\$\s*(?:[1-9]\d*(?:\.\d{1,2})?|0\.\d*[1-9])|\b\d+(?:\.\d{2})?\s*(?:usd|dollars)\b/i;

export interface FreeStatusInput {
  priceText: string | null | undefined;
  /** Which extractor supplied the price wording. */
  origin: ExtractionMethod;
  /** The adapter's listing is pre-filtered to free programs. */
  freeListing: boolean;
  /** Readable text of the source document, used to corroborate fallback claims. */
  documentText: string | null;
  /** Where the candidate's own text starts in `documentText`. */
  title?: string | null;
  /** Titles of the other candidates on the page; each one ends this candidate's text. */
  siblingTitles?: string[];
}

/** Characters after a title that count as that candidate's own text. */
export const CORROBORATION_WINDOW = 300;

function squash(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/**
 * The stretch of page text that belongs to the candidate: from its title up to
 * the window size, cut short where its own title or a sibling's appears next.
 */
export function candidateWindow(
  documentText: string | null,
  title: string | null | undefined,
  siblingTitles: string[] = []
): string | null {
  if (!documentText || !title) return null;
  const page = squash(documentText);
  const lower = page.toLowerCase();
  const needle = squash(title).toLowerCase();
  if (!needle) return null;
  const start = lower.indexOf(needle);
  if (start < 0) return null;
  const bodyStart = start + needle.length;
  let end = Math.min(bodyStart + CORROBORATION_WINDOW, page.length);
  for (const other of [needle, ...siblingTitles.map((t) => squash(t).toLowerCase())]) {
    if (!other || (other !== needle && needle.includes(other))) continue;
    const at = lower.indexOf(other, bodyStart);
    if (at >= 0 && at < end) end = at;
  }
  return page.slice(start, end);
}

/** A model's free claim holds only when the candidate's own text says free and names no price or condition. */
function corroboratesFree(window: string | null): boolean {
  if (!window) return false;
  return FREE_RE.test(window) && !PAID_RE.test(window) && !AMBIGUOUS_RE.test(window);
}

function uncertain(corroborated: boolean, signal: FreeSignal): FreeClassification {
  return { status: "uncertain", isFree: true, corroborated, signal };
}

export function classifyFreeStatus(input: FreeStatusInput): FreeClassification {
  const text = input.priceText?.replace(/\s+/g, " ").trim() ?? "";

  if (text) {
    const free = FREE_RE.test(text);
    const paid = PAID_RE.test(text);
    if (AMBIGUOUS_RE.test(text) || (free && paid)) return uncertain(true, "ambiguous");
    if (free) {
      if (input.origin === "hardcoded") return { status: "confirmed", isFree: true, corroborated: true, signal: "explicit" };
      if (corroboratesFree(candidateWindow(input.documentText, input.title, input.siblingTitles))) {
        return { status: "inferred", isFree: true, corroborated: true, signal: "explicit" };
      }
      return uncertain(true, "model_claim");
    }
    if (paid) return { status: "uncertain", isFree: false, corroborated: false, signal: "paid" };
  }

  if (input.freeListing) return { status: "inferred", isFree: true, corroborated: true, signal: "listing" };
  return uncertain(false, "none");
}
