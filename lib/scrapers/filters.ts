const IRRELEVANT_ITEM_KEYWORDS = ["ticket", "tickets", "donate", "membership", "member", "members", "shop"];

/**
 * Navigation and commerce text that leaks into naive listing parses
 * ("Tickets", "Become a member", "Shop").
 */
export function isIrrelevantItemText(value: string | null | undefined): boolean {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) return true;
  return IRRELEVANT_ITEM_KEYWORDS.some((k) => normalized === k || normalized.startsWith(`${k} `));
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/** "drop-in" / "drop in" anywhere in the text. */
export function mentionsDropIn(text: string): boolean {
  return /\bdrop[-\s]?in\b/i.test(text);
}

/** true when registration is required, false when explicitly not, null when unstated. */
export function registrationRequirement(text: string): boolean | null {
  const lower = text.toLowerCase();
  if (/no (advance )?registration|registration (is )?not required|without registration/.test(lower)) return false;
  if (/registration (is )?required|register in advance|advance registration|registration opens/.test(lower)) return true;
  return null;
}

const AGE_MENTION_RE = /\bages?\s*\d{1,2}\s*(?:-|–|to)\s*\d{1,2}\b|\bages?\s*\d{1,2}\s*\+|\bages?\s*\d{1,2}\s+and\s+(?:up|older)\b/i;

/** First "Ages 5–12" / "ages 13+" phrase in the given texts. */
export function findAgeText(...texts: (string | null | undefined)[]): string | null {
  for (const text of texts) {
    const m = text?.match(AGE_MENTION_RE);
    if (m) return m[0];
  }
  return null;
}

const PRICE_PHRASE_RE =
  /pay[-\s]what[-\s]you[-\s]\w+|suggested\s+\w+|\bfree\b(?:\s+with\s+(?:\w+\s+)?admission|\s+for\s+members)?|\$\s*\d+(?:\.\d{2})?/gi;

/** Cost wording found in free text ("Free", "$15", "free with admission"), joined with "; ". */
export function priceMention(text: string): string | null {
  const hits = [...text.matchAll(PRICE_PHRASE_RE)].map((m) => m[0].replace(/\s+/g, " "));
  const unique = [...new Set(hits.map((h) => h.toLowerCase()))];
  return unique.length ? unique.join("; ") : null;
}
