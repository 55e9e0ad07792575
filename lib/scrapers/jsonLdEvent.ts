/**
 * Pull schema.org Event objects out of a page: application/ld+json blocks,
 * Next.js `__NEXT_DATA__` payloads, and plain objects that look like events.
 */
import * as cheerio from "cheerio";
import { isIrrelevantItemText, mentionsDropIn, registrationRequirement } from "./filters";
import type { CandidateActivity } from "./types";

/** A schema.org Event-like object; fields are read defensively since sites vary. */
export type JsonLdEvent = Record<string, unknown>;

const EVENT_TYPES = new Set([
  "Event",
  "EducationEvent",
  "ChildrensEvent",
  "ExhibitionEvent",
  "SocialEvent",
  "VisualArtsEvent",
  "CourseInstance",
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return value != null && typeof value === "object" && !Array.isArray(value);
}

function hasEventType(type: unknown): boolean {
  if (typeof type === "string") return EVENT_TYPES.has(type);
  if (Array.isArray(type)) return type.some((t) => typeof t === "string" && EVENT_TYPES.has(t));
  return false;
}

function looksLikeEvent(o: Record<string, unknown>): boolean {
  const hasTitle = typeof o.name === "string" || typeof o.title === "string";
  const hasStart = typeof o.startDate === "string" || typeof o.start_date === "string";
  return hasTitle && hasStart;
}

/** Depth-first walk yielding event-shaped objects in document order. */
export function collectEventObjects(value: unknown, out: JsonLdEvent[] = [], depth = 0): JsonLdEvent[] {
  if (depth > 12) return out;
  if (Array.isArray(value)) {
    for (const item of value) collectEventObjects(item, out, depth + 1);
    return out;
  }
  if (!isRecord(value)) return out;
  if (hasEventType(value["@type"]) || looksLikeEvent(value)) {
    out.push(value);
    return out;
  }
  for (const child of Object.values(value)) collectEventObjects(child, out, depth + 1);
  return out;
}

function safeJsonParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Every event object embedded in the page's structured-data scripts. */
export function extractJsonLdEvents(html: string): JsonLdEvent[] {
  const $ = cheerio.load(html);
  const events: JsonLdEvent[] = [];
  $('script[type="application/ld+json"], script#__NEXT_DATA__').each((_, el) => {
    const text = $(el).text().trim();
    if (!text) return;
    const parsed = safeJsonParse(text);
    if (parsed !== undefined) collectEventObjects(parsed, events);
  });
  return events;
}

export function titleFromJsonLdEvent(ld: JsonLdEvent): string | null {
  const raw = typeof ld.name === "string" ? ld.name : typeof ld.title === "string" ? ld.title : null;
  const name = raw ? cheerio.load(raw).root().text().replace(/\s+/g, " ").trim() : null;
  return name && name.length > 1 ? name : null;
}

export function startDateFromJsonLdEvent(ld: JsonLdEvent): string | null {
  const value = ld.startDate ?? ld.start_date;
  return typeof value === "string" && value.trim() ? value.trim() : null;
}

export function endDateFromJsonLdEvent(ld: JsonLdEvent): string | null {
  const value = ld.endDate ?? ld.end_date;
  return typeof value === "string" && value.trim() ? value.trim() : null;
}

/** Strip tags and collapse whitespace in HTML-bearing text fields. */
export function plainText(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const text = cheerio.load(value).root().text().replace(/\s+/g, " ").trim();
  return text || null;
}

export function locationNameFromJsonLd(location: unknown): string | null {
  if (typeof location === "string") return plainText(location);
  if (Array.isArray(location)) {
    const names = location.map(locationNameFromJsonLd).filter((n): n is string => Boolean(n));
    return names.length ? names.join(", ") : null;
  }
  if (isRecord(location) && typeof location.name === "string") return plainText(location.name);
  return null;
}

/**
 * Price wording from `offers` / `isAccessibleForFree`, e.g. "Free" or "$15".
 * Returns null when the object says nothing about cost.
 */
export function priceTextFromJsonLd(ld: JsonLdEvent): string | null {
  const free = ld.isAccessibleForFree;
  if (free === true || free === "true" || free === "True") return "Free";
  const offers = Array.isArray(ld.offers) ? ld.offers : ld.offers != null ? [ld.offers] : [];
  for (const offer of offers) {
    if (!isRecord(offer)) continue;
    const price = offer.price;
    if (price === 0 || price === "0" || price === "0.00") return "Free";
    if (typeof price === "number" || (typeof price === "string" && /\d/.test(price))) {
      const currency = offer.priceCurrency === "USD" || offer.priceCurrency == null ? "$" : `${String(offer.priceCurrency)} `;
      return `${currency}${String(price)}`;
    }
    const label = plainText(offer.name) ?? plainText(offer.description);
    if (label) return label;
  }
  return null;
}

export function audienceTextFromJsonLd(audience: unknown): string | null {
  if (typeof audience === "string") return plainText(audience);
  if (Array.isArray(audience)) {
    const parts = audience.map(audienceTextFromJsonLd).filter((a): a is string => Boolean(a));
    return parts.length ? parts.join(", ") : null;
  }
  if (!isRecord(audience)) return null;
  const min = audience.suggestedMinAge;
  const max = audience.suggestedMaxAge;
  if (min != null && max != null) return `Ages ${String(min)}-${String(max)}`;
  if (min != null) return `Ages ${String(min)}+`;
  return plainText(audience.audienceType) ?? plainText(audience.name);
}

function absoluteUrl(value: unknown, base: string): string | null {
  if (typeof value !== "string" || !value.trim()) return null;
  try {
    return new URL(value.trim(), base).toString();
  } catch {
    return null;
  }
}

/**
 * The fields every structured-data listing shares. Adapters add their venue,
 * audience and filtering on top. Null when the object lacks a title or start.
 */
export function candidateFromJsonLdEvent(ld: JsonLdEvent, listUrl: string): CandidateActivity | null {
  const title = titleFromJsonLdEvent(ld);
  const startAt = startDateFromJsonLdEvent(ld);
  if (!title || !startAt || isIrrelevantItemText(title)) return null;

  const description = plainText(ld.description) ?? plainText(ld.summary) ?? plainText(ld.excerpt);
  const category = plainText(ld.category) ?? plainText(ld.keywords);
  const priceText = priceTextFromJsonLd(ld);
  const blob = [title, description, category, priceText].filter(Boolean).join(" ");
  const identifier = ld.identifier;

  return {
    title,
    startAt,
    endAt: endDateFromJsonLdEvent(ld),
    sourceUrl: absoluteUrl(ld.url, listUrl) ?? absoluteUrl(ld["@id"], listUrl) ?? listUrl,
    externalId: typeof identifier === "string" || typeof identifier === "number" ? String(identifier) : null,
    description,
    priceText,
    ageText: audienceTextFromJsonLd(ld.audience),
    locationText: locationNameFromJsonLd(ld.location),
    dropIn: mentionsDropIn(blob) ? true : null,
    registrationRequired: registrationRequirement(blob),
    tags: category ? category.split(/\s*,\s*/).filter(Boolean) : undefined,
  };
}
