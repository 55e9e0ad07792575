import { DEFAULT_TIMEZONE } from "@/types";

export interface ZonedDateTimeParts {
  /** Full year, e.g. 2026 */
  year: number;
  /** Month 1-12 */
  month: number;
  /** Day 1-31 */
  day: number;
  hour?: number;
  minute?: number;
  second?: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  const existing = formatters.get(timeZone);
  if (existing) return existing;
  const fmt = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hour12: false,
  });
  formatters.set(timeZone, fmt);
  return fmt;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    getFormatter(timeZone);
    return true;
  } catch {
    return false;
  }
}

/** Wall-clock parts of `date` as seen in `timeZone`. */
export function partsInTimeZone(date: Date, timeZone: string): Required<ZonedDateTimeParts> {
  const parts = getFormatter(timeZone).formatToParts(date);
  const get = (type: Intl.DateTimeFormatPartTypes) =>
    Number.parseInt(parts.find((p) => p.type === type)?.value ?? "", 10);
  // en-CA renders midnight as hour 24 on some ICU builds.
  const hour = get("hour") % 24;
  return {
    year: get("year"),
    month: get("month"),
    day: get("day"),
    hour,
    minute: get("minute"),
    second: get("second"),
  };
}

/**
 * Convert a wall-clock time in an IANA timezone into an absolute instant.
 *
 * `new Date(y, m, d, h...)` would use the host's zone, so the guess is corrected
 * against the formatter until the rendered wall clock matches (handles DST).
 */
export function dateFromZonedParts(parts: ZonedDateTimeParts, timeZone = DEFAULT_TIMEZONE): Date {
  const hour = parts.hour ?? 0;
  const minute = parts.minute ?? 0;
  const second = parts.second ?? 0;
  const desired = Date.UTC(parts.year, parts.month - 1, parts.day, hour, minute, second, 0);
  let utcMillis = desired;

  for (let i = 0; i < 3; i++) {
    const got = partsInTimeZone(new Date(utcMillis), timeZone);
    const gotMillis = Date.UTC(got.year, got.month - 1, got.day, got.hour, got.minute, got.second, 0);
    const diff = desired - gotMillis;
    if (diff === 0) break;
    utcMillis += diff;
  }

  return new Date(utcMillis);
}

export function isoFromZonedParts(parts: ZonedDateTimeParts, timeZone = DEFAULT_TIMEZONE): string {
  return dateFromZonedParts(parts, timeZone).toISOString();
}

export function hasExplicitOffset(iso: string): boolean {
  return /[zZ]$/.test(iso) || /[+-]\d{2}:?\d{2}$/.test(iso);
}

/**
 * Parse an ISO-like string to an ISO instant.
 * - With an offset/Z: built-in parsing.
 * - Without one ("2026-02-12T20:00", "2026-02-12 20:00", "2026-02-12"): wall clock in `timeZone`.
 */
export function parseIsoAssumingTimeZone(iso: string, timeZone = DEFAULT_TIMEZONE): string | null {
  const s = iso.trim();
  if (!s) return null;

  if (hasExplicitOffset(s)) {
    const d = new Date(s);
    return Number.isNaN(d.getTime()) ? null : d.toISOString();
  }

  const m = s.match(/^(\d{4})-(\d{2})-(\d{2})(?:[T\s](\d{2}):(\d{2})(?::(\d{2}))?)?/);
  if (!m) {
    const d = new Date(s);
    return Number.isNaN(d.getTime()) ? null : d.toISOString();
  }

  const year = Number.parseInt(m[1], 10);
  const month = Number.parseInt(m[2], 10);
  const day = Number.parseInt(m[3], 10);
  if (!year || month < 1 || month > 12 || day < 1 || day > 31) return null;
  const hour = m[4] ? Number.parseInt(m[4], 10) : 0;
  const minute = m[5] ? Number.parseInt(m[5], 10) : 0;
  const second = m[6] ? Number.parseInt(m[6], 10) : 0;
  if (hour > 23 || minute > 59 || second > 59) return null;
  return isoFromZonedParts({ year, month, day, hour, minute, second }, timeZone);
}

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6, jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

/** "March", "Mar", "mar." → 3 */
export function monthFromName(name: string): number | null {
  return MONTHS[name.trim().toLowerCase().slice(0, 3)] ?? null;
}

/** "6:30 pm", "10am", "18:00" → 24h parts. */
export function parseClockTime(text: string): { hour: number; minute: number } | null {
  // A bare number ("Ages 5") is not a time; require minutes or a meridiem.
  for (const m of text.toLowerCase().matchAll(/(\d{1,2})(?::(\d{2}))?\s*(a\.?m\.?|p\.?m\.?)?/g)) {
    const meridiem = m[3]?.replace(/\./g, "");
    if (!meridiem && !m[2]) continue;
    let hour = Number.parseInt(m[1], 10);
    const minute = m[2] ? Number.parseInt(m[2], 10) : 0;
    if (meridiem === "pm" && hour < 12) hour += 12;
    if (meridiem === "am" && hour === 12) hour = 0;
    if (hour > 23 || minute > 59) continue;
    return { hour, minute };
  }
  return null;
}

/**
 * Year for a "Month Day" heading with no year: the current year, rolled into
 * the next one when the date would be more than ~300 days in the past.
 */
export function inferYear(month: number, day: number, now: Date, timeZone = DEFAULT_TIMEZONE): number {
  const today = partsInTimeZone(now, timeZone);
  const candidate = Date.UTC(today.year, month - 1, day);
  const todayUtc = Date.UTC(today.year, today.month - 1, today.day);
  return (candidate - todayUtc) / 86_400_000 < -300 ? today.year + 1 : today.year;
}
