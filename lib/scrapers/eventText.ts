import { monthFromName, parseClockTime } from "./timezone";

export interface ClockTime {
  hour: number;
  minute: number;
}

const MERIDIEM = "(a\\.?m\\.?|p\\.?m\\.?)";
const TIME_RANGE_RE = new RegExp(
  `(\\d{1,2})(?::(\\d{2}))?\\s*(?:${MERIDIEM}\\s*)?(?:-|\\u2013|\\u2014|to)\\s*(\\d{1,2})(?::(\\d{2}))?\\s*${MERIDIEM}`,
  "i"
);

function to24h(hour: number, minute: number, meridiem: string): ClockTime {
  const suffix = meridiem.toLowerCase().replace(/\./g, "");
  let h = hour;
  if (suffix === "pm" && h < 12) h += 12;
  if (suffix === "am" && h === 12) h = 0;
  return { hour: h, minute };
}

/**
 * Start (and end, for ranges) of a time expression: "10:00–11:30 a.m.",
 * "6–8 pm", "2:00 PM". A range's start borrows the end's meridiem when it has
 * none of its own.
 */
export function parseTimeRange(text: string): { start: ClockTime; end: ClockTime | null } | null {
  const normalized = text.replace(/\s+/g, " ");
  const m = normalized.match(TIME_RANGE_RE);
  if (m) {
    const endMeridiem = m[6];
    const start = to24h(Number.parseInt(m[1], 10), m[2] ? Number.parseInt(m[2], 10) : 0, m[3] ?? endMeridiem);
    const end = to24h(Number.parseInt(m[4], 10), m[5] ? Number.parseInt(m[5], 10) : 0, endMeridiem);
    if (start.hour <= 23 && end.hour <= 23 && start.minute <= 59 && end.minute <= 59) return { start, end };
  }
  const single = parseClockTime(normalized);
  return single ? { start: single, end: null } : null;
}

const WEEKDAY = "(?:Mon|Tue|Tues|Wed|Thu|Thur|Thurs|Fri|Sat|Sun)[a-z]*\\.?";
const WEEKDAY_HEADING_RE = new RegExp(`^${WEEKDAY},?\\s+([A-Za-z]{3,9})\\.?\\s+(\\d{1,2})$`, "i");
const LONG_DATE_RE = /\b([A-Za-z]{3,9})\.?\s+(\d{1,2}),\s*(\d{4})\b/;

/** "Saturday, March 1" or "Sat, Mar 1" → month/day; null for anything else. */
export function parseWeekdayHeading(text: string): { month: number; day: number } | null {
  const m = text.replace(/\s+/g, " ").trim().match(WEEKDAY_HEADING_RE);
  if (!m) return null;
  const month = monthFromName(m[1]);
  const day = Number.parseInt(m[2], 10);
  if (!month || day < 1 || day > 31) return null;
  return { month, day };
}

/** First "March 1, 2026" in the text; `end` is the offset just past it. */
export function parseLongDate(text: string): { year: number; month: number; day: number; end: number } | null {
  const m = text.match(LONG_DATE_RE);
  if (!m || m.index == null) return null;
  const month = monthFromName(m[1]);
  const day = Number.parseInt(m[2], 10);
  if (!month || day < 1 || day > 31) return null;
  return { year: Number.parseInt(m[3], 10), month, day, end: m.index + m[0].length };
}

/** Offset-less local ISO string, read later in the source's timezone. */
export function localIso(date: { year: number; month: number; day: number }, time?: ClockTime | null): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const base = `${date.year}-${pad(date.month)}-${pad(date.day)}`;
  return time ? `${base}T${pad(time.hour)}:${pad(time.minute)}:00` : base;
}
