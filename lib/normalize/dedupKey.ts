import { createHash } from "crypto";

const TRACKING_PARAM_RE = /^(?:utm_[a-z_]+|fbclid|gclid|mc_cid|mc_eid)$/i;

/**
 * Canonical form of a source URL: lowercase scheme and host, no fragment,
 * no tracking parameters, sorted query, no trailing slash.
 */
export function normalizeSourceUrl(url: string): string {
  const trimmed = url.trim();
  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    return trimmed.toLowerCase();
  }
  parsed.hash = "";
  const kept = [...parsed.searchParams.entries()]
    .filter(([k]) => !TRACKING_PARAM_RE.test(k))
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const search = new URLSearchParams(kept).toString();
  let path = parsed.pathname;
  if (path.length > 1) path = path.replace(/\/+$/, "");
  if (path === "/") path = "";
  return `${parsed.protocol}//${parsed.host}${path}${search ? `?${search}` : ""}`;
}

export function normalizeTitle(title: string): string {
  return title
    .normalize("NFKC")
    .replace(/[‘’]/g, "'")
    .replace(/[“”]/g, '"')
    .replace(/[–—]/g, "-")
    .replace(/\s+/g, " ")
    .trim()
    .toLowerCase();
}

/** Identity of an activity within its source: URL, title and start instant. */
export function buildDedupKey(sourceId: string, sourceUrl: string, title: string, startAt: Date): string {
  return [sourceId, normalizeSourceUrl(sourceUrl), normalizeTitle(title), startAt.toISOString()].join("|");
}

/** Stable document id for a dedup key. */
export function activityIdFromDedupKey(sourceId: string, dedupKey: string): string {
  const digest = createHash("sha256").update(dedupKey).digest("hex").slice(0, 24);
  return `${sourceId}_${digest}`;
}
