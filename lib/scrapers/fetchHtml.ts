import { FetchError } from "@/lib/errors";

export const DEFAULT_TIMEOUT_MS = 30_000;

export const UA =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36";

export const DEFAULT_HEADERS: Record<string, string> = {
  "User-Agent": UA,
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.9",
};

export type HttpFetch = typeof fetch;

export interface HttpRequestOptions {
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
}

const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);

/** 429 is the one 4xx that is worth retrying; other 4xx will not change. */
export function classifyStatus(status: number): "transient" | "permanent" {
  if (TRANSIENT_STATUSES.has(status) || status >= 500) return "transient";
  return "permanent";
}

function parseRetryAfter(value: string | null): number | null {
  if (!value) return null;
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  return Number.parseInt(trimmed, 10);
}

function assertHttpUrl(url: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (e) {
    throw new FetchError("permanent", url, `Malformed URL: ${url}`, { cause: e });
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new FetchError("permanent", url, `Unsupported protocol: ${parsed.protocol}`);
  }
  return parsed;
}

/**
 * Fetch HTML and return the final URL after redirects.
 * Failures surface as FetchError so the caller's retry policy can tell
 * transient from permanent problems.
 */
export async function fetchHtmlWithUrl(
  url: string,
  opts: HttpRequestOptions = {},
  httpFetch: HttpFetch = fetch
): Promise<{ html: string; finalUrl: string; status: number }> {
  assertHttpUrl(url);
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    let res: Response;
    try {
      res = await httpFetch(url, {
        method: opts.method ?? "GET",
        signal: controller.signal,
        redirect: "follow",
        headers: { ...DEFAULT_HEADERS, ...opts.headers },
        body: opts.body,
      });
    } catch (e) {
      const reason = controller.signal.aborted ? `timed out after ${timeoutMs}ms` : String(e);
      throw new FetchError("transient", url, `Request failed: ${reason}`, { cause: e });
    }
    if (!res.ok) {
      throw new FetchError(classifyStatus(res.status), url, `HTTP ${res.status}: ${url}`, {
        status: res.status,
        retryAfterSeconds: parseRetryAfter(res.headers.get("retry-after")),
      });
    }
    const html = await res.text();
    const finalUrl = res.url || url;
    return { html, finalUrl, status: res.status };
  } finally {
    clearTimeout(timeoutId);
  }
}
