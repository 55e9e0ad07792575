import { FetchError } from "@/lib/errors";
import { getFetchPolicyConfig } from "@/lib/pipeline/policy";
import { fetchHtmlWithUrl, type HttpFetch } from "./fetchHtml";
import { fetchWithPlaywright, type BrowserRenderer } from "./fetchPlaywright";
import { HostThrottle } from "./hostThrottle";
import { createRetryPolicy, realSleep, withRetry, type RetryPolicy, type Sleep } from "./retryPolicy";
import type { DocumentRequest, RawDocument } from "./types";

/**
 * Process-scoped fetch state. One context is shared by every source in a
 * process so the per-host throttle sees all traffic; tests build their own.
 */
export interface FetchContext {
  httpFetch: HttpFetch;
  renderBrowser: BrowserRenderer;
  throttle: HostThrottle;
  retryPolicy: RetryPolicy;
  timeoutMs: number;
  sleep: Sleep;
  now: () => Date;
}

export function createFetchContext(overrides?: Partial<FetchContext>): FetchContext {
  const config = getFetchPolicyConfig();
  const sleep = overrides?.sleep ?? realSleep;
  return {
    httpFetch: fetch,
    renderBrowser: fetchWithPlaywright,
    throttle: new HostThrottle(config.hostMinIntervalMs, Date.now, sleep),
    retryPolicy: createRetryPolicy({ maxAttempts: config.maxAttempts, baseDelayMs: config.baseDelayMs }),
    timeoutMs: config.timeoutMs,
    sleep,
    now: () => new Date(),
    ...overrides,
  };
}

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch (e) {
    throw new FetchError("permanent", url, `Malformed URL: ${url}`, { cause: e });
  }
}

function shouldTryBrowser(error: unknown): boolean {
  if (!(error instanceof FetchError)) return false;
  return error.kind === "transient" || error.status === 403;
}

/**
 * Fetch one document with politeness, retry/backoff and a hard timeout.
 * Throws FetchError when every strategy is exhausted.
 */
export async function fetchDocument(request: DocumentRequest, ctx: FetchContext): Promise<RawDocument> {
  const host = hostOf(request.url);
  const { strategy } = request;
  const onRetry = (attempt: number, delayMs: number, error: unknown) => {
    console.warn(
      `[fetch] ${request.url} attempt ${attempt}/${ctx.retryPolicy.maxAttempts} failed (${String(error)}); retrying in ${delayMs}ms`
    );
  };

  const viaBrowser = (readiness: Parameters<BrowserRenderer>[1]["readiness"], settleMs?: number) =>
    withRetry(
      ctx.retryPolicy,
      async () => {
        await ctx.throttle.acquire(host);
        const html = await ctx.renderBrowser(request.url, { readiness, timeoutMs: ctx.timeoutMs, settleMs });
        return { url: request.url, finalUrl: request.url, html, fetchedAt: ctx.now(), via: "browser" as const };
      },
      { sleep: ctx.sleep, onRetry }
    );

  if (strategy.kind === "browser") {
    return viaBrowser(strategy.readiness, strategy.settleMs);
  }

  try {
    return await withRetry(
      ctx.retryPolicy,
      async () => {
        await ctx.throttle.acquire(host);
        const { html, finalUrl } = await fetchHtmlWithUrl(
          request.url,
          { method: strategy.method, headers: strategy.headers, body: strategy.body, timeoutMs: ctx.timeoutMs },
          ctx.httpFetch
        );
        return { url: request.url, finalUrl, html, fetchedAt: ctx.now(), via: "http" as const };
      },
      { sleep: ctx.sleep, onRetry }
    );
  } catch (error) {
    if (!strategy.browserFallback || !shouldTryBrowser(error)) throw error;
    console.warn(`[fetch] ${request.url} switching to headless browser after: ${String(error)}`);
    return viaBrowser(strategy.browserFallback);
  }
}
