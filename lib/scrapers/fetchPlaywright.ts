import { FetchError } from "@/lib/errors";
import { UA } from "./fetchHtml";

/** What the headless page must reach before its HTML is read. */
export type ReadinessCondition =
  | { kind: "networkidle" }
  | { kind: "selector"; selector: string };

export interface BrowserRenderOptions {
  readiness: ReadinessCondition;
  timeoutMs: number;
  /** Extra settle time after readiness, for calendars that hydrate in stages. */
  settleMs?: number;
}

export type BrowserRenderer = (url: string, opts: BrowserRenderOptions) => Promise<string>;

/**
 * Fetch rendered HTML from a URL using Playwright (for JS-rendered pages).
 * Use for sources whose calendars show "Loading…" in static HTML.
 */
export const fetchWithPlaywright: BrowserRenderer = async (url, opts) => {
  // Ensure Playwright looks for browsers bundled with the app (not ephemeral OS cache).
  process.env.PLAYWRIGHT_BROWSERS_PATH ||= "0";
  const { chromium } = await import("playwright");
  const browser = await chromium.launch({ headless: true }).catch((e: unknown) => {
    throw new FetchError("permanent", url, `Headless browser unavailable: ${String(e)}`, { cause: e });
  });
  try {
    const context = await browser.newContext({ userAgent: UA, locale: "en-US" });
    const page = await context.newPage();
    const waitUntil = opts.readiness.kind === "networkidle" ? "networkidle" : "domcontentloaded";
    const response = await page.goto(url, { waitUntil, timeout: opts.timeoutMs });
    if (response && response.status() >= 400) {
      const status = response.status();
      const kind = status === 429 || status >= 500 ? "transient" : "permanent";
      throw new FetchError(kind, url, `HTTP ${status} (browser): ${url}`, { status });
    }
    if (opts.readiness.kind === "selector") {
      await page.waitForSelector(opts.readiness.selector, { timeout: opts.timeoutMs });
    }
    if (opts.settleMs) await page.waitForTimeout(opts.settleMs);
    return await page.content();
  } catch (e) {
    if (e instanceof FetchError) throw e;
    throw new FetchError("transient", url, `Browser navigation failed: ${String(e)}`, { cause: e });
  } finally {
    await browser.close();
  }
};
