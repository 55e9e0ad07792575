import type { CatalogStore } from "@/lib/catalog/store";
import { FetchError, RunAbortedError, ValidationError, errorMessage } from "@/lib/errors";
import { extractDocument } from "@/lib/extract/extractDocument";
import type { FallbackExtractor } from "@/lib/extract/fallback";
import type { Rejection } from "@/lib/extract/types";
import { normalizeCandidate, type NormalizedActivity } from "@/lib/normalize/normalizeActivity";
import { expireStale, reconcile } from "@/lib/reconcile/reconciler";
import { RunTracker } from "@/lib/runs/runTracker";
import { fetchDocument, type FetchContext } from "@/lib/scrapers/fetcher";
import type { RawDocument, SourceAdapter } from "@/lib/scrapers/types";
import { getExtractorVersion, getVenueNameTolerance } from "./policy";

export interface RunSourceOptions {
  /** Required unless `dryRun`. */
  store: CatalogStore | null;
  fetchContext: FetchContext;
  fallback: FallbackExtractor | null;
  /** Fetch, extract and normalize only: no store writes, no run row. */
  dryRun?: boolean;
  signal?: AbortSignal;
  now?: () => Date;
  /** Saved documents used instead of fetching (offline validation). */
  documents?: RawDocument[];
  extractorVersion?: string;
  venueTolerance?: number;
}

export interface RunSourceResult {
  sourceId: string;
  runId: string | null;
  status: "success" | "failed";
  dryRun: boolean;
  itemsFound: number;
  itemsSaved: number;
  inserted: number;
  updated: number;
  unchanged: number;
  rejected: number;
  expired: number;
  rejections: Rejection[];
  errors: string[];
  /** Normalized candidates, kept for dry runs. */
  preview: NormalizedActivity[];
}

function throwIfAborted(signal: AbortSignal | undefined, sourceId: string): void {
  if (signal?.aborted) throw new RunAbortedError("cancelled", `[${sourceId}] cancelled`);
}

function emptyResult(adapter: SourceAdapter, dryRun: boolean): RunSourceResult {
  return {
    sourceId: adapter.id,
    runId: null,
    status: "success",
    dryRun,
    itemsFound: 0,
    itemsSaved: 0,
    inserted: 0,
    updated: 0,
    unchanged: 0,
    rejected: 0,
    expired: 0,
    rejections: [],
    errors: [],
    preview: [],
  };
}

/**
 * One ingestion run for one source: fetch each document, extract with
 * fallback, normalize, reconcile. Every started run is closed, as failed when
 * the entry document cannot be fetched, the store fails or the run is
 * cancelled. Expiry runs only after a successful run.
 */
export async function runSource(adapter: SourceAdapter, opts: RunSourceOptions): Promise<RunSourceResult> {
  const dryRun = opts.dryRun ?? false;
  const now = opts.now ?? (() => new Date());
  const extractorVersion = opts.extractorVersion ?? getExtractorVersion();
  const venueTolerance = opts.venueTolerance ?? getVenueNameTolerance();
  const result = emptyResult(adapter, dryRun);

  const store = dryRun ? null : opts.store;
  if (!dryRun && !store) throw new Error(`[${adapter.id}] a catalog store is required unless dryRun is set`);

  let tracker: RunTracker | null = null;
  if (store) {
    await store.ensureSource(
      {
        id: adapter.id,
        name: adapter.name,
        baseUrl: adapter.baseUrl,
        adapterType: adapter.adapterType,
        crawlFrequency: adapter.crawlFrequency,
      },
      now()
    );
    tracker = new RunTracker(store, now);
    result.runId = (await tracker.startRun(adapter.id)).id;
  }

  try {
    const requests = opts.documents ? [] : adapter.documents();
    const total = opts.documents ? opts.documents.length : requests.length;

    for (let i = 0; i < total; i++) {
      throwIfAborted(opts.signal, adapter.id);

      let doc: RawDocument;
      const saved = opts.documents?.[i];
      if (saved) doc = saved;
      else {
        try {
          doc = await fetchDocument(requests[i], opts.fetchContext);
        } catch (e) {
          if (i === 0) {
            throw new RunAbortedError("entry_fetch_failed", `[${adapter.id}] entry document failed: ${errorMessage(e)}`, e);
          }
          const kind = e instanceof FetchError ? e.kind : "error";
          result.errors.push(`[${adapter.id}] ${kind} fetch failure for ${requests[i].url}: ${errorMessage(e)}`);
          console.warn(`[ingest] ${adapter.id}: skipping ${requests[i].url}: ${errorMessage(e)}`);
          continue;
        }
      }

      const extraction = await extractDocument(adapter, doc, { fallback: opts.fallback });
      result.errors.push(...extraction.errors);
      result.rejections.push(...extraction.rejections);
      result.itemsFound += extraction.candidates.length + extraction.rejections.length;

      const normalized: NormalizedActivity[] = [];
      const siblingTitles = extraction.candidates.map((c) => c.candidate.title ?? "");
      for (const scored of extraction.candidates) {
        try {
          normalized.push(
            normalizeCandidate(scored, {
              sourceId: adapter.id,
              defaults: adapter.defaults,
              documentText: extraction.documentText,
              siblingTitles,
              extractorVersion,
            })
          );
        } catch (e) {
          if (!(e instanceof ValidationError)) throw e;
          result.rejections.push({ title: scored.candidate.title, sourceUrl: scored.candidate.sourceUrl, reason: e.message });
        }
      }

      throwIfAborted(opts.signal, adapter.id);
      if (!store || !result.runId) {
        result.preview.push(...normalized);
        continue;
      }
      const reconciled = await reconcile(store, adapter.id, result.runId, normalized, { now: now(), venueTolerance });
      result.inserted += reconciled.inserted;
      result.updated += reconciled.updated;
      result.unchanged += reconciled.unchanged;
      result.rejections.push(...reconciled.rejections);
    }

    if (store) result.expired = await expireStale(store, adapter.id, now());
  } catch (e) {
    result.status = "failed";
    result.errors.push(errorMessage(e));
    console.error(`[ingest] ${adapter.id} failed:`, e);
  } finally {
    result.rejected = result.rejections.length;
    result.itemsSaved = result.inserted + result.updated + result.unchanged;
    if (tracker && result.runId) {
      const errors = [
        ...result.errors,
        ...result.rejections.map((r) => `rejected "${r.title ?? "(untitled)"}" (${r.sourceUrl}): ${r.reason}`),
      ];
      try {
        await tracker.finishRun(result.runId, {
          status: result.status,
          itemsFound: result.itemsFound,
          itemsSaved: result.itemsSaved,
          errors,
        });
      } catch (e) {
        // Left running; closeStaleRuns will fail it later.
        result.status = "failed";
        result.errors.push(`could not close run ${result.runId}: ${errorMessage(e)}`);
        console.error(`[ingest] ${adapter.id}: could not close run ${result.runId}:`, e);
      }
    }
  }

  console.log(
    `[ingest] ${adapter.id}: ${result.status}${dryRun ? " (dry run)" : ""}; found ${result.itemsFound}, saved ${result.itemsSaved}, rejected ${result.rejected}, expired ${result.expired}`
  );
  return result;
}

/** Run several sources concurrently; one source's failure never affects another. */
export async function runSources(adapters: SourceAdapter[], opts: RunSourceOptions): Promise<RunSourceResult[]> {
  const settled = await Promise.allSettled(adapters.map((a) => runSource(a, opts)));
  return settled.map((p, i) => {
    if (p.status === "fulfilled") return p.value;
    const failed = emptyResult(adapters[i], opts.dryRun ?? false);
    failed.status = "failed";
    failed.errors.push(errorMessage(p.reason));
    console.error(`[ingest] ${adapters[i].id} could not start:`, p.reason);
    return failed;
  });
}
