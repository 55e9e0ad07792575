/**
 * Run ingestion from the command line.
 *
 *   npm run ingest -- --all
 *   npm run ingest -- --source met-teens --dry-run
 *   npm run ingest -- --source moma-kids --dry-run --html saved/moma.html
 *   npm run ingest -- --housekeeping
 */
import { readFileSync } from "fs";
import { resolve } from "path";
import { parseArgs } from "util";
import { FirestoreCatalogStore } from "@/lib/catalog/firestoreStore";
import type { CatalogStore } from "@/lib/catalog/store";
import { createFallbackExtractor } from "@/lib/extract/fallback";
import { getAdminDb } from "@/lib/firebase/admin";
import { runSources, type RunSourceResult } from "@/lib/pipeline/runSource";
import { RunTracker } from "@/lib/runs/runTracker";
import { createFetchContext } from "@/lib/scrapers/fetcher";
import { getAdapterById, getAdapters } from "@/lib/scrapers/registry";
import { registerAllAdapters } from "@/lib/scrapers/sources";
import type { RawDocument, SourceAdapter } from "@/lib/scrapers/types";

registerAllAdapters();

const USAGE =
  "Usage: npm run ingest -- (--all | --source <id> ...) [--dry-run] [--html <file> [--url <url>]] [--limit <n>]\n" +
  "       npm run ingest -- --housekeeping\n" +
  "       npm run ingest -- --list";

function selectAdapters(ids: string[], all: boolean): SourceAdapter[] {
  if (all) return getAdapters();
  return ids.map((id) => {
    const adapter = getAdapterById(id);
    if (!adapter) {
      const known = getAdapters()
        .map((a) => a.id)
        .join(", ");
      throw new Error(`Source "${id}" not found. Available: ${known}`);
    }
    return adapter;
  });
}

function savedDocument(adapter: SourceAdapter, file: string, url: string | undefined): RawDocument {
  const html = readFileSync(resolve(file), "utf-8");
  const entry = url ?? adapter.documents()[0]?.url ?? adapter.baseUrl;
  return { url: entry, finalUrl: entry, html, fetchedAt: new Date(), via: "file" };
}

function printResult(r: RunSourceResult, limit: number): void {
  const counts = r.dryRun
    ? `${r.preview.length} normalized`
    : `${r.inserted} inserted, ${r.updated} updated, ${r.unchanged} unchanged, ${r.expired} expired`;
  console.log(`${r.sourceId}: ${r.status}; found ${r.itemsFound}, ${counts}, ${r.rejected} rejected`);
  for (const a of r.preview.slice(0, limit)) {
    console.log(`  ${a.startAt.toISOString()}  ${a.title}  [${a.free.status}, ${a.confidenceScore}]  ${a.sourceUrl}`);
  }
  for (const rej of r.rejections.slice(0, limit)) console.log(`  - ${rej.title ?? "(untitled)"}: ${rej.reason}`);
  for (const e of r.errors.slice(0, limit)) console.log(`  ! ${e}`);
}

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      source: { type: "string", short: "s", multiple: true },
      all: { type: "boolean" },
      "dry-run": { type: "boolean" },
      html: { type: "string" },
      url: { type: "string" },
      limit: { type: "string" },
      housekeeping: { type: "boolean" },
      list: { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }
  if (values.list) {
    for (const a of getAdapters()) console.log(`${a.id}\t${a.name}`);
    return 0;
  }

  const dryRun = values["dry-run"] ?? false;
  const ids = values.source ?? [];
  const all = values.all ?? false;
  const limit = Number.parseInt(values.limit ?? "10", 10) || 10;

  let store: CatalogStore | null = null;
  if (!dryRun || values.housekeeping) {
    const db = getAdminDb();
    if (!db) {
      console.error("[ingest] Firebase not configured; set credentials or use --dry-run");
      return 1;
    }
    store = new FirestoreCatalogStore(db);
  }

  if (values.housekeeping && store) {
    const closed = await new RunTracker(store).closeStaleRuns();
    console.log(`[ingest] housekeeping closed ${closed.length} stale runs`);
    if (!all && ids.length === 0) return 0;
  }

  const adapters = selectAdapters(ids, all);
  if (adapters.length === 0) {
    console.error(USAGE);
    return 1;
  }
  if (values.html && adapters.length !== 1) {
    console.error("[ingest] --html needs exactly one --source");
    return 1;
  }

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.warn("[ingest] interrupted; cancelling runs");
    controller.abort();
  });

  const results = await runSources(adapters, {
    store,
    fetchContext: createFetchContext(),
    fallback: createFallbackExtractor(),
    dryRun,
    signal: controller.signal,
    documents: values.html ? [savedDocument(adapters[0], values.html, values.url)] : undefined,
  });
  for (const r of results) printResult(r, limit);
  return results.every((r) => r.status === "success") ? 0 : 1;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error("[ingest] fatal:", e);
    process.exitCode = 1;
  }
);
