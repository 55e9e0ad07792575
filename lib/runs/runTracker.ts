import type { IngestionRun } from "@/types";
import type { CatalogStore } from "@/lib/catalog/store";
import { getRunStaleAfterMinutes } from "@/lib/pipeline/policy";

/** Most messages kept in a run's error bundle; the rest are summarized as a count. */
export const MAX_ERROR_MESSAGES = 50;
const MAX_MESSAGE_LENGTH = 500;

export const STALE_RUN_MARKER = "stale: closed by housekeeping";

/** Newline-joined, capped error bundle; null when there is nothing to report. */
export function formatErrorBundle(errors: string[], max = MAX_ERROR_MESSAGES): string | null {
  const messages = errors.map((e) => e.trim()).filter(Boolean);
  if (messages.length === 0) return null;
  const kept = messages.slice(0, max).map((m) => (m.length > MAX_MESSAGE_LENGTH ? `${m.slice(0, MAX_MESSAGE_LENGTH)}…` : m));
  if (messages.length > max) kept.push(`… and ${messages.length - max} more`);
  return kept.join("\n");
}

export interface FinishRun {
  status: "success" | "failed";
  itemsFound: number;
  itemsSaved: number;
  errors?: string[];
}

/** Opens and closes ingestion_runs rows; one row per source run. */
export class RunTracker {
  constructor(
    private readonly store: CatalogStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  async startRun(sourceId: string): Promise<IngestionRun> {
    const run = await this.store.createRun(sourceId, this.now());
    console.log(`[ingest] ${sourceId}: run ${run.id} started`);
    return run;
  }

  /** Close a running run. Returns false (and changes nothing) when it was already closed. */
  async finishRun(runId: string, finish: FinishRun): Promise<boolean> {
    const closed = await this.store.closeRun(runId, {
      status: finish.status,
      finishedAt: this.now(),
      itemsFound: finish.itemsFound,
      itemsSaved: finish.itemsSaved,
      errors: formatErrorBundle(finish.errors ?? []),
    });
    if (!closed) console.warn(`[ingest] run ${runId} was already closed; finish ignored`);
    return closed;
  }

  /**
   * Close runs still marked running after `staleAfterMinutes`, as failed.
   * Returns the ids it closed.
   */
  async closeStaleRuns(staleAfterMinutes = getRunStaleAfterMinutes()): Promise<string[]> {
    const now = this.now();
    const cutoff = new Date(now.getTime() - staleAfterMinutes * 60_000);
    const stale = await this.store.listRunningRuns(cutoff);
    const closed: string[] = [];
    for (const run of stale) {
      const ok = await this.store.closeRun(run.id, {
        status: "failed",
        finishedAt: now,
        itemsFound: run.itemsFound,
        itemsSaved: run.itemsSaved,
        errors: STALE_RUN_MARKER,
      });
      if (ok) closed.push(run.id);
    }
    if (closed.length) console.warn(`[ingest] closed ${closed.length} stale runs started before ${cutoff.toISOString()}`);
    return closed;
  }
}
