import type { Activity, ActivityTag, IngestionRun, Source, Venue } from "@/types";
import { findMatchingVenue, type VenueRef } from "@/lib/normalize/venue";
import { stableJson } from "./compare";
import { activityTagId, newRunId, venueIdFor } from "./ids";
import type {
  ActivityDecision,
  ActivityScan,
  CatalogStore,
  RunClose,
  SourceInput,
  UpsertOutcome,
} from "./store";

const TOUCH_FIELDS = new Set(["lastSeenAt", "updatedAt"]);

/** Equal apart from the timestamps every observation refreshes. */
function sameContent(a: Activity, b: Activity): boolean {
  return stableJson(a, TOUCH_FIELDS) === stableJson(b, TOUCH_FIELDS);
}

/**
 * In-process catalog. Every operation runs to completion without awaiting in
 * between, so each read-decide-write is atomic within the event loop.
 */
function isAfter(a: Activity, cursor: { startAt: Date; id: string }): boolean {
  const diff = a.startAt.getTime() - cursor.startAt.getTime();
  return diff > 0 || (diff === 0 && a.id > cursor.id);
}

export class MemoryCatalogStore implements CatalogStore {
  readonly sources = new Map<string, Source>();
  readonly venues = new Map<string, Venue>();
  readonly activities = new Map<string, Activity>();
  readonly activityTags = new Map<string, ActivityTag>();
  readonly runs = new Map<string, IngestionRun>();

  async ensureSource(input: SourceInput, now: Date): Promise<Source> {
    const existing = this.sources.get(input.id);
    const row: Source = existing
      ? { ...existing, ...input, updatedAt: now }
      : { ...input, active: true, createdAt: now, updatedAt: now };
    this.sources.set(row.id, row);
    return { ...row };
  }

  async getSource(id: string): Promise<Source | null> {
    const row = this.sources.get(id);
    return row ? { ...row } : null;
  }

  async resolveVenue(ref: VenueRef, tolerance: number, now: Date): Promise<Venue> {
    const match = findMatchingVenue([...this.venues.values()], ref, tolerance);
    if (match) return { ...match };
    const id = venueIdFor(ref);
    const existing = this.venues.get(id);
    if (existing) return { ...existing };
    const row: Venue = { id, ...ref, lat: null, lng: null, createdAt: now, updatedAt: now };
    this.venues.set(id, row);
    return { ...row };
  }

  async listVenues(): Promise<Venue[]> {
    return [...this.venues.values()].map((v) => ({ ...v }));
  }

  async upsertActivity(
    id: string,
    decide: ActivityDecision
  ): Promise<{ outcome: UpsertOutcome; activity: Activity | null }> {
    const existing = this.activities.get(id) ?? null;
    const next = decide(existing ? { ...existing, fieldConfidence: { ...existing.fieldConfidence } } : null);
    if (!next) return { outcome: "unchanged", activity: existing };
    this.activities.set(id, next);
    if (!existing) return { outcome: "inserted", activity: next };
    return { outcome: sameContent(existing, next) ? "unchanged" : "updated", activity: next };
  }

  async getActivity(id: string): Promise<Activity | null> {
    const row = this.activities.get(id);
    return row ? { ...row } : null;
  }

  async listActivitiesBySource(sourceId: string): Promise<Activity[]> {
    return [...this.activities.values()].filter((a) => a.sourceId === sourceId);
  }

  async scanActivities(scan: ActivityScan): Promise<Activity[]> {
    return [...this.activities.values()]
      .filter((a) => scan.statuses.includes(a.status))
      .filter((a) => !scan.startFrom || a.startAt.getTime() >= scan.startFrom.getTime())
      .filter((a) => !scan.startTo || a.startAt.getTime() <= scan.startTo.getTime())
      .sort((a, b) => a.startAt.getTime() - b.startAt.getTime() || a.id.localeCompare(b.id))
      .filter((a) => !scan.after || isAfter(a, scan.after))
      .slice(0, scan.limit);
  }

  async expireActivities(sourceId: string, lastSeenBefore: Date, now: Date): Promise<number> {
    let count = 0;
    for (const a of this.activities.values()) {
      if (a.sourceId !== sourceId || a.status !== "active") continue;
      if (a.lastSeenAt.getTime() >= lastSeenBefore.getTime()) continue;
      this.activities.set(a.id, { ...a, status: "expired", updatedAt: now });
      count++;
    }
    return count;
  }

  async addActivityTags(activityId: string, tags: string[]): Promise<void> {
    for (const tag of tags) this.activityTags.set(activityTagId(activityId, tag), { activityId, tag });
  }

  async getActivityTags(activityId: string): Promise<string[]> {
    return [...this.activityTags.values()].filter((t) => t.activityId === activityId).map((t) => t.tag);
  }

  async createRun(sourceId: string, startedAt: Date): Promise<IngestionRun> {
    const run: IngestionRun = {
      id: newRunId(sourceId, startedAt),
      sourceId,
      startedAt,
      finishedAt: null,
      status: "running",
      itemsFound: 0,
      itemsSaved: 0,
      errors: null,
    };
    this.runs.set(run.id, run);
    return { ...run };
  }

  async closeRun(id: string, close: RunClose): Promise<boolean> {
    const run = this.runs.get(id);
    if (!run || run.status !== "running") return false;
    this.runs.set(id, { ...run, ...close });
    return true;
  }

  async getRun(id: string): Promise<IngestionRun | null> {
    const run = this.runs.get(id);
    return run ? { ...run } : null;
  }

  async listRunningRuns(startedBefore: Date): Promise<IngestionRun[]> {
    return [...this.runs.values()].filter(
      (r) => r.status === "running" && r.startedAt.getTime() < startedBefore.getTime()
    );
  }
}
