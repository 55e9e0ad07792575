import type { Activity, ActivityStatus, IngestionRun, RunStatus, Source, Venue } from "@/types";
import type { VenueRef } from "@/lib/normalize/venue";

export interface SourceInput {
  id: string;
  name: string;
  baseUrl: string;
  adapterType: string;
  crawlFrequency: string;
}

/** What an activity write did. */
export type UpsertOutcome = "inserted" | "updated" | "unchanged";

/**
 * Decide the row to write for `existing` (null when the key is new). Return
 * null to leave the row as it is. May be called more than once when the store
 * retries a transaction, so it must not have side effects.
 */
export type ActivityDecision = (existing: Activity | null) => Activity | null;

export interface ActivityScan {
  statuses: ActivityStatus[];
  startFrom?: Date;
  startTo?: Date;
  /** Resume after this row in (startAt, id) order. */
  after?: { startAt: Date; id: string };
  limit: number;
}

export interface RunClose {
  status: Exclude<RunStatus, "running">;
  finishedAt: Date;
  itemsFound: number;
  itemsSaved: number;
  errors: string | null;
}

/**
 * Persistence for the catalog. Implementations make each activity upsert and
 * each venue match-or-create atomic, so concurrent runs cannot duplicate a
 * dedup key or a venue.
 */
export interface CatalogStore {
  /** Create the source row if absent; refresh its descriptive fields otherwise. */
  ensureSource(input: SourceInput, now: Date): Promise<Source>;
  getSource(id: string): Promise<Source | null>;

  /** The stored venue matching `ref` within `tolerance`, or a new one. */
  resolveVenue(ref: VenueRef, tolerance: number, now: Date): Promise<Venue>;
  listVenues(): Promise<Venue[]>;

  upsertActivity(id: string, decide: ActivityDecision): Promise<{ outcome: UpsertOutcome; activity: Activity | null }>;
  getActivity(id: string): Promise<Activity | null>;
  listActivitiesBySource(sourceId: string): Promise<Activity[]>;
  scanActivities(scan: ActivityScan): Promise<Activity[]>;
  /** Active rows of the source last seen before `lastSeenBefore` become expired. Returns the count. */
  expireActivities(sourceId: string, lastSeenBefore: Date, now: Date): Promise<number>;

  addActivityTags(activityId: string, tags: string[]): Promise<void>;
  getActivityTags(activityId: string): Promise<string[]>;

  createRun(sourceId: string, startedAt: Date): Promise<IngestionRun>;
  /** Close a running run. Returns false when the run is unknown or already closed. */
  closeRun(id: string, close: RunClose): Promise<boolean>;
  getRun(id: string): Promise<IngestionRun | null>;
  listRunningRuns(startedBefore: Date): Promise<IngestionRun[]>;
}
