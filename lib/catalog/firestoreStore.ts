import { FieldPath, Timestamp, type DocumentData, type Firestore } from "firebase-admin/firestore";
import {
  ACTIVITY_STATUSES,
  EXTRACTION_METHODS,
  FREE_VERIFICATION_STATUSES,
  RUN_STATUSES,
  CONFIDENCE_FIELDS,
  type Activity,
  type FieldConfidence,
  type IngestionRun,
  type Source,
  type Venue,
} from "@/types";
import { BATCH_SIZE, COLLECTIONS } from "@/lib/firebase/collections";
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

function str(d: DocumentData, key: string): string {
  const v: unknown = d[key];
  return typeof v === "string" ? v : "";
}

function strOrNull(d: DocumentData, key: string): string | null {
  const v: unknown = d[key];
  return typeof v === "string" ? v : null;
}

function numOrNull(d: DocumentData, key: string): number | null {
  const v: unknown = d[key];
  return typeof v === "number" && Number.isFinite(v) ? v : null;
}

function boolOrNull(d: DocumentData, key: string): boolean | null {
  const v: unknown = d[key];
  return typeof v === "boolean" ? v : null;
}

function dateOrNull(d: DocumentData, key: string): Date | null {
  const v: unknown = d[key];
  if (v instanceof Timestamp) return v.toDate();
  if (v instanceof Date) return v;
  return null;
}

function date(d: DocumentData, key: string): Date {
  return dateOrNull(d, key) ?? new Date(0);
}

function oneOf<T extends string>(values: readonly T[], raw: unknown, fallback: T): T {
  return values.find((v) => v === raw) ?? fallback;
}

function ts(value: Date): Timestamp {
  return Timestamp.fromDate(value);
}

function tsOrNull(value: Date | null): Timestamp | null {
  return value ? Timestamp.fromDate(value) : null;
}

function fieldConfidenceFrom(raw: unknown): FieldConfidence {
  const out: FieldConfidence = {};
  if (raw == null || typeof raw !== "object") return out;
  for (const field of CONFIDENCE_FIELDS) {
    const v: unknown = Object.getOwnPropertyDescriptor(raw, field)?.value;
    if (typeof v === "number") out[field] = v;
  }
  return out;
}

function sourceFromDoc(id: string, d: DocumentData): Source {
  return {
    id,
    name: str(d, "name"),
    baseUrl: str(d, "base_url"),
    adapterType: str(d, "adapter_type"),
    crawlFrequency: str(d, "crawl_frequency"),
    active: boolOrNull(d, "active") ?? true,
    createdAt: date(d, "created_at"),
    updatedAt: date(d, "updated_at"),
  };
}

function venueFromDoc(id: string, d: DocumentData): Venue {
  return {
    id,
    name: str(d, "name"),
    address: strOrNull(d, "address"),
    city: strOrNull(d, "city"),
    state: strOrNull(d, "state"),
    zip: strOrNull(d, "zip"),
    lat: numOrNull(d, "lat"),
    lng: numOrNull(d, "lng"),
    website: strOrNull(d, "website"),
    createdAt: date(d, "created_at"),
    updatedAt: date(d, "updated_at"),
  };
}

function venueToDoc(v: Venue): DocumentData {
  return {
    name: v.name,
    address: v.address,
    city: v.city,
    state: v.state,
    zip: v.zip,
    lat: v.lat,
    lng: v.lng,
    website: v.website,
    created_at: ts(v.createdAt),
    updated_at: ts(v.updatedAt),
  };
}

export function activityFromDoc(id: string, d: DocumentData): Activity {
  return {
    id,
    sourceId: str(d, "source_id"),
    sourceUrl: str(d, "source_url"),
    externalId: strOrNull(d, "external_id"),
    title: str(d, "title"),
    description: strOrNull(d, "description"),
    activityType: strOrNull(d, "activity_type"),
    ageMin: numOrNull(d, "age_min"),
    ageMax: numOrNull(d, "age_max"),
    isFree: true,
    freeVerificationStatus: oneOf(FREE_VERIFICATION_STATUSES, d.free_verification_status, "uncertain"),
    dropIn: boolOrNull(d, "drop_in"),
    registrationRequired: boolOrNull(d, "registration_required"),
    startAt: date(d, "start_at"),
    endAt: dateOrNull(d, "end_at"),
    timezone: str(d, "timezone"),
    recurrenceText: strOrNull(d, "recurrence_text"),
    locationText: strOrNull(d, "location_text"),
    venueId: strOrNull(d, "venue_id"),
    extractionMethod: oneOf(EXTRACTION_METHODS, d.extraction_method, "hardcoded"),
    extractorVersion: strOrNull(d, "extractor_version"),
    llmProvider: strOrNull(d, "llm_provider"),
    llmModel: strOrNull(d, "llm_model"),
    llmConfidence: numOrNull(d, "llm_confidence"),
    status: oneOf(ACTIVITY_STATUSES, d.status, "needs_review"),
    confidenceScore: numOrNull(d, "confidence_score") ?? 0,
    fieldConfidence: fieldConfidenceFrom(d.field_confidence),
    dedupKey: str(d, "dedup_key"),
    firstSeenAt: date(d, "first_seen_at"),
    lastSeenAt: date(d, "last_seen_at"),
    updatedAt: date(d, "updated_at"),
  };
}

/** Firestore rejects undefined, so every optional column is written as null. */
export function activityToDoc(a: Activity): DocumentData {
  return {
    source_id: a.sourceId,
    source_url: a.sourceUrl,
    external_id: a.externalId,
    title: a.title,
    description: a.description,
    activity_type: a.activityType,
    age_min: a.ageMin,
    age_max: a.ageMax,
    is_free: true,
    free_verification_status: a.freeVerificationStatus,
    drop_in: a.dropIn,
    registration_required: a.registrationRequired,
    start_at: ts(a.startAt),
    end_at: tsOrNull(a.endAt),
    timezone: a.timezone,
    recurrence_text: a.recurrenceText,
    location_text: a.locationText,
    venue_id: a.venueId,
    extraction_method: a.extractionMethod,
    extractor_version: a.extractorVersion,
    llm_provider: a.llmProvider,
    llm_model: a.llmModel,
    llm_confidence: a.llmConfidence,
    status: a.status,
    confidence_score: a.confidenceScore,
    field_confidence: { ...a.fieldConfidence },
    dedup_key: a.dedupKey,
    first_seen_at: ts(a.firstSeenAt),
    last_seen_at: ts(a.lastSeenAt),
    updated_at: ts(a.updatedAt),
  };
}

function runFromDoc(id: string, d: DocumentData): IngestionRun {
  return {
    id,
    sourceId: str(d, "source_id"),
    startedAt: date(d, "started_at"),
    finishedAt: dateOrNull(d, "finished_at"),
    status: oneOf(RUN_STATUSES, d.status, "failed"),
    itemsFound: numOrNull(d, "items_found") ?? 0,
    itemsSaved: numOrNull(d, "items_saved") ?? 0,
    errors: strOrNull(d, "errors"),
  };
}

const TOUCH_COLUMNS = new Set(["last_seen_at", "updated_at"]);

/** Equal apart from the timestamps every observation refreshes. */
function sameContent(a: DocumentData, b: DocumentData): boolean {
  return stableJson(a, TOUCH_COLUMNS) === stableJson(b, TOUCH_COLUMNS);
}

/**
 * Catalog on Firestore. Collections mirror the catalog tables; document ids
 * carry the uniqueness constraints (one activity per dedup key, one tag row
 * per pair) and transactions make each read-decide-write atomic.
 *
 * Needs composite indexes on activities (source_id, status, last_seen_at),
 * activities (status, start_at) and ingestion_runs (status, started_at).
 */
export class FirestoreCatalogStore implements CatalogStore {
  constructor(private readonly db: Firestore) {}

  async ensureSource(input: SourceInput, now: Date): Promise<Source> {
    const ref = this.db.collection(COLLECTIONS.SOURCES).doc(input.id);
    return this.db.runTransaction(async (tx) => {
      const snap = await tx.get(ref);
      const fields = {
        name: input.name,
        base_url: input.baseUrl,
        adapter_type: input.adapterType,
        crawl_frequency: input.crawlFrequency,
        updated_at: ts(now),
      };
      if (snap.exists) {
        tx.update(ref, fields);
        return sourceFromDoc(input.id, { ...snap.data(), ...fields });
      }
      const doc = { ...fields, active: true, created_at: ts(now) };
      tx.set(ref, doc);
      return sourceFromDoc(input.id, doc);
    });
  }

  async getSource(id: string): Promise<Source | null> {
    const snap = await this.db.collection(COLLECTIONS.SOURCES).doc(id).get();
    const data = snap.data();
    return data ? sourceFromDoc(snap.id, data) : null;
  }

  async resolveVenue(ref: VenueRef, tolerance: number, now: Date): Promise<Venue> {
    const col = this.db.collection(COLLECTIONS.VENUES);
    return this.db.runTransaction(async (tx) => {
      const nearby = await tx.get(col.where("state", "==", ref.state));
      const match = findMatchingVenue(
        nearby.docs.map((doc) => venueFromDoc(doc.id, doc.data())),
        ref,
        tolerance
      );
      if (match) return match;
      const id = venueIdFor(ref);
      const row: Venue = { id, ...ref, lat: null, lng: null, createdAt: now, updatedAt: now };
      tx.set(col.doc(id), venueToDoc(row));
      return row;
    });
  }

  async listVenues(): Promise<Venue[]> {
    const snapshot = await this.db.collection(COLLECTIONS.VENUES).get();
    return snapshot.docs.map((doc) => venueFromDoc(doc.id, doc.data()));
  }

  async upsertActivity(
    id: string,
    decide: ActivityDecision
  ): Promise<{ outcome: UpsertOutcome; activity: Activity | null }> {
    const ref = this.db.collection(COLLECTIONS.ACTIVITIES).doc(id);
    return this.db.runTransaction(async (tx) => {
      const snap = await tx.get(ref);
      const data = snap.data();
      const existing = data ? activityFromDoc(id, data) : null;
      const next = decide(existing);
      if (!next) return { outcome: "unchanged" as const, activity: existing };
      const doc = activityToDoc(next);
      tx.set(ref, doc);
      if (!data) return { outcome: "inserted" as const, activity: next };
      const unchanged = sameContent(activityToDoc(activityFromDoc(id, data)), doc);
      return { outcome: unchanged ? ("unchanged" as const) : ("updated" as const), activity: next };
    });
  }

  async getActivity(id: string): Promise<Activity | null> {
    const snap = await this.db.collection(COLLECTIONS.ACTIVITIES).doc(id).get();
    const data = snap.data();
    return data ? activityFromDoc(snap.id, data) : null;
  }

  async listActivitiesBySource(sourceId: string): Promise<Activity[]> {
    const snapshot = await this.db.collection(COLLECTIONS.ACTIVITIES).where("source_id", "==", sourceId).get();
    return snapshot.docs.map((doc) => activityFromDoc(doc.id, doc.data()));
  }

  async scanActivities(scan: ActivityScan): Promise<Activity[]> {
    let query = this.db.collection(COLLECTIONS.ACTIVITIES).where("status", "in", scan.statuses);
    if (scan.startFrom) query = query.where("start_at", ">=", ts(scan.startFrom));
    if (scan.startTo) query = query.where("start_at", "<=", ts(scan.startTo));
    query = query.orderBy("start_at", "asc").orderBy(FieldPath.documentId(), "asc");
    if (scan.after) query = query.startAfter(ts(scan.after.startAt), scan.after.id);
    const snapshot = await query.limit(scan.limit).get();
    return snapshot.docs.map((doc) => activityFromDoc(doc.id, doc.data()));
  }

  async expireActivities(sourceId: string, lastSeenBefore: Date, now: Date): Promise<number> {
    const snapshot = await this.db
      .collection(COLLECTIONS.ACTIVITIES)
      .where("source_id", "==", sourceId)
      .where("status", "==", "active")
      .where("last_seen_at", "<", ts(lastSeenBefore))
      .get();
    for (let i = 0; i < snapshot.docs.length; i += BATCH_SIZE) {
      const batch = this.db.batch();
      snapshot.docs
        .slice(i, i + BATCH_SIZE)
        .forEach((doc) => batch.update(doc.ref, { status: "expired", updated_at: ts(now) }));
      await batch.commit();
    }
    return snapshot.docs.length;
  }

  async addActivityTags(activityId: string, tags: string[]): Promise<void> {
    const col = this.db.collection(COLLECTIONS.ACTIVITY_TAGS);
    for (let i = 0; i < tags.length; i += BATCH_SIZE) {
      const batch = this.db.batch();
      tags
        .slice(i, i + BATCH_SIZE)
        .forEach((tag) => batch.set(col.doc(activityTagId(activityId, tag)), { activity_id: activityId, tag }));
      await batch.commit();
    }
  }

  async getActivityTags(activityId: string): Promise<string[]> {
    const snapshot = await this.db
      .collection(COLLECTIONS.ACTIVITY_TAGS)
      .where("activity_id", "==", activityId)
      .get();
    return snapshot.docs.map((doc) => str(doc.data(), "tag")).filter(Boolean);
  }

  async createRun(sourceId: string, startedAt: Date): Promise<IngestionRun> {
    const id = newRunId(sourceId, startedAt);
    await this.db
      .collection(COLLECTIONS.INGESTION_RUNS)
      .doc(id)
      .set({
        source_id: sourceId,
        started_at: ts(startedAt),
        finished_at: null,
        status: "running",
        items_found: 0,
        items_saved: 0,
        errors: null,
      });
    return { id, sourceId, startedAt, finishedAt: null, status: "running", itemsFound: 0, itemsSaved: 0, errors: null };
  }

  async closeRun(id: string, close: RunClose): Promise<boolean> {
    const ref = this.db.collection(COLLECTIONS.INGESTION_RUNS).doc(id);
    return this.db.runTransaction(async (tx) => {
      const snap = await tx.get(ref);
      const data = snap.data();
      if (!data || data.status !== "running") return false;
      tx.update(ref, {
        status: close.status,
        finished_at: ts(close.finishedAt),
        items_found: close.itemsFound,
        items_saved: close.itemsSaved,
        errors: close.errors,
      });
      return true;
    });
  }

  async getRun(id: string): Promise<IngestionRun | null> {
    const snap = await this.db.collection(COLLECTIONS.INGESTION_RUNS).doc(id).get();
    const data = snap.data();
    return data ? runFromDoc(snap.id, data) : null;
  }

  async listRunningRuns(startedBefore: Date): Promise<IngestionRun[]> {
    const snapshot = await this.db
      .collection(COLLECTIONS.INGESTION_RUNS)
      .where("status", "==", "running")
      .where("started_at", "<", ts(startedBefore))
      .get();
    return snapshot.docs.map((doc) => runFromDoc(doc.id, doc.data()));
  }
}
