import { CONFIDENCE_FIELDS, type Activity, type ActivityStatus, type ConfidenceField, type FieldConfidence } from "@/types";
import type { CatalogStore } from "@/lib/catalog/store";
import { ReconciliationError, ValidationError, errorMessage } from "@/lib/errors";
import { aggregateConfidence } from "@/lib/extract/confidence";
import type { Rejection } from "@/lib/extract/types";
import type { NormalizedActivity } from "@/lib/normalize/normalizeActivity";
import { getRetentionCutoff, getVenueNameTolerance } from "@/lib/pipeline/policy";

export interface ReconcileResult {
  inserted: number;
  updated: number;
  unchanged: number;
  rejected: number;
  rejections: Rejection[];
  /** Ids of every activity written or re-seen in this call. */
  savedIds: string[];
}

export interface ReconcileOptions {
  now?: Date;
  venueTolerance?: number;
}

/** Rejects candidates that would break the catalog's free-only invariant. */
export function validateForCatalog(c: NormalizedActivity): ValidationError | null {
  if (!c.title.trim()) return new ValidationError("missing_required", "missing title");
  if (Number.isNaN(c.startAt.getTime())) return new ValidationError("invalid_value", "invalid start time");
  if (!c.free.isFree) return new ValidationError("invariant_violation", "listed with a price");
  if (c.free.status === "uncertain" && !c.free.corroborated) {
    return new ValidationError("invariant_violation", "free status could not be established");
  }
  return null;
}

type Mergeable = Pick<
  Activity,
  | "title"
  | "description"
  | "activityType"
  | "ageMin"
  | "ageMax"
  | "freeVerificationStatus"
  | "dropIn"
  | "registrationRequired"
  | "endAt"
  | "recurrenceText"
  | "locationText"
  | "venueId"
  | "externalId"
>;

/** Activity columns governed by each confidence field. Start time is part of the key. */
const MERGE_COLUMNS: Partial<Record<ConfidenceField, (keyof Mergeable)[]>> = {
  title: ["title"],
  description: ["description"],
  activityType: ["activityType"],
  age: ["ageMin", "ageMax"],
  freeStatus: ["freeVerificationStatus"],
  dropIn: ["dropIn"],
  registrationRequired: ["registrationRequired"],
  endAt: ["endAt"],
  recurrenceText: ["recurrenceText"],
  locationText: ["locationText"],
  venue: ["venueId"],
  externalId: ["externalId"],
};

function copyColumn<K extends keyof Mergeable>(to: Mergeable, from: Mergeable, key: K): void {
  to[key] = from[key];
}

function hasValue(row: Mergeable, columns: (keyof Mergeable)[]): boolean {
  return columns.some((c) => row[c] != null);
}

function statusFor(existing: Activity | null, free: Activity["freeVerificationStatus"]): ActivityStatus {
  if (existing?.status === "cancelled") return "cancelled";
  return free === "uncertain" ? "needs_review" : "active";
}

function mergeableOf(a: Activity): Mergeable {
  return {
    title: a.title,
    description: a.description,
    activityType: a.activityType,
    ageMin: a.ageMin,
    ageMax: a.ageMax,
    freeVerificationStatus: a.freeVerificationStatus,
    dropIn: a.dropIn,
    registrationRequired: a.registrationRequired,
    endAt: a.endAt,
    recurrenceText: a.recurrenceText,
    locationText: a.locationText,
    venueId: a.venueId,
    externalId: a.externalId,
  };
}

function incomingRow(c: NormalizedActivity, venueId: string | null): Mergeable {
  return {
    title: c.title,
    description: c.description,
    activityType: c.activityType,
    ageMin: c.ageMin,
    ageMax: c.ageMax,
    freeVerificationStatus: c.free.status,
    dropIn: c.dropIn,
    registrationRequired: c.registrationRequired,
    endAt: c.endAt,
    recurrenceText: c.recurrenceText,
    locationText: c.locationText,
    venueId,
    externalId: c.externalId,
  };
}

type Provenance = Pick<Activity, "extractionMethod" | "extractorVersion" | "llmProvider" | "llmModel" | "llmConfidence">;

/** Extraction provenance follows whichever side supplied the title and free status. */
function provenance(existing: Activity | null, incoming: NormalizedActivity, taken: Set<ConfidenceField>): Provenance {
  if (existing && !taken.has("title") && !taken.has("freeStatus")) {
    return {
      extractionMethod: existing.extractionMethod,
      extractorVersion: existing.extractorVersion,
      llmProvider: existing.llmProvider,
      llmModel: existing.llmModel,
      llmConfidence: existing.llmConfidence,
    };
  }
  return {
    extractionMethod: incoming.extractionMethod,
    extractorVersion: incoming.extractorVersion,
    llmProvider: incoming.llm?.provider ?? null,
    llmModel: incoming.llm?.model ?? null,
    llmConfidence: incoming.llm?.confidence ?? null,
  };
}

/**
 * The row to store for `incoming`. A new key is inserted as observed. For a
 * known key each field keeps whichever of the stored and observed values has
 * the higher confidence (ties take the new observation), so stored confidence
 * never drops; first_seen_at never changes; an expired row comes back active.
 */
export function mergeActivity(
  existing: Activity | null,
  incoming: NormalizedActivity,
  venueId: string | null,
  now: Date
): Activity {
  const observed = incomingRow(incoming, venueId);
  const merged: Mergeable = existing ? mergeableOf(existing) : { ...observed };
  const fieldConfidence: FieldConfidence = existing ? {} : { ...incoming.fieldConfidence };
  const taken = new Set<ConfidenceField>();

  if (existing) {
    for (const field of CONFIDENCE_FIELDS) {
      const columns = MERGE_COLUMNS[field];
      if (!columns) continue;
      const storedConf = hasValue(existing, columns) ? existing.fieldConfidence[field] ?? 0 : 0;
      const newConf = incoming.fieldConfidence[field];
      if (hasValue(observed, columns) && newConf != null && newConf >= storedConf) {
        for (const col of columns) copyColumn(merged, observed, col);
        fieldConfidence[field] = newConf;
        taken.add(field);
      } else if (existing.fieldConfidence[field] != null) {
        fieldConfidence[field] = existing.fieldConfidence[field];
      }
    }
    const startConf = Math.max(existing.fieldConfidence.startAt ?? 0, incoming.fieldConfidence.startAt ?? 0);
    if (startConf > 0) fieldConfidence.startAt = startConf;
  }

  return {
    id: incoming.id,
    sourceId: incoming.sourceId,
    sourceUrl: existing?.sourceUrl ?? incoming.sourceUrl,
    ...merged,
    isFree: true,
    startAt: existing?.startAt ?? incoming.startAt,
    timezone: incoming.timezone,
    ...provenance(existing, incoming, taken),
    status: statusFor(existing, merged.freeVerificationStatus),
    confidenceScore: aggregateConfidence(fieldConfidence),
    fieldConfidence,
    dedupKey: incoming.dedupKey,
    firstSeenAt: existing?.firstSeenAt ?? now,
    lastSeenAt: now,
    updatedAt: now,
  };
}

async function storeCall<T>(what: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (e) {
    throw new ReconciliationError(`${what}: ${errorMessage(e)}`, e);
  }
}

/**
 * Upsert a batch of normalized candidates for one source. Candidates that
 * fail validation are counted and skipped; a store failure aborts the batch
 * with ReconciliationError.
 */
export async function reconcile(
  store: CatalogStore,
  sourceId: string,
  runId: string,
  candidates: NormalizedActivity[],
  opts: ReconcileOptions = {}
): Promise<ReconcileResult> {
  const now = opts.now ?? new Date();
  const tolerance = opts.venueTolerance ?? getVenueNameTolerance();
  const result: ReconcileResult = { inserted: 0, updated: 0, unchanged: 0, rejected: 0, rejections: [], savedIds: [] };
  const venueIds = new Map<string, string>();

  for (const c of candidates) {
    const invalid = c.sourceId === sourceId ? validateForCatalog(c) : new ValidationError("invalid_value", "wrong source");
    if (invalid) {
      result.rejected++;
      result.rejections.push({ title: c.title, sourceUrl: c.sourceUrl, reason: invalid.message });
      continue;
    }

    let venueId: string | null = null;
    if (c.venue) {
      const key = [c.venue.name, c.venue.city, c.venue.state].join("|").toLowerCase();
      const cachedVenue = venueIds.get(key);
      if (cachedVenue) venueId = cachedVenue;
      else {
        const ref = c.venue;
        const venue = await storeCall("resolve venue", () => store.resolveVenue(ref, tolerance, now));
        venueIds.set(key, venue.id);
        venueId = venue.id;
      }
    }

    const { outcome } = await storeCall(`upsert ${c.id}`, () =>
      store.upsertActivity(c.id, (existing) => mergeActivity(existing, c, venueId, now))
    );
    result[outcome]++;
    result.savedIds.push(c.id);
    if (c.tags.length) await storeCall(`tag ${c.id}`, () => store.addActivityTags(c.id, c.tags));
  }

  console.log(
    `[reconcile] ${sourceId} run ${runId}: ${result.inserted} inserted, ${result.updated} updated, ${result.unchanged} unchanged, ${result.rejected} rejected`
  );
  return result;
}

/**
 * Expire active rows of the source not seen within the retention window.
 * Only call after a run that completed successfully.
 */
export async function expireStale(store: CatalogStore, sourceId: string, now = new Date()): Promise<number> {
  const cutoff = getRetentionCutoff(now);
  const expired = await storeCall(`expire ${sourceId}`, () => store.expireActivities(sourceId, cutoff, now));
  if (expired > 0) console.log(`[reconcile] ${sourceId}: expired ${expired} activities last seen before ${cutoff.toISOString()}`);
  return expired;
}
