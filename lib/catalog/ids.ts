import { createHash, randomUUID } from "crypto";
import { venueNameTokens, type VenueRef } from "@/lib/normalize/venue";

/** Document id of an (activity, tag) pair; one row per pair. */
export function activityTagId(activityId: string, tag: string): string {
  return `${activityId}_${createHash("sha256").update(tag).digest("hex").slice(0, 16)}`;
}

/** Deterministic venue id, so two writers creating the same venue land on one document. */
export function venueIdFor(ref: Pick<VenueRef, "name" | "city" | "state">): string {
  const seed = [venueNameTokens(ref.name).join(" "), (ref.city ?? "").toLowerCase(), (ref.state ?? "").toLowerCase()].join("|");
  return `venue_${createHash("sha256").update(seed).digest("hex").slice(0, 20)}`;
}

export function newRunId(sourceId: string, startedAt: Date): string {
  return `${sourceId}_${startedAt.getTime()}_${randomUUID().slice(0, 8)}`;
}
