import type { Activity } from "@/types";

/** A stored activity row for store and query tests. */
export function activityRow(overrides: Partial<Activity> = {}): Activity {
  const seen = new Date("2025-03-01T00:00:00Z");
  return {
    id: "community_a",
    sourceId: "community",
    sourceUrl: "https://example.org/events/a",
    externalId: null,
    title: "Family Art Day",
    description: null,
    activityType: "workshop",
    ageMin: null,
    ageMax: null,
    isFree: true,
    freeVerificationStatus: "confirmed",
    dropIn: null,
    registrationRequired: null,
    startAt: new Date("2025-03-08T15:00:00Z"),
    endAt: null,
    timezone: "America/New_York",
    recurrenceText: null,
    locationText: null,
    venueId: null,
    extractionMethod: "hardcoded",
    extractorVersion: "hardcoded-v1",
    llmProvider: null,
    llmModel: null,
    llmConfidence: null,
    status: "active",
    confidenceScore: 0.895,
    fieldConfidence: { title: 1, startAt: 1, freeStatus: 1 },
    dedupKey: "community|https://example.org/events/a|family art day|2025-03-08T15:00:00.000Z",
    firstSeenAt: seen,
    lastSeenAt: seen,
    updatedAt: seen,
    ...overrides,
  };
}
