import { describe, it, expect, beforeEach } from "vitest";
import { MemoryCatalogStore } from "@/lib/catalog/memoryStore";
import { ReconciliationError } from "@/lib/errors";
import { scoreCandidate } from "@/lib/extract/confidence";
import { normalizeCandidate, type NormalizeContext, type NormalizedActivity } from "@/lib/normalize/normalizeActivity";
import type { CandidateActivity, SourceDefaults } from "@/lib/scrapers/types";
import { expireStale, reconcile, validateForCatalog } from "./reconciler";

const DEFAULTS: SourceDefaults = {
  timezone: "America/New_York",
  venue: { name: "Community Art Center", city: "New York", state: "NY" },
  freeListing: false,
  activityType: "workshop",
  tags: ["Kids"],
};

const CTX: NormalizeContext = {
  sourceId: "community",
  defaults: DEFAULTS,
  documentText: null,
  extractorVersion: "hardcoded-v1",
};

const T1 = new Date("2025-03-01T00:00:00Z");
const DAY = 24 * 60 * 60 * 1000;

function candidate(overrides: Partial<CandidateActivity> = {}): CandidateActivity {
  return {
    title: "Family Art Day",
    startAt: "2025-03-08T10:00",
    sourceUrl: "https://example.org/events/family-art-day",
    description: "Collage and paper art",
    priceText: "Free admission",
    ...overrides,
  };
}

function normalize(c: CandidateActivity): NormalizedActivity {
  return normalizeCandidate(scoreCandidate(c, DEFAULTS, "hardcoded"), CTX);
}

class FailingStore extends MemoryCatalogStore {
  async upsertActivity(): Promise<never> {
    throw new Error("connection reset");
  }
}

describe("validateForCatalog", () => {
  it("accepts confirmed and corroborated rows", () => {
    expect(validateForCatalog(normalize(candidate()))).toBeNull();
    expect(validateForCatalog(normalize(candidate({ priceText: "Pay what you wish" })))).toBeNull();
  });

  it("rejects priced and unsupported rows", () => {
    expect(validateForCatalog(normalize(candidate({ priceText: "$15" })))?.message).toBe("listed with a price");
    expect(validateForCatalog(normalize(candidate({ priceText: null })))?.message).toBe(
      "free status could not be established"
    );
  });
});

describe("reconcile", () => {
  let store: MemoryCatalogStore;

  beforeEach(() => {
    store = new MemoryCatalogStore();
  });

  it("inserts a new activity with its venue and tags", async () => {
    const c = normalize(candidate());
    const result = await reconcile(store, "community", "run-1", [c], { now: T1 });

    expect(result).toMatchObject({ inserted: 1, updated: 0, unchanged: 0, rejected: 0, savedIds: [c.id] });
    const row = await store.getActivity(c.id);
    expect(row?.status).toBe("active");
    expect(row?.freeVerificationStatus).toBe("confirmed");
    expect(row?.isFree).toBe(true);
    expect(row?.firstSeenAt).toEqual(T1);
    expect(row?.confidenceScore).toBe(0.945);
    const venues = await store.listVenues();
    expect(venues.map((v) => v.name)).toEqual(["Community Art Center"]);
    expect(row?.venueId).toBe(venues[0].id);
    expect(await store.getActivityTags(c.id)).toEqual(["kids"]);
  });

  it("reports an identical re-observation as unchanged and only touches last_seen_at", async () => {
    const c = normalize(candidate());
    await reconcile(store, "community", "run-1", [c], { now: T1 });
    const before = await store.getActivity(c.id);

    const t2 = new Date(T1.getTime() + DAY);
    const result = await reconcile(store, "community", "run-2", [normalize(candidate())], { now: t2 });

    expect(result).toMatchObject({ inserted: 0, updated: 0, unchanged: 1 });
    const after = await store.getActivity(c.id);
    expect(after).toEqual({ ...before, lastSeenAt: t2, updatedAt: t2 });
    expect(store.activities.size).toBe(1);
  });

  it("collapses cosmetic variants onto one row", async () => {
    const result = await reconcile(
      store,
      "community",
      "run-1",
      [
        normalize(candidate()),
        normalize(
          candidate({
            title: "  family   art DAY ",
            sourceUrl: "https://EXAMPLE.org/events/family-art-day/?utm_source=newsletter#top",
          })
        ),
      ],
      { now: T1 }
    );
    expect(result.inserted).toBe(1);
    expect(result.inserted + result.updated + result.unchanged).toBe(2);
    expect(store.activities.size).toBe(1);
  });

  it("never writes a priced or unsupported candidate", async () => {
    const result = await reconcile(
      store,
      "community",
      "run-1",
      [normalize(candidate({ priceText: "$15 per child" })), normalize(candidate({ title: "Open Studio", priceText: null }))],
      { now: T1 }
    );
    expect(result.rejected).toBe(2);
    expect(result.rejections).toEqual([
      { title: "Family Art Day", sourceUrl: "https://example.org/events/family-art-day", reason: "listed with a price" },
      {
        title: "Open Studio",
        sourceUrl: "https://example.org/events/family-art-day",
        reason: "free status could not be established",
      },
    ]);
    expect(store.activities.size).toBe(0);
  });

  it("stores ambiguous pricing for review", async () => {
    const c = normalize(candidate({ priceText: "Pay what you wish" }));
    await reconcile(store, "community", "run-1", [c], { now: T1 });
    const row = await store.getActivity(c.id);
    expect(row?.status).toBe("needs_review");
    expect(row?.freeVerificationStatus).toBe("uncertain");
  });

  it("rejects candidates from another source", async () => {
    const result = await reconcile(store, "elsewhere", "run-1", [normalize(candidate())], { now: T1 });
    expect(result.rejections[0].reason).toBe("wrong source");
    expect(store.activities.size).toBe(0);
  });

  it("keeps a higher-confidence stored value over a weaker observation", async () => {
    const c = normalize(candidate());
    await reconcile(store, "community", "run-1", [c], { now: T1 });

    const weaker = normalize(candidate({ description: "Bring a friend", fieldConfidence: { description: 0.4 } }));
    const result = await reconcile(store, "community", "run-2", [weaker], { now: new Date(T1.getTime() + DAY) });

    expect(result.unchanged).toBe(1);
    const row = await store.getActivity(c.id);
    expect(row?.description).toBe("Collage and paper art");
    expect(row?.fieldConfidence.description).toBe(1);
  });

  it("fills in a field a later observation adds and keeps first_seen_at", async () => {
    const c = normalize(candidate());
    await reconcile(store, "community", "run-1", [c], { now: T1 });

    const t2 = new Date(T1.getTime() + 2 * DAY);
    const result = await reconcile(store, "community", "run-2", [normalize(candidate({ ageText: "Ages 5–12" }))], {
      now: t2,
    });

    expect(result.updated).toBe(1);
    const row = await store.getActivity(c.id);
    expect(row?.ageMin).toBe(5);
    expect(row?.ageMax).toBe(12);
    expect(row?.fieldConfidence.age).toBe(1);
    expect(row?.firstSeenAt).toEqual(T1);
    expect(row?.lastSeenAt).toEqual(t2);
  });

  it("reactivates an expired activity that is seen again", async () => {
    const c = normalize(candidate());
    await reconcile(store, "community", "run-1", [c], { now: T1 });

    expect(await expireStale(store, "community", new Date(T1.getTime() + 15 * DAY))).toBe(1);
    expect((await store.getActivity(c.id))?.status).toBe("expired");

    const t3 = new Date(T1.getTime() + 16 * DAY);
    const result = await reconcile(store, "community", "run-3", [normalize(candidate())], { now: t3 });
    expect(result.updated).toBe(1);
    const row = await store.getActivity(c.id);
    expect(row?.status).toBe("active");
    expect(row?.firstSeenAt).toEqual(T1);
    expect(row?.lastSeenAt).toEqual(t3);
  });

  it("does not expire rows seen within the retention window", async () => {
    await reconcile(store, "community", "run-1", [normalize(candidate())], { now: T1 });
    expect(await expireStale(store, "community", new Date(T1.getTime() + 10 * DAY))).toBe(0);
  });

  it("leaves a cancelled activity cancelled", async () => {
    const c = normalize(candidate());
    await reconcile(store, "community", "run-1", [c], { now: T1 });
    const row = store.activities.get(c.id);
    if (row) store.activities.set(c.id, { ...row, status: "cancelled" });

    await reconcile(store, "community", "run-2", [normalize(candidate())], { now: new Date(T1.getTime() + DAY) });
    expect((await store.getActivity(c.id))?.status).toBe("cancelled");
  });

  it("reuses a venue whose name differs only cosmetically", async () => {
    const first = normalize(candidate());
    const second = normalize(candidate({ title: "Print Lab", venueName: "The Community Art Center" }));
    await reconcile(store, "community", "run-1", [first, second], { now: T1 });

    const venues = await store.listVenues();
    expect(venues).toHaveLength(1);
    expect((await store.getActivity(second.id))?.venueId).toBe(venues[0].id);
  });

  it("keeps one row when two batches reconcile the same activity at once", async () => {
    const a = normalize(candidate());
    const b = normalize(candidate({ title: " family  art day " }));
    expect(b.id).toBe(a.id);

    const results = await Promise.all([
      reconcile(store, "community", "run-1", [a], { now: T1 }),
      reconcile(store, "community", "run-2", [b], { now: T1 }),
    ]);

    expect(results.reduce((n, r) => n + r.inserted, 0)).toBe(1);
    expect(store.activities.size).toBe(1);
    expect(await store.listVenues()).toHaveLength(1);
  });

  it("keeps the stored provenance when a weaker model observation changes nothing it supplied", async () => {
    const c = normalize(candidate());
    await reconcile(store, "community", "run-1", [c], { now: T1 });

    const weak = normalizeCandidate(
      scoreCandidate(candidate(), DEFAULTS, "llm", 0.5, { provider: "openai", model: "test-model", confidence: 0.5 }),
      { ...CTX, documentText: "Family Art Day. Free admission" }
    );
    await reconcile(store, "community", "run-2", [weak], { now: new Date(T1.getTime() + DAY) });

    const row = await store.getActivity(c.id);
    expect(row?.extractionMethod).toBe("hardcoded");
    expect(row?.extractorVersion).toBe("hardcoded-v1");
    expect(row?.llmProvider).toBeNull();
    expect(row?.llmModel).toBeNull();
    expect(row?.llmConfidence).toBeNull();
  });

  it("takes model provenance when the model's title wins the merge", async () => {
    const c = normalize(candidate());
    await reconcile(store, "community", "run-1", [c], { now: T1 });

    const strong = normalizeCandidate(
      scoreCandidate(candidate(), DEFAULTS, "llm", 1, { provider: "openai", model: "test-model", confidence: 1 }),
      { ...CTX, documentText: "Family Art Day. Free admission" }
    );
    await reconcile(store, "community", "run-2", [strong], { now: new Date(T1.getTime() + DAY) });

    const row = await store.getActivity(c.id);
    expect(row?.extractionMethod).toBe("llm");
    expect(row?.extractorVersion).toBeNull();
    expect(row?.llmProvider).toBe("openai");
    expect(row?.llmModel).toBe("test-model");
    expect(row?.llmConfidence).toBe(1);
  });

  it("aborts the batch with ReconciliationError when the store fails", async () => {
    const c = normalize(candidate());
    await expect(reconcile(new FailingStore(), "community", "run-1", [c], { now: T1 })).rejects.toThrow(
      new ReconciliationError(`upsert ${c.id}: connection reset`)
    );
  });
});
