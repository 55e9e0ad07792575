import { describe, it, expect } from "vitest";
import type { SourceDefaults } from "@/lib/scrapers/types";
import { aggregateConfidence, candidateConfidence, scoreCandidate } from "./confidence";

const DEFAULTS: SourceDefaults = {
  timezone: "America/New_York",
  venue: { name: "Gallery", city: "New York", state: "NY" },
  freeListing: true,
};

describe("aggregateConfidence", () => {
  it("is a weighted mean where missing fields count as zero", () => {
    expect(aggregateConfidence({ title: 1, startAt: 1, freeStatus: 1, description: 1, age: 1, venue: 1 })).toBe(1);
    expect(aggregateConfidence({ title: 1, startAt: 1 })).toBe(0.6);
    expect(aggregateConfidence({})).toBe(0);
  });

  it("ignores unweighted fields", () => {
    expect(aggregateConfidence({ title: 1, startAt: 1, endAt: 0, externalId: 1 })).toBe(0.6);
  });
});

describe("candidateConfidence", () => {
  it("is zero when a required field is missing", () => {
    expect(candidateConfidence({ title: 1, startAt: 1, description: 1 })).toBe(0);
    expect(candidateConfidence({ title: 1, startAt: 1, freeStatus: 1 })).toBe(0.85);
  });
});

describe("scoreCandidate", () => {
  const base = { title: "Clay", startAt: "2026-03-07T10:00", sourceUrl: "https://example.org/e/1" };

  it("caps a free signal that rests on the listing alone", () => {
    const scored = scoreCandidate(base, DEFAULTS, "hardcoded");
    expect(scored.fieldConfidence).toEqual({ title: 1, startAt: 1, freeStatus: 0.8 });
    expect(scored.confidence).toBe(0.8);
    expect(scored.fieldOrigin).toEqual({ title: "hardcoded", startAt: "hardcoded", freeStatus: "hardcoded" });
  });

  it("honors lower confidences supplied by the parser", () => {
    const scored = scoreCandidate({ ...base, priceText: "Free", fieldConfidence: { startAt: 0.6 } }, DEFAULTS, "hardcoded");
    expect(scored.fieldConfidence.startAt).toBe(0.6);
    expect(scored.confidence).toBe(0.73);
  });

  it("never scores a field above the extractor's base confidence", () => {
    const scored = scoreCandidate({ ...base, priceText: "Free", fieldConfidence: { title: 0.9 } }, DEFAULTS, "llm", 0.5);
    expect(scored.fieldConfidence.title).toBe(0.5);
    expect(scored.method).toBe("llm");
  });
});
