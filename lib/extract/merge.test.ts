import { describe, it, expect } from "vitest";
import type { CandidateActivity, SourceDefaults } from "@/lib/scrapers/types";
import { scoreCandidate } from "./confidence";
import { mergeCandidateSets, sameOccurrence } from "./merge";

const DEFAULTS: SourceDefaults = {
  timezone: "America/New_York",
  venue: { name: "Gallery", city: "New York", state: "NY" },
  freeListing: false,
};
const LLM = { provider: "openai", model: "test-model", confidence: 0.7 };
const URL_A = "https://example.org/e/1";

function hard(c: Partial<CandidateActivity>) {
  return scoreCandidate({ title: "Clay Studio", startAt: "2026-03-07T10:00", sourceUrl: URL_A, ...c }, DEFAULTS, "hardcoded");
}

function soft(c: Partial<CandidateActivity>) {
  return scoreCandidate({ title: "Clay Studio", startAt: "2026-03-07T10:00", sourceUrl: URL_A, ...c }, DEFAULTS, "llm", 0.7, LLM);
}

describe("sameOccurrence", () => {
  it("matches titles case- and space-insensitively on the same day", () => {
    expect(
      sameOccurrence(
        { title: "Clay  studio", startAt: "2026-03-07T10:00", sourceUrl: URL_A },
        { title: "Clay Studio", startAt: "2026-03-07T14:00", sourceUrl: URL_A }
      )
    ).toBe(true);
  });

  it("does not match different days or titles", () => {
    expect(
      sameOccurrence(
        { title: "Clay Studio", startAt: "2026-03-07", sourceUrl: URL_A },
        { title: "Clay Studio", startAt: "2026-03-14", sourceUrl: URL_A }
      )
    ).toBe(false);
    expect(sameOccurrence({ title: "Clay", startAt: null, sourceUrl: URL_A }, { title: "Paint", startAt: null, sourceUrl: URL_A })).toBe(
      false
    );
  });

  it("matches when one side has no start", () => {
    expect(sameOccurrence({ title: "Clay", startAt: null, sourceUrl: URL_A }, { title: "clay", startAt: "2026-03-07", sourceUrl: URL_A })).toBe(
      true
    );
  });
});

describe("mergeCandidateSets", () => {
  it("takes each field from the more confident side", () => {
    const [merged, ...rest] = mergeCandidateSets([hard({})], [soft({ title: "clay studio", priceText: "Free", description: "Hands-on clay" })]);
    expect(rest).toHaveLength(0);
    expect(merged.candidate.title).toBe("Clay Studio");
    expect(merged.candidate.priceText).toBe("Free");
    expect(merged.candidate.description).toBe("Hands-on clay");
    expect(merged.fieldConfidence).toEqual({ title: 1, startAt: 1, freeStatus: 0.7, description: 0.7 });
    expect(merged.fieldOrigin).toEqual({ title: "hardcoded", startAt: "hardcoded", freeStatus: "llm", description: "llm" });
    expect(merged.confidence).toBe(0.81);
  });

  it("marks the merge as model-sourced when a required field came from the model", () => {
    const [merged] = mergeCandidateSets([hard({})], [soft({ priceText: "Free" })]);
    expect(merged.method).toBe("llm");
    expect(merged.llm).toEqual(LLM);
  });

  it("stays hardcoded when the model only filled optional fields", () => {
    const [merged] = mergeCandidateSets([hard({ priceText: "Free" })], [soft({ priceText: "Free", description: "Bring an apron" })]);
    expect(merged.method).toBe("hardcoded");
    expect(merged.fieldOrigin.freeStatus).toBe("hardcoded");
    expect(merged.llm).toEqual(LLM);
  });

  it("keeps unmatched candidates from both sides", () => {
    const out = mergeCandidateSets([hard({})], [soft({ title: "Printmaking", priceText: "Free" })]);
    expect(out.map((c) => [c.candidate.title, c.method])).toEqual([
      ["Clay Studio", "hardcoded"],
      ["Printmaking", "llm"],
    ]);
  });
});
