import { describe, it, expect } from "vitest";
import type { CandidateActivity, RawDocument, SourceAdapter } from "@/lib/scrapers/types";
import { extractDocument } from "./extractDocument";
import type { FallbackExtractor, FallbackInput, FallbackResult } from "./fallback";

const DOC: RawDocument = {
  url: "https://example.org/list",
  finalUrl: "https://example.org/list",
  html: "<html><body><h1>Programs</h1><p>Clay Studio, March 7, free</p></body></html>",
  fetchedAt: new Date("2026-03-01T12:00:00Z"),
  via: "file",
};

function adapter(parse: (doc: RawDocument) => CandidateActivity[]): SourceAdapter {
  return {
    id: "test",
    name: "Test",
    baseUrl: "https://example.org",
    adapterType: "test",
    crawlFrequency: "daily",
    defaults: { timezone: "America/New_York", venue: { name: "Gallery", city: "New York", state: "NY" }, freeListing: true },
    fallbackThreshold: 0.6,
    documents: () => [],
    parse,
  };
}

class FakeFallback implements FallbackExtractor {
  readonly provider = "fake";
  readonly model = "fake-1";
  inputs: FallbackInput[] = [];

  constructor(private readonly reply: () => FallbackResult) {}

  async extract(input: FallbackInput): Promise<FallbackResult> {
    this.inputs.push(input);
    return this.reply();
  }
}

const CLAY: CandidateActivity = { title: "Clay Studio", startAt: "2026-03-07T10:00", sourceUrl: DOC.url, priceText: "Free" };

function modelResult(candidates: CandidateActivity[], confidence = 0.7): FallbackResult {
  return { candidates, confidences: candidates.map(() => confidence), provider: "fake", model: "fake-1", dropped: 0 };
}

describe("extractDocument", () => {
  it("does not consult the fallback when the parser is confident", async () => {
    const fallback = new FakeFallback(() => modelResult([]));
    const out = await extractDocument(adapter(() => [CLAY]), DOC, { fallback });
    expect(out.usedFallback).toBe(false);
    expect(fallback.inputs).toHaveLength(0);
    expect(out.candidates).toHaveLength(1);
    expect(out.candidates[0].method).toBe("hardcoded");
    expect(out.documentText).toBe("Programs\nClay Studio, March 7, free");
    expect(out.errors).toEqual([]);
  });

  it("asks the fallback when the parser finds nothing", async () => {
    const fallback = new FakeFallback(() => modelResult([CLAY]));
    const out = await extractDocument(adapter(() => []), DOC, { fallback });
    expect(out.usedFallback).toBe(true);
    expect(fallback.inputs[0]).toEqual({
      documentText: "Programs\nClay Studio, March 7, free",
      sourceUrl: DOC.finalUrl,
      timezone: "America/New_York",
    });
    expect(out.candidates).toHaveLength(1);
    expect(out.candidates[0].method).toBe("llm");
    expect(out.candidates[0].llm).toEqual({ provider: "fake", model: "fake-1", confidence: 0.7 });
  });

  it("asks the fallback when every candidate is below the threshold", async () => {
    const weak: CandidateActivity = { ...CLAY, fieldConfidence: { title: 0.2, startAt: 0.2 } };
    const fallback = new FakeFallback(() => modelResult([CLAY], 0.9));
    const out = await extractDocument(adapter(() => [weak]), DOC, { fallback });
    expect(out.usedFallback).toBe(true);
    expect(out.candidates).toHaveLength(1);
    expect(out.candidates[0].fieldConfidence.title).toBe(0.9);
  });

  it("records an extraction failure when nothing is found and the fallback is off", async () => {
    const out = await extractDocument(adapter(() => []), DOC, { fallback: null });
    expect(out.candidates).toEqual([]);
    expect(out.errors).toEqual(["[test] no candidates in https://example.org/list"]);
  });

  it("treats a parser exception as an empty parse", async () => {
    const fallback = new FakeFallback(() => modelResult([CLAY]));
    const out = await extractDocument(
      adapter(() => {
        throw new Error("layout changed");
      }),
      DOC,
      { fallback }
    );
    expect(out.errors).toEqual(["[test] parser failed on https://example.org/list: layout changed"]);
    expect(out.usedFallback).toBe(true);
    expect(out.candidates).toHaveLength(1);
  });

  it("keeps the parser's candidates when the fallback fails", async () => {
    const weak: CandidateActivity = { ...CLAY, fieldConfidence: { title: 0.2, startAt: 0.2 } };
    const fallback = new FakeFallback(() => {
      throw new Error("timeout");
    });
    const out = await extractDocument(adapter(() => [weak]), DOC, { fallback });
    expect(out.usedFallback).toBe(false);
    expect(out.candidates).toHaveLength(1);
    expect(out.errors).toEqual(["[test] fallback failed for https://example.org/list: timeout"]);
  });

  it("rejects candidates without a title or start", async () => {
    const out = await extractDocument(
      adapter(() => [CLAY, { ...CLAY, title: "Paint Night", startAt: null }]),
      DOC,
      { fallback: null }
    );
    expect(out.candidates).toHaveLength(1);
    expect(out.rejections).toEqual([{ title: "Paint Night", sourceUrl: DOC.url, reason: "missing start time" }]);
  });

  it("truncates the page text", async () => {
    const out = await extractDocument(adapter(() => [CLAY]), DOC, { fallback: null, maxDocumentChars: 8 });
    expect(out.documentText).toBe("Programs");
  });
});
