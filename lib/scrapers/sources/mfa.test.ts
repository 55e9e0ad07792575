import { describe, it, expect } from "vitest";
import { readFileSync } from "fs";
import { join } from "path";
import { isExcludedProgram, mfaProgramsAdapter, mfaProgramsUrl } from "./mfa";

const html = readFileSync(join(__dirname, "../fixtures/mfa/programs.html"), "utf-8");

describe("mfa adapter", () => {
  it("requests the first four listing pages", () => {
    expect(mfaProgramsAdapter.documents().map((d) => d.url)).toEqual([
      mfaProgramsUrl(0),
      mfaProgramsUrl(1),
      mfaProgramsUrl(2),
      mfaProgramsUrl(3),
    ]);
  });

  it("parses program cards and drops tours and sold-out events", () => {
    const rows = mfaProgramsAdapter.parse({
      url: mfaProgramsUrl(0),
      finalUrl: mfaProgramsUrl(0),
      html,
      fetchedAt: new Date("2026-03-01T12:00:00Z"),
      via: "file",
    });
    expect(rows.map((r) => r.title)).toEqual(["Family Art Cart", "Teen Arts Lab"]);
    expect(rows[0]).toMatchObject({
      startAt: "2026-03-15T10:30:00",
      endAt: "2026-03-15T12:30:00",
      sourceUrl: "https://www.mfa.org/programs/family-art-cart",
      priceText: "free with museum admission",
      ageText: "Ages 4 and up",
      locationText: "Boston, MA",
    });
    expect(rows[1]).toMatchObject({
      startAt: "2026-03-18T17:00:00",
      endAt: null,
      priceText: "free",
      registrationRequired: true,
    });
  });

  it("recognizes guided tours and unavailable tickets", () => {
    expect(isExcludedProgram("Highlights Guided Tour", "")).toBe(true);
    expect(isExcludedProgram("Workshop", "Tickets no longer available")).toBe(true);
    expect(isExcludedProgram("Family Art Cart", "Free")).toBe(false);
  });
});
