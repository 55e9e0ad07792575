import { describe, it, expect } from "vitest";
import { parseAgeRange, resolveAgeRange } from "./ageRange";

describe("parseAgeRange", () => {
  it("reads explicit ranges", () => {
    expect(parseAgeRange("Ages 5–12")).toEqual({ ageMin: 5, ageMax: 12 });
    expect(parseAgeRange("for 6 to 10 years")).toEqual({ ageMin: 6, ageMax: 10 });
    expect(parseAgeRange("Ages 12-8")).toEqual({ ageMin: 8, ageMax: 12 });
  });

  it("reads open-ended bounds", () => {
    expect(parseAgeRange("ages 13+")).toEqual({ ageMin: 13, ageMax: null });
    expect(parseAgeRange("8 and up")).toEqual({ ageMin: 8, ageMax: null });
    expect(parseAgeRange("Ages 5 and under")).toEqual({ ageMin: null, ageMax: 5 });
    expect(parseAgeRange("children under 5")).toEqual({ ageMin: null, ageMax: 4 });
  });

  it("does not read durations as ages", () => {
    expect(parseAgeRange("2+ hours of studio time")).toBeNull();
  });

  it("maps audience words and widens several of them", () => {
    expect(parseAgeRange("For teens")).toEqual({ ageMin: 13, ageMax: 18 });
    expect(parseAgeRange("Tweens and teens")).toEqual({ ageMin: 9, ageMax: 18 });
    expect(parseAgeRange("Families with kids")).toEqual({ ageMin: null, ageMax: null });
  });

  it("returns null when nothing is said about age", () => {
    expect(parseAgeRange("Printmaking in the galleries")).toBeNull();
    expect(parseAgeRange("  ")).toBeNull();
    expect(parseAgeRange(null)).toBeNull();
  });

  it("accepts a caller-supplied descriptor table", () => {
    expect(parseAgeRange("Little learners", [{ pattern: /little learners/i, ageMin: 2, ageMax: 4 }])).toEqual({
      ageMin: 2,
      ageMax: 4,
    });
  });
});

describe("resolveAgeRange", () => {
  it("prefers explicit bounds over text", () => {
    expect(resolveAgeRange({ ageMin: 14, ageMax: 11 }, "Ages 5-8")).toEqual({ ageMin: 11, ageMax: 14 });
    expect(resolveAgeRange({ ageMax: 12 }, "teens")).toEqual({ ageMin: null, ageMax: 12 });
  });

  it("parses the text when no bounds are given", () => {
    expect(resolveAgeRange({}, "Ages 3-5")).toEqual({ ageMin: 3, ageMax: 5 });
  });
});
