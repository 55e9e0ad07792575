import { describe, it, expect } from "vitest";
import { findAgeText, isIrrelevantItemText, mentionsDropIn, priceMention, registrationRequirement } from "./filters";

describe("isIrrelevantItemText", () => {
  it("flags navigation and commerce labels", () => {
    expect(isIrrelevantItemText("Tickets")).toBe(true);
    expect(isIrrelevantItemText("Members only preview")).toBe(true);
    expect(isIrrelevantItemText("  ")).toBe(true);
    expect(isIrrelevantItemText("Teen Studio")).toBe(false);
  });
});

describe("registrationRequirement", () => {
  it("reads required, not required and unstated", () => {
    expect(registrationRequirement("Registration required.")).toBe(true);
    expect(registrationRequirement("No registration needed")).toBe(false);
    expect(registrationRequirement("Just come by")).toBeNull();
  });
});

describe("mentionsDropIn", () => {
  it("matches both spellings", () => {
    expect(mentionsDropIn("Drop in anytime")).toBe(true);
    expect(mentionsDropIn("drop-in")).toBe(true);
    expect(mentionsDropIn("Dropping off")).toBe(false);
  });
});

describe("findAgeText", () => {
  it("returns the first age phrase across the texts", () => {
    expect(findAgeText("Open Studio", "For ages 13+ only")).toBe("ages 13+");
    expect(findAgeText("Ages 5–12 welcome", "ages 8 and up")).toBe("Ages 5–12");
    expect(findAgeText("ages 4 and up")).toBe("ages 4 and up");
    expect(findAgeText(null, "All welcome")).toBeNull();
  });
});

describe("priceMention", () => {
  it("collects distinct cost wording in order", () => {
    expect(priceMention("Free for teens. $5 materials fee. FREE")).toBe("free; $5");
    expect(priceMention("Free with museum admission")).toBe("free with museum admission");
    expect(priceMention("Pay what you wish")).toBe("pay what you wish");
  });

  it("returns null when cost is not mentioned", () => {
    expect(priceMention("Saturday at noon")).toBeNull();
  });
});
