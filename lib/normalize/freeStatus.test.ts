import { describe, it, expect } from "vitest";
import { candidateWindow, classifyFreeStatus, type FreeStatusInput } from "./freeStatus";

function input(overrides: Partial<FreeStatusInput>): FreeStatusInput {
  return { priceText: null, origin: "hardcoded", freeListing: false, documentText: null, ...overrides };
}

describe("classifyFreeStatus", () => {
  it("confirms explicit free wording found by a site parser", () => {
    expect(classifyFreeStatus(input({ priceText: "Free admission" }))).toEqual({
      status: "confirmed",
      isFree: true,
      corroborated: true,
      signal: "explicit",
    });
    expect(classifyFreeStatus(input({ priceText: "$0" })).status).toBe("confirmed");
  });

  it("marks pay-what-you-wish and similar wording uncertain but corroborated", () => {
    for (const priceText of ["Pay what you wish", "Free with museum admission", "Suggested donation $5", "Free for members"]) {
      expect(classifyFreeStatus(input({ priceText }))).toEqual({
        status: "uncertain",
        isFree: true,
        corroborated: true,
        signal: "ambiguous",
      });
    }
  });

  it("treats mixed free and paid wording as ambiguous", () => {
    expect(classifyFreeStatus(input({ priceText: "Free for teens; adults $15" })).signal).toBe("ambiguous");
  });

  it("flags a price as not free", () => {
    expect(classifyFreeStatus(input({ priceText: "$25", freeListing: true }))).toEqual({
      status: "uncertain",
      isFree: false,
      corroborated: false,
      signal: "paid",
    });
  });

  it("infers free from a free-only listing when the page says nothing", () => {
    expect(classifyFreeStatus(input({ freeListing: true }))).toEqual({
      status: "inferred",
      isFree: true,
      corroborated: true,
      signal: "listing",
    });
  });

  it("leaves a row with no signal uncertain and uncorroborated", () => {
    expect(classifyFreeStatus(input({}))).toEqual({
      status: "uncertain",
      isFree: true,
      corroborated: false,
      signal: "none",
    });
  });

  it("downgrades a fallback claim the page text does not repeat", () => {
    expect(
      classifyFreeStatus(input({ priceText: "Free", origin: "llm", title: "Teen Studio", documentText: "Teen Studio. Studio hours 2-4" }))
    ).toEqual({
      status: "uncertain",
      isFree: true,
      corroborated: true,
      signal: "model_claim",
    });
    expect(
      classifyFreeStatus(
        input({ priceText: "Free", origin: "llm", title: "Teen Studio", documentText: "Teen Studio. This program is free." })
      ).status
    ).toBe("inferred");
  });

  it("does not let unrelated free wording back a fallback claim for a priced program", () => {
    const documentText = "Teen Print Workshop. March 8. Tickets $25 per teen. Free coat check in the lobby.";
    expect(classifyFreeStatus(input({ priceText: "Free", origin: "llm", title: "Teen Print Workshop", documentText }))).toEqual({
      status: "uncertain",
      isFree: true,
      corroborated: true,
      signal: "model_claim",
    });
  });

  it("only reads free wording near the candidate's own title", () => {
    const documentText = `Teen Collage. March 8. ${"Bring your own scissors. ".repeat(20)}Free parking in the garage.`;
    expect(
      classifyFreeStatus(input({ priceText: "Free", origin: "llm", title: "Teen Collage", documentText })).signal
    ).toBe("model_claim");
    expect(classifyFreeStatus(input({ priceText: "Free", origin: "llm", title: null, documentText: "Everything is free." })).signal).toBe(
      "model_claim"
    );
  });

  it("treats pay-what-you-wish near the title as no corroboration", () => {
    const documentText = "Family Sketching. Sundays. Pay what you wish; sketching is free for kids.";
    expect(classifyFreeStatus(input({ priceText: "Free", origin: "llm", title: "Family Sketching", documentText })).status).toBe(
      "uncertain"
    );
  });
});

describe("candidateWindow", () => {
  it("stops at the title's next appearance", () => {
    expect(candidateWindow("Clay Lab. Free. Clay Lab. $20.", "clay  lab")).toBe("Clay Lab. Free. ");
  });

  it("stops where another candidate's title begins", () => {
    expect(candidateWindow("Zine Lab. Free. Print Workshop. $25.", "Zine Lab", ["Print Workshop"])).toBe("Zine Lab. Free. ");
  });

  it("is null when the title is not on the page", () => {
    expect(candidateWindow("Zine Night. Free.", "Clay Lab")).toBeNull();
  });
});
