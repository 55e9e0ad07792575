import { describe, it, expect } from "vitest";
import { readFileSync } from "fs";
import { join } from "path";
import { WHITNEY_TEENS_URL, whitneyTeensAdapter } from "./whitney";

describe("whitney adapter", () => {
  it("parses event cards with a long date and time range", () => {
    const rows = whitneyTeensAdapter.parse({
      url: WHITNEY_TEENS_URL,
      finalUrl: WHITNEY_TEENS_URL,
      html: readFileSync(join(__dirname, "../fixtures/whitney/events.html"), "utf-8"),
      fetchedAt: new Date("2026-03-01T12:00:00Z"),
      via: "file",
    });
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({
      title: "Teen Open Studio",
      startAt: "2026-04-04T13:00:00",
      endAt: "2026-04-04T15:00:00",
      sourceUrl: "https://whitney.org/events/teen-open-studio",
      priceText: "free",
      ageText: "ages 14–18",
      dropIn: true,
      locationText: "New York, NY",
    });
  });
});
