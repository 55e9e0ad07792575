import { describe, it, expect } from "vitest";
import { MemoryCatalogStore } from "@/lib/catalog/memoryStore";
import { formatErrorBundle, RunTracker, STALE_RUN_MARKER } from "./runTracker";

const T0 = new Date("2026-03-01T12:00:00Z");
const MINUTE = 60_000;

describe("formatErrorBundle", () => {
  it("is null when there is nothing to report", () => {
    expect(formatErrorBundle([])).toBeNull();
    expect(formatErrorBundle(["  ", ""])).toBeNull();
  });

  it("joins trimmed messages and summarizes the overflow", () => {
    expect(formatErrorBundle([" first ", "second"])).toBe("first\nsecond");
    expect(formatErrorBundle(["a", "b", "c", "d"], 2)).toBe("a\nb\n… and 2 more");
  });

  it("truncates very long messages", () => {
    const bundle = formatErrorBundle(["x".repeat(600)]);
    expect(bundle).toBe(`${"x".repeat(500)}…`);
  });
});

describe("RunTracker", () => {
  it("opens a running row and closes it once", async () => {
    const store = new MemoryCatalogStore();
    let now = T0;
    const tracker = new RunTracker(store, () => now);

    const run = await tracker.startRun("met-teens");
    expect(run).toMatchObject({ sourceId: "met-teens", status: "running", startedAt: T0, finishedAt: null });

    now = new Date(T0.getTime() + 5 * MINUTE);
    expect(await tracker.finishRun(run.id, { status: "success", itemsFound: 4, itemsSaved: 3, errors: ["one rejected"] })).toBe(
      true
    );
    expect(await store.getRun(run.id)).toEqual({
      id: run.id,
      sourceId: "met-teens",
      startedAt: T0,
      finishedAt: now,
      status: "success",
      itemsFound: 4,
      itemsSaved: 3,
      errors: "one rejected",
    });

    expect(await tracker.finishRun(run.id, { status: "failed", itemsFound: 0, itemsSaved: 0 })).toBe(false);
    expect((await store.getRun(run.id))?.status).toBe("success");
  });

  it("fails runs left running past the stale window", async () => {
    const store = new MemoryCatalogStore();
    const old = await store.createRun("met-teens", T0);
    const recent = await store.createRun("moma-teens", new Date(T0.getTime() + 150 * MINUTE));
    const now = new Date(T0.getTime() + 180 * MINUTE);
    const tracker = new RunTracker(store, () => now);

    expect(await tracker.closeStaleRuns(120)).toEqual([old.id]);
    expect(await store.getRun(old.id)).toMatchObject({ status: "failed", finishedAt: now, errors: STALE_RUN_MARKER });
    expect((await store.getRun(recent.id))?.status).toBe("running");
  });
});
