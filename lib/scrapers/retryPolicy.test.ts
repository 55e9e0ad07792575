import { describe, it, expect } from "vitest";
import { FetchError } from "@/lib/errors";
import { backoffDelayMs, createRetryPolicy, withRetry } from "./retryPolicy";

const policy = createRetryPolicy({ maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1_000 });
const transient = () => new FetchError("transient", "https://example.org", "HTTP 503: https://example.org", { status: 503 });

describe("backoffDelayMs", () => {
  it("doubles per attempt up to the cap", () => {
    expect([1, 2, 3, 4, 5].map((a) => backoffDelayMs(policy, a))).toEqual([100, 200, 400, 800, 1_000]);
  });

  it("honors Retry-After, still capped", () => {
    const err = (s: number) => new FetchError("transient", "https://example.org", "HTTP 429", { status: 429, retryAfterSeconds: s });
    expect(backoffDelayMs(policy, 1, err(0))).toBe(0);
    expect(backoffDelayMs(policy, 1, err(30))).toBe(1_000);
  });
});

describe("withRetry", () => {
  it("retries transient failures and returns the first success", async () => {
    const sleeps: number[] = [];
    let attempts = 0;
    const value = await withRetry(
      policy,
      async () => {
        attempts++;
        if (attempts < 3) throw transient();
        return "ok";
      },
      { sleep: async (ms) => void sleeps.push(ms) }
    );
    expect(value).toBe("ok");
    expect(sleeps).toEqual([100, 200]);
  });

  it("does not retry permanent failures", async () => {
    let attempts = 0;
    const task = async () => {
      attempts++;
      throw new FetchError("permanent", "https://example.org", "HTTP 404: https://example.org", { status: 404 });
    };
    await expect(withRetry(policy, task, { sleep: async () => {} })).rejects.toMatchObject({ kind: "permanent" });
    expect(attempts).toBe(1);
  });

  it("rethrows the last failure once attempts run out", async () => {
    let attempts = 0;
    const retried: number[] = [];
    const task = async () => {
      attempts++;
      throw transient();
    };
    await expect(
      withRetry(policy, task, { sleep: async () => {}, onRetry: (attempt) => void retried.push(attempt) })
    ).rejects.toMatchObject({ kind: "transient", status: 503 });
    expect(attempts).toBe(3);
    expect(retried).toEqual([1, 2]);
  });
});
