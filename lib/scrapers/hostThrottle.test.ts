import { describe, it, expect } from "vitest";
import { HostThrottle } from "./hostThrottle";

function clock() {
  let t = 0;
  const sleeps: number[] = [];
  return {
    now: () => t,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      t += ms;
    },
    sleeps,
  };
}

describe("HostThrottle", () => {
  it("spaces requests to one host and lets other hosts through", async () => {
    const c = clock();
    const throttle = new HostThrottle(1_000, c.now, c.sleep);
    await throttle.acquire("example.org");
    await throttle.acquire("example.org");
    await throttle.acquire("other.org");
    await throttle.acquire("EXAMPLE.org");
    expect(c.sleeps).toEqual([1_000, 1_000]);
  });

  it("queues concurrent callers behind each other", async () => {
    const sleeps: number[] = [];
    const throttle = new HostThrottle(500, () => 0, async (ms) => void sleeps.push(ms));
    await Promise.all([throttle.acquire("example.org"), throttle.acquire("example.org"), throttle.acquire("example.org")]);
    expect(sleeps).toEqual([500, 1_000]);
  });
});
