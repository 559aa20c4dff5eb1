import { describe, expect, it } from "vitest";
import { mapWithConcurrency } from "../../src/shared/async-pool.js";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("mapWithConcurrency", () => {
  it("keeps input order regardless of completion order", async () => {
    const delays = [30, 5, 15, 0];
    const out = await mapWithConcurrency(delays, 4, async (delay, index) => {
      await sleep(delay);
      return `item-${index}`;
    });

    expect(out).toEqual(["item-0", "item-1", "item-2", "item-3"]);
  });

  it("never runs more than the limit at once", async () => {
    let active = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      active++;
      peak = Math.max(peak, active);
      await sleep(5);
      active--;
    });

    expect(peak).toBe(3);
  });

  it("returns an empty array for no items", async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
  });

  it("stops picking up items once the signal aborts", async () => {
    const controller = new AbortController();
    const seen: number[] = [];

    const run = mapWithConcurrency([0, 1, 2, 3], 1, async (item) => {
      seen.push(item);
      if (item === 1) controller.abort();
      return item;
    }, controller.signal);

    await expect(run).rejects.toThrow();
    expect(seen).toEqual([0, 1]);
  });
});
