import { describe, expect, it } from "vitest";
import { processWithConcurrency } from "../../../src/core/concurrency";

describe("processWithConcurrency", () => {
  it("handles every item once without exceeding the slot count", async () => {
    const seen: number[] = [];
    let active = 0;
    let peak = 0;

    await processWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async (item) => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 1));
      seen.push(item);
      active -= 1;
    });

    expect([...seen].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7]);
    expect(peak).toBe(3);
  });
});
