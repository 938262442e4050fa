import { describe, expect, it } from "vitest";
import { fanOut } from "./stages.js";

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("fanOut", () => {
  it("keeps results in input order", async () => {
    const results = await fanOut([30, 10, 20], async (ms) => {
      await delay(ms);
      return ms * 2;
    });
    expect(results).toEqual([60, 20, 40]);
  });

  it("passes the index", async () => {
    expect(await fanOut(["a", "b"], (item, index) => `${index}:${item}`)).toEqual(["0:a", "1:b"]);
  });

  it("reports the earliest failure, whatever finishes first", async () => {
    const run = fanOut([0, 1, 2], async (i) => {
      await delay(i === 0 ? 30 : 0);
      if (i === 0 || i === 2) throw new Error(`failed ${i}`);
      return i;
    });
    await expect(run).rejects.toThrow("failed 0");
  });

  it("waits for every task before failing", async () => {
    const finished: number[] = [];
    const run = fanOut([0, 1], async (i) => {
      if (i === 0) throw new Error("fast failure");
      await delay(20);
      finished.push(i);
      return i;
    });
    await expect(run).rejects.toThrow("fast failure");
    expect(finished).toEqual([1]);
  });

  it("handles no items", async () => {
    expect(await fanOut([], () => 1)).toEqual([]);
  });
});
