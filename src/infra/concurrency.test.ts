import { describe, expect, it } from "vitest";

import { runWithConcurrency } from "./concurrency.js";

describe("runWithConcurrency", () => {
  it("keeps input order and never exceeds the limit", async () => {
    let active = 0;
    let peak = 0;
    const tasks = [30, 5, 20, 1].map((ms, index) => async () => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, ms));
      active -= 1;
      return index;
    });
    const results = await runWithConcurrency(tasks, 2);
    expect(results.map((r) => (r.status === "fulfilled" ? r.value : -1))).toEqual([0, 1, 2, 3]);
    expect(peak).toBe(2);
  });

  it("isolates a failing task", async () => {
    const results = await runWithConcurrency(
      [async () => "a", async () => Promise.reject(new Error("boom")), async () => "c"],
      4,
    );
    expect(results[0]).toEqual({ status: "fulfilled", value: "a" });
    expect(results[1]?.status).toBe("rejected");
    expect(results[2]).toEqual({ status: "fulfilled", value: "c" });
  });

  it("returns an empty list for no tasks", async () => {
    await expect(runWithConcurrency([], 3)).resolves.toEqual([]);
  });
});
