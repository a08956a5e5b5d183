import { describe, it, expect, vi } from "vitest";
import { poll } from "../../lib/poll";

const noSleep = vi.fn(async (_ms: number) => {});

describe("poll", () => {
  it("should succeed immediately when the predicate already holds", async () => {
    const result = await poll(async () => true, { intervalMs: 3000, ceilingMs: 9000, sleep: noSleep });
    expect(result).toEqual({ status: "success", elapsedMs: 0 });
  });

  it("should count elapsed time in whole intervals", async () => {
    let checks = 0;
    const pending: number[] = [];

    const result = await poll(async () => ++checks === 3, {
      intervalMs: 3000,
      ceilingMs: 30000,
      sleep: async () => {},
      onPending: (elapsed) => pending.push(elapsed),
    });

    expect(result).toEqual({ status: "success", elapsedMs: 6000 });
    expect(pending).toEqual([0, 3000]);
  });

  it("should time out at the ceiling", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const predicate = vi.fn(async () => false);

    const result = await poll(predicate, { intervalMs: 3000, ceilingMs: 9000, sleep });

    expect(result).toEqual({ status: "timeout", elapsedMs: 9000 });
    expect(predicate).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledWith(3000);
  });

  it("should check the predicate once even with no time to wait", async () => {
    const predicate = vi.fn(async () => false);

    const result = await poll(predicate, { intervalMs: 3000, ceilingMs: 0, sleep: noSleep });

    expect(result.status).toBe("timeout");
    expect(predicate).toHaveBeenCalledTimes(1);
    expect(await poll(async () => true, { intervalMs: 3000, ceilingMs: 0, sleep: noSleep })).toEqual({
      status: "success",
      elapsedMs: 0,
    });
  });
});
