// test/stats.test.ts
import { describe, expect, it } from "vitest";
import { StatCounter } from "../src/stats.js";

describe("StatCounter", () => {
  it("is fully healthy when nothing reached the service", () => {
    const s = new StatCounter(0, 0, 7);
    expect(s.requestsSentToService).toBe(0);
    expect(s.successRatio()).toBe(100);
    expect(s.failureRatio()).toBe(0);
  });

  it("rounds ratios to whole percents", () => {
    const a = new StatCounter(2, 1);
    expect(a.successRatio()).toBe(67);
    expect(a.failureRatio()).toBe(33);

    const b = new StatCounter(1, 2);
    expect(b.successRatio()).toBe(33);
    expect(b.failureRatio()).toBe(67);
  });

  it("keeps both ratios in 0..100 and summing to 100", () => {
    for (let s = 0; s <= 7; s++) {
      for (let f = 0; f <= 7; f++) {
        const c = new StatCounter(s, f);
        expect(c.successRatio() + c.failureRatio()).toBe(100);
        expect(c.successRatio()).toBeGreaterThanOrEqual(0);
        expect(c.successRatio()).toBeLessThanOrEqual(100);
      }
    }
  });

  it("derives totals", () => {
    const s = new StatCounter(4, 2, 3);
    expect(s.requestsSentToService).toBe(6);
    expect(s.totalAttempted).toBe(9);
  });

  it("clamps decrements at zero", () => {
    const s = new StatCounter(1, 1, 1);
    s.addSuccess(-5).addFailure(-1).addRejection(-2);
    expect(s.toJSON()).toEqual({ successes: 0, failures: 0, rejections: 0 });

    s.addFailure(2).addFailure(-1);
    expect(s.failures).toBe(1);
  });

  it("adds by outcome kind", () => {
    const s = new StatCounter();
    s.add("success").add("failure", 2).add("rejection");
    expect(s.toJSON()).toEqual({ successes: 1, failures: 2, rejections: 1 });
  });

  it("rejects fractional deltas", () => {
    expect(() => new StatCounter().addSuccess(1.5)).toThrow(/integer/);
  });

  it("rebuilds from a stored record, zeroing junk", () => {
    const s = StatCounter.from({ successes: -3, failures: 2.5, rejections: 4 });
    expect(s.toJSON()).toEqual({ successes: 0, failures: 0, rejections: 4 });
    expect(StatCounter.from(undefined).totalAttempted).toBe(0);
  });

  it("clones independently", () => {
    const a = new StatCounter(1, 0, 0);
    const b = a.clone().addSuccess();
    expect(a.successes).toBe(1);
    expect(b.successes).toBe(2);
  });

  it("formats for logs", () => {
    expect(String(new StatCounter(2, 1, 0))).toBe("successes 2, failures 1, rejections 0");
  });
});
