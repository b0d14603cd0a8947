import { describe, expect, it } from "vitest";
import { PacingController } from "./pacing.js";

const HOUR = 60 * 60 * 1000;
const buy = { action: "BUY" } as const;

describe("PacingController", () => {
  it("admits up to the hourly limit and drops the rest", () => {
    const pacing = new PacingController(() => 2);

    expect(pacing.admit(buy, 0)).toBe(true);
    expect(pacing.admit({ action: "SELL" }, 1_000)).toBe(true);
    expect(pacing.admit(buy, 2_000)).toBe(false);
    expect(pacing.count(2_000)).toBe(2);
    expect(pacing.remaining(2_000)).toBe(0);
  });

  it("frees a slot once an admission leaves the trailing hour", () => {
    const pacing = new PacingController(() => 1);
    pacing.admit(buy, 0);

    expect(pacing.admit(buy, HOUR)).toBe(true);
    expect(pacing.count(HOUR)).toBe(1);
  });

  it("always lets NO_SIGNAL through without using the budget", () => {
    const pacing = new PacingController(() => 0);

    expect(pacing.admit({ action: "NO_SIGNAL" }, 0)).toBe(true);
    expect(pacing.admit(buy, 0)).toBe(false);
    expect(pacing.count(0)).toBe(0);
  });

  it("follows a changed limit", () => {
    let limit = 1;
    const pacing = new PacingController(() => limit);
    pacing.admit(buy, 0);

    expect(pacing.admit(buy, 1)).toBe(false);
    limit = 3;
    expect(pacing.admit(buy, 2)).toBe(true);
    expect(pacing.remaining(2)).toBe(1);
  });

  it("never admits more than the limit under a burst", () => {
    const pacing = new PacingController(() => 12);
    const admitted = Array.from({ length: 50 }, (_, i) => pacing.admit(buy, i)).filter(Boolean);

    expect(admitted).toHaveLength(12);
  });

  it("starts over after reset", () => {
    const pacing = new PacingController(() => 1);
    pacing.admit(buy, 0);
    pacing.reset();

    expect(pacing.admit(buy, 1)).toBe(true);
  });
});
