import { describe, expect, it } from "vitest";
import { fixedClock, systemClock } from "./clock.js";

describe("fixedClock", () => {
  it("always reports the same instant", () => {
    const clock = fixedClock("2026-10-18T12:00:00.000Z");
    expect(clock.now().toISOString()).toBe("2026-10-18T12:00:00.000Z");
    expect(clock.now().getTime()).toBe(clock.now().getTime());
  });

  it("hands out a fresh Date each time", () => {
    const clock = fixedClock(new Date(0));
    const first = clock.now();
    first.setFullYear(2000);
    expect(clock.now().getTime()).toBe(0);
  });
});

describe("systemClock", () => {
  it("reads the current time", () => {
    const before = Date.now();
    const now = systemClock.now().getTime();
    expect(now).toBeGreaterThanOrEqual(before);
    expect(now).toBeLessThanOrEqual(Date.now());
  });
});
