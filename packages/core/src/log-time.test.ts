import { describe, expect, it, vi } from "vitest";
import type { Clock } from "./clock.js";
import { fixedClock } from "./clock.js";
import { MockConsoleOutput } from "./console-mock.js";
import { logTime } from "./log-time.js";

const NOON = "2026-10-18T12:00:00.000Z";

describe("logTime", () => {
  it("writes the timestamp with the default prefix after the call", () => {
    const out = new MockConsoleOutput();
    const timed = logTime((a: number, b: number) => a + b, { out, clock: fixedClock(NOON) });

    expect(timed(2, 3)).toBe(5);
    expect(out.lines).toEqual([{ level: "info", text: `> Logged at ${NOON}` }]);
  });

  it("invokes the inner callable exactly once per call", () => {
    const out = new MockConsoleOutput();
    const inner = vi.fn((label: string) => label.toUpperCase());
    const timed = logTime(inner, { out, clock: fixedClock(NOON) });

    timed("a");
    timed("b");

    expect(inner).toHaveBeenCalledTimes(2);
    expect(inner).toHaveBeenNthCalledWith(1, "a");
    expect(inner).toHaveBeenNthCalledWith(2, "b");
  });

  it("reads the clock before the call by default", () => {
    const out = new MockConsoleOutput();
    const events: string[] = [];
    const clock: Clock = {
      now: () => {
        events.push("clock");
        return new Date(NOON);
      },
    };
    const timed = logTime(() => events.push("call"), { out, clock });

    timed();

    expect(events).toEqual(["clock", "call"]);
  });

  it("reads the clock after the call when configured", () => {
    const out = new MockConsoleOutput();
    const events: string[] = [];
    const clock: Clock = {
      now: () => {
        events.push("clock");
        return new Date(NOON);
      },
    };
    const timed = logTime(() => events.push("call"), { out, clock, capture: "after" });

    timed();

    expect(events).toEqual(["call", "clock"]);
  });

  it("uses a custom prefix and time format", () => {
    const out = new MockConsoleOutput();
    const timed = logTime(() => undefined, {
      out,
      clock: fixedClock(NOON),
      prefix: "at",
      formatTime: (time) => String(time.getUTCHours()),
    });

    timed();

    expect(out.texts()).toEqual(["at 12"]);
  });

  it("propagates a throw and logs nothing", () => {
    const out = new MockConsoleOutput();
    const timed = logTime(
      () => {
        throw new Error("boom");
      },
      { out, clock: fixedClock(NOON) },
    );

    expect(() => timed()).toThrow("boom");
    expect(out.lines).toEqual([]);
  });
});
