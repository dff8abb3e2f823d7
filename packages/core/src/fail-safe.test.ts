import { describe, expect, it } from "vitest";
import { failSafe, instancesOf } from "./fail-safe.js";
import { err, ok } from "./result.js";

function divide(a: number, b: number): number {
  return a / b;
}

function weigh(count: number, weight: number): number {
  if (count <= 0) throw new Error("must have 1 or more apples");
  if (weight <= 0) throw new Error("apples must weigh more than 0 ounces");
  return count * weight;
}

describe("failSafe", () => {
  it("wraps a normal return in a success", () => {
    expect(failSafe(divide)(12.0, 3.0)).toEqual({ ok: true, value: 4 });
  });

  it("returns the same value as a direct call", () => {
    const safe = failSafe(weigh);
    for (const [count, weight] of [
      [2, 1.5],
      [5, 1.25],
      [1, 8],
    ] as const) {
      const result = safe(count, weight);
      expect(result.ok && result.value).toBe(weigh(count, weight));
    }
  });

  it("turns a throw into an operation_failed error", () => {
    expect(failSafe(weigh)(4, 0)).toEqual({
      ok: false,
      error: {
        kind: "operation_failed",
        message: "apples must weigh more than 0 ounces",
        name: "Error",
      },
    });
  });

  it("never lets an intercepted throw escape", () => {
    const safe = failSafe((): number => {
      throw new TypeError("not a number");
    });
    expect(() => safe()).not.toThrow();
    expect(safe()).toEqual({
      ok: false,
      error: { kind: "operation_failed", message: "not a number", name: "TypeError" },
    });
  });

  it("wraps a void return as a unit success", () => {
    const calls: string[] = [];
    const record = failSafe((entry: string): void => {
      calls.push(entry);
    });
    expect(record("one")).toEqual({ ok: true, value: undefined });
    expect(calls).toEqual(["one"]);
  });

  it("uses a thrown string as the message", () => {
    const safe = failSafe(() => {
      throw "missing_file.txt not found!";
    });
    expect(safe()).toEqual({
      ok: false,
      error: { kind: "operation_failed", message: "missing_file.txt not found!" },
    });
  });

  it("falls back to the unknown-failure message", () => {
    const safe = failSafe(() => {
      throw { code: 7 };
    });
    expect(safe()).toEqual({
      ok: false,
      error: { kind: "operation_failed", message: "unknown failure" },
    });
  });

  it("treats an Error with an empty message as undescribed", () => {
    const safe = failSafe(
      () => {
        throw new Error();
      },
      { unknownMessage: "Exception caught: default exception" },
    );
    expect(safe()).toEqual({
      ok: false,
      error: {
        kind: "operation_failed",
        message: "Exception caught: default exception",
        name: "Error",
      },
    });
  });

  it("does not double-wrap a callable that already returns a Result", () => {
    const inner = failSafe(divide);
    const outer = failSafe(inner);
    expect(outer(9, 3)).toEqual({ ok: true, value: 3 });

    const passthrough = failSafe((flag: boolean) => (flag ? ok("yes") : err("no")));
    expect(passthrough(true)).toEqual({ ok: true, value: "yes" });
    expect(passthrough(false)).toEqual({ ok: false, error: "no" });
  });

  it("re-throws failures the intercept predicate rejects", () => {
    const safe = failSafe(
      (kind: "range" | "type"): number => {
        if (kind === "range") throw new RangeError("out of range");
        throw new TypeError("wrong type");
      },
      { intercept: instancesOf(RangeError) },
    );

    expect(safe("range")).toEqual({
      ok: false,
      error: { kind: "operation_failed", message: "out of range", name: "RangeError" },
    });
    expect(() => safe("type")).toThrow(TypeError);
  });

  it("calls the inner function once per invocation", () => {
    let calls = 0;
    const safe = failSafe(() => ++calls);
    safe();
    safe();
    expect(calls).toBe(2);
  });
});

describe("instancesOf", () => {
  it("matches subclasses of the listed classes", () => {
    const isBuiltin = instancesOf(TypeError, RangeError);
    expect(isBuiltin(new RangeError("x"))).toBe(true);
    expect(isBuiltin(new TypeError("x"))).toBe(true);
    expect(isBuiltin(new Error("x"))).toBe(false);
    expect(isBuiltin("x")).toBe(false);
  });
});
