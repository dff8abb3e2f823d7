import { describe, expect, it } from "vitest";
import { banner } from "./banner.js";
import { MockConsoleOutput } from "./console-mock.js";
import { output } from "./output.js";

describe("banner", () => {
  it("writes a border before and after the inner call", () => {
    const out = new MockConsoleOutput();
    const hello = banner(() => out.write("hello, world!"), { out });

    hello();

    expect(out.texts()).toEqual(["*******", "hello, world!", "*******"]);
  });

  it("frames output from an inner output wrapper", () => {
    const out = new MockConsoleOutput();
    const divide = banner(
      output((a: number, b: number) => a / b, { out }),
      { out, border: "---" },
    );

    expect(divide(12, 3)).toBe(4);
    expect(out.texts()).toEqual(["---", "4", "---"]);
  });
});
