import { describe, it, expect } from "vitest";
import { colorize, formatColumns, printJson, printLines } from "../src/lib/render.js";
import { formatMetric, withTiming } from "../src/lib/telemetry.js";
import { MemoryIO } from "./helpers.js";

describe("render", () => {
  it("should align every column but the last", () => {
    expect(
      formatColumns([
        ["calc.desktop", "Calculator", "/a"],
        ["editor.desktop", "Ed", "/b"],
      ])
    ).toEqual(["calc.desktop    Calculator  /a", "editor.desktop  Ed          /b"]);
  });

  it("should print JSON pretty by default and compact when raw", () => {
    const io = new MemoryIO();
    printJson(io, { a: 1 });
    printJson(io, { a: 1 }, { raw: true });
    expect(io.out).toBe('{\n  "a": 1\n}\n{"a":1}\n');
  });

  it("should print one line per entry", () => {
    const io = new MemoryIO();
    printLines(io, ["one", "two"]);
    expect(io.out).toBe("one\ntwo\n");
  });

  it("should only colorize for terminals", () => {
    expect(colorize("x", "red", false)).toBe("x");
    expect(colorize("x", "red", true)).toBe("\x1b[31mx\x1b[0m");
  });
});

describe("telemetry", () => {
  it("should format metrics on one line", () => {
    expect(formatMetric("cli.list", { count: 2, note: "a\nb" })).toBe("metric cli.list count=2 note=a b\n");
  });

  it("should report failures to the sink and rethrow", async () => {
    const lines: string[] = [];
    await expect(
      withTiming(
        "cli.fail",
        async () => {
          throw new Error("nope");
        },
        (line) => lines.push(line)
      )
    ).rejects.toThrow("nope");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^metric cli\.fail duration_ms=\d+ success=false\n$/);
  });

  it("should pass results through without a sink", async () => {
    await expect(withTiming("cli.ok", async () => 7)).resolves.toBe(7);
  });
});
