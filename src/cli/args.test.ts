import { InvalidArgumentError } from "commander";
import { describe, expect, it } from "vitest";
import { parseCountArg, parseDateArg, parseNumberArg } from "./args.js";

describe("cli argument parsers", () => {
  it("parses numbers", () => {
    expect(parseNumberArg("28")).toBe(28);
    expect(parseNumberArg("-1.5")).toBe(-1.5);
    expect(() => parseNumberArg("abc")).toThrow(InvalidArgumentError);
    expect(() => parseNumberArg(" ")).toThrow(InvalidArgumentError);
  });

  it("requires positive integer counts", () => {
    expect(parseCountArg("3")).toBe(3);
    expect(() => parseCountArg("0")).toThrow('"0" must be a positive integer');
    expect(() => parseCountArg("2.5")).toThrow(InvalidArgumentError);
  });

  it("accepts only real calendar dates", () => {
    expect(parseDateArg("2026-03-12")).toBe("2026-03-12");
    expect(() => parseDateArg("2026-02-30")).toThrow('"2026-02-30" is not a YYYY-MM-DD date');
    expect(() => parseDateArg("12/03/2026")).toThrow(InvalidArgumentError);
  });
});
