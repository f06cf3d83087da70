import { describe, expect, it } from "vitest";
import { parseArgs, positiveInt } from "../index";

describe("parseArgs", () => {
  it("pairs flags with values and treats bare flags as switches", () => {
    expect(parseArgs(["--days", "30", "--verbose", "--only-outlet-id", "gazette", "stray"])).toEqual({
      days: "30",
      verbose: "true",
      "only-outlet-id": "gazette"
    });
  });
});

describe("positiveInt", () => {
  it("falls back when the flag is absent", () => {
    expect(positiveInt({}, "days", 365)).toBe(365);
  });

  it("parses positive integers and rejects anything else", () => {
    expect(positiveInt({ days: "7" }, "days", 365)).toBe(7);
    expect(() => positiveInt({ days: "0" }, "days", 365)).toThrow('--days must be a positive integer (got "0")');
    expect(() => positiveInt({ days: "1.5" }, "days", 365)).toThrow('--days must be a positive integer (got "1.5")');
  });
});
