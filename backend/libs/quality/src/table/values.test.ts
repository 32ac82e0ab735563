import { describe, it, expect } from "vitest";
import { MISSING, parseBoolean, parseDatetime, parseNumber, presentValues, text, toRawValue } from "./values.js";

describe("toRawValue", () => {
  const markers = new Set(["", "NA", "null"]);

  it("treats null, undefined and markers as missing", () => {
    expect(toRawValue(null, markers)).toBe(MISSING);
    expect(toRawValue(undefined, markers)).toBe(MISSING);
    expect(toRawValue("", markers)).toBe(MISSING);
    expect(toRawValue("  NA ", markers)).toBe(MISSING);
  });

  it("keeps other cells as raw text, untrimmed", () => {
    expect(toRawValue(" 42 ", markers)).toEqual({ kind: "text", value: " 42 " });
    expect(toRawValue("na", markers)).toEqual({ kind: "text", value: "na" });
  });

  it("presentValues skips missing cells", () => {
    expect(presentValues([text("a"), MISSING, text("b")])).toEqual(["a", "b"]);
  });
});

describe("parseNumber", () => {
  it("accepts decimal and exponent literals", () => {
    expect(parseNumber("1.5")).toBe(1.5);
    expect(parseNumber(" -2e3 ")).toBe(-2000);
    expect(parseNumber(".5")).toBe(0.5);
    expect(parseNumber("5.")).toBe(5);
    expect(parseNumber("+7")).toBe(7);
  });

  it("rejects grouping, hex, words and overflow", () => {
    expect(parseNumber("1,000")).toBeNull();
    expect(parseNumber("0x10")).toBeNull();
    expect(parseNumber("Infinity")).toBeNull();
    expect(parseNumber("abc")).toBeNull();
    expect(parseNumber("1e999")).toBeNull();
    expect(parseNumber("")).toBeNull();
  });
});

describe("parseBoolean", () => {
  it("only reads true/false, any case", () => {
    expect(parseBoolean("TRUE")).toBe(true);
    expect(parseBoolean("False")).toBe(false);
    expect(parseBoolean("1")).toBeNull();
    expect(parseBoolean("yes")).toBeNull();
  });
});

describe("parseDatetime", () => {
  it("reads ISO dates and datetimes in UTC", () => {
    expect(parseDatetime("2024-01-15")).toEqual({ epochMs: Date.UTC(2024, 0, 15), precision: "day" });
    expect(parseDatetime("2024-01-15 10:30")).toEqual({ epochMs: Date.UTC(2024, 0, 15, 10, 30), precision: "minute" });
    expect(parseDatetime("2024-01-15T10:30:00Z")).toEqual({
      epochMs: Date.UTC(2024, 0, 15, 10, 30, 0),
      precision: "second",
    });
    expect(parseDatetime("2024-01-15T10:30:00.25")).toEqual({
      epochMs: Date.UTC(2024, 0, 15, 10, 30, 0, 250),
      precision: "millisecond",
    });
  });

  it("applies zone offsets", () => {
    expect(parseDatetime("2024-01-15T10:30:00+02:00")?.epochMs).toBe(Date.UTC(2024, 0, 15, 8, 30));
    expect(parseDatetime("2024-01-15T10:30:00-0130")?.epochMs).toBe(Date.UTC(2024, 0, 15, 12, 0));
  });

  it("reads slash dates, year first or month first", () => {
    expect(parseDatetime("2024/3/5")?.epochMs).toBe(Date.UTC(2024, 2, 5));
    expect(parseDatetime("03/05/2024")?.epochMs).toBe(Date.UTC(2024, 2, 5));
  });

  it("keeps two-digit years literal", () => {
    expect(parseDatetime("0050-06-01")?.epochMs).toBe(new Date("0050-06-01T00:00:00Z").getTime());
  });

  it("rejects impossible calendar values", () => {
    expect(parseDatetime("2023-02-29")).toBeNull();
    expect(parseDatetime("2024-02-29")).not.toBeNull();
    expect(parseDatetime("2024-13-01")).toBeNull();
    expect(parseDatetime("2024-01-15T24:00")).toBeNull();
    expect(parseDatetime("13/01/2024")).toBeNull();
    expect(parseDatetime("hello")).toBeNull();
  });
});
