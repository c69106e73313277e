import { describe, it, expect } from "vitest";
import {
  hasReading,
  identityOf,
  isBlank,
  keyText,
  toNumeric,
  toOutputValue,
} from "../analysis.cells";

describe("analysis cells", () => {
  it("coerces measurements to numbers", () => {
    expect(toNumeric(42)).toBe(42);
    expect(toNumeric("12.5")).toBe(12.5);
    expect(toNumeric(" 7 ")).toBe(7);
    expect(toNumeric("-3")).toBe(-3);
    expect(toNumeric("1e3")).toBe(1000);
    expect(toNumeric(true)).toBe(1);
  });

  it("coerces non-numeric cells to null", () => {
    expect(toNumeric("abc")).toBeNull();
    expect(toNumeric("")).toBeNull();
    expect(toNumeric("0x10")).toBeNull();
    expect(toNumeric(Number.NaN)).toBeNull();
    expect(toNumeric(new Date("2024-01-01T00:00:00.000Z"))).toBeNull();
    expect(toNumeric(null)).toBeNull();
  });

  it("treats zeros and placeholders as no reading", () => {
    expect(hasReading(null)).toBe(false);
    expect(hasReading(0)).toBe(false);
    expect(hasReading("0")).toBe(false);
    expect(hasReading(" nan ")).toBe(false);
    expect(hasReading("NaN")).toBe(false);
    expect(hasReading("   ")).toBe(false);
    expect(hasReading(false)).toBe(false);
  });

  it("detects actual readings", () => {
    expect(hasReading(3)).toBe(true);
    expect(hasReading(-1)).toBe(true);
    expect(hasReading("Layer Mash")).toBe(true);
    expect(hasReading(new Date("2024-01-01T00:00:00.000Z"))).toBe(true);
  });

  it("counts whitespace-only text as blank but not zero", () => {
    expect(isBlank("  ")).toBe(true);
    expect(isBlank(null)).toBe(true);
    expect(isBlank(Number.NaN)).toBe(true);
    expect(isBlank(0)).toBe(false);
    expect(isBlank("x")).toBe(false);
  });

  it("distinguishes cell types in duplicate identity", () => {
    expect(identityOf(1)).toBe("number:1");
    expect(identityOf("1")).toBe("string:1");
    expect(identityOf(null)).toBe(identityOf(Number.NaN));
  });

  it("normalizes key text", () => {
    expect(keyText(" f1 ", true)).toBe("F1");
    expect(keyText(" f1 ", false)).toBe("f1");
    expect(keyText(null, true)).toBe("");
  });

  it("serializes output values", () => {
    expect(toOutputValue(new Date("2024-03-01T00:00:00.000Z"))).toBe(
      "2024-03-01T00:00:00.000Z",
    );
    expect(toOutputValue(Number.POSITIVE_INFINITY)).toBeNull();
    expect(toOutputValue(Number.NaN)).toBeNull();
    expect(toOutputValue("ok")).toBe("ok");
  });
});
