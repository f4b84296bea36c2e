/**
 * Money helpers — Tests
 */

import { describe, it, expect } from "vitest";
import {
  convertMinorUnits,
  currencyExponent,
  formatMinorUnits,
  formatMoney,
  parseMajorToMinor,
  roundHalfAwayFromZero,
} from "./money.js";

describe("parseMajorToMinor", () => {
  it("parses decimal strings without float drift", () => {
    expect(parseMajorToMinor("120.00", "USD")).toBe(12000);
    expect(parseMajorToMinor("0.1", "USD")).toBe(10);
    expect(parseMajorToMinor(" 7 ", "USD")).toBe(700);
  });

  it("rounds half away from zero", () => {
    expect(parseMajorToMinor("0.005", "USD")).toBe(1);
    expect(parseMajorToMinor("-0.005", "USD")).toBe(-1);
    expect(parseMajorToMinor("-0.004", "USD")).toBe(0);
  });

  it("follows the currency exponent", () => {
    expect(parseMajorToMinor("1500", "JPY")).toBe(1500);
    expect(parseMajorToMinor("12.3456", "KWD")).toBe(12346);
  });

  it("accepts numbers and exponent notation", () => {
    expect(parseMajorToMinor(7, "USD")).toBe(700);
    expect(parseMajorToMinor("1e2", "USD")).toBe(10000);
  });

  it("returns null for anything else", () => {
    expect(parseMajorToMinor("abc", "USD")).toBeNull();
    expect(parseMajorToMinor("", "USD")).toBeNull();
    expect(parseMajorToMinor(".", "USD")).toBeNull();
    expect(parseMajorToMinor(Number.NaN, "USD")).toBeNull();
    expect(parseMajorToMinor({}, "USD")).toBeNull();
  });
});

describe("formatting", () => {
  it("formats minor units as plain decimals", () => {
    expect(formatMinorUnits(5, "USD")).toBe("0.05");
    expect(formatMinorUnits(-5, "USD")).toBe("-0.05");
    expect(formatMinorUnits(123456, "USD")).toBe("1234.56");
    expect(formatMinorUnits(1500, "JPY")).toBe("1500");
  });

  it("groups thousands for display", () => {
    expect(formatMoney(123456, "USD")).toBe("USD 1,234.56");
    expect(formatMoney(-100000000, "USD")).toBe("USD -1,000,000.00");
    expect(formatMoney(1500, "JPY")).toBe("JPY 1,500");
  });
});

describe("conversion", () => {
  it("shifts between currency exponents", () => {
    expect(currencyExponent("jpy")).toBe(0);
    expect(convertMinorUnits(1500, "JPY", "USD", 0.0067)).toBe(1005);
    expect(convertMinorUnits(1000, "EUR", "USD", 1.08)).toBe(1080);
  });

  it("rounds ties away from zero", () => {
    expect(roundHalfAwayFromZero(2.5)).toBe(3);
    expect(roundHalfAwayFromZero(-2.5)).toBe(-3);
    expect(roundHalfAwayFromZero(-2.4)).toBe(-2);
  });
});
