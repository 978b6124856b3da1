import { describe, it, expect } from "vitest";
import {
  formatMoney,
  formatSignedMoney,
  getCurrency,
  isSupportedCurrency,
  parseAmount,
  fromMinorUnits,
} from "../../src/engine/index.js";

describe("formatMoney", () => {
  it.each([
    [123450, "USD", "$1,234.50"],
    [-500, "USD", "-$5.00"],
    [1200, "CHF", "CHF 12.00"],
    [1500, "JPY", "¥1,500"],
    [0, "EUR", "€0.00"],
  ])("should format %d %s as %s", (amount, code, expected) => {
    expect(formatMoney(amount, code)).toBe(expected);
  });

  it("should fall back to the code for unknown currencies", () => {
    expect(formatMoney(1000, "xyz")).toBe("XYZ 10.00");
  });
});

describe("formatSignedMoney", () => {
  it("should sign amounts outside the zero threshold", () => {
    expect(formatSignedMoney(500, "EUR")).toBe("+€5.00");
    expect(formatSignedMoney(-500, "EUR")).toBe("-€5.00");
    expect(formatSignedMoney(0, "EUR")).toBe("€0.00");
  });
});

describe("parseAmount", () => {
  it("should accept a comma as the decimal separator", () => {
    expect(parseAmount("12,50", "EUR")).toBe(1250);
  });

  it("should strip symbols and thousands separators", () => {
    expect(parseAmount("$1,234.50", "USD")).toBe(123450);
  });

  it("should use the currency's minor units", () => {
    expect(parseAmount("1500", "JPY")).toBe(1500);
  });

  it("should reject input that is not a positive amount", () => {
    expect(parseAmount("abc", "USD")).toBeNull();
    expect(parseAmount("0", "USD")).toBeNull();
    expect(parseAmount("", "USD")).toBeNull();
  });
});

describe("currency lookup", () => {
  it("should be case-insensitive", () => {
    expect(isSupportedCurrency("usd")).toBe(true);
    expect(getCurrency("jpy").minorUnits).toBe(0);
  });

  it("should convert minor units back to major units", () => {
    expect(fromMinorUnits(1234, "USD")).toBe(12.34);
    expect(fromMinorUnits(1234, "JPY")).toBe(1234);
  });
});
