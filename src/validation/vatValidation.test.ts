import { describe, it, expect } from "vitest";
import {
  countryPrefix,
  normalizeVatNumber,
  requireCountryCode,
  requireText,
  requireVatNumber,
} from "./vatValidation";

describe("normalizeVatNumber", () => {
  it("strips whitespace and uppercases", () => {
    expect(normalizeVatNumber(" de 123 456 789 ")).toBe("DE123456789");
  });
});

describe("countryPrefix", () => {
  it("returns the leading letters of a prefixed number", () => {
    expect(countryPrefix("DE123456789")).toBe("DE");
    expect(countryPrefix("el094259216")).toBe("EL");
  });

  it("returns null when the number has no country prefix", () => {
    expect(countryPrefix("123456789")).toBeNull();
    expect(countryPrefix("D")).toBeNull();
  });
});

describe("requireVatNumber", () => {
  it("returns the normalized number", () => {
    expect(requireVatNumber("fr 40303265045")).toBe("FR40303265045");
  });

  it("rejects blank input before anything is sent", () => {
    expect(() => requireVatNumber("   ")).toThrow("vat_number is required and cannot be empty.");
  });

  it("rejects non-strings", () => {
    expect(() => requireVatNumber(42)).toThrow("vat_number must be a string (e.g. DE123456789).");
  });

  it("rejects oversized input", () => {
    expect(() => requireVatNumber("DE".padEnd(40, "1"))).toThrow(
      "vat_number is too long (max 32 characters)."
    );
  });
});

describe("requireCountryCode", () => {
  it("trims and uppercases", () => {
    expect(requireCountryCode(" de ")).toBe("DE");
  });

  it("rejects anything but two letters", () => {
    expect(() => requireCountryCode("DEU")).toThrow(
      "country_code must be a two-letter ISO country code (e.g. DE, FR)."
    );
    expect(() => requireCountryCode("")).toThrow("country_code is required and cannot be empty.");
  });
});

describe("requireText", () => {
  it("names the field in the error", () => {
    expect(() => requireText(" ", "supply_date")).toThrow("supply_date is required and cannot be empty.");
    expect(requireText(" 2024-01-01 ", "supply_date")).toBe("2024-01-01");
  });
});
