import { describe, it, expect } from "vitest";
import {
  calculationRequestSchema,
  calculationResultSchema,
  rateTypeSchema,
  ratesResponseSchema,
  reportedRateTypeSchema,
  validationResultSchema,
} from "./schemas";

describe("rateTypeSchema", () => {
  it("normalizes spelling variants", () => {
    expect(rateTypeSchema.parse("Super-Reduced")).toBe("super_reduced");
    expect(rateTypeSchema.parse("STANDARD")).toBe("standard");
  });

  it("rejects unknown rate types", () => {
    expect(rateTypeSchema.safeParse("luxury").success).toBe(false);
  });
});

describe("reportedRateTypeSchema", () => {
  it("normalizes known tiers and keeps unknown ones", () => {
    expect(reportedRateTypeSchema.parse("Super Reduced")).toBe("super_reduced");
    expect(reportedRateTypeSchema.parse("Reduced-2")).toBe("reduced_2");
  });

  it("rejects an empty rate type", () => {
    expect(reportedRateTypeSchema.safeParse("  ").success).toBe(false);
  });
});

describe("calculationRequestSchema", () => {
  it("applies defaults and uppercases party country codes", () => {
    const parsed = calculationRequestSchema.parse({
      amount: 100,
      supply_date: "2024-05-01",
      supplier: { country_code: "de" },
      customer: { country_code: "FR", vat_number: "FR40303265045" },
    });
    expect(parsed).toEqual({
      amount: 100,
      basis: "net",
      rate_type: "standard",
      supply_date: "2024-05-01",
      supplier: { country_code: "DE" },
      customer: { country_code: "FR", vat_number: "FR40303265045" },
      supply_type: "goods",
      b2x: "B2C",
    });
  });

  it("requires a positive amount", () => {
    const result = calculationRequestSchema.safeParse({
      amount: 0,
      supply_date: "2024-05-01",
      supplier: { country_code: "DE" },
      customer: { country_code: "FR" },
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(["amount"]);
    }
  });
});

describe("validationResultSchema", () => {
  it("defaults meta and leaves absent optionals out", () => {
    expect(
      validationResultSchema.parse({ vat_number: "DE123456789", valid: true, country_code: "DE" })
    ).toEqual({ vat_number: "DE123456789", valid: true, country_code: "DE", meta: {} });
  });

  it("allows the country code to be missing", () => {
    expect(validationResultSchema.parse({ vat_number: "123456789", valid: false })).toEqual({
      vat_number: "123456789",
      valid: false,
      meta: {},
    });
  });

  it("accepts null name and address", () => {
    const parsed = validationResultSchema.parse({
      vat_number: "DE123456789",
      valid: false,
      country_code: "DE",
      name: null,
      address: null,
    });
    expect(parsed.name).toBeNull();
    expect(parsed.address).toBeNull();
  });
});

describe("calculationResultSchema", () => {
  it("reads applied_rate as rate_percent", () => {
    const parsed = calculationResultSchema.parse({
      country_code: "FR",
      applied_rate: 5.5,
      net: 100,
      vat: 5.5,
      gross: 105.5,
      messages: ["reduced rate for accommodation"],
      vat_check_status: "valid",
    });
    expect(parsed).toEqual({
      country_code: "FR",
      rate_percent: 5.5,
      net: 100,
      vat: 5.5,
      gross: 105.5,
      messages: ["reduced rate for accommodation"],
      vat_check_status: "valid",
    });
  });

  it("requires a rate", () => {
    expect(calculationResultSchema.safeParse({ country_code: "DE" }).success).toBe(false);
  });
});

describe("ratesResponseSchema", () => {
  it("keeps the order of a bare array and fills the country", () => {
    expect(
      ratesResponseSchema("DE").parse([
        { rate_type: "standard", rate_percent: 19.0 },
        { rate_type: "reduced", rate_percent: 7.0 },
      ])
    ).toEqual([
      { rate_type: "standard", rate_percent: 19, country_code: "DE" },
      { rate_type: "reduced", rate_percent: 7, country_code: "DE" },
    ]);
  });

  it("unwraps a rates envelope and coerces numeric strings", () => {
    expect(
      ratesResponseSchema("AT").parse({ rates: [{ rate_type: "parking", rate_percent: "13.0" }] })
    ).toEqual([{ rate_type: "parking", rate_percent: 13, country_code: "AT" }]);
  });

  it("expands the standard/reduced country summary", () => {
    expect(
      ratesResponseSchema("DE").parse({
        country: "DE",
        standard_rate: "19",
        reduced_rates: [{ rate: 7, label: "foodstuffs" }],
      })
    ).toEqual([
      { rate_type: "standard", rate_percent: 19, country_code: "DE" },
      { rate_type: "reduced", rate_percent: 7, country_code: "DE", label: "foodstuffs" },
    ]);
  });

  it("reads { rate, label } items, naming the tier from the label when it can", () => {
    expect(
      ratesResponseSchema("FR").parse({
        rates: [
          { rate: 20, label: "Standard" },
          { rate: "5.5", label: "books" },
          { rate: 2.1, label: "super-reduced" },
        ],
      })
    ).toEqual([
      { rate_type: "standard", rate_percent: 20, country_code: "FR", label: "Standard" },
      { rate_type: "reduced", rate_percent: 5.5, country_code: "FR", label: "books" },
      { rate_type: "super_reduced", rate_percent: 2.1, country_code: "FR", label: "super-reduced" },
    ]);
  });

  it("reads a bare list of { rate, label } items", () => {
    expect(ratesResponseSchema("LU").parse([{ rate: 3, label: "super_reduced" }])).toEqual([
      { rate_type: "super_reduced", rate_percent: 3, country_code: "LU", label: "super_reduced" },
    ]);
  });

  it("rejects a body with no rates", () => {
    expect(ratesResponseSchema("DE").safeParse({ country: "DE" }).success).toBe(false);
  });
});
