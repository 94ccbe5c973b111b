import { z } from "zod";

export const RATE_TYPES = ["standard", "reduced", "super_reduced", "parking", "zero"] as const;

function normalizeRateType(value: unknown): unknown {
  return typeof value === "string" ? value.trim().toLowerCase().replace(/[\s-]+/g, "_") : value;
}

/** Accepts "super-reduced", "Super Reduced" and friends. */
export const rateTypeSchema = z.preprocess(normalizeRateType, z.enum(RATE_TYPES));

/**
 * Rate types the service reports. Known spellings are normalized; other tiers
 * (e.g. "reduced_2") pass through.
 */
export const reportedRateTypeSchema = z.preprocess(
  normalizeRateType,
  z.union([z.enum(RATE_TYPES), z.string().min(1)])
);

export const basisSchema = z.enum(["net", "gross"]);

export const supplyTypeSchema = z.enum(["goods", "services"]);

export const b2xSchema = z.enum(["B2C", "B2B"]);

/** Percentages sometimes arrive as strings ("19.0"). */
const percentSchema = z.union([
  z.number().finite(),
  z
    .string()
    .regex(/^\s*-?\d+(\.\d+)?\s*$/, "Expected a numeric percentage")
    .transform(Number),
]);

// ── Requests ──

export const partySchema = z.object({
  country_code: z
    .string()
    .trim()
    .toUpperCase()
    .regex(/^[A-Z]{2}$/, "country_code must be a two-letter ISO code"),
  vat_number: z.string().trim().min(1).optional(),
});

export const calculationRequestSchema = z.object({
  amount: z.number().finite().positive(),
  basis: basisSchema.default("net"),
  rate_type: rateTypeSchema.default("standard"),
  supply_date: z.string().trim().min(1),
  supplier: partySchema,
  customer: partySchema,
  supply_type: supplyTypeSchema.default("goods"),
  b2x: b2xSchema.default("B2C"),
  category_hint: z.string().trim().min(1).optional(),
});

// ── Responses ──

export const validationResultSchema = z.object({
  vat_number: z.string(),
  valid: z.boolean(),
  country_code: z.string().nullable().optional(),
  name: z.string().nullable().optional(),
  address: z.string().nullable().optional(),
  meta: z.record(z.unknown()).default({}),
});

const partyResultSchema = z.object({
  country_code: z.string(),
  vat_number: z.string().nullable().optional(),
});

const calculationResultBody = z.object({
  country_code: z.string(),
  rate_percent: percentSchema,
  rate_type: reportedRateTypeSchema.optional(),
  supply_date: z.string().optional(),
  amount: z.number().optional(),
  basis: basisSchema.optional(),
  supply_type: supplyTypeSchema.optional(),
  b2x: b2xSchema.optional(),
  supplier: partyResultSchema.optional(),
  customer: partyResultSchema.optional(),
  net: z.number().optional(),
  vat: z.number().optional(),
  gross: z.number().optional(),
  mechanism: z.string().nullable().optional(),
  messages: z.array(z.string()).default([]),
  vat_check_status: z.string().optional(),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * The extended endpoint reports the rate as `applied_rate`.
 */
function withRatePercent(value: unknown): unknown {
  if (isRecord(value) && value.rate_percent == null && value.applied_rate != null) {
    return { ...value, rate_percent: value.applied_rate };
  }
  return value;
}

export const calculationResultSchema = z.preprocess(withRatePercent, calculationResultBody);

const rawRateSchema = z.object({
  rate_type: reportedRateTypeSchema,
  rate_percent: percentSchema,
  country_code: z.string().optional(),
  label: z.string().optional(),
});

type RawRate = z.infer<typeof rawRateSchema>;

/**
 * `{ rate, label }`: the label names the tier when it is a known rate type,
 * otherwise it is a reduced rate with a description.
 */
const labelledRateSchema = z
  .object({
    rate: percentSchema,
    label: z.string().optional(),
    country_code: z.string().optional(),
  })
  .transform((r): RawRate => {
    const tier = rateTypeSchema.safeParse(r.label);
    return {
      rate_type: tier.success ? tier.data : "reduced",
      rate_percent: r.rate,
      country_code: r.country_code,
      label: r.label,
    };
  });

const rateItemSchema = z.union([rawRateSchema, labelledRateSchema]);

/** `{ country, standard_rate, reduced_rates: [{ rate, label }] }` */
const countryRatesSchema = z
  .object({
    country: z.string().optional(),
    standard_rate: percentSchema,
    reduced_rates: z.array(z.object({ rate: percentSchema, label: z.string() })).default([]),
  })
  .transform((body): RawRate[] => [
    { rate_type: "standard", rate_percent: body.standard_rate, country_code: body.country },
    ...body.reduced_rates.map(
      (r): RawRate => ({
        rate_type: "reduced",
        rate_percent: r.rate,
        country_code: body.country,
        label: r.label,
      })
    ),
  ]);

const ratesBodySchema = z.union([
  z.array(rateItemSchema),
  z.object({ rates: z.array(rateItemSchema) }).transform((b) => b.rates),
  countryRatesSchema,
  z.object({ rates: countryRatesSchema }).transform((b) => b.rates),
]);

/**
 * Rates schema for one queried country; entries without a country code get it.
 */
export function ratesResponseSchema(countryCode: string) {
  return ratesBodySchema.transform((entries) =>
    entries.map((entry) => ({
      rate_type: entry.rate_type,
      rate_percent: entry.rate_percent,
      country_code: entry.country_code ?? countryCode,
      ...(entry.label !== undefined && { label: entry.label }),
    }))
  );
}
