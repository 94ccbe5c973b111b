/**
 * Request builders for the three service endpoints. Both clients send exactly
 * what these return; argument errors are thrown here, before any I/O.
 */
import { z } from "zod";
import { invalidArgument } from "../errors";
import type {
  BasicCalculationRequest,
  CalculationRequest,
  CalculationResult,
  RateEntry,
  ValidationResult,
} from "../types";
import {
  calculationRequestSchema,
  calculationResultSchema,
  ratesResponseSchema,
  validationResultSchema,
} from "../validation/schemas";
import {
  countryPrefix,
  requireCountryCode,
  requireText,
  requireVatNumber,
} from "../validation/vatValidation";
import type { RequestPlan } from "./transport";

/**
 * Fills keys the service left out (or sent as null) from what we submitted.
 */
function withFallbacks(value: unknown, fallbacks: Record<string, string | null>): unknown {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return value;
  const filled: Record<string, unknown> = { ...value };
  for (const [key, fallback] of Object.entries(fallbacks)) {
    if (filled[key] == null && fallback !== null) filled[key] = fallback;
  }
  return filled;
}

function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

// POST /v1/validate-vat  body {"vat_number":"..."}
export function validateVatRequest(rawVatNumber: string): RequestPlan<ValidationResult> {
  const vatNumber = requireVatNumber(rawVatNumber);
  const fallbacks = { vat_number: vatNumber, country_code: countryPrefix(vatNumber) };
  return {
    method: "POST",
    path: "/v1/validate-vat",
    body: { vat_number: vatNumber },
    label: "Validation failed",
    schema: z.preprocess((v) => withFallbacks(v, fallbacks), validationResultSchema),
  };
}

function isExtended(
  params: BasicCalculationRequest | CalculationRequest
): params is CalculationRequest {
  return "amount" in params;
}

function calculationBody(params: BasicCalculationRequest | CalculationRequest): object {
  if (isExtended(params)) {
    const parsed = calculationRequestSchema.safeParse(params);
    if (!parsed.success) {
      throw invalidArgument(
        `Invalid calculation request: ${formatIssues(parsed.error.issues)}`,
        parsed.error.issues
      );
    }
    return parsed.data;
  }
  return {
    country_code: requireCountryCode(params.country_code),
    rate_type: requireText(params.rate_type, "rate_type"),
    supply_date: requireText(params.supply_date, "supply_date"),
  };
}

// POST /v1/calculate  body: the three basic fields, or the full CalculationRequest
export function calculateRequest(
  params: BasicCalculationRequest | CalculationRequest
): RequestPlan<CalculationResult> {
  if (typeof params !== "object" || params === null) {
    throw invalidArgument("calculate() expects a parameter object.");
  }
  return {
    method: "POST",
    path: "/v1/calculate",
    body: calculationBody(params),
    label: "Calculation failed",
    schema: calculationResultSchema,
  };
}

// GET /v1/rates/{country_code}
export function ratesRequest(rawCountryCode: string): RequestPlan<RateEntry[]> {
  const countryCode = requireCountryCode(rawCountryCode);
  return {
    method: "GET",
    path: `/v1/rates/${encodeURIComponent(countryCode)}`,
    label: "Fetching rates failed",
    schema: ratesResponseSchema(countryCode),
  };
}
