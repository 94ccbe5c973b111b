import type { z } from "zod";
import type { Logger } from "./logger";
import type {
  calculationResultSchema,
  ratesResponseSchema,
  validationResultSchema,
  RATE_TYPES,
} from "./validation/schemas";

export type RateType = (typeof RATE_TYPES)[number];

export type Basis = "net" | "gross";

export type SupplyType = "goods" | "services";

export type B2x = "B2C" | "B2B";

export interface Party {
  /**
   * Two-letter ISO 3166-1 country code, e.g. "DE".
   */
  country_code: string;

  /**
   * VAT number of the party, used by the service for a B2B/VIES check.
   */
  vat_number?: string;
}

/**
 * Minimal calculation: which rate applies in a country on a given date.
 */
export interface BasicCalculationRequest {
  country_code: string;

  /**
   * Passed through as given; the service decides which names it accepts.
   */
  rate_type: string;

  /**
   * ISO-8601 calendar date (YYYY-MM-DD). Not checked client-side.
   */
  supply_date: string;
}

/**
 * Full calculation of VAT on an amount between a supplier and a customer.
 * Omitted fields take the service defaults shown below.
 */
export interface CalculationRequest {
  /**
   * Input amount, net or gross depending on `basis`. Must be positive.
   */
  amount: number;

  /** Defaults to "net". */
  basis?: Basis;

  /** Defaults to "standard". */
  rate_type?: RateType;

  supply_date: string;
  supplier: Party;
  customer: Party;

  /** Defaults to "goods". */
  supply_type?: SupplyType;

  /** Defaults to "B2C". */
  b2x?: B2x;

  /**
   * Free-form category such as "ebooks", "hospitality" or "food".
   */
  category_hint?: string;
}

export type ValidationResult = z.infer<typeof validationResultSchema>;

export type CalculationResult = z.infer<typeof calculationResultSchema>;

export type RateEntry = z.infer<ReturnType<typeof ratesResponseSchema>>[number];

export interface VatifyOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;

  /**
   * Where VATIFY_* fallbacks are read from. Defaults to process.env.
   */
  env?: Record<string, string | undefined>;

  /**
   * Receives request/response debug lines and failure warnings. Silent by default.
   */
  logger?: Logger;
}

export interface RequestOptions {
  /**
   * Aborts the call; the returned promise rejects with code ABORTED.
   */
  signal?: AbortSignal;
}
