/**
 * Argument checks run before a request is sent. Only emptiness and shape are
 * checked here; whether a VAT number actually exists is the service's call.
 */
import { invalidArgument } from "../errors";

/** Two-letter country code. */
const COUNTRY_CODE_REGEX = /^[A-Z]{2}$/;

/** Max length for raw vat_number input (before normalize) to prevent huge payloads. */
const MAX_VAT_INPUT_LENGTH = 32;

/**
 * Normalizes VAT input: uppercase, strip spaces.
 */
export function normalizeVatNumber(vat: string): string {
  return vat.replace(/\s+/g, "").toUpperCase();
}

/**
 * Two letters at the start of a VAT number, or null when it has no country prefix.
 */
export function countryPrefix(vatNumber: string): string | null {
  const prefix = vatNumber.slice(0, 2).toUpperCase();
  return COUNTRY_CODE_REGEX.test(prefix) ? prefix : null;
}

/**
 * @throws {VatifyError} INVALID_ARGUMENT when the input is empty or not a string.
 */
export function requireVatNumber(raw: unknown): string {
  if (typeof raw !== "string") {
    throw invalidArgument("vat_number must be a string (e.g. DE123456789).");
  }
  const vatNumber = normalizeVatNumber(raw);
  if (!vatNumber) {
    throw invalidArgument("vat_number is required and cannot be empty.");
  }
  if (vatNumber.length > MAX_VAT_INPUT_LENGTH) {
    throw invalidArgument(`vat_number is too long (max ${MAX_VAT_INPUT_LENGTH} characters).`);
  }
  return vatNumber;
}

/**
 * @throws {VatifyError} INVALID_ARGUMENT unless the input is a two-letter code.
 */
export function requireCountryCode(raw: unknown, field = "country_code"): string {
  if (typeof raw !== "string" || !raw.trim()) {
    throw invalidArgument(`${field} is required and cannot be empty.`);
  }
  const code = raw.trim().toUpperCase();
  if (!COUNTRY_CODE_REGEX.test(code)) {
    throw invalidArgument(`${field} must be a two-letter ISO country code (e.g. DE, FR).`);
  }
  return code;
}

/**
 * @throws {VatifyError} INVALID_ARGUMENT when the value is missing or blank.
 */
export function requireText(raw: unknown, field: string): string {
  if (typeof raw !== "string" || !raw.trim()) {
    throw invalidArgument(`${field} is required and cannot be empty.`);
  }
  return raw.trim();
}
