// Clients
export { Vatify } from "./client";
export { VatifyAsync } from "./asyncClient";

// Configuration
export {
  resolveConfig,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  SDK_VERSION,
  type ClientConfig,
  type ConfigOptions,
} from "./config";

// Errors
export {
  VatifyError,
  isVatifyError,
  type VatifyErrorCode,
  type VatifyErrorOrigin,
  type VatifyErrorOptions,
} from "./errors";

// Models
export type {
  B2x,
  Basis,
  BasicCalculationRequest,
  CalculationRequest,
  CalculationResult,
  Party,
  RateEntry,
  RateType,
  RequestOptions,
  SupplyType,
  ValidationResult,
  VatifyOptions,
} from "./types";
export {
  RATE_TYPES,
  calculationRequestSchema,
  calculationResultSchema,
  ratesResponseSchema,
  reportedRateTypeSchema,
  validationResultSchema,
} from "./validation/schemas";

// Logging
export { type Logger, noopLogger, consoleLogger } from "./logger";
