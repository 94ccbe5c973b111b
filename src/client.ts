import { resolveConfig, type ClientConfig } from "./config";
import { configurationError, isVatifyError, type VatifyError } from "./errors";
import { noopLogger, type Logger } from "./logger";
import { calculateRequest, ratesRequest, validateVatRequest } from "./services/endpoints";
import { HttpTransport, type RequestPlan } from "./services/transport";
import type {
  BasicCalculationRequest,
  CalculationRequest,
  CalculationResult,
  RateEntry,
  ValidationResult,
  VatifyOptions,
} from "./types";

/**
 * Client over a single reusable connection. Calls are served one at a time in
 * the order they are issued; each one makes exactly one HTTP request.
 *
 * close() releases the connection. Calls still queued or in flight at that
 * point reject with CLIENT_CLOSED and never reach the network.
 *
 * @example
 * const vatify = new Vatify({ apiKey: "..." });
 * try {
 *   const result = await vatify.validateVat("DE123456789");
 * } finally {
 *   vatify.close();
 * }
 */
export class Vatify {
  readonly config: ClientConfig;
  private readonly logger: Logger;
  private transport: HttpTransport | null;
  private readonly lifetime = new AbortController();
  // Settles when the previously issued call has; the next call starts after it.
  private tail: Promise<void> = Promise.resolve();

  /**
   * @throws {VatifyError} MISSING_API_KEY when neither `apiKey` nor VATIFY_API_KEY is set.
   */
  constructor(options: VatifyOptions = {}) {
    this.config = resolveConfig(options, options.env);
    this.logger = options.logger ?? noopLogger;
    this.transport = new HttpTransport(this.config, { maxSockets: 1, logger: this.logger });
  }

  get isClosed(): boolean {
    return this.transport === null;
  }

  async validateVat(vatNumber: string): Promise<ValidationResult> {
    return this.send(validateVatRequest(vatNumber));
  }

  /**
   * Either the basic lookup `{ country_code, rate_type, supply_date }` or a full
   * CalculationRequest with an amount and the two parties.
   */
  async calculate(params: BasicCalculationRequest | CalculationRequest): Promise<CalculationResult> {
    return this.send(calculateRequest(params));
  }

  async rates(countryCode: string): Promise<RateEntry[]> {
    return this.send(ratesRequest(countryCode));
  }

  /**
   * Releases the connection. Safe to call more than once.
   */
  close(): void {
    const transport = this.transport;
    if (!transport) return;
    this.transport = null;
    this.lifetime.abort();
    transport.destroy();
    this.logger.debug("client closed");
  }

  private send<T>(plan: RequestPlan<T>): Promise<T> {
    if (!this.transport) {
      return Promise.reject(closedError());
    }
    const result = this.tail.then(() => this.dispatch(plan));
    const next = (): void => {};
    this.tail = result.then(next, next);
    return result;
  }

  private async dispatch<T>(plan: RequestPlan<T>): Promise<T> {
    const transport = this.transport;
    if (!transport) throw closedError();
    try {
      return await transport.request({ ...plan, signal: this.lifetime.signal });
    } catch (err) {
      if (this.lifetime.signal.aborted && isVatifyError(err) && err.origin === "transport") {
        throw closedError();
      }
      throw err;
    }
  }
}

function closedError(): VatifyError {
  return configurationError("CLIENT_CLOSED", "Client is closed.");
}
