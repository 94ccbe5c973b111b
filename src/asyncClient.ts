import { resolveConfig, type ClientConfig } from "./config";
import { configurationError } from "./errors";
import { noopLogger, type Logger } from "./logger";
import { calculateRequest, ratesRequest, validateVatRequest } from "./services/endpoints";
import { HttpTransport, type RequestPlan } from "./services/transport";
import type {
  BasicCalculationRequest,
  CalculationRequest,
  CalculationResult,
  RateEntry,
  RequestOptions,
  ValidationResult,
  VatifyOptions,
} from "./types";

/**
 * Client for concurrent use. Calls run independently over a pool of
 * keep-alive sockets and may complete in any order; each one can be
 * cancelled through its own AbortSignal without affecting the others.
 */
export class VatifyAsync {
  readonly config: ClientConfig;
  private readonly logger: Logger;
  private transport: HttpTransport | null;
  private readonly inFlight = new Set<Promise<void>>();
  private closing: Promise<void> | null = null;

  /**
   * @throws {VatifyError} MISSING_API_KEY when neither `apiKey` nor VATIFY_API_KEY is set.
   */
  constructor(options: VatifyOptions = {}) {
    this.config = resolveConfig(options, options.env);
    this.logger = options.logger ?? noopLogger;
    this.transport = new HttpTransport(this.config, { maxSockets: Infinity, logger: this.logger });
  }

  get isClosed(): boolean {
    return this.closing !== null;
  }

  validateVat(vatNumber: string, options: RequestOptions = {}): Promise<ValidationResult> {
    return this.track(() => validateVatRequest(vatNumber), options);
  }

  calculate(
    params: BasicCalculationRequest | CalculationRequest,
    options: RequestOptions = {}
  ): Promise<CalculationResult> {
    return this.track(() => calculateRequest(params), options);
  }

  rates(countryCode: string, options: RequestOptions = {}): Promise<RateEntry[]> {
    return this.track(() => ratesRequest(countryCode), options);
  }

  /**
   * Refuses new calls, waits for the ones in flight to settle, then releases
   * the sockets. Every call returns the same promise.
   */
  aclose(): Promise<void> {
    if (!this.closing) {
      this.closing = this.drain();
    }
    return this.closing;
  }

  private async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
    this.transport?.destroy();
    this.transport = null;
    this.logger.debug("client closed");
  }

  private track<T>(build: () => RequestPlan<T>, options: RequestOptions): Promise<T> {
    const transport = this.transport;
    if (this.closing || !transport) {
      return Promise.reject(configurationError("CLIENT_CLOSED", "Client is closed."));
    }

    const pending = this.run(transport, build, options);
    const done = (): void => {
      this.inFlight.delete(settled);
    };
    const settled: Promise<void> = pending.then(done, done);
    this.inFlight.add(settled);
    return pending;
  }

  private async run<T>(
    transport: HttpTransport,
    build: () => RequestPlan<T>,
    options: RequestOptions
  ): Promise<T> {
    return transport.request({ ...build(), signal: options.signal });
  }
}
