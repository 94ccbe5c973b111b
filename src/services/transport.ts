import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import http from "node:http";
import https from "node:https";
import type { ZodType, ZodTypeDef } from "zod";
import type { ClientConfig } from "../config";
import { VatifyError, parseError, serviceError } from "../errors";
import type { Logger } from "../logger";

export interface RequestPlan<T> {
  method: "GET" | "POST";
  path: string;
  body?: unknown;
  /** Prefix for error messages, e.g. "Validation failed". */
  label: string;
  schema: ZodType<T, ZodTypeDef, unknown>;
  signal?: AbortSignal;
}

export interface TransportOptions {
  /** Upper bound on open connections; 1 serializes every call on one socket. */
  maxSockets: number;
  logger: Logger;
}

type JsonBody = { ok: true; value: unknown } | { ok: false };

function parseJsonBody(text: string): JsonBody {
  if (!text.trim()) return { ok: false };
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Folds anything axios (or the runtime) throws into a transport error.
 * Nothing here has a status code: non-2xx responses never reach this path.
 */
function transportError(label: string, err: unknown): VatifyError {
  if (err instanceof VatifyError) return err;
  if (axios.isCancel(err)) {
    return new VatifyError(`${label}: request aborted`, {
      origin: "transport",
      code: "ABORTED",
      cause: err,
    });
  }
  if (axios.isAxiosError(err)) {
    const timedOut =
      err.code === "ECONNABORTED" ||
      err.code === "ETIMEDOUT" ||
      err.message.toLowerCase().includes("timeout");
    return new VatifyError(`Network error: ${err.message}`, {
      origin: "transport",
      code: timedOut ? "TIMEOUT" : "NETWORK_ERROR",
      details: err.code ? { code: err.code } : undefined,
      cause: err,
    });
  }
  return new VatifyError(`Network error: ${err instanceof Error ? err.message : String(err)}`, {
    origin: "transport",
    code: "UNKNOWN_ERROR",
    cause: err,
  });
}

/**
 * One axios instance over its own keep-alive agents. Owns the connections
 * until destroy() is called.
 */
export class HttpTransport {
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;
  private readonly client: AxiosInstance;
  private readonly logger: Logger;

  constructor(config: ClientConfig, options: TransportOptions) {
    this.logger = options.logger;
    this.httpAgent = new http.Agent({ keepAlive: true, maxSockets: options.maxSockets });
    this.httpsAgent = new https.Agent({ keepAlive: true, maxSockets: options.maxSockets });
    this.client = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: {
        Authorization: `Bearer ${config.apiKey}`,
        "User-Agent": config.userAgent,
        Accept: "application/json",
      },
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      proxy: false,
      maxRedirects: 5,
      // Status and JSON handling happen in request() so every failure maps the same way.
      responseType: "text",
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    });
  }

  async request<T>(plan: RequestPlan<T>): Promise<T> {
    const startedAt = Date.now();
    this.logger.debug("request", { method: plan.method, path: plan.path });

    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.request<unknown>({
        method: plan.method,
        url: plan.path,
        data: plan.body,
        signal: plan.signal,
      });
    } catch (err) {
      throw this.failed(plan, transportError(plan.label, err));
    }

    this.logger.debug("response", {
      method: plan.method,
      path: plan.path,
      status: response.status,
      durationMs: Date.now() - startedAt,
    });

    const text = typeof response.data === "string" ? response.data : "";
    const body = parseJsonBody(text);

    if (response.status < 200 || response.status >= 300) {
      throw this.failed(plan, serviceError(plan.label, response.status, text, body));
    }
    if (!body.ok) {
      throw this.failed(plan, parseError(plan.label, "response body is not valid JSON", text));
    }

    const parsed = plan.schema.safeParse(body.value);
    if (!parsed.success) {
      throw this.failed(
        plan,
        parseError(plan.label, "unexpected response shape", parsed.error.issues)
      );
    }
    return parsed.data;
  }

  destroy(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }

  private failed<T>(plan: RequestPlan<T>, error: VatifyError): VatifyError {
    this.logger.warn("request failed", {
      method: plan.method,
      path: plan.path,
      code: error.code,
      statusCode: error.statusCode,
    });
    return error;
  }
}
