/**
 * Where a failure came from. Callers that only care whether the service
 * answered can check `statusCode` instead: it is set for `service` errors only.
 */
export type VatifyErrorOrigin =
  | "configuration"
  | "validation"
  | "transport"
  | "service"
  | "parse";

/** Machine-readable error codes carried by VatifyError */
export type VatifyErrorCode =
  | "MISSING_API_KEY"
  | "CLIENT_CLOSED"
  | "INVALID_ARGUMENT"
  | "NETWORK_ERROR"
  | "TIMEOUT"
  | "ABORTED"
  | "HTTP_ERROR"
  | "PARSE_ERROR"
  | "UNKNOWN_ERROR";

export interface VatifyErrorOptions {
  origin: VatifyErrorOrigin;
  code: VatifyErrorCode;
  statusCode?: number;
  details?: unknown;
  cause?: unknown;
}

/**
 * The single error type surfaced by the clients and the CLI.
 */
export class VatifyError extends Error {
  public readonly origin: VatifyErrorOrigin;
  public readonly code: VatifyErrorCode;
  public readonly statusCode?: number;
  public readonly details?: unknown;

  constructor(message: string, options: VatifyErrorOptions) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "VatifyError";
    this.origin = options.origin;
    this.code = options.code;
    this.statusCode = options.statusCode;
    this.details = options.details;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      origin: this.origin,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

export function isVatifyError(err: unknown): err is VatifyError {
  return err instanceof VatifyError;
}

export function configurationError(
  code: "MISSING_API_KEY" | "CLIENT_CLOSED",
  message: string
): VatifyError {
  return new VatifyError(message, { origin: "configuration", code });
}

export function invalidArgument(message: string, details?: unknown): VatifyError {
  return new VatifyError(message, { origin: "validation", code: "INVALID_ARGUMENT", details });
}

/**
 * Reads a human message out of a JSON error body, if the service sent one.
 */
function messageFromBody(body: unknown): string | null {
  if (typeof body !== "object" || body === null || Array.isArray(body)) return null;
  for (const key of ["message", "error"]) {
    const value: unknown = Reflect.get(body, key);
    if (typeof value === "string" && value.trim()) return value.trim();
  }
  return null;
}

/**
 * Maps a non-2xx response to a service error. JSON bodies become `details`;
 * anything else is used as the message.
 */
export function serviceError(
  label: string,
  statusCode: number,
  rawBody: string,
  parsedBody: { ok: true; value: unknown } | { ok: false }
): VatifyError {
  if (parsedBody.ok) {
    const fromBody = messageFromBody(parsedBody.value);
    const message = fromBody ? `${label}: ${fromBody}` : `${label} (HTTP ${statusCode})`;
    return new VatifyError(message, {
      origin: "service",
      code: "HTTP_ERROR",
      statusCode,
      details: parsedBody.value,
    });
  }
  const text = rawBody.trim();
  return new VatifyError(text || `${label} (HTTP ${statusCode})`, {
    origin: "service",
    code: "HTTP_ERROR",
    statusCode,
  });
}

export function parseError(label: string, reason: string, details?: unknown): VatifyError {
  return new VatifyError(`${label}: ${reason}`, { origin: "parse", code: "PARSE_ERROR", details });
}
