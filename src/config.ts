/**
 * Client configuration, resolved from explicit options or environment variables.
 * Set VATIFY_API_KEY in the shell or in a .env file (the CLI loads it).
 */
import { configurationError } from "./errors";

export const DEFAULT_BASE_URL = "https://api.vatifytax.app";

export const DEFAULT_TIMEOUT_MS = 10_000;

export const SDK_VERSION = "0.1.0";

export const API_KEY_ENV = "VATIFY_API_KEY";

export interface ConfigOptions {
  /** API key; falls back to VATIFY_API_KEY when empty or omitted. */
  apiKey?: string;
  /** Service root, e.g. a staging deployment. Falls back to VATIFY_BASE_URL. */
  baseUrl?: string;
  /** Per-request timeout. Falls back to VATIFY_TIMEOUT_MS. */
  timeoutMs?: number;
}

export interface ClientConfig {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly userAgent: string;
}

type Env = Record<string, string | undefined>;

function envInt(env: Env, key: string, defaultValue: number): number {
  const v = env[key];
  if (v === undefined || v === "") return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) || n <= 0 ? defaultValue : n;
}

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Resolves the configuration for one client instance.
 * @throws {VatifyError} with code MISSING_API_KEY when no key is available.
 */
export function resolveConfig(options: ConfigOptions = {}, env: Env = process.env): ClientConfig {
  const apiKey = nonEmpty(options.apiKey) ?? nonEmpty(env[API_KEY_ENV]);
  if (!apiKey) {
    throw configurationError(
      "MISSING_API_KEY",
      `Missing API key. Pass apiKey or set ${API_KEY_ENV}.`
    );
  }

  const baseUrl = nonEmpty(options.baseUrl) ?? nonEmpty(env.VATIFY_BASE_URL) ?? DEFAULT_BASE_URL;

  const timeoutMs =
    options.timeoutMs !== undefined && Number.isInteger(options.timeoutMs) && options.timeoutMs > 0
      ? options.timeoutMs
      : envInt(env, "VATIFY_TIMEOUT_MS", DEFAULT_TIMEOUT_MS);

  return Object.freeze({
    apiKey,
    baseUrl: baseUrl.replace(/\/+$/, ""),
    timeoutMs,
    userAgent: `vatify-node/${SDK_VERSION}`,
  });
}
