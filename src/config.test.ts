import { describe, it, expect } from "vitest";
import { DEFAULT_BASE_URL, resolveConfig } from "./config";
import { VatifyError } from "./errors";

describe("resolveConfig", () => {
  it("uses the explicit key and defaults for everything else", () => {
    const config = resolveConfig({ apiKey: "  test-key  " }, {});
    expect(config).toEqual({
      apiKey: "test-key",
      baseUrl: DEFAULT_BASE_URL,
      timeoutMs: 10_000,
      userAgent: "vatify-node/0.1.0",
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("falls back to VATIFY_API_KEY when the argument is empty", () => {
    expect(resolveConfig({ apiKey: "" }, { VATIFY_API_KEY: "env-key" }).apiKey).toBe("env-key");
    expect(resolveConfig({}, { VATIFY_API_KEY: "env-key" }).apiKey).toBe("env-key");
  });

  it("prefers the argument over the environment", () => {
    expect(resolveConfig({ apiKey: "arg-key" }, { VATIFY_API_KEY: "env-key" }).apiKey).toBe(
      "arg-key"
    );
  });

  it("throws a configuration error when no key is available", () => {
    let caught: unknown;
    try {
      resolveConfig({}, { VATIFY_API_KEY: "   " });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(VatifyError);
    expect(caught).toMatchObject({
      origin: "configuration",
      code: "MISSING_API_KEY",
      message: "Missing API key. Pass apiKey or set VATIFY_API_KEY.",
      statusCode: undefined,
    });
  });

  it("reads the base URL from the environment and strips trailing slashes", () => {
    const config = resolveConfig({ apiKey: "k" }, { VATIFY_BASE_URL: "http://localhost:9999//" });
    expect(config.baseUrl).toBe("http://localhost:9999");
  });

  it("resolves the timeout from option, then environment, then default", () => {
    expect(resolveConfig({ apiKey: "k", timeoutMs: 2500 }, { VATIFY_TIMEOUT_MS: "3000" }).timeoutMs).toBe(2500);
    expect(resolveConfig({ apiKey: "k" }, { VATIFY_TIMEOUT_MS: "3000" }).timeoutMs).toBe(3000);
    expect(resolveConfig({ apiKey: "k" }, { VATIFY_TIMEOUT_MS: "abc" }).timeoutMs).toBe(10_000);
    expect(resolveConfig({ apiKey: "k", timeoutMs: -5 }, {}).timeoutMs).toBe(10_000);
  });
});
