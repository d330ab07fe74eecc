import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 17,
      host: "0.0.0.0",
      quotesFile: undefined,
      rateLimitThreshold: 10,
      rateLimitDecay: 10,
      decayIntervalSec: 60,
      connectionTimeoutMs: 30_000,
      maxConnections: 256,
      failFast: false,
      statusPort: undefined,
      logLevel: "info",
    });
  });

  it("reads overrides", () => {
    const config = loadConfig({
      QUOTDD_PORT: "1717",
      QUOTDD_HOST: "127.0.0.1",
      QUOTDD_QUOTES_FILE: "/etc/quotdd/quotes.json",
      QUOTDD_RATE_LIMIT: "5",
      QUOTDD_RATE_DECAY: "3",
      QUOTDD_DECAY_INTERVAL_SEC: "30",
      QUOTDD_CONNECTION_TIMEOUT_MS: "0",
      QUOTDD_MAX_CONNECTIONS: "64",
      QUOTDD_FAIL_FAST: "true",
      QUOTDD_STATUS_PORT: "8080",
      LOG_LEVEL: "debug",
    });

    expect(config).toEqual({
      port: 1717,
      host: "127.0.0.1",
      quotesFile: "/etc/quotdd/quotes.json",
      rateLimitThreshold: 5,
      rateLimitDecay: 3,
      decayIntervalSec: 30,
      connectionTimeoutMs: 0,
      maxConnections: 64,
      failFast: true,
      statusPort: 8080,
      logLevel: "debug",
    });
  });

  it("accepts the full 16-bit port range", () => {
    expect(loadConfig({ QUOTDD_PORT: "0" }).port).toBe(0);
    expect(loadConfig({ QUOTDD_PORT: "65535" }).port).toBe(65535);
  });

  it.each(["65536", "-1", "abc", "17.5", ""])("rejects port %j", (value) => {
    expect(() => loadConfig({ QUOTDD_PORT: value })).toThrow(`Invalid port passed in QUOTDD_PORT: ${value}`);
  });

  it("rejects invalid numeric and boolean values", () => {
    expect(() => loadConfig({ QUOTDD_RATE_LIMIT: "0" })).toThrow("Invalid numeric env var QUOTDD_RATE_LIMIT: 0");
    expect(() => loadConfig({ QUOTDD_DECAY_INTERVAL_SEC: "soon" })).toThrow(
      "Invalid numeric env var QUOTDD_DECAY_INTERVAL_SEC: soon",
    );
    expect(() => loadConfig({ QUOTDD_MAX_CONNECTIONS: "0" })).toThrow("Invalid numeric env var QUOTDD_MAX_CONNECTIONS: 0");
    expect(() => loadConfig({ QUOTDD_FAIL_FAST: "maybe" })).toThrow("Invalid boolean env var QUOTDD_FAIL_FAST: maybe");
  });

  it.each(["0x10", "1e3", " 5 ", "5.0", "-3"])("rejects non-decimal numeric value %j", (value) => {
    expect(() => loadConfig({ QUOTDD_RATE_LIMIT: value })).toThrow(`Invalid numeric env var QUOTDD_RATE_LIMIT: ${value}`);
  });
});
