import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/utils/config.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      namespace: "default",
      httpPort: 8080,
      workers: 2,
      retryBaseDelayMs: 5,
      retryMaxDelayMs: 1_000_000,
      orphanSweepIntervalMinutes: 0,
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      NAMESPACE: "podsets",
      HTTP_PORT: "9090",
      WORKERS: "4",
      RETRY_BASE_DELAY_MS: "50",
      RETRY_MAX_DELAY_MS: "60000",
      ORPHAN_SWEEP_INTERVAL_MINUTES: "10",
    });

    expect(config).toEqual({
      namespace: "podsets",
      httpPort: 9090,
      workers: 4,
      retryBaseDelayMs: 50,
      retryMaxDelayMs: 60000,
      orphanSweepIntervalMinutes: 10,
    });
  });

  it("rejects malformed numbers", () => {
    expect(() => loadConfig({ WORKERS: "0" })).toThrow('WORKERS must be an integer >= 1, got "0"');
    expect(() => loadConfig({ HTTP_PORT: "http" })).toThrow(
      'HTTP_PORT must be an integer >= 0, got "http"',
    );
    expect(() => loadConfig({ RETRY_BASE_DELAY_MS: "1.5" })).toThrow(
      'RETRY_BASE_DELAY_MS must be an integer >= 1, got "1.5"',
    );
  });

  it("rejects a maximum delay below the base delay", () => {
    expect(() => loadConfig({ RETRY_BASE_DELAY_MS: "100", RETRY_MAX_DELAY_MS: "10" })).toThrow(
      "RETRY_MAX_DELAY_MS must not be smaller than RETRY_BASE_DELAY_MS",
    );
  });
});
