// test/config.test.ts
import { describe, expect, it } from "vitest";
import { DEFAULT_BREAKER_CONFIG, breakerConfigFromEnv, resolveBreakerConfig } from "../src/config.js";
import { InvalidConfigError } from "../src/errors.js";

describe("config", () => {
  it("defaults to 50% over 3 requests in a 15 minute window", () => {
    expect(resolveBreakerConfig()).toEqual({
      failureThreshold: 50,
      minRequests: 3,
      considerationWindowMs: 900_000,
      enabled: true,
      recordRejections: false,
    });
  });

  it("ignores explicitly undefined fields", () => {
    expect(resolveBreakerConfig({ minRequests: undefined }).minRequests).toBe(3);
  });

  it("reads the environment", () => {
    const cfg = breakerConfigFromEnv({
      TRIPWIRE_FAILURE_THRESHOLD: "75",
      TRIPWIRE_MIN_REQUESTS: "10",
      TRIPWIRE_ENABLED: "false",
      TRIPWIRE_WINDOW_MS: "",
    });
    expect(cfg).toEqual({ ...DEFAULT_BREAKER_CONFIG, failureThreshold: 75, minRequests: 10, enabled: false });
  });

  it("keeps defaults for an empty environment", () => {
    expect(breakerConfigFromEnv({})).toEqual(DEFAULT_BREAKER_CONFIG);
  });

  it("rejects bad values", () => {
    expect(() => breakerConfigFromEnv({ TRIPWIRE_MIN_REQUESTS: "lots" })).toThrow(InvalidConfigError);
    expect(() => breakerConfigFromEnv({ TRIPWIRE_MIN_REQUESTS: "2.5" })).toThrow(/minRequests/);
    expect(() => resolveBreakerConfig({ failureThreshold: -1 })).toThrow(/failureThreshold/);
  });
});
