// src/config.ts
import { InvalidConfigError } from "./errors.js";
import type { BreakerConfig } from "./types.js";

export const DEFAULT_BREAKER_CONFIG: Readonly<BreakerConfig> = {
  failureThreshold: 50,
  minRequests: 3,
  considerationWindowMs: 15 * 60_000,
  enabled: true,
  recordRejections: false,
};

export function assertFailureThreshold(value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 100) {
    throw new InvalidConfigError(`failureThreshold must be 0..100 (got ${value})`);
  }
}

export function assertMinRequests(value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidConfigError(`minRequests must be an integer >= 0 (got ${value})`);
  }
}

export function assertConsiderationWindow(value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidConfigError(`considerationWindowMs must be > 0 (got ${value})`);
  }
}

/** Fills in defaults and validates. */
export function resolveBreakerConfig(partial: Partial<BreakerConfig> = {}): BreakerConfig {
  const d = DEFAULT_BREAKER_CONFIG;
  const cfg: BreakerConfig = {
    failureThreshold: partial.failureThreshold ?? d.failureThreshold,
    minRequests: partial.minRequests ?? d.minRequests,
    considerationWindowMs: partial.considerationWindowMs ?? d.considerationWindowMs,
    enabled: partial.enabled ?? d.enabled,
    recordRejections: partial.recordRejections ?? d.recordRejections,
  };
  assertFailureThreshold(cfg.failureThreshold);
  assertMinRequests(cfg.minRequests);
  assertConsiderationWindow(cfg.considerationWindowMs);
  return cfg;
}

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  const n = Number(raw);
  if (Number.isNaN(n)) throw new InvalidConfigError(`${name} must be a number (got "${raw}")`);
  return n;
}

function envBool(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === "") return undefined;
  if (raw === "false" || raw === "0" || raw === "no" || raw === "off") return false;
  return true;
}

/**
 * Reads TRIPWIRE_FAILURE_THRESHOLD, TRIPWIRE_MIN_REQUESTS, TRIPWIRE_WINDOW_MS,
 * TRIPWIRE_ENABLED and TRIPWIRE_RECORD_REJECTIONS. Unset variables keep
 * their defaults.
 */
export function breakerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): BreakerConfig {
  const partial: Partial<BreakerConfig> = {};

  const failureThreshold = envNumber(env, "TRIPWIRE_FAILURE_THRESHOLD");
  if (failureThreshold !== undefined) partial.failureThreshold = failureThreshold;

  const minRequests = envNumber(env, "TRIPWIRE_MIN_REQUESTS");
  if (minRequests !== undefined) partial.minRequests = minRequests;

  const windowMs = envNumber(env, "TRIPWIRE_WINDOW_MS");
  if (windowMs !== undefined) partial.considerationWindowMs = windowMs;

  const enabled = envBool(env, "TRIPWIRE_ENABLED");
  if (enabled !== undefined) partial.enabled = enabled;

  const recordRejections = envBool(env, "TRIPWIRE_RECORD_REJECTIONS");
  if (recordRejections !== undefined) partial.recordRejections = recordRejections;

  return resolveBreakerConfig(partial);
}
