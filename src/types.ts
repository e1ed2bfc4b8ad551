import type { Dispatcher } from "undici";
import type { CacheStore } from "./cache.js";
import type { IdentityClassifier, IdentityFn } from "./identity.js";
import type { TransitionListener } from "./listeners.js";
import type { Logger } from "./logger.js";
import type { OutcomeClassifier } from "./outcome.js";
import type { StatRecord } from "./stats.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD" | "OPTIONS";

export interface GuardedRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  body?: string | Uint8Array | Buffer;

  /** Aborting through this signal is a cancellation, not a service failure. */
  signal?: AbortSignal;
}

export interface GuardedResponse {
  status: number;
  headers: Record<string, string>;
  body: Uint8Array; // keep raw; helpers can parse JSON
}

/**
 * Breaker status for one service identity.
 *
 * CLOSED and CLOSING let traffic through, OPEN rejects it. CLOSING is part of
 * the listener contract but the threshold rule never produces it.
 */
export type BreakerStatus = "CLOSED" | "OPEN" | "CLOSING";

export type OutcomeKind = "success" | "failure" | "rejection";

export interface BreakerConfig {
  failureThreshold: number;      // percent, 0..100 (e.g. 50)
  minRequests: number;           // e.g. 3
  considerationWindowMs: number; // e.g. 15 * 60_000
  enabled: boolean;

  /** Count actual rejections in the service's stats (renews the window). */
  recordRejections: boolean;
}

/** Sends one request. Resolves with any response, rejects on transport errors. */
export type Transport = (req: GuardedRequest) => Promise<GuardedResponse>;

export interface GuardedHttpClientOptions {
  breaker?: Partial<BreakerConfig>;

  /** Used by the default undici transport. */
  requestTimeoutMs?: number;
  dispatcher?: Dispatcher;

  /** Replaces the undici transport entirely. */
  transport?: Transport;

  /**
   * Where per-service stats live. Default: a MemoryCache private to this
   * client.
   */
  cache?: CacheStore<StatRecord>;

  /** Cache key prefix, so several breakers can share one cache. */
  namespace?: string;

  /**
   * Determines which breaker stats a request belongs to.
   * Default: HostIdentityClassifier
   */
  identity?: IdentityClassifier | IdentityFn;

  /** Default: StandardOutcomeClassifier */
  outcome?: OutcomeClassifier;

  listeners?: TransitionListener[];
  logger?: Logger;
}
