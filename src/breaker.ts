// src/breaker.ts
import type { CacheStore } from "./cache.js";
import {
  assertConsiderationWindow,
  assertFailureThreshold,
  assertMinRequests,
  resolveBreakerConfig,
} from "./config.js";
import { OpenCircuitError } from "./errors.js";
import type { TransitionEvent } from "./events.js";
import type { TransitionListener } from "./listeners.js";
import type { Logger } from "./logger.js";
import type { BreakerSnapshot } from "./snapshot.js";
import { StatCounter, type StatRecord } from "./stats.js";
import { MetricStore } from "./store.js";
import type { BreakerConfig, BreakerStatus, GuardedRequest, OutcomeKind } from "./types.js";

export interface BreakerDecision {
  allowed: true;
  status: BreakerStatus;
}

export interface BreakerEngineOptions {
  cache: CacheStore<StatRecord>;
  config?: Partial<BreakerConfig>;
  listeners?: TransitionListener[];
  namespace?: string;
  logger?: Logger;
}

/**
 * Failure-rate circuit breaker over externally stored stats.
 *
 * Status is never stored: it is derived from the service's StatCounter every
 * time it is asked for. A service is OPEN once at least minRequests calls
 * reached it and its failure ratio is at or above failureThreshold. Nothing
 * moves it out of OPEN except successes, a manual reset, or the stats
 * expiring after a quiet consideration window.
 */
export class BreakerEngine {
  private readonly config: BreakerConfig;
  private readonly store: MetricStore;
  private readonly logger: Logger;
  private listeners: TransitionListener[];

  constructor(opts: BreakerEngineOptions) {
    this.config = resolveBreakerConfig(opts.config);
    this.store = new MetricStore({
      cache: opts.cache,
      considerationWindowMs: this.config.considerationWindowMs,
      namespace: opts.namespace,
    });
    this.logger = opts.logger ?? console;
    this.listeners = [...(opts.listeners ?? [])];
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  /** Current settings; a copy, use the setters to change them. */
  settings(): BreakerConfig {
    return { ...this.config };
  }

  stats(identity: string): StatCounter {
    try {
      return this.store.get(identity);
    } catch (err) {
      // Store outage: assume healthy rather than block traffic
      this.logger.error("Circuit breaker stats could not be read; assuming CLOSED", { identity, err });
      return new StatCounter();
    }
  }

  status(identity: string): BreakerStatus {
    return this.statusOf(this.stats(identity));
  }

  isClosed(identity: string): boolean {
    return this.status(identity) === "CLOSED";
  }

  isOpen(identity: string): boolean {
    return this.status(identity) === "OPEN";
  }

  isClosing(identity: string): boolean {
    return this.status(identity) === "CLOSING";
  }

  isAllowingRequests(identity: string): boolean {
    const s = this.status(identity);
    return s === "CLOSED" || s === "CLOSING";
  }

  isRejectingRequests(identity: string): boolean {
    return this.isOpen(identity);
  }

  isTripped(identity: string): boolean {
    return this.isOpen(identity);
  }

  /**
   * Pre-flight check for one request.
   * Throws OpenCircuitError when the circuit is open and the breaker enabled;
   * a disabled breaker only reports what it would have done.
   */
  decide(identity: string, request: GuardedRequest): BreakerDecision {
    const stats = this.stats(identity);
    const status = this.statusOf(stats);

    if (status === "OPEN") {
      if (!this.config.enabled) {
        for (const l of this.listeners) l.onRequestTheoreticallyRejected?.(identity, stats.clone(), request);
        return { allowed: true, status };
      }

      const recorded = this.config.recordRejections ? this.record(identity, "rejection") : undefined;
      const current = recorded ?? stats;
      for (const l of this.listeners) l.onRequestRejected?.(identity, current.clone(), request);
      throw new OpenCircuitError(identity, request);
    }

    return { allowed: true, status };
  }

  /**
   * Counts one call that reached the service and notifies listeners if the
   * status moved away from `previousStatus` (the status seen by decide()).
   */
  recordOutcome(identity: string, previousStatus: BreakerStatus, isFailure: boolean): TransitionEvent | undefined {
    const stats = this.record(identity, isFailure ? "failure" : "success");
    // Nothing was written, so nothing changed
    if (!stats) return undefined;
    return this.transition(identity, previousStatus, stats);
  }

  /** Hard reset: drops the service's stats. */
  reset(identity: string): TransitionEvent | undefined {
    const previousStatus = this.status(identity);
    this.store.reset(identity);
    return this.transition(identity, previousStatus, new StatCounter());
  }

  snapshot(identity: string): BreakerSnapshot {
    const stats = this.stats(identity);
    return {
      identity,
      status: this.statusOf(stats),
      enabled: this.config.enabled,
      ...stats.toJSON(),
      requestsSentToService: stats.requestsSentToService,
      successRatio: stats.successRatio(),
      failureRatio: stats.failureRatio(),
    };
  }

  addListener(listener: TransitionListener): void {
    this.listeners.push(listener);
  }

  addListeners(listeners: TransitionListener[]): void {
    this.listeners.push(...listeners);
  }

  setListeners(listeners: TransitionListener[]): void {
    this.listeners = [...listeners];
  }

  removeListener(listener: TransitionListener): void {
    this.listeners = this.listeners.filter((l) => l !== listener);
  }

  /**
   * If disabled, stats are still gathered and listeners still hear about
   * trips and rejections, but no request is ever refused.
   */
  setEnabled(enabled: boolean): void {
    this.config.enabled = enabled;
  }

  setFailureThreshold(percent: number): void {
    assertFailureThreshold(percent);
    this.config.failureThreshold = percent;
  }

  setMinRequests(n: number): void {
    assertMinRequests(n);
    this.config.minRequests = n;
  }

  setConsiderationWindow(ms: number): void {
    assertConsiderationWindow(ms);
    this.config.considerationWindowMs = ms;
    this.store.setConsiderationWindow(ms);
  }

  setRecordRejections(on: boolean): void {
    this.config.recordRejections = on;
  }

  private statusOf(stats: StatCounter): BreakerStatus {
    if (
      stats.requestsSentToService >= this.config.minRequests &&
      stats.failureRatio() >= this.config.failureThreshold
    ) {
      return "OPEN";
    }
    return "CLOSED";
  }

  private record(identity: string, kind: OutcomeKind): StatCounter | undefined {
    try {
      return this.store.recordEvent(identity, kind);
    } catch (err) {
      this.logger.error("Circuit breaker stats could not be written; event dropped", { identity, kind, err });
      return undefined;
    }
  }

  private transition(
    identity: string,
    previousStatus: BreakerStatus,
    stats: StatCounter
  ): TransitionEvent | undefined {
    const newStatus = this.statusOf(stats);
    if (newStatus === previousStatus) return undefined;

    const event: TransitionEvent = { identity, previousStatus, newStatus, stats: stats.toJSON() };

    // Each listener gets its own copy
    for (const l of this.listeners) {
      const own = stats.clone();
      switch (newStatus) {
        case "CLOSED":
          l.onBreakerReset?.(identity, own, previousStatus);
          break;
        case "OPEN":
          if (this.config.enabled) l.onBreakerTripped?.(identity, own, previousStatus);
          else l.onBreakerTheoreticallyTripped?.(identity, own, previousStatus);
          break;
        case "CLOSING":
          l.onBreakerClosing?.(identity, own);
          break;
      }
    }

    return event;
  }
}
