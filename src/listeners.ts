// src/listeners.ts
import type { Logger } from "./logger.js";
import type { StatCounter } from "./stats.js";
import type { BreakerStatus, GuardedRequest } from "./types.js";

/**
 * Receives breaker notifications. Every callback is optional and is called
 * synchronously, before the triggering request settles.
 */
export interface TransitionListener {
  /** The breaker closed again; requests flow to the service. */
  onBreakerReset?(identity: string, stats: StatCounter, previousStatus: BreakerStatus): void;
  onBreakerTripped?(identity: string, stats: StatCounter, previousStatus: BreakerStatus): void;
  /** Would have tripped, but the breaker is disabled. */
  onBreakerTheoreticallyTripped?(identity: string, stats: StatCounter, previousStatus: BreakerStatus): void;
  onRequestRejected?(identity: string, stats: StatCounter, request: GuardedRequest): void;
  onRequestTheoreticallyRejected?(identity: string, stats: StatCounter, request: GuardedRequest): void;
  onBreakerClosing?(identity: string, stats: StatCounter): void;
}

function describeRequest(req: GuardedRequest): string {
  return `${req.method} ${req.url}`;
}

/** Writes every breaker notification to a logger. */
export class LoggingListener implements TransitionListener {
  constructor(private readonly logger: Logger = console) {}

  onBreakerReset(identity: string, stats: StatCounter, previousStatus: BreakerStatus): void {
    this.logger.info(
      `Circuit breaker for service \`${identity}\` has been reset. Requests will be allowed to this service again.`,
      { identity, previousStatus, stats: stats.toJSON() }
    );
  }

  onBreakerTripped(identity: string, stats: StatCounter, previousStatus: BreakerStatus): void {
    this.logger.error(
      `Circuit breaker for service \`${identity}\` has been tripped. No further requests to this service will be allowed until the breaker is reset.`,
      { identity, previousStatus, stats: stats.toJSON() }
    );
  }

  onBreakerTheoreticallyTripped(identity: string, stats: StatCounter, previousStatus: BreakerStatus): void {
    this.logger.warn(
      `Circuit breaker for service \`${identity}\` would have been tripped, but the breaker is not enabled.`,
      { identity, previousStatus, stats: stats.toJSON() }
    );
  }

  onRequestRejected(identity: string, stats: StatCounter, request: GuardedRequest): void {
    this.logger.info(`Request to service \`${identity}\` was rejected by a tripped breaker.`, {
      identity,
      request: describeRequest(request),
      stats: stats.toJSON(),
    });
  }

  onRequestTheoreticallyRejected(identity: string, stats: StatCounter, request: GuardedRequest): void {
    this.logger.info(
      `Request to service \`${identity}\` would have been rejected by a tripped breaker, but the breaker is not enabled.`,
      { identity, request: describeRequest(request), stats: stats.toJSON() }
    );
  }

  onBreakerClosing(identity: string, stats: StatCounter): void {
    this.logger.debug(`Circuit breaker for service \`${identity}\` is closing.`, {
      identity,
      stats: stats.toJSON(),
    });
  }
}
