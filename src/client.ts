// src/client.ts
import { EventEmitter } from "node:events";
import { BreakerEngine } from "./breaker.js";
import { MemoryCache } from "./cache.js";
import { OpenCircuitError } from "./errors.js";
import type { GuardedHttpEventName, GuardedHttpEvents } from "./events.js";
import { createHttpTransport } from "./http.js";
import { HostIdentityClassifier, toIdentityClassifier, type IdentityClassifier } from "./identity.js";
import { StandardOutcomeClassifier, type OutcomeClassifier } from "./outcome.js";
import type { StatRecord } from "./stats.js";
import type { BreakerStatus, GuardedHttpClientOptions, GuardedRequest, GuardedResponse, Transport } from "./types.js";

function genRequestId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 10)}`;
}

const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

/**
 * Sends requests through a circuit breaker.
 *
 * Each request is identified, checked against its service's breaker, sent,
 * and its outcome recorded. Listener notifications for a request happen
 * before its promise settles.
 */
export class GuardedHttpClient extends EventEmitter {
  readonly breaker: BreakerEngine;
  private readonly transport: Transport;
  private readonly identity: IdentityClassifier;
  private readonly outcome: OutcomeClassifier;

  constructor(opts: GuardedHttpClientOptions = {}) {
    super();

    this.breaker = new BreakerEngine({
      cache: opts.cache ?? new MemoryCache<StatRecord>(),
      config: opts.breaker,
      listeners: opts.listeners,
      namespace: opts.namespace,
      logger: opts.logger,
    });

    this.transport =
      opts.transport ??
      createHttpTransport({
        requestTimeoutMs: opts.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
        dispatcher: opts.dispatcher,
      });
    this.identity = toIdentityClassifier(opts.identity ?? new HostIdentityClassifier());
    this.outcome = opts.outcome ?? new StandardOutcomeClassifier();
  }

  identify(req: GuardedRequest): string {
    return this.identity.identify(req);
  }

  async request(req: GuardedRequest): Promise<GuardedResponse> {
    const identity = this.identity.identify(req);
    const requestId = genRequestId();

    let status: BreakerStatus;
    try {
      status = this.breaker.decide(identity, req).status;
    } catch (err) {
      if (err instanceof OpenCircuitError) {
        const stats = this.breaker.stats(identity).toJSON();
        this.emitEvent("request:rejected", { identity, requestId, request: req, stats, error: err });
      }
      throw err;
    }

    if (status === "OPEN") {
      // Disabled breaker: let it through but say so
      const stats = this.breaker.stats(identity).toJSON();
      this.emitEvent("request:theoretical-reject", { identity, requestId, request: req, stats });
    }

    const start = Date.now();
    this.emitEvent("request:start", { identity, requestId, request: req });

    let res: GuardedResponse;
    try {
      res = await this.transport(req);
    } catch (err) {
      const isFailure = this.outcome.isErrorFailure(err, identity);
      if (isFailure) this.record(identity, status, true);

      const durationMs = Date.now() - start;
      this.emitEvent("request:failure", {
        identity,
        requestId,
        request: req,
        error: err,
        durationMs,
        recorded: isFailure,
        isFailure,
      });
      throw err;
    }

    const isFailure = this.outcome.isResponseFailure(res, identity);
    this.record(identity, status, isFailure);

    const durationMs = Date.now() - start;
    this.emitEvent("request:success", {
      identity,
      requestId,
      request: req,
      status: res.status,
      durationMs,
      recorded: true,
      isFailure,
    });
    return res;
  }

  /** Same as request(); the interceptor-style name. */
  handle(req: GuardedRequest): Promise<GuardedResponse> {
    return this.request(req);
  }

  /** Drops the stats for a service; emits breaker:transition if it was open. */
  reset(identity: string): void {
    const change = this.breaker.reset(identity);
    if (change) this.emitEvent("breaker:transition", change);
  }

  private emitEvent<K extends GuardedHttpEventName>(name: K, payload: GuardedHttpEvents[K]): void {
    this.emit(name, payload);
  }

  private record(identity: string, previousStatus: BreakerStatus, isFailure: boolean): void {
    const change = this.breaker.recordOutcome(identity, previousStatus, isFailure);
    if (change) this.emitEvent("breaker:transition", change);
  }
}
