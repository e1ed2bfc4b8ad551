// src/store.ts
import type { CacheStore } from "./cache.js";
import { StatCounter, type StatRecord } from "./stats.js";
import type { OutcomeKind } from "./types.js";

/**
 * One StatCounter per service identity, kept in an external cache.
 *
 * Every recorded event renews the TTL of the whole counter, so a service's
 * stats only disappear after a full window with no traffic.
 *
 * recordEvent is a plain read-modify-write: two processes (or two interleaved
 * callers on an async-backed cache) writing the same identity can lose an
 * increment. Counts are approximate under contention.
 */
export class MetricStore {
  private readonly cache: CacheStore<StatRecord>;
  private readonly namespace: string;
  private considerationWindowMs: number;

  constructor(opts: { cache: CacheStore<StatRecord>; considerationWindowMs: number; namespace?: string }) {
    this.cache = opts.cache;
    this.namespace = opts.namespace ?? "tripwire";
    this.considerationWindowMs = opts.considerationWindowMs;
  }

  key(identity: string): string {
    return `${this.namespace}/${identity}`;
  }

  setConsiderationWindow(ms: number): void {
    this.considerationWindowMs = ms;
  }

  get(identity: string): StatCounter {
    return StatCounter.from(this.cache.get(this.key(identity)));
  }

  recordEvent(identity: string, kind: OutcomeKind): StatCounter {
    const key = this.key(identity);
    const stats = StatCounter.from(this.cache.get(key)).add(kind, 1);
    this.cache.set(key, stats.toJSON(), this.considerationWindowMs);
    return stats;
  }

  reset(identity: string): void {
    this.cache.delete(this.key(identity));
  }
}
