// src/stats.ts
import type { OutcomeKind } from "./types.js";

export interface StatRecord {
  successes: number;
  failures: number;
  rejections: number;
}

function clampAdd(current: number, delta: number): number {
  if (!Number.isInteger(delta)) throw new Error(`delta must be an integer (got ${delta})`);
  return Math.max(0, current + delta);
}

function sanitize(value: unknown): number {
  return typeof value === "number" && Number.isInteger(value) && value > 0 ? value : 0;
}

/**
 * Success/failure/rejection counts for one service.
 * Knows nothing about storage or time; fields never go below zero.
 */
export class StatCounter {
  private _successes: number;
  private _failures: number;
  private _rejections: number;

  constructor(successes = 0, failures = 0, rejections = 0) {
    this._successes = sanitize(successes);
    this._failures = sanitize(failures);
    this._rejections = sanitize(rejections);
  }

  /** Rebuilds a counter from a cached record. Garbage fields read as 0. */
  static from(record: Partial<StatRecord> | undefined): StatCounter {
    if (!record) return new StatCounter();
    return new StatCounter(sanitize(record.successes), sanitize(record.failures), sanitize(record.rejections));
  }

  get successes(): number {
    return this._successes;
  }

  get failures(): number {
    return this._failures;
  }

  get rejections(): number {
    return this._rejections;
  }

  /** Calls that actually reached the service. */
  get requestsSentToService(): number {
    return this._successes + this._failures;
  }

  get totalAttempted(): number {
    return this.requestsSentToService + this._rejections;
  }

  /** 0..100, rounded. No data counts as fully healthy. */
  successRatio(): number {
    const sent = this.requestsSentToService;
    if (sent === 0) return 100;
    return Math.round((this._successes / sent) * 100);
  }

  failureRatio(): number {
    return 100 - this.successRatio();
  }

  addSuccess(n = 1): this {
    this._successes = clampAdd(this._successes, n);
    return this;
  }

  addFailure(n = 1): this {
    this._failures = clampAdd(this._failures, n);
    return this;
  }

  addRejection(n = 1): this {
    this._rejections = clampAdd(this._rejections, n);
    return this;
  }

  add(kind: OutcomeKind, n = 1): this {
    switch (kind) {
      case "success":
        return this.addSuccess(n);
      case "failure":
        return this.addFailure(n);
      case "rejection":
        return this.addRejection(n);
    }
  }

  clone(): StatCounter {
    return new StatCounter(this._successes, this._failures, this._rejections);
  }

  toJSON(): StatRecord {
    return { successes: this._successes, failures: this._failures, rejections: this._rejections };
  }

  toString(): string {
    return `successes ${this._successes}, failures ${this._failures}, rejections ${this._rejections}`;
  }
}
