import type { StatRecord } from "./stats.js";
import type { BreakerStatus, GuardedRequest } from "./types.js";

/** Built only to notify listeners; never stored. */
export interface TransitionEvent {
  identity: string;
  previousStatus: BreakerStatus;
  newStatus: BreakerStatus;
  stats: StatRecord;
}

export interface RequestEventBase {
  identity: string;
  request: GuardedRequest;
  requestId: string;
}

export interface RequestRejectedEvent extends RequestEventBase {
  stats: StatRecord;
  error?: Error; // absent for theoretical rejections
}

export interface RequestResultEvent extends RequestEventBase {
  durationMs: number;
  status?: number;     // set when the upstream answered
  error?: unknown;     // set on transport error
  recorded: boolean;   // false when the outcome was not counted
  isFailure: boolean;
}

/** Payload of each event GuardedHttpClient emits. */
export interface GuardedHttpEvents {
  "breaker:transition": TransitionEvent;
  "request:start": RequestEventBase;
  "request:success": RequestResultEvent;
  "request:failure": RequestResultEvent;
  "request:rejected": RequestRejectedEvent;
  "request:theoretical-reject": RequestRejectedEvent;
}

export type GuardedHttpEventName = keyof GuardedHttpEvents;
