// src/errors.ts
import type { GuardedRequest } from "./types.js";

/**
 * Raised by the breaker when a request is refused because the circuit for
 * its service is open. The transport is never called for such a request.
 */
export class OpenCircuitError extends Error {
  override readonly name = "OpenCircuitError";

  constructor(
    public readonly identity: string,
    public readonly request: GuardedRequest
  ) {
    super(
      `The request to ${request.method} ${request.url} was rejected due to an open circuit for service \`${identity}\`.`
    );
  }
}

/**
 * Any failure to get a response out of the upstream: connection refused,
 * reset, DNS, timeout. The standard outcome classifier counts these.
 */
export class TransportError extends Error {
  override name = "TransportError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class RequestTimeoutError extends TransportError {
  override name = "RequestTimeoutError";

  constructor(public readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
  }
}

export class InvalidConfigError extends Error {
  override readonly name = "InvalidConfigError";
}
