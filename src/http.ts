// src/http.ts
import { errors, request as undiciRequest, type Dispatcher } from "undici";
import { RequestTimeoutError, TransportError } from "./errors.js";
import type { GuardedRequest, GuardedResponse, Transport } from "./types.js";

function normalizeHeaders(headers: Record<string, string | string[] | undefined>): Record<string, string> {
  const out: Record<string, string> = {};

  for (const [k, v] of Object.entries(headers)) {
    if (Array.isArray(v)) out[k.toLowerCase()] = v.join(", ");
    else if (typeof v === "string") out[k.toLowerCase()] = v;
  }
  return out;
}

function isTransportFailure(err: unknown): boolean {
  // Bad arguments are our bug, not the upstream's
  if (err instanceof errors.InvalidArgumentError) return false;
  if (err instanceof errors.UndiciError) return true;
  // Raw socket/DNS errors (ECONNREFUSED, ENOTFOUND, ...)
  return err instanceof Error && "code" in err && typeof err.code === "string";
}

/**
 * Execute a single HTTP request with a hard timeout using AbortController.
 * No retries. No breaker. Just raw outbound I/O with a timeout.
 *
 * Timeouts and network errors reject with TransportError. A request aborted
 * through its own `signal` rejects with the original abort error, which the
 * standard classifier does not count.
 */
export async function doHttpRequest(
  req: GuardedRequest,
  requestTimeoutMs: number,
  dispatcher?: Dispatcher
): Promise<GuardedResponse> {
  const ac = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    ac.abort();
  }, requestTimeoutMs);

  const onCallerAbort = (): void => ac.abort(req.signal?.reason);
  if (req.signal?.aborted) onCallerAbort();
  else req.signal?.addEventListener("abort", onCallerAbort, { once: true });

  try {
    const res = await undiciRequest(req.url, {
      method: req.method,
      headers: req.headers,
      body: req.body,
      signal: ac.signal,
      dispatcher,
    });

    const body = await res.body.arrayBuffer();
    return {
      status: res.statusCode,
      headers: normalizeHeaders(res.headers),
      body: new Uint8Array(body),
    };
  } catch (err) {
    if (timedOut) throw new RequestTimeoutError(requestTimeoutMs);
    if (req.signal?.aborted) throw err;
    if (isTransportFailure(err)) {
      const message = err instanceof Error ? err.message : String(err);
      throw new TransportError(`${req.method} ${req.url} failed: ${message}`, { cause: err });
    }
    throw err;
  } finally {
    clearTimeout(timer);
    req.signal?.removeEventListener("abort", onCallerAbort);
  }
}

export function createHttpTransport(opts: { requestTimeoutMs: number; dispatcher?: Dispatcher }): Transport {
  if (!Number.isFinite(opts.requestTimeoutMs) || opts.requestTimeoutMs <= 0) {
    throw new Error(`requestTimeoutMs must be > 0 (got ${opts.requestTimeoutMs})`);
  }
  return (req) => doHttpRequest(req, opts.requestTimeoutMs, opts.dispatcher);
}
