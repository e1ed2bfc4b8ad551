// src/identity.ts
import type { GuardedRequest } from "./types.js";

/** Names the downstream service a request belongs to. Equal strings share stats. */
export interface IdentityClassifier {
  identify(req: GuardedRequest): string;
}

export type IdentityFn = (req: GuardedRequest) => string;

/** `api.example.com:8443` — one breaker per host (port included when present). */
export class HostIdentityClassifier implements IdentityClassifier {
  identify(req: GuardedRequest): string {
    return new URL(req.url).host;
  }
}

/** `GET https://api.example.com/v1/users` — one breaker per method and path. */
export class EndpointIdentityClassifier implements IdentityClassifier {
  identify(req: GuardedRequest): string {
    const u = new URL(req.url);
    const scheme = u.protocol.replace(/:$/, "");
    const path = u.pathname.replace(/^\/+|\/+$/g, "");
    return `${req.method} ${scheme}://${u.host}/${path}`;
  }
}

export function toIdentityClassifier(c: IdentityClassifier | IdentityFn): IdentityClassifier {
  return typeof c === "function" ? { identify: c } : c;
}
