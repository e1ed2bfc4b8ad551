export { GuardedHttpClient } from "./client.js";
export { BreakerEngine, type BreakerDecision, type BreakerEngineOptions } from "./breaker.js";
export { MetricStore } from "./store.js";
export { StatCounter, type StatRecord } from "./stats.js";
export { MemoryCache, type CacheStore } from "./cache.js";
export { doHttpRequest, createHttpTransport } from "./http.js";
export {
  HostIdentityClassifier,
  EndpointIdentityClassifier,
  toIdentityClassifier,
  type IdentityClassifier,
  type IdentityFn,
} from "./identity.js";
export { StandardOutcomeClassifier, type OutcomeClassifier } from "./outcome.js";
export { LoggingListener, type TransitionListener } from "./listeners.js";
export { silentLogger, type Logger } from "./logger.js";
export { DEFAULT_BREAKER_CONFIG, resolveBreakerConfig, breakerConfigFromEnv } from "./config.js";
export { OpenCircuitError, TransportError, RequestTimeoutError, InvalidConfigError } from "./errors.js";
export type * from "./events.js";
export type { BreakerSnapshot } from "./snapshot.js";
export type * from "./types.js";
