// src/outcome.ts
import { TransportError } from "./errors.js";
import type { GuardedResponse } from "./types.js";

/**
 * Decides which outcomes count against a service. Errors it does not mark
 * as failures are not recorded at all.
 */
export interface OutcomeClassifier {
  isResponseFailure(res: GuardedResponse, identity: string): boolean;
  isErrorFailure(err: unknown, identity: string): boolean;
}

/** 5xx responses and transport errors (including timeouts) are failures. */
export class StandardOutcomeClassifier implements OutcomeClassifier {
  isResponseFailure(res: GuardedResponse, _identity: string): boolean {
    return res.status >= 500 && res.status <= 599;
  }

  isErrorFailure(err: unknown, _identity: string): boolean {
    return err instanceof TransportError;
  }
}
