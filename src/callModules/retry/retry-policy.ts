// src/callModules/retry/retry-policy.ts
import { CallErrorKind } from '../../common/errors/call-errors';
import type { CallAttempt } from '../dispatcher/interface/campaign-dispatch.interface';

export type ErrorClass = 'transient' | 'terminal';

/** Exhaustive: adding a CallErrorKind without classifying it fails to compile. */
export const ERROR_CLASSIFICATION: Readonly<Record<CallErrorKind, ErrorClass>> = Object.freeze({
  [CallErrorKind.ServiceUnavailable]: 'transient',
  [CallErrorKind.RateLimited]: 'transient',
  [CallErrorKind.TimedOut]: 'transient',
  [CallErrorKind.CallFailed]: 'transient',
  [CallErrorKind.InvalidPhoneNumber]: 'terminal',
  [CallErrorKind.AuthError]: 'terminal',
  [CallErrorKind.CallRejected]: 'terminal',
});

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicyOptions> = Object.freeze({
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 60_000,
});

export type RetryDecision =
  | { kind: 'retry'; delayMs: number }
  | { kind: 'give-up'; reason: 'succeeded' | 'terminal' | 'exhausted' };

export class RetryPolicy {
  readonly options: Readonly<RetryPolicyOptions>;

  constructor(options: Partial<RetryPolicyOptions> = {}) {
    const merged = { ...DEFAULT_RETRY_POLICY, ...options };
    if (!Number.isInteger(merged.maxAttempts) || merged.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer (got ${merged.maxAttempts})`);
    }
    if (merged.baseDelayMs < 0 || merged.maxDelayMs < merged.baseDelayMs) {
      throw new RangeError('Retry delays must satisfy 0 <= baseDelayMs <= maxDelayMs');
    }
    this.options = Object.freeze(merged);
  }

  isTransient(kind: CallErrorKind): boolean {
    return ERROR_CLASSIFICATION[kind] === 'transient';
  }

  /** base × 2^(attemptsSoFar − 1), capped at maxDelayMs. */
  delayFor(attemptsSoFar: number): number {
    const exp = Math.max(0, attemptsSoFar - 1);
    return Math.min(this.options.baseDelayMs * 2 ** exp, this.options.maxDelayMs);
  }

  shouldRetry(attempt: CallAttempt, attemptsSoFar: number): RetryDecision {
    if (attempt.status === 'Succeeded') return { kind: 'give-up', reason: 'succeeded' };
    if (attempt.status === 'Pending' || attempt.status === 'InProgress') {
      throw new Error(`Attempt ${attempt.attemptNumber} for ${attempt.contactId} has not finished`);
    }

    const kind = attempt.errorKind ?? (attempt.status === 'TimedOut' ? CallErrorKind.TimedOut : undefined);
    if (!kind || !this.isTransient(kind)) return { kind: 'give-up', reason: 'terminal' };
    if (attemptsSoFar >= this.options.maxAttempts) return { kind: 'give-up', reason: 'exhausted' };

    return { kind: 'retry', delayMs: this.delayFor(attemptsSoFar) };
  }
}
