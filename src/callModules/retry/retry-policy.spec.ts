import { CallErrorKind } from '../../common/errors/call-errors';
import type { CallAttempt, CallAttemptStatus } from '../dispatcher/interface/campaign-dispatch.interface';
import { ERROR_CLASSIFICATION, RetryPolicy } from './retry-policy';

const attempt = (
  status: CallAttemptStatus,
  errorKind?: CallErrorKind,
  attemptNumber = 1,
): CallAttempt => ({
  contactId: 'c-1',
  attemptNumber,
  startedAt: new Date('2026-03-02T09:00:00Z'),
  status,
  ...(errorKind ? { errorKind } : {}),
});

describe('RetryPolicy', () => {
  const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 1_000, maxDelayMs: 3_000 });

  it('classifies every error kind', () => {
    expect(Object.keys(ERROR_CLASSIFICATION).sort()).toEqual(Object.values(CallErrorKind).sort());
  });

  it.each([CallErrorKind.ServiceUnavailable, CallErrorKind.RateLimited, CallErrorKind.TimedOut, CallErrorKind.CallFailed])(
    'retries %s with exponential backoff until the cap',
    (kind) => {
      expect(policy.shouldRetry(attempt('Failed', kind, 1), 1)).toEqual({ kind: 'retry', delayMs: 1_000 });
      expect(policy.shouldRetry(attempt('Failed', kind, 2), 2)).toEqual({ kind: 'retry', delayMs: 2_000 });
      expect(policy.shouldRetry(attempt('Failed', kind, 3), 3)).toEqual({ kind: 'give-up', reason: 'exhausted' });
    },
  );

  it.each([CallErrorKind.InvalidPhoneNumber, CallErrorKind.AuthError, CallErrorKind.CallRejected])(
    'never retries %s',
    (kind) => {
      for (let n = 1; n <= 5; n++) {
        expect(policy.shouldRetry(attempt('Failed', kind, n), n)).toEqual({ kind: 'give-up', reason: 'terminal' });
      }
    },
  );

  it('treats a timed-out attempt without an error kind as transient', () => {
    expect(policy.shouldRetry(attempt('TimedOut'), 1)).toEqual({ kind: 'retry', delayMs: 1_000 });
  });

  it('gives up on a failure that carries no error kind', () => {
    expect(policy.shouldRetry(attempt('Failed'), 1)).toEqual({ kind: 'give-up', reason: 'terminal' });
  });

  it('does not retry a success', () => {
    expect(policy.shouldRetry(attempt('Succeeded'), 1)).toEqual({ kind: 'give-up', reason: 'succeeded' });
  });

  it('refuses to judge an unfinished attempt', () => {
    expect(() => policy.shouldRetry(attempt('InProgress'), 1)).toThrow('has not finished');
  });

  it('caps the delay', () => {
    const wide = new RetryPolicy({ maxAttempts: 10, baseDelayMs: 1_000, maxDelayMs: 5_000 });
    expect([1, 2, 3, 4, 5].map((n) => wide.delayFor(n))).toEqual([1_000, 2_000, 4_000, 5_000, 5_000]);
  });

  it('uses 3 attempts and a 1s base by default', () => {
    expect(new RetryPolicy().options).toEqual({ maxAttempts: 3, baseDelayMs: 1_000, maxDelayMs: 60_000 });
  });

  it('rejects nonsense options', () => {
    expect(() => new RetryPolicy({ maxAttempts: 0 })).toThrow(RangeError);
    expect(() => new RetryPolicy({ baseDelayMs: 10, maxDelayMs: 5 })).toThrow(RangeError);
  });
});
