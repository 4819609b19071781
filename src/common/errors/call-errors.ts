// src/common/errors/call-errors.ts

/**
 * Every way a single call attempt can fail. The retry policy keeps an
 * exhaustive transient/terminal map over this set.
 */
export const CallErrorKind = {
  InvalidPhoneNumber: 'InvalidPhoneNumber',
  AuthError: 'AuthError',
  ServiceUnavailable: 'ServiceUnavailable',
  RateLimited: 'RateLimited',
  TimedOut: 'TimedOut',
  CallFailed: 'CallFailed',
  CallRejected: 'CallRejected',
} as const;

export type CallErrorKind = (typeof CallErrorKind)[keyof typeof CallErrorKind];

/** Kinds a CallClient may raise from `initiate` / `pollStatus` / `fetchTranscript`. */
export type RemoteCallErrorKind =
  | typeof CallErrorKind.ServiceUnavailable
  | typeof CallErrorKind.AuthError
  | typeof CallErrorKind.RateLimited
  | typeof CallErrorKind.CallRejected;

export class InvalidPhoneNumberError extends Error {
  readonly kind = CallErrorKind.InvalidPhoneNumber;

  constructor(
    readonly raw: string,
    reason: string,
  ) {
    super(`Invalid phone number "${raw}": ${reason}`);
    this.name = 'InvalidPhoneNumberError';
  }
}

export class CallClientError extends Error {
  constructor(
    readonly kind: RemoteCallErrorKind,
    message: string,
    readonly httpStatus?: number,
  ) {
    super(message);
    this.name = 'CallClientError';
  }
}

/** Raised by a campaign run that stopped early because the provider rejected our credentials. */
export class CampaignAbortedError extends Error {
  constructor(
    readonly campaignId: string,
    readonly reason: CallErrorKind,
  ) {
    super(`Campaign ${campaignId} aborted: ${reason}`);
    this.name = 'CampaignAbortedError';
  }
}

export class CampaignCancelledError extends Error {
  constructor(message = 'Campaign run cancelled') {
    super(message);
    this.name = 'CampaignCancelledError';
  }
}

export class ScriptConfigError extends Error {
  constructor(
    readonly issues: Array<{ path: string; message: string }>,
  ) {
    super(`Invalid script config: ${issues.map((i) => `${i.path || '(root)'} ${i.message}`).join('; ')}`);
    this.name = 'ScriptConfigError';
  }
}

/** Maps anything a CallClient threw onto an error kind. Unknown failures count as service trouble. */
export function callErrorKindOf(error: unknown): CallErrorKind {
  if (error instanceof CallClientError) return error.kind;
  if (error instanceof InvalidPhoneNumberError) return error.kind;
  return CallErrorKind.ServiceUnavailable;
}
