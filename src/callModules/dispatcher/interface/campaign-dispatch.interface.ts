import type { CallErrorKind } from '../../../common/errors/call-errors';
import type { ScriptConfigInput } from '../../call-client/schema/script-config.schema';
import type { RetryPolicyOptions } from '../../retry/retry-policy';
import type { TranscriptSummary } from '../../transcript/transcript-classifier';

export interface Contact {
  id: string;
  rawPhone: string;
  displayName: string;
  clinicReference: string;
  /** Extra values for script placeholders (appointment date, provider, ...). */
  fields?: Record<string, string>;
}

export type CallAttemptStatus = 'Pending' | 'InProgress' | 'Succeeded' | 'Failed' | 'TimedOut';

export interface CallAttempt {
  readonly contactId: string;
  readonly attemptNumber: number; // 1-based
  readonly startedAt: Date;
  readonly status: CallAttemptStatus;
  readonly errorKind?: CallErrorKind;
  readonly callId?: string;
  readonly finishedAt?: Date;
}

export type FinalStatus = 'Succeeded' | 'Failed' | 'GaveUp' | 'Cancelled';

export interface CampaignResult {
  readonly contactId: string;
  readonly finalStatus: FinalStatus;
  readonly attempts: readonly CallAttempt[];
  /** Terminal error for Failed, last transient error for GaveUp. */
  readonly errorKind?: CallErrorKind;
  readonly phone?: string;
  readonly transcript?: string;
  readonly summary?: TranscriptSummary;
  readonly durationSeconds?: number;
  readonly completedAt: Date;
}

export interface CampaignRun {
  campaignId: string;
  contacts: readonly Contact[];
  concurrencyLimit: number;
  rateLimitPerMinute: number;
  retryPolicy?: Partial<RetryPolicyOptions>;
  scriptConfig: ScriptConfigInput;
  /** ISO region or calling code used for numbers without a "+" prefix. */
  defaultCountry?: string;
  attemptTimeoutMs?: number;
  pollIntervalMs?: number;
  maxPollIntervalMs?: number;
}

export interface ProgressSnapshot {
  readonly total: number;
  readonly queued: number;
  readonly inFlight: number;
  readonly succeeded: number;
  /** Failed plus GaveUp. */
  readonly failed: number;
  readonly cancelled: number;
}

/** Where the aggregator persists finished results. */
export interface ResultStore {
  append(campaignId: string, result: CampaignResult): Promise<void>;
  list(campaignId: string): Promise<CampaignResult[]>;
  clear(campaignId: string): Promise<void>;
}

export const RESULT_STORE = Symbol('RESULT_STORE');
