import type { NormalizedPhone } from '../../phone-number/interface/normalized-phone.interface';
import type { ScriptConfig } from '../schema/script-config.schema';

export interface CallHandle {
  readonly callId: string;
  readonly phone: NormalizedPhone;
}

export type RemoteCallStatus = 'Pending' | 'Succeeded' | 'Failed';

export interface Transcript {
  text: string;
  durationSeconds?: number;
}

/**
 * The only seam that talks to the calling provider. Failures surface as
 * CallClientError with a RemoteCallErrorKind.
 */
export interface CallClient {
  initiate(phone: NormalizedPhone, script: ScriptConfig): Promise<CallHandle>;
  /** Read-only; safe to call repeatedly. */
  pollStatus(handle: CallHandle): Promise<RemoteCallStatus>;
  /** Only meaningful once pollStatus reported Succeeded. */
  fetchTranscript(handle: CallHandle): Promise<Transcript | undefined>;
}

export const CALL_CLIENT = Symbol('CALL_CLIENT');
