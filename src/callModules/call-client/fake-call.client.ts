// src/callModules/call-client/fake-call.client.ts
import { Logger } from '@nestjs/common';

import { CallClientError, RemoteCallErrorKind } from '../../common/errors/call-errors';
import { sleep } from '../../common/utils/sleep';
import type { NormalizedPhone } from '../phone-number/interface/normalized-phone.interface';
import type { ScriptConfig } from './schema/script-config.schema';
import type { CallClient, CallHandle, RemoteCallStatus, Transcript } from './interface/call-client.interface';

export interface FakeCallBehavior {
  /**
   * Outcome of each successive `initiate` for the number: an error kind to
   * throw, or 'accept'. The last entry repeats once the list runs out.
   */
  initiate?: Array<RemoteCallErrorKind | 'accept'>;
  /** What pollStatus settles on. 'Pending' never completes. */
  outcome?: RemoteCallStatus;
  /** How long after initiation the call settles. */
  callDurationMs?: number;
  transcript?: string;
  durationSeconds?: number;
}

export interface InitiatedCall {
  callId: string;
  phone: NormalizedPhone;
  script: ScriptConfig;
  at: number;
}

interface PlacedCall {
  behavior: FakeCallBehavior;
  startedAt: number;
}

/**
 * In-process stand-in for the calling provider. Used by the test suite and by
 * CALL_PROVIDER=fake for dry runs. Every initiation is recorded in `initiated`;
 * with a `historyLimit` only the most recent calls are kept.
 */
export class FakeCallClient implements CallClient {
  private readonly logger = new Logger(FakeCallClient.name);
  private readonly behaviors = new Map<string, FakeCallBehavior>();
  private readonly initiateCounts = new Map<string, number>();
  private readonly calls = new Map<string, PlacedCall>();
  readonly initiated: InitiatedCall[] = [];
  private seq = 0;

  constructor(
    private readonly defaults: FakeCallBehavior = {},
    private readonly initiateLatencyMs = 0,
    private readonly historyLimit = Number.POSITIVE_INFINITY,
  ) {}

  setBehavior(e164: string, behavior: FakeCallBehavior): this {
    this.behaviors.set(e164, behavior);
    return this;
  }

  initiateCount(e164: string): number {
    return this.initiateCounts.get(e164) ?? 0;
  }

  async initiate(phone: NormalizedPhone, script: ScriptConfig): Promise<CallHandle> {
    if (this.initiateLatencyMs > 0) await sleep(this.initiateLatencyMs);

    const behavior = { ...this.defaults, ...this.behaviors.get(phone.e164) };
    const n = this.initiateCount(phone.e164);
    this.initiateCounts.set(phone.e164, n + 1);

    const callId = `fake-${++this.seq}`;
    this.initiated.push({ callId, phone, script, at: Date.now() });
    if (this.initiated.length > this.historyLimit) this.initiated.shift();
    this.prune();

    const plan = behavior.initiate ?? ['accept'];
    const step = plan[Math.min(n, plan.length - 1)] ?? 'accept';
    if (step !== 'accept') {
      this.logger.debug(`[initiate] ${phone.e164} -> ${step}`);
      throw new CallClientError(step, `Fake provider refused call to ${phone.e164}: ${step}`);
    }

    this.calls.set(callId, { behavior, startedAt: Date.now() });
    this.prune();
    return { callId, phone };
  }

  async pollStatus(handle: CallHandle): Promise<RemoteCallStatus> {
    const call = this.lookup(handle);
    const outcome = call.behavior.outcome ?? 'Succeeded';
    if (outcome === 'Pending') return 'Pending';
    return Date.now() - call.startedAt >= (call.behavior.callDurationMs ?? 0) ? outcome : 'Pending';
  }

  async fetchTranscript(handle: CallHandle): Promise<Transcript | undefined> {
    const { behavior } = this.lookup(handle);
    if (behavior.transcript === undefined) return undefined;
    return {
      text: behavior.transcript,
      ...(behavior.durationSeconds !== undefined && { durationSeconds: behavior.durationSeconds }),
    };
  }

  /** Maps iterate in insertion order, so the first keys are the oldest. */
  private prune(): void {
    for (const key of this.calls.keys()) {
      if (this.calls.size <= this.historyLimit) break;
      this.calls.delete(key);
    }
    for (const key of this.initiateCounts.keys()) {
      if (this.initiateCounts.size <= this.historyLimit) break;
      this.initiateCounts.delete(key);
    }
  }

  private lookup(handle: CallHandle): PlacedCall {
    const call = this.calls.get(handle.callId);
    if (!call) throw new CallClientError('CallRejected', `Unknown call ${handle.callId}`, 404);
    return call;
  }
}
