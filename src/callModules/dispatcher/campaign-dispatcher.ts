// src/callModules/dispatcher/campaign-dispatcher.ts
import { Inject, Injectable, Logger } from '@nestjs/common';

import {
  CallErrorKind,
  CampaignAbortedError,
  CampaignCancelledError,
  InvalidPhoneNumberError,
  callErrorKindOf,
} from '../../common/errors/call-errors';
import { sleep, TIMED_OUT, withDeadline } from '../../common/utils/sleep';
import { CALL_CLIENT, CallClient, CallHandle, RemoteCallStatus, Transcript } from '../call-client/interface/call-client.interface';
import { parseScriptConfig, ScriptConfig } from '../call-client/schema/script-config.schema';
import { renderScript } from '../call-client/script-renderer';
import { NormalizedPhone } from '../phone-number/interface/normalized-phone.interface';
import { isValidDefaultCountry, PhoneNumberNormalizer } from '../phone-number/phone-number.normalizer';
import { Permit, RateLimiter } from '../rate-limiter/rate-limiter';
import { RetryPolicy } from '../retry/retry-policy';
import { TranscriptClassifier } from '../transcript/transcript-classifier';
import {
  CallAttempt,
  CallAttemptStatus,
  CampaignResult,
  CampaignRun,
  Contact,
  FinalStatus,
} from './interface/campaign-dispatch.interface';
import { ResultAggregator } from './result-aggregator';
import { ResultChannel } from './result-channel';

export interface RunOptions {
  /** Aborting stops new initiations; in-flight attempts still finish. */
  signal?: AbortSignal;
  aggregator?: ResultAggregator;
  /** Shared limiter (e.g. across campaigns). Without one the run builds and disposes its own. */
  rateLimiter?: RateLimiter;
}

const DEFAULT_ATTEMPT_TIMEOUT_MS = 300_000;
const DEFAULT_POLL_INTERVAL_MS = 2_000;
const DEFAULT_MAX_POLL_INTERVAL_MS = 15_000;
const POLL_BACKOFF = 1.5;

interface ResolvedRun {
  campaignId: string;
  contacts: readonly Contact[];
  concurrencyLimit: number;
  rateLimitPerMinute: number;
  script: ScriptConfig;
  policy: RetryPolicy;
  defaultCountry?: string;
  attemptTimeoutMs: number;
  pollIntervalMs: number;
  maxPollIntervalMs: number;
}

interface RunContext {
  run: ResolvedRun;
  limiter: RateLimiter;
  signal: AbortSignal;
}

type ResultExtras = Partial<
  Pick<CampaignResult, 'errorKind' | 'phone' | 'transcript' | 'summary' | 'durationSeconds'>
>;

interface AttemptOutcome {
  attempt: CallAttempt;
  transcript?: Transcript;
}

/**
 * Drives a contact list through
 * Queued → Normalizing → Dispatching → Awaiting → (Succeeded | Retrying → Dispatching | GaveUp),
 * with NormalizeFailed as an early terminal state.
 *
 * Results come out in completion order, NOT input order. Every contact is
 * emitted exactly once, including the ones a cancellation never reached.
 */
@Injectable()
export class CampaignDispatcher {
  private readonly logger = new Logger(CampaignDispatcher.name);

  constructor(
    @Inject(CALL_CLIENT) private readonly client: CallClient,
    private readonly normalizer: PhoneNumberNormalizer,
    private readonly classifier: TranscriptClassifier,
  ) {}

  /**
   * Validates the run up front (throws before any call is placed) and returns
   * a lazy, one-shot stream of results. Work starts on the first pull.
   *
   * If the provider rejects our credentials the remaining contacts are
   * emitted as Cancelled and the stream then throws CampaignAbortedError.
   */
  run(campaignRun: CampaignRun, options: RunOptions = {}): AsyncIterable<CampaignResult> {
    const resolved = this.resolve(campaignRun);
    let consumed = false;

    return {
      [Symbol.asyncIterator]: () => {
        if (consumed) throw new Error(`Campaign run ${resolved.campaignId} can only be consumed once`);
        consumed = true;
        return this.execute(resolved, options);
      },
    };
  }

  // ---------------------------------------------------------------------------
  // Run loop
  // ---------------------------------------------------------------------------

  private async *execute(run: ResolvedRun, options: RunOptions): AsyncGenerator<CampaignResult, void, undefined> {
    const aggregator = options.aggregator ?? new ResultAggregator(run.campaignId, run.contacts.length);
    const limiter = options.rateLimiter ?? new RateLimiter({ limit: run.rateLimitPerMinute, name: run.campaignId });
    const ownsLimiter = !options.rateLimiter;

    const halt = new AbortController();
    const state: { abortedBy: CallErrorKind | null } = { abortedBy: null };
    const external = options.signal;
    const onCancel = () => {
      if (halt.signal.aborted) return;
      this.logger.log(`[dispatch] ${run.campaignId} cancellation requested`);
      halt.abort();
    };
    if (external?.aborted) onCancel();
    else external?.addEventListener('abort', onCancel, { once: true });

    const channel = new ResultChannel<CampaignResult>();
    const emit = (result: CampaignResult) => {
      aggregator.record(result);
      channel.push(result);
      if (result.finalStatus === 'Failed' && result.errorKind === CallErrorKind.AuthError && !halt.signal.aborted) {
        state.abortedBy = CallErrorKind.AuthError;
        this.logger.error(`[dispatch] ${run.campaignId} aborting: provider rejected credentials`);
        halt.abort();
      }
    };

    const ctx: RunContext = { run, limiter, signal: halt.signal };
    const queue = [...run.contacts];
    const workerCount = Math.min(run.concurrencyLimit, queue.length);
    this.logger.log(`[dispatch] ${run.campaignId} starting: contacts=${queue.length} workers=${workerCount}`);

    // A crashed worker halts the run; the others drain the queue as Cancelled
    // before the channel closes with the crash.
    const workers = Array.from({ length: workerCount }, () =>
      this.worker(ctx, queue, aggregator, emit).catch((err: unknown) => {
        this.logger.error(`[dispatch] ${run.campaignId} worker crashed: ${err instanceof Error ? err.message : String(err)}`);
        halt.abort();
        throw err;
      }),
    );
    const settled = Promise.allSettled(workers).then((outcomes) => {
      const crash = outcomes.find((o): o is PromiseRejectedResult => o.status === 'rejected');
      if (crash) channel.close(crash.reason);
      else channel.close();
    });

    try {
      for await (const result of channel) yield result;
      if (state.abortedBy) throw new CampaignAbortedError(run.campaignId, state.abortedBy);
    } finally {
      external?.removeEventListener('abort', onCancel);
      // Consumer walked away early: stop dispatching and let in-flight calls settle.
      if (!channel.isClosed) halt.abort();
      await settled;
      if (ownsLimiter) limiter.dispose();
      this.logger.log(`[dispatch] ${run.campaignId} finished`, aggregator.snapshot());
    }
  }

  private async worker(
    ctx: RunContext,
    queue: Contact[],
    aggregator: ResultAggregator,
    emit: (result: CampaignResult) => void,
  ): Promise<void> {
    for (let contact = queue.shift(); contact; contact = queue.shift()) {
      if (ctx.signal.aborted) {
        emit(this.finish(contact, 'Cancelled', []));
        continue;
      }
      aggregator.markInFlight(contact.id);
      emit(await this.dispatchContact(ctx, contact));
    }
  }

  private async dispatchContact(ctx: RunContext, contact: Contact): Promise<CampaignResult> {
    const { run } = ctx;

    let phone: NormalizedPhone;
    try {
      phone = this.normalizer.normalize(contact.rawPhone, run.defaultCountry);
    } catch (e) {
      if (!(e instanceof InvalidPhoneNumberError)) throw e;
      this.logger.warn(`[normalize] ${run.campaignId}/${contact.id}: ${e.message}`);
      return this.finish(contact, 'Failed', [], { errorKind: CallErrorKind.InvalidPhoneNumber });
    }

    const script = renderScript(run.script, contact);
    const attempts: CallAttempt[] = [];

    for (let n = 1; ; n++) {
      const permit = await this.acquirePermit(ctx);
      if (!permit) return this.cancelled(contact, attempts, phone);

      const { attempt, transcript } = await this.attempt(ctx, contact, phone, script, n, permit);
      attempts.push(attempt);

      if (attempt.status === 'Succeeded') {
        return this.finish(contact, 'Succeeded', attempts, {
          phone: phone.e164,
          summary: this.classifier.classify(transcript?.text),
          ...(transcript && { transcript: transcript.text }),
          ...(transcript?.durationSeconds !== undefined && { durationSeconds: transcript.durationSeconds }),
        });
      }

      const errorKind = attempt.errorKind ?? CallErrorKind.TimedOut;
      const decision = run.policy.shouldRetry(attempt, n);
      if (decision.kind === 'give-up') {
        const status: FinalStatus = decision.reason === 'exhausted' ? 'GaveUp' : 'Failed';
        this.logger.warn(`[dispatch] ${run.campaignId}/${contact.id} ${status} after ${n} attempt(s): ${errorKind}`);
        return this.finish(contact, status, attempts, { phone: phone.e164, errorKind });
      }

      this.logger.debug(`[retry] ${run.campaignId}/${contact.id} attempt ${n} ${errorKind}; next in ${decision.delayMs}ms`);
      try {
        await sleep(decision.delayMs, ctx.signal);
      } catch (e) {
        if (e instanceof CampaignCancelledError) return this.cancelled(contact, attempts, phone);
        throw e;
      }
    }
  }

  private async acquirePermit(ctx: RunContext): Promise<Permit | null> {
    if (ctx.signal.aborted) return null;
    try {
      const permit = await ctx.limiter.acquire(ctx.signal);
      if (ctx.signal.aborted) {
        ctx.limiter.release(permit, { used: false });
        return null;
      }
      return permit;
    } catch (e) {
      if (e instanceof CampaignCancelledError) return null;
      throw e;
    }
  }

  /** One initiate-and-await cycle, bounded by the per-attempt timeout. */
  private async attempt(
    ctx: RunContext,
    contact: Contact,
    phone: NormalizedPhone,
    script: ScriptConfig,
    attemptNumber: number,
    permit: Permit,
  ): Promise<AttemptOutcome> {
    const { run } = ctx;
    const startedAt = new Date();
    const deadline = startedAt.getTime() + run.attemptTimeoutMs;
    const done = (
      status: CallAttemptStatus,
      extra: { errorKind?: CallErrorKind; callId?: string } = {},
    ): AttemptOutcome => ({
      attempt: Object.freeze({
        contactId: contact.id,
        attemptNumber,
        startedAt,
        status,
        ...extra,
        finishedAt: new Date(),
      }),
    });

    let handle: CallHandle | typeof TIMED_OUT;
    try {
      handle = await withDeadline(this.client.initiate(phone, script), run.attemptTimeoutMs);
    } catch (e) {
      const errorKind = callErrorKindOf(e);
      this.logger.warn(`[initiate] ${run.campaignId}/${contact.id} attempt ${attemptNumber}: ${errorKind}`);
      return done('Failed', { errorKind });
    } finally {
      ctx.limiter.release(permit);
    }
    if (handle === TIMED_OUT) return done('TimedOut', { errorKind: CallErrorKind.TimedOut });

    const callId = handle.callId;
    let interval = run.pollIntervalMs;
    for (;;) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) return done('TimedOut', { errorKind: CallErrorKind.TimedOut, callId });

      let status: RemoteCallStatus | typeof TIMED_OUT;
      try {
        status = await withDeadline(this.client.pollStatus(handle), remaining);
      } catch (e) {
        return done('Failed', { errorKind: callErrorKindOf(e), callId });
      }

      if (status === TIMED_OUT) return done('TimedOut', { errorKind: CallErrorKind.TimedOut, callId });
      if (status === 'Failed') return done('Failed', { errorKind: CallErrorKind.CallFailed, callId });
      if (status === 'Succeeded') {
        const transcript = await this.transcriptFor(ctx, contact, handle);
        return { ...done('Succeeded', { callId }), transcript };
      }

      await sleep(Math.min(interval, Math.max(0, deadline - Date.now())));
      interval = Math.min(Math.ceil(interval * POLL_BACKOFF), run.maxPollIntervalMs);
    }
  }

  private async transcriptFor(ctx: RunContext, contact: Contact, handle: CallHandle): Promise<Transcript | undefined> {
    try {
      const transcript = await withDeadline(this.client.fetchTranscript(handle), ctx.run.attemptTimeoutMs);
      return transcript === TIMED_OUT ? undefined : transcript;
    } catch (e) {
      // The call itself succeeded; a missing transcript only degrades the summary.
      this.logger.warn(
        `[transcript] ${ctx.run.campaignId}/${contact.id} unavailable: ${e instanceof Error ? e.message : String(e)}`,
      );
      return undefined;
    }
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private cancelled(contact: Contact, attempts: CallAttempt[], phone: NormalizedPhone): CampaignResult {
    const last = attempts[attempts.length - 1];
    return this.finish(contact, 'Cancelled', attempts, {
      phone: phone.e164,
      ...(last?.errorKind && { errorKind: last.errorKind }),
    });
  }

  private finish(
    contact: Contact,
    finalStatus: FinalStatus,
    attempts: CallAttempt[],
    extra: ResultExtras = {},
  ): CampaignResult {
    return Object.freeze({
      contactId: contact.id,
      finalStatus,
      attempts: Object.freeze([...attempts]),
      ...extra,
      completedAt: new Date(),
    });
  }

  private resolve(run: CampaignRun): ResolvedRun {
    if (!Number.isInteger(run.concurrencyLimit) || run.concurrencyLimit < 1) {
      throw new RangeError(`concurrencyLimit must be a positive integer (got ${run.concurrencyLimit})`);
    }
    if (!Number.isInteger(run.rateLimitPerMinute) || run.rateLimitPerMinute < 1) {
      throw new RangeError(`rateLimitPerMinute must be a positive integer (got ${run.rateLimitPerMinute})`);
    }
    if (run.defaultCountry !== undefined && !isValidDefaultCountry(run.defaultCountry)) {
      throw new RangeError(`Unsupported default country "${run.defaultCountry}"`);
    }

    const seen = new Set<string>();
    for (const c of run.contacts) {
      if (seen.has(c.id)) throw new RangeError(`Duplicate contact id "${c.id}" in campaign ${run.campaignId}`);
      seen.add(c.id);
    }

    const pollIntervalMs = run.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    return {
      campaignId: run.campaignId,
      contacts: run.contacts,
      concurrencyLimit: run.concurrencyLimit,
      rateLimitPerMinute: run.rateLimitPerMinute,
      script: parseScriptConfig(run.scriptConfig),
      policy: new RetryPolicy(run.retryPolicy),
      defaultCountry: run.defaultCountry,
      attemptTimeoutMs: run.attemptTimeoutMs ?? DEFAULT_ATTEMPT_TIMEOUT_MS,
      pollIntervalMs,
      maxPollIntervalMs: Math.max(pollIntervalMs, run.maxPollIntervalMs ?? DEFAULT_MAX_POLL_INTERVAL_MS),
    };
  }
}
