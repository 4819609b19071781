import { CallErrorKind, CampaignAbortedError, ScriptConfigError } from '../../common/errors/call-errors';
import { sleep } from '../../common/utils/sleep';
import { FakeCallClient } from '../call-client/fake-call.client';
import type { CallClient, CallHandle, RemoteCallStatus } from '../call-client/interface/call-client.interface';
import { PhoneNumberNormalizer } from '../phone-number/phone-number.normalizer';
import { RateLimiter } from '../rate-limiter/rate-limiter';
import { TranscriptClassifier } from '../transcript/transcript-classifier';
import { CampaignDispatcher } from './campaign-dispatcher';
import type { CampaignResult, CampaignRun, Contact } from './interface/campaign-dispatch.interface';
import { ResultAggregator } from './result-aggregator';

const phoneOf = (i: number) => `+1213373${4200 + i}`;

const contact = (i: number, rawPhone = phoneOf(i)): Contact => ({
  id: `c-${i}`,
  rawPhone,
  displayName: `Patient ${i}`,
  clinicReference: 'Main St',
});

const contacts = (n: number) => Array.from({ length: n }, (_, i) => contact(i));

const campaign = (overrides: Partial<CampaignRun> = {}): CampaignRun => ({
  campaignId: 'camp-1',
  contacts: contacts(3),
  concurrencyLimit: 2,
  rateLimitPerMinute: 600,
  scriptConfig: { task: 'Hi {{displayName}}, confirming your visit at {{clinicReference}}' },
  retryPolicy: { maxAttempts: 3, baseDelayMs: 1_000, maxDelayMs: 60_000 },
  ...overrides,
});

const dispatcherFor = (client: CallClient, normalizer = new PhoneNumberNormalizer()) =>
  new CampaignDispatcher(client, normalizer, new TranscriptClassifier());

async function collect(results: AsyncIterable<CampaignResult>): Promise<CampaignResult[]> {
  const out: CampaignResult[] = [];
  for await (const r of results) out.push(r);
  return out;
}

/** Holds every call open for `callMs` and records how many overlap. */
class OverlapClient implements CallClient {
  active = 0;
  peak = 0;
  private seq = 0;

  constructor(private readonly callMs: number) {}

  async initiate(phone: CallHandle['phone']): Promise<CallHandle> {
    this.active += 1;
    this.peak = Math.max(this.peak, this.active);
    return { callId: `overlap-${++this.seq}`, phone };
  }

  async pollStatus(): Promise<RemoteCallStatus> {
    await sleep(this.callMs);
    this.active -= 1;
    return 'Succeeded';
  }

  async fetchTranscript() {
    return undefined;
  }
}

/** Blows up with a plain Error on one raw number. */
class ExplodingNormalizer extends PhoneNumberNormalizer {
  constructor(private readonly trigger: string) {
    super();
  }

  normalize(raw: string, defaultCountry?: string) {
    if (raw === this.trigger) throw new Error('normalizer exploded');
    return super.normalize(raw, defaultCountry);
  }
}

describe('CampaignDispatcher', () => {
  describe('happy path', () => {
    it('calls every contact once with its rendered script', async () => {
      const client = new FakeCallClient({ transcript: 'Yes, I will be there', durationSeconds: 42 });
      const results = await collect(dispatcherFor(client).run(campaign()));

      expect(results).toHaveLength(3);
      expect(new Set(results.map((r) => r.contactId))).toEqual(new Set(['c-0', 'c-1', 'c-2']));
      for (const r of results) {
        expect(r).toMatchObject({
          finalStatus: 'Succeeded',
          transcript: 'Yes, I will be there',
          summary: 'confirmed',
          durationSeconds: 42,
        });
        expect(r.attempts).toHaveLength(1);
        expect(Object.isFrozen(r)).toBe(true);
      }

      const first = client.initiated.find((c) => c.phone.e164 === '+12133734200');
      expect(first?.script.task).toBe('Hi Patient 0, confirming your visit at Main St');
    });

    it('summarizes a call without a transcript as busy_voicemail', async () => {
      const client = new FakeCallClient();
      const [result] = await collect(dispatcherFor(client).run(campaign({ contacts: [contact(0)] })));
      expect(result).toMatchObject({ finalStatus: 'Succeeded', phone: '+12133734200', summary: 'busy_voicemail' });
      expect(result.transcript).toBeUndefined();
    });

    it('never runs more calls at once than the concurrency limit', async () => {
      const client = new OverlapClient(10);
      const results = await collect(
        dispatcherFor(client).run(campaign({ contacts: contacts(6), concurrencyLimit: 2, pollIntervalMs: 5 })),
      );
      expect(results).toHaveLength(6);
      expect(client.peak).toBe(2);
    });

    it('handles an empty contact list', async () => {
      const results = await collect(dispatcherFor(new FakeCallClient()).run(campaign({ contacts: [] })));
      expect(results).toEqual([]);
    });
  });

  describe('timed behaviour', () => {
    const t0 = new Date('2026-03-02T09:00:00Z').getTime();

    beforeEach(() => {
      jest.useFakeTimers({ now: t0 });
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    it('emits results in completion order', async () => {
      const client = new FakeCallClient().setBehavior(phoneOf(0), { callDurationMs: 5_000 });
      const done = collect(dispatcherFor(client).run(campaign({ contacts: contacts(2) })));

      await jest.advanceTimersByTimeAsync(5_000);
      const results = await done;
      expect(results.map((r) => r.contactId)).toEqual(['c-1', 'c-0']);
    });

    it('backs off exponentially between transient failures and then gives up', async () => {
      const client = new FakeCallClient({ initiate: ['ServiceUnavailable'] });
      const done = collect(dispatcherFor(client).run(campaign({ contacts: [contact(0)] })));

      await jest.advanceTimersByTimeAsync(3_000);
      const [result] = await done;

      expect(result.finalStatus).toBe('GaveUp');
      expect(result.errorKind).toBe(CallErrorKind.ServiceUnavailable);
      expect(result.attempts.map((a) => a.startedAt.getTime() - t0)).toEqual([0, 1_000, 3_000]);
      expect(result.attempts.map((a) => a.attemptNumber)).toEqual([1, 2, 3]);
      expect(client.initiateCount(phoneOf(0))).toBe(3);
    });

    it('succeeds on a retry after a transient failure', async () => {
      const client = new FakeCallClient({ initiate: ['RateLimited', 'accept'] });
      const done = collect(dispatcherFor(client).run(campaign({ contacts: [contact(0)] })));

      await jest.advanceTimersByTimeAsync(1_000);
      const [result] = await done;

      expect(result.finalStatus).toBe('Succeeded');
      expect(result.attempts.map((a) => [a.status, a.errorKind])).toEqual([
        ['Failed', CallErrorKind.RateLimited],
        ['Succeeded', undefined],
      ]);
    });

    it('times out an attempt that never settles', async () => {
      const client = new FakeCallClient({ outcome: 'Pending' });
      const done = collect(
        dispatcherFor(client).run(
          campaign({
            contacts: [contact(0)],
            retryPolicy: { maxAttempts: 1 },
            attemptTimeoutMs: 10_000,
            pollIntervalMs: 2_000,
          }),
        ),
      );

      await jest.advanceTimersByTimeAsync(10_000);
      const [result] = await done;

      expect(result).toMatchObject({ finalStatus: 'GaveUp', errorKind: CallErrorKind.TimedOut });
      expect(result.attempts).toHaveLength(1);
      expect(result.attempts[0]).toMatchObject({ status: 'TimedOut', callId: 'fake-1' });
      expect(result.attempts[0].finishedAt?.getTime()).toBe(t0 + 10_000);
    });

    it('spaces initiations to the per-minute rate', async () => {
      const client = new FakeCallClient();
      const done = collect(
        dispatcherFor(client).run(campaign({ contacts: contacts(3), concurrencyLimit: 3, rateLimitPerMinute: 2 })),
      );

      await jest.advanceTimersByTimeAsync(60_000);
      const results = await done;

      expect(results).toHaveLength(3);
      expect(client.initiated.map((c) => c.at - t0)).toEqual([0, 0, 60_000]);
    });

    it('cancels a contact waiting out a retry delay and keeps its attempts', async () => {
      const client = new FakeCallClient({ initiate: ['ServiceUnavailable'] });
      const controller = new AbortController();
      const done = collect(
        dispatcherFor(client).run(campaign({ contacts: [contact(0)] }), { signal: controller.signal }),
      );

      await jest.advanceTimersByTimeAsync(500);
      controller.abort();
      const [result] = await done;

      expect([result.finalStatus, result.attempts.length, result.errorKind]).toEqual([
        'Cancelled',
        1,
        CallErrorKind.ServiceUnavailable,
      ]);
      expect(result.phone).toBe(phoneOf(0));
      expect(client.initiateCount(phoneOf(0))).toBe(1);
    });

    it('cancels a contact still waiting for a rate-limit permit', async () => {
      const client = new FakeCallClient();
      const controller = new AbortController();
      const done = collect(
        dispatcherFor(client).run(campaign({ contacts: contacts(2), rateLimitPerMinute: 1 }), {
          signal: controller.signal,
        }),
      );

      await jest.advanceTimersByTimeAsync(1_000);
      controller.abort();
      const results = await done;

      expect(results.map((r) => [r.contactId, r.finalStatus, r.attempts.length])).toEqual([
        ['c-0', 'Succeeded', 1],
        ['c-1', 'Cancelled', 0],
      ]);
      expect(client.initiated).toHaveLength(1);
    });

    it('treats a disposed shared limiter as a cancellation', async () => {
      const limiter = new RateLimiter({ limit: 1, name: 'global' });
      const client = new FakeCallClient();
      const done = collect(
        dispatcherFor(client).run(campaign({ contacts: contacts(3), concurrencyLimit: 3 }), { rateLimiter: limiter }),
      );

      await jest.advanceTimersByTimeAsync(1_000);
      limiter.dispose();
      const results = await done;

      expect(results.map((r) => [r.contactId, r.finalStatus])).toEqual([
        ['c-0', 'Succeeded'],
        ['c-1', 'Cancelled'],
        ['c-2', 'Cancelled'],
      ]);
    });
  });

  describe('failures', () => {
    it('reports an invalid phone number without dialing it', async () => {
      const client = new FakeCallClient();
      const list = [contact(0), contact(1), contact(2, 'not a phone'), contact(3), contact(4)];
      const results = await collect(dispatcherFor(client).run(campaign({ contacts: list })));

      expect(results).toHaveLength(5);
      const bad = results.find((r) => r.contactId === 'c-2');
      expect(bad).toMatchObject({ finalStatus: 'Failed', errorKind: CallErrorKind.InvalidPhoneNumber, attempts: [] });
      expect(client.initiated).toHaveLength(4);
    });

    it('does not retry a rejected call', async () => {
      const client = new FakeCallClient().setBehavior(phoneOf(0), { initiate: ['CallRejected'] });
      const [result] = await collect(dispatcherFor(client).run(campaign({ contacts: [contact(0)] })));

      expect(result).toMatchObject({ finalStatus: 'Failed', errorKind: CallErrorKind.CallRejected });
      expect(result.attempts).toHaveLength(1);
      expect(client.initiateCount(phoneOf(0))).toBe(1);
    });

    it('marks a call the provider reports as failed', async () => {
      const client = new FakeCallClient({ outcome: 'Failed' });
      const [result] = await collect(
        dispatcherFor(client).run(campaign({ contacts: [contact(0)], retryPolicy: { maxAttempts: 1 } })),
      );
      expect(result).toMatchObject({ finalStatus: 'GaveUp', errorKind: CallErrorKind.CallFailed });
    });

    it('aborts the run on an authentication error after emitting every contact', async () => {
      const client = new FakeCallClient().setBehavior(phoneOf(0), { initiate: ['AuthError'] });
      const seen: CampaignResult[] = [];
      const run = dispatcherFor(client).run(campaign({ contacts: contacts(4), concurrencyLimit: 1 }));

      await expect(
        (async () => {
          for await (const r of run) seen.push(r);
        })(),
      ).rejects.toBeInstanceOf(CampaignAbortedError);

      expect(seen.map((r) => [r.contactId, r.finalStatus])).toEqual([
        ['c-0', 'Failed'],
        ['c-1', 'Cancelled'],
        ['c-2', 'Cancelled'],
        ['c-3', 'Cancelled'],
      ]);
      expect(seen[0].errorKind).toBe(CallErrorKind.AuthError);
      expect(client.initiated).toHaveLength(1);
    });

    it('drains the other workers before surfacing a worker crash', async () => {
      const client = new FakeCallClient();
      const list = [contact(0), contact(1, 'boom'), contact(2), contact(3)];
      const seen: CampaignResult[] = [];
      const run = dispatcherFor(client, new ExplodingNormalizer('boom')).run(campaign({ contacts: list }));

      await expect(
        (async () => {
          for await (const r of run) seen.push(r);
        })(),
      ).rejects.toThrow('normalizer exploded');

      expect(seen.map((r) => r.contactId).sort()).toEqual(['c-0', 'c-2', 'c-3']);
      expect(seen.filter((r) => r.contactId !== 'c-0').map((r) => r.finalStatus)).toEqual(['Cancelled', 'Cancelled']);
    });
  });

  describe('cancellation', () => {
    it('stops dispatching but lets in-flight calls finish', async () => {
      const client = new FakeCallClient({ callDurationMs: 30 });
      const controller = new AbortController();
      const aggregator = new ResultAggregator('camp-1', 10);
      const results: CampaignResult[] = [];

      const run = dispatcherFor(client).run(campaign({ contacts: contacts(10), pollIntervalMs: 5 }), {
        signal: controller.signal,
        aggregator,
      });
      for await (const r of run) {
        results.push(r);
        if (results.length === 2) controller.abort();
      }

      const placed = client.initiated.length;
      expect(results).toHaveLength(10);
      expect(new Set(results.map((r) => r.contactId)).size).toBe(10);
      expect(placed).toBeGreaterThanOrEqual(2);
      expect(placed).toBeLessThanOrEqual(4);
      expect(results.filter((r) => r.finalStatus === 'Succeeded')).toHaveLength(placed);
      expect(results.filter((r) => r.finalStatus === 'Cancelled')).toHaveLength(10 - placed);
      expect(aggregator.snapshot()).toEqual({
        total: 10,
        queued: 0,
        inFlight: 0,
        succeeded: placed,
        failed: 0,
        cancelled: 10 - placed,
      });
    });

    it('cancels every contact when the signal is already aborted', async () => {
      const client = new FakeCallClient();
      const controller = new AbortController();
      controller.abort();

      const results = await collect(dispatcherFor(client).run(campaign(), { signal: controller.signal }));
      expect(results.map((r) => r.finalStatus)).toEqual(['Cancelled', 'Cancelled', 'Cancelled']);
      expect(results.every((r) => r.attempts.length === 0)).toBe(true);
      expect(client.initiated).toHaveLength(0);
    });
  });

  describe('run contract', () => {
    it('can only be consumed once', async () => {
      const run = dispatcherFor(new FakeCallClient()).run(campaign());
      await collect(run);
      expect(() => run[Symbol.asyncIterator]()).toThrow('can only be consumed once');
    });

    it('leaves a shared rate limiter usable after the run', async () => {
      const limiter = new RateLimiter({ limit: 100, name: 'shared' });
      await collect(dispatcherFor(new FakeCallClient()).run(campaign(), { rateLimiter: limiter }));

      expect(limiter.inWindow).toBe(3);
      await expect(limiter.acquire()).resolves.toMatchObject({ id: expect.any(Number) });
      limiter.dispose();
    });

    it('validates the run before placing any call', () => {
      const dispatcher = dispatcherFor(new FakeCallClient());
      expect(() => dispatcher.run(campaign({ contacts: [contact(1), contact(1)] }))).toThrow(
        'Duplicate contact id "c-1"',
      );
      expect(() => dispatcher.run(campaign({ scriptConfig: { task: '' } }))).toThrow(ScriptConfigError);
      expect(() => dispatcher.run(campaign({ concurrencyLimit: 0 }))).toThrow(RangeError);
      expect(() => dispatcher.run(campaign({ rateLimitPerMinute: 1.5 }))).toThrow(RangeError);
      expect(() => dispatcher.run(campaign({ defaultCountry: 'Atlantis' }))).toThrow(RangeError);
    });
  });
});
