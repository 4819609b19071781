import type { CampaignResult, FinalStatus, ResultStore } from './interface/campaign-dispatch.interface';
import { ResultAggregator } from './result-aggregator';

const result = (contactId: string, finalStatus: FinalStatus): CampaignResult => ({
  contactId,
  finalStatus,
  attempts: [],
  completedAt: new Date('2026-03-02T09:00:00Z'),
});

class MemoryResultStore implements ResultStore {
  readonly rows = new Map<string, CampaignResult[]>();
  failNext = false;

  async append(campaignId: string, r: CampaignResult): Promise<void> {
    if (this.failNext) {
      this.failNext = false;
      throw new Error('disk full');
    }
    this.rows.set(campaignId, [...(this.rows.get(campaignId) ?? []), r]);
  }

  async list(campaignId: string): Promise<CampaignResult[]> {
    return this.rows.get(campaignId) ?? [];
  }

  async clear(campaignId: string): Promise<void> {
    this.rows.delete(campaignId);
  }
}

describe('ResultAggregator', () => {
  it('tracks progress as contacts move through the run', () => {
    const agg = new ResultAggregator('camp-1', 4);
    expect(agg.snapshot()).toEqual({ total: 4, queued: 4, inFlight: 0, succeeded: 0, failed: 0, cancelled: 0 });

    agg.markInFlight('a');
    agg.markInFlight('b');
    expect(agg.snapshot()).toMatchObject({ queued: 2, inFlight: 2 });

    agg.record(result('a', 'Succeeded'));
    agg.record(result('b', 'GaveUp'));
    agg.record(result('c', 'Failed'));
    agg.record(result('d', 'Cancelled'));

    expect(agg.snapshot()).toEqual({ total: 4, queued: 0, inFlight: 0, succeeded: 1, failed: 2, cancelled: 1 });
    expect(agg.results().map((r) => r.contactId)).toEqual(['a', 'b', 'c', 'd']);
  });

  it('refuses a second result for the same contact', () => {
    const agg = new ResultAggregator('camp-1', 2);
    agg.record(result('a', 'Succeeded'));
    expect(() => agg.record(result('a', 'Failed'))).toThrow('Contact a already has a result in campaign camp-1');
    expect(() => agg.markInFlight('a')).toThrow('already has a result');
  });

  it('persists results in record order', async () => {
    const store = new MemoryResultStore();
    const agg = new ResultAggregator('camp-1', 3, store);
    agg.record(result('a', 'Succeeded'));
    agg.record(result('b', 'Failed'));
    agg.record(result('c', 'Cancelled'));

    await agg.flush();
    const stored = await store.list('camp-1');
    expect(stored.map((r) => r.contactId)).toEqual(['a', 'b', 'c']);
  });

  it('keeps counting when a write fails and reports it on flush', async () => {
    const store = new MemoryResultStore();
    store.failNext = true;
    const agg = new ResultAggregator('camp-1', 2, store);
    agg.record(result('a', 'Succeeded'));
    agg.record(result('b', 'Succeeded'));

    await expect(agg.flush()).rejects.toThrow('disk full');
    expect(agg.snapshot().succeeded).toBe(2);
    expect((await store.list('camp-1')).map((r) => r.contactId)).toEqual(['b']);
  });
});
