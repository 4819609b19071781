// src/callModules/dispatcher/result-aggregator.ts
import { Logger } from '@nestjs/common';

import type { CampaignResult, ProgressSnapshot, ResultStore } from './interface/campaign-dispatch.interface';

/**
 * Running tally for one campaign run.
 *
 * Counters change synchronously inside `record`, so a snapshot taken right
 * after a record call always includes it. Persistence goes through a single
 * promise chain: results reach the store one at a time, in record order.
 */
export class ResultAggregator {
  private readonly logger = new Logger(ResultAggregator.name);
  private readonly recorded = new Map<string, CampaignResult>();
  private readonly inFlight = new Set<string>();
  private succeeded = 0;
  private failed = 0;
  private cancelled = 0;

  private writes: Promise<void> = Promise.resolve();
  private writeError: { error: unknown } | null = null;

  constructor(
    readonly campaignId: string,
    readonly total: number,
    private readonly store?: ResultStore,
  ) {}

  markInFlight(contactId: string): void {
    if (this.recorded.has(contactId)) {
      throw new Error(`Contact ${contactId} already has a result in campaign ${this.campaignId}`);
    }
    this.inFlight.add(contactId);
  }

  record(result: CampaignResult): void {
    if (this.recorded.has(result.contactId)) {
      throw new Error(`Contact ${result.contactId} already has a result in campaign ${this.campaignId}`);
    }
    this.recorded.set(result.contactId, result);
    this.inFlight.delete(result.contactId);

    switch (result.finalStatus) {
      case 'Succeeded':
        this.succeeded += 1;
        break;
      case 'Failed':
      case 'GaveUp':
        this.failed += 1;
        break;
      case 'Cancelled':
        this.cancelled += 1;
        break;
    }

    const store = this.store;
    if (store) {
      this.writes = this.writes
        .then(() => store.append(this.campaignId, result))
        .catch((error: unknown) => {
          this.writeError ??= { error };
          this.logger.error(`[record] could not persist result for ${result.contactId}`, {
            campaignId: this.campaignId,
            err: error instanceof Error ? error.message : String(error),
          });
        });
    }
  }

  snapshot(): ProgressSnapshot {
    const done = this.recorded.size;
    return Object.freeze({
      total: this.total,
      queued: Math.max(0, this.total - done - this.inFlight.size),
      inFlight: this.inFlight.size,
      succeeded: this.succeeded,
      failed: this.failed,
      cancelled: this.cancelled,
    });
  }

  /** Results in the order they were recorded. */
  results(): CampaignResult[] {
    return [...this.recorded.values()];
  }

  /** Waits for every pending store write; rethrows the first write failure. */
  async flush(): Promise<void> {
    await this.writes;
    if (this.writeError) throw this.writeError.error;
  }
}
