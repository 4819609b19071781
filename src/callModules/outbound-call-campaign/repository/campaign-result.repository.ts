import { Injectable } from '@nestjs/common';

import type { CampaignResult, ResultStore } from '../../dispatcher/interface/campaign-dispatch.interface';

/** Results per campaign in the order they were recorded. */
@Injectable()
export class InMemoryCampaignResultRepository implements ResultStore {
  private readonly results = new Map<string, CampaignResult[]>();

  async append(campaignId: string, result: CampaignResult): Promise<void> {
    const list = this.results.get(campaignId);
    if (list) list.push(result);
    else this.results.set(campaignId, [result]);
  }

  async list(campaignId: string): Promise<CampaignResult[]> {
    return [...(this.results.get(campaignId) ?? [])];
  }

  async clear(campaignId: string): Promise<void> {
    this.results.delete(campaignId);
  }
}
