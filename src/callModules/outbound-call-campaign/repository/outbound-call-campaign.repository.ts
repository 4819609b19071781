// src/callModules/outbound-call-campaign/repository/outbound-call-campaign.repository.ts
import { Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';

import { RecordNotFoundError } from '../../../common/errors/store-errors';
import type { CampaignPatch, CampaignStore, NewCampaign } from '../interface/campaign-stores.interface';
import { IOutboundCallCampaign, OutboundCallCampaignStatus } from '../interface/outbound-call-campaign.interface';
import type {
  IOutboundCallCampaignQuery,
  IPaginated,
  OutboundCallCampaignSortBy,
} from '../interface/outbound-call-campaign-query.interface';

type Sortable = string | number;

const sortKey: Record<OutboundCallCampaignSortBy, (c: IOutboundCallCampaign) => Sortable> = {
  createdAt: (c) => c.createdAt.getTime(),
  // unscheduled campaigns sort last in ascending order
  scheduledAt: (c) => c.scheduledAt?.getTime() ?? Number.MAX_SAFE_INTEGER,
  name: (c) => c.name.toLowerCase(),
  status: (c) => c.status,
};

/** Process-local campaign store. Records are copied in and out so callers never share state with it. */
@Injectable()
export class InMemoryCampaignRepository implements CampaignStore {
  private readonly rows = new Map<string, IOutboundCallCampaign>();

  // ------------------------------------------------------------------
  // Create / Read / Update / Delete
  // ------------------------------------------------------------------

  async create(data: NewCampaign): Promise<IOutboundCallCampaign> {
    const now = new Date();
    const row: IOutboundCallCampaign = {
      id: randomUUID(),
      name: data.name,
      clientReference: data.clientReference ?? null,
      status: data.status,
      settings: data.settings,
      contactsCount: data.contactsCount,
      scheduledAt: data.scheduledAt ?? null,
      startedAt: null,
      completedAt: null,
      cancelledAt: null,
      abortReason: null,
      createdAt: now,
      updatedAt: now,
    };
    this.rows.set(row.id, row);
    return { ...row };
  }

  async findById(id: string): Promise<IOutboundCallCampaign | null> {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async findAll(): Promise<IOutboundCallCampaign[]> {
    return [...this.rows.values()].map((c) => ({ ...c }));
  }

  async findMany(query: IOutboundCallCampaignQuery): Promise<IPaginated<IOutboundCallCampaign>> {
    const q = query.q?.toLowerCase();
    const matches = [...this.rows.values()].filter(
      (c) =>
        (!query.status || query.status.includes(c.status)) &&
        (!query.clientReference || c.clientReference === query.clientReference) &&
        (!q || c.name.toLowerCase().includes(q)) &&
        (!query.createdFrom || c.createdAt >= query.createdFrom) &&
        (!query.createdTo || c.createdAt <= query.createdTo),
    );

    const key = sortKey[query.sortBy];
    const dir = query.sortOrder === 'asc' ? 1 : -1;
    matches.sort((a, b) => {
      const ka = key(a);
      const kb = key(b);
      return ka < kb ? -dir : ka > kb ? dir : 0;
    });

    const skip = (query.page - 1) * query.limit;
    return {
      data: matches.slice(skip, skip + query.limit).map((c) => ({ ...c })),
      total: matches.length,
      page: query.page,
      limit: query.limit,
    };
  }

  async update(id: string, patch: CampaignPatch): Promise<IOutboundCallCampaign> {
    const row = this.rows.get(id);
    if (!row) throw new RecordNotFoundError('Campaign', id);
    const next = { ...row, ...patch, updatedAt: new Date() };
    this.rows.set(id, next);
    return { ...next };
  }

  async remove(id: string): Promise<void> {
    if (!this.rows.delete(id)) throw new RecordNotFoundError('Campaign', id);
  }

  // ------------------------------------------------------------------
  // Scheduling
  // ------------------------------------------------------------------

  async findDueScheduled(now: Date): Promise<IOutboundCallCampaign[]> {
    return [...this.rows.values()]
      .filter(
        (c): c is IOutboundCallCampaign & { scheduledAt: Date } =>
          c.status === OutboundCallCampaignStatus.SCHEDULED && c.scheduledAt !== null && c.scheduledAt <= now,
      )
      .sort((a, b) => a.scheduledAt.getTime() - b.scheduledAt.getTime())
      .map((c) => ({ ...c }));
  }
}
