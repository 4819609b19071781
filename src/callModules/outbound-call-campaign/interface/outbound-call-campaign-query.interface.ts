import type { OutboundCallCampaignStatus } from './outbound-call-campaign.interface';

export type OutboundCallCampaignSortBy = 'createdAt' | 'scheduledAt' | 'name' | 'status';

export type SortOrder = 'asc' | 'desc';

/**
 * Normalized query shape AFTER Zod validation (QueryOutboundCallCampaignsSchema).
 * - Defaults applied: page, limit, sortBy, sortOrder
 * - status normalized to an array
 */
export interface IOutboundCallCampaignQuery {
  page: number;
  limit: number;

  status?: OutboundCallCampaignStatus[];
  clientReference?: string;
  q?: string; // name contains, case-insensitive

  createdFrom?: Date;
  createdTo?: Date;

  sortBy: OutboundCallCampaignSortBy;
  sortOrder: SortOrder;
}

export interface IPaginated<T> {
  data: T[];
  total: number;
  page: number;
  limit: number;
}
