import type { CampaignSettings } from '../schema/outbound-call-campaign.schema';

export const OutboundCallCampaignStatus = {
  DRAFT: 'DRAFT',
  SCHEDULED: 'SCHEDULED',
  RUNNING: 'RUNNING',
  COMPLETED: 'COMPLETED',
  CANCELLED: 'CANCELLED',
  ABORTED: 'ABORTED',
} as const;

export type OutboundCallCampaignStatus = (typeof OutboundCallCampaignStatus)[keyof typeof OutboundCallCampaignStatus];

export interface IOutboundCallCampaign {
  id: string;
  name: string;
  clientReference: string | null;
  status: OutboundCallCampaignStatus;
  settings: CampaignSettings;
  contactsCount: number;

  // lifecycle
  scheduledAt: Date | null;
  startedAt: Date | null;
  completedAt: Date | null;
  cancelledAt: Date | null;
  /** Set when the run ended early (ABORTED). */
  abortReason: string | null;

  // bookkeeping
  createdAt: Date;
  updatedAt: Date;
}
