import type { OutboundCallCampaignStatus } from './outbound-call-campaign.interface';

export interface IOutboundCallCampaignOverview {
  /** Distinct client references across all campaigns. */
  totalClients: number;
  totalCampaigns: number;
  campaignsByStatus: Record<OutboundCallCampaignStatus, number>;
  totalCalls: number;
  confirmedCalls: number;

  // Derived
  successRate: number; // confirmedCalls / totalCalls × 100, one decimal
}
