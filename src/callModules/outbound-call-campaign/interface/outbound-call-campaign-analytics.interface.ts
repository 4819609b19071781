import type { FinalStatus } from '../../dispatcher/interface/campaign-dispatch.interface';
import type { TranscriptSummary } from '../../transcript/transcript-classifier';

export interface IOutboundCallCampaignAnalytics {
  campaignId: string;
  /** Contacts with a recorded result. */
  totalCalls: number;
  totalDurationSeconds: number;
  /** confirmed / totalCalls × 100, one decimal; 0 without calls. */
  successRate: number;
  /** Transcript outcome per result; results without one count as busy_voicemail, so the buckets sum to totalCalls. */
  summaryCounts: Record<TranscriptSummary, number>;
  finalStatusCounts: Record<FinalStatus, number>;
}
