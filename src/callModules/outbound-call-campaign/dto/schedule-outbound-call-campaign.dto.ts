import { z } from 'zod';
import { ScheduleOutboundCallCampaignSchema } from '../schema/outbound-call-campaign.schema';

export type ScheduleOutboundCallCampaignDto = z.infer<typeof ScheduleOutboundCallCampaignSchema>;
export { ScheduleOutboundCallCampaignSchema };
