import { z } from 'zod';
import { CreateOutboundCallCampaignSchema } from '../schema/outbound-call-campaign.schema';

export type CreateOutboundCallCampaignDto = z.infer<typeof CreateOutboundCallCampaignSchema>;
export { CreateOutboundCallCampaignSchema };
