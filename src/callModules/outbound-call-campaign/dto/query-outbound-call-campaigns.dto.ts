import { z } from 'zod';
import { QueryOutboundCallCampaignsSchema } from '../schema/query-outbound-call-campaigns.schema';

export type QueryOutboundCallCampaignsDto = z.infer<typeof QueryOutboundCallCampaignsSchema>;
export { QueryOutboundCallCampaignsSchema };
