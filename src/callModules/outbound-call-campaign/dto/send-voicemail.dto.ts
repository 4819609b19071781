import { z } from 'zod';
import { SendVoicemailSchema } from '../schema/outbound-call-campaign.schema';

export type SendVoicemailDto = z.infer<typeof SendVoicemailSchema>;
export { SendVoicemailSchema };
