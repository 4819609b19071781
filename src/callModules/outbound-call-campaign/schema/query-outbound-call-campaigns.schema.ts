import { z } from 'zod';

import { OutboundCallCampaignStatus } from '../interface/outbound-call-campaign.interface';

/** Accepts a single status or an array, returns a normalized array (or undefined). */
const StatusOneOrMany = z
  .union([
    z.nativeEnum(OutboundCallCampaignStatus),
    z.array(z.nativeEnum(OutboundCallCampaignStatus)).nonempty(),
  ])
  .optional()
  .transform((v) => (v == null ? undefined : Array.isArray(v) ? v : [v]));

export const QueryOutboundCallCampaignsSchema = z
  .object({
    page: z.coerce.number().int().min(1).default(1),
    limit: z.coerce.number().int().min(1).max(100).default(20),

    status: StatusOneOrMany,
    clientReference: z.string().trim().max(120).optional(),
    q: z
      .string()
      .trim()
      .max(120, 'Max 120 chars')
      .optional()
      .transform((s) => (s ? s : undefined)), // empty -> undefined

    createdFrom: z.coerce.date().optional(),
    createdTo: z.coerce.date().optional(),

    sortBy: z.enum(['createdAt', 'scheduledAt', 'name', 'status']).default('createdAt'),
    sortOrder: z.enum(['asc', 'desc']).default('desc'),
  })
  .strict()
  .refine((d) => !(d.createdFrom && d.createdTo) || d.createdFrom <= d.createdTo, {
    message: 'createdFrom must be <= createdTo',
    path: ['createdFrom'],
  });

export type QueryOutboundCallCampaignsInput = z.infer<typeof QueryOutboundCallCampaignsSchema>;
