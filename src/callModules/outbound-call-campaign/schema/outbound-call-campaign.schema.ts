import { z } from 'zod';

import { ScriptConfigSchema } from '../../call-client/schema/script-config.schema';
import { isValidDefaultCountry } from '../../phone-number/phone-number.normalizer';

const Name = z.string().trim().min(1, 'Name is required').max(120, 'Max 120 chars');

// Phone numbers are NOT validated here: an unparseable number becomes a
// per-contact InvalidPhoneNumber result when the campaign runs.
export const ContactSchema = z
  .object({
    id: z.string().trim().min(1, 'id is required').max(120),
    rawPhone: z.string().max(40, 'Max 40 chars'),
    displayName: z.string().trim().max(200).default(''),
    clinicReference: z.string().trim().max(200).default(''),
    fields: z.record(z.string().max(500)).optional(),
  })
  .strict();

export const CampaignSettingsSchema = z
  .object({
    concurrencyLimit: z.coerce.number().int().min(1).max(50).default(2),
    rateLimitPerMinute: z.coerce.number().int().min(1).max(1000).default(30),
    maxAttempts: z.coerce.number().int().min(1).max(10).default(3),
    retryBaseDelayMs: z.coerce.number().int().min(0).default(30_000),
    retryMaxDelayMs: z.coerce.number().int().min(0).default(600_000),
    attemptTimeoutMs: z.coerce.number().int().min(1_000).max(3_600_000).default(300_000),
    pollIntervalMs: z.coerce.number().int().min(100).default(2_000),
    maxPollIntervalMs: z.coerce.number().int().min(100).default(15_000),
    defaultCountry: z
      .string()
      .trim()
      .refine(isValidDefaultCountry, 'Use an ISO region like "US" or a calling code like "+1"')
      .default('+1'),
    script: ScriptConfigSchema,
  })
  .strict()
  .refine((s) => s.retryBaseDelayMs <= s.retryMaxDelayMs, {
    message: 'retryBaseDelayMs must be <= retryMaxDelayMs',
    path: ['retryBaseDelayMs'],
  })
  .refine((s) => s.pollIntervalMs <= s.maxPollIntervalMs, {
    message: 'pollIntervalMs must be <= maxPollIntervalMs',
    path: ['pollIntervalMs'],
  });

export type CampaignSettings = z.infer<typeof CampaignSettingsSchema>;

// -------- CREATE --------
export const CreateOutboundCallCampaignSchema = z
  .object({
    name: Name,
    clientReference: z.string().trim().max(120).optional(),
    contacts: z.array(ContactSchema).min(1, 'At least one contact is required').max(10_000),
    settings: CampaignSettingsSchema,
    scheduledAt: z.coerce.date().optional(), // service enforces "future"
  })
  .strict()
  .superRefine((d, ctx) => {
    const seen = new Set<string>();
    d.contacts.forEach((c, i) => {
      if (seen.has(c.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate contact id "${c.id}"`,
          path: ['contacts', i, 'id'],
        });
      }
      seen.add(c.id);
    });
  });
export type CreateOutboundCallCampaignInput = z.infer<typeof CreateOutboundCallCampaignSchema>;

// -------- SCHEDULE --------
export const ScheduleOutboundCallCampaignSchema = z
  .object({
    startAt: z.coerce.date().optional(),
    startIn: z
      .string()
      .trim()
      .regex(/^\d+\s*[smhd]$/i, 'Use formats like "30s", "5m", "2h", or "1d"')
      .optional(),
  })
  .strict()
  .refine((d) => !!d.startAt || !!d.startIn, {
    message: 'Provide either startAt or startIn',
    path: ['startAt'],
  })
  .refine((d) => !(d.startAt && d.startIn), {
    message: 'Provide only one of startAt or startIn',
    path: ['startAt'],
  });
export type ScheduleOutboundCallCampaignInput = z.infer<typeof ScheduleOutboundCallCampaignSchema>;

// -------- VOICEMAIL --------
/** One-off reminder call outside any campaign; the message doubles as the voicemail. */
export const SendVoicemailSchema = z
  .object({
    phone: z.string().trim().min(1, 'phone is required').max(40),
    message: z.string().trim().min(1, 'message is required').max(2000, 'Max 2000 chars'),
    defaultCountry: z
      .string()
      .trim()
      .refine(isValidDefaultCountry, 'Use an ISO region like "US" or a calling code like "+1"')
      .default('+1'),
    voice: z.string().trim().min(1).max(60).optional(),
    maxDurationSeconds: z.coerce.number().int().min(10).max(600).default(120),
  })
  .strict();
export type SendVoicemailInput = z.infer<typeof SendVoicemailSchema>;
