import { z } from 'zod';

import { ScriptConfigError } from '../../../common/errors/call-errors';

/** Call script sent with every initiation. Text fields may hold {{placeholders}}. */
export const ScriptConfigSchema = z
  .object({
    task: z.string().trim().min(1, 'task is required').max(8000, 'Max 8000 chars'),
    voice: z.string().trim().min(1).max(60).default('maya'),
    language: z
      .string()
      .trim()
      .regex(/^[a-z]{2}(-[A-Z]{2})?$/, 'Use a language tag like "en" or "en-US"')
      .default('en-US'),
    maxDurationSeconds: z.coerce.number().int().min(10).max(3600).default(300),
    record: z.boolean().default(true),
    waitForGreeting: z.boolean().default(true),
    answeredByEnabled: z.boolean().default(true),
    firstSentence: z.string().trim().max(500).optional(),
    voicemailMessage: z.string().trim().max(2000).optional(),
  })
  .strict();

export type ScriptConfig = z.infer<typeof ScriptConfigSchema>;
export type ScriptConfigInput = z.input<typeof ScriptConfigSchema>;

export function parseScriptConfig(data: unknown): ScriptConfig {
  const parsed = ScriptConfigSchema.safeParse(data);
  if (!parsed.success) {
    throw new ScriptConfigError(
      parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    );
  }
  return parsed.data;
}
