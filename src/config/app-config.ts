// src/config/app-config.ts
import { z } from 'zod';

function isTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

const Flag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

export const AppConfigSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    CALL_PROVIDER: z.enum(['bland', 'fake']).default('fake'),
    BLAND_API_KEY: z.string().trim().min(1).optional(),
    BLAND_BASE_URL: z.string().trim().url().default('https://api.bland.ai/v1'),
    CALL_HTTP_TIMEOUT_MS: z.coerce.number().int().min(100).default(15_000),
    RATE_LIMIT_SCOPE: z.enum(['campaign', 'global']).default('campaign'),
    GLOBAL_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().min(1).default(60),
    CAMPAIGN_CRON_DISABLED: Flag,
    // Read straight from process.env by @Cron, whose options are fixed when the
    // service class loads; validated here so a bad value still stops start-up.
    CRON_TZ: z
      .string()
      .trim()
      .min(1)
      .refine(isTimeZone, 'Use an IANA time zone like "UTC" or "Asia/Dhaka"')
      .default('UTC'),
    CORS_ORIGIN: z.string().trim().min(1).optional(),
  })
  .refine((env) => env.CALL_PROVIDER !== 'bland' || !!env.BLAND_API_KEY, {
    message: 'BLAND_API_KEY is required when CALL_PROVIDER=bland',
    path: ['BLAND_API_KEY'],
  })
  .transform((env) => ({
    port: env.PORT,
    callProvider: env.CALL_PROVIDER,
    bland: {
      apiKey: env.BLAND_API_KEY,
      baseUrl: env.BLAND_BASE_URL,
      timeoutMs: env.CALL_HTTP_TIMEOUT_MS,
    },
    rateLimitScope: env.RATE_LIMIT_SCOPE,
    globalRateLimitPerMinute: env.GLOBAL_RATE_LIMIT_PER_MINUTE,
    cronDisabled: env.CAMPAIGN_CRON_DISABLED,
    corsOrigin: env.CORS_ORIGIN,
  }));

export type AppConfig = z.infer<typeof AppConfigSchema>;

export const APP_CONFIG = Symbol('APP_CONFIG');

/** Parses the environment once at start-up; a bad value stops the process. */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = AppConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(env)'}: ${i.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }
  return parsed.data;
}
