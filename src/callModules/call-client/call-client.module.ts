// src/callModules/call-client/call-client.module.ts
import { Logger, Module } from '@nestjs/common';

import { APP_CONFIG, AppConfig } from '../../config/app-config';
import { BlandCallClient } from './bland-call.client';
import { FakeCallClient } from './fake-call.client';
import { CALL_CLIENT, CallClient } from './interface/call-client.interface';

// Dry-run calls settle after 1.5 s with a confirming transcript.
const DRY_RUN_HISTORY = 1_000;
const DRY_RUN_BEHAVIOR = {
  callDurationMs: 1_500,
  transcript: 'assistant: Calling to confirm your appointment.\nuser: Yes, I will be there.',
  durationSeconds: 35,
};

export function createCallClient(config: AppConfig): CallClient {
  const logger = new Logger('CallClientModule');
  if (config.callProvider === 'fake') {
    logger.warn('[provider] CALL_PROVIDER=fake, no real calls will be placed');
    return new FakeCallClient(DRY_RUN_BEHAVIOR, 0, DRY_RUN_HISTORY);
  }

  const { apiKey, baseUrl, timeoutMs } = config.bland;
  if (!apiKey) throw new Error('BLAND_API_KEY is required when CALL_PROVIDER=bland');
  logger.log(`[provider] using ${baseUrl}`);
  return new BlandCallClient({ apiKey, baseUrl, timeoutMs });
}

@Module({
  providers: [{ provide: CALL_CLIENT, inject: [APP_CONFIG], useFactory: createCallClient }],
  exports: [CALL_CLIENT],
})
export class CallClientModule {}
