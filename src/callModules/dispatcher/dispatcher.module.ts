import { Module } from '@nestjs/common';

import { CallClientModule } from '../call-client/call-client.module';
import { PhoneNumberNormalizer } from '../phone-number/phone-number.normalizer';
import { DispatchRateLimits } from '../rate-limiter/dispatch-rate-limits';
import { TranscriptClassifier } from '../transcript/transcript-classifier';
import { CampaignDispatcher } from './campaign-dispatcher';

@Module({
  imports: [CallClientModule],
  providers: [PhoneNumberNormalizer, TranscriptClassifier, DispatchRateLimits, CampaignDispatcher],
  exports: [CallClientModule, CampaignDispatcher, DispatchRateLimits, PhoneNumberNormalizer, TranscriptClassifier],
})
export class DispatcherModule {}
