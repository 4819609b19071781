import { Module } from '@nestjs/common';

import { OutboundCallCampaignModule } from './callModules/outbound-call-campaign/outbound-call-campaign.module';
import { AppConfigModule } from './config/app-config.module';

@Module({
  imports: [AppConfigModule, OutboundCallCampaignModule],
})
export class AppModule {}
