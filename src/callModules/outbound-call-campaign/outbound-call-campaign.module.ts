// src/callModules/outbound-call-campaign/outbound-call-campaign.module.ts
import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';

import { DispatcherModule } from '../dispatcher/dispatcher.module';
import { RESULT_STORE } from '../dispatcher/interface/campaign-dispatch.interface';
import { CAMPAIGN_STORE, CONTACT_LIST_STORE } from './interface/campaign-stores.interface';
import { OutboundCallCampaignController } from './outbound-call-campaign.controller';
import { OutboundCallCampaignService } from './outbound-call-campaign.service';
import { InMemoryCampaignResultRepository } from './repository/campaign-result.repository';
import { InMemoryContactListRepository } from './repository/contact-list.repository';
import { InMemoryCampaignRepository } from './repository/outbound-call-campaign.repository';

@Module({
  imports: [DispatcherModule, ScheduleModule.forRoot()],
  controllers: [OutboundCallCampaignController],
  providers: [
    { provide: CAMPAIGN_STORE, useClass: InMemoryCampaignRepository },
    { provide: CONTACT_LIST_STORE, useClass: InMemoryContactListRepository },
    { provide: RESULT_STORE, useClass: InMemoryCampaignResultRepository },
    OutboundCallCampaignService,
  ],
  exports: [OutboundCallCampaignService],
})
export class OutboundCallCampaignModule {}
