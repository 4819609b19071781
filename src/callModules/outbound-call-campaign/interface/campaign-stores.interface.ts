import type { Contact } from '../../dispatcher/interface/campaign-dispatch.interface';
import type { CampaignSettings } from '../schema/outbound-call-campaign.schema';
import type { IOutboundCallCampaign } from './outbound-call-campaign.interface';
import type { IOutboundCallCampaignQuery, IPaginated } from './outbound-call-campaign-query.interface';

export interface NewCampaign {
  name: string;
  clientReference?: string;
  status: IOutboundCallCampaign['status'];
  settings: CampaignSettings;
  contactsCount: number;
  scheduledAt?: Date;
}

export type CampaignPatch = Partial<
  Pick<
    IOutboundCallCampaign,
    'status' | 'scheduledAt' | 'startedAt' | 'completedAt' | 'cancelledAt' | 'abortReason'
  >
>;

/** Campaign records. `update` and `remove` throw RecordNotFoundError for unknown ids. */
export interface CampaignStore {
  create(data: NewCampaign): Promise<IOutboundCallCampaign>;
  findById(id: string): Promise<IOutboundCallCampaign | null>;
  findAll(): Promise<IOutboundCallCampaign[]>;
  findMany(query: IOutboundCallCampaignQuery): Promise<IPaginated<IOutboundCallCampaign>>;
  update(id: string, patch: CampaignPatch): Promise<IOutboundCallCampaign>;
  remove(id: string): Promise<void>;
  /** SCHEDULED campaigns whose start time is at or before `now`, oldest first. */
  findDueScheduled(now: Date): Promise<IOutboundCallCampaign[]>;
}

export interface ContactListStore {
  save(campaignId: string, contacts: Contact[]): Promise<void>;
  load(campaignId: string): Promise<Contact[]>;
  remove(campaignId: string): Promise<void>;
}

export const CAMPAIGN_STORE = Symbol('CAMPAIGN_STORE');
export const CONTACT_LIST_STORE = Symbol('CONTACT_LIST_STORE');
