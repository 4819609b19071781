import { Injectable } from '@nestjs/common';

import type { Contact } from '../../dispatcher/interface/campaign-dispatch.interface';
import type { ContactListStore } from '../interface/campaign-stores.interface';

@Injectable()
export class InMemoryContactListRepository implements ContactListStore {
  private readonly lists = new Map<string, readonly Contact[]>();

  async save(campaignId: string, contacts: Contact[]): Promise<void> {
    this.lists.set(campaignId, Object.freeze(contacts.map((c) => ({ ...c }))));
  }

  async load(campaignId: string): Promise<Contact[]> {
    return [...(this.lists.get(campaignId) ?? [])];
  }

  async remove(campaignId: string): Promise<void> {
    this.lists.delete(campaignId);
  }
}
