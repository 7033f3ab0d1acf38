/**
 * Firestore binding of SettingsRepository.
 *
 * Collections:
 *   settings/{name}  { name, value, updatedAt }
 *   apiKeys/{name}   { name, label, value, createdAt, updatedAt }
 */

import { Injectable } from '@nestjs/common';
import { COLLECTIONS, FirestoreService } from '../firestore/firestore.service.js';
import { ApiKeyRecord, SettingRecord, SettingsRepository } from './settings.repository.js';

@Injectable()
export class FirestoreSettingsRepository extends SettingsRepository {
  constructor(private readonly firestoreService: FirestoreService) {
    super();
  }

  async getSetting(name: string): Promise<SettingRecord | null> {
    const snap = await this.firestoreService.collection(COLLECTIONS.settings).doc(name).get();
    if (!snap.exists) return null;
    return snap.data() as SettingRecord;
  }

  async putSetting(name: string, value: string): Promise<SettingRecord> {
    const record: SettingRecord = { name, value, updatedAt: new Date().toISOString() };
    await this.firestoreService.collection(COLLECTIONS.settings).doc(name).set(record);
    return record;
  }

  async deleteSetting(name: string): Promise<void> {
    await this.firestoreService.collection(COLLECTIONS.settings).doc(name).delete();
  }

  async listApiKeys(): Promise<ApiKeyRecord[]> {
    const snap = await this.firestoreService.collection(COLLECTIONS.apiKeys).orderBy('name').get();
    return snap.docs.map((doc) => doc.data() as ApiKeyRecord);
  }

  async getApiKey(name: string): Promise<ApiKeyRecord | null> {
    const snap = await this.firestoreService.collection(COLLECTIONS.apiKeys).doc(name).get();
    if (!snap.exists) return null;
    return snap.data() as ApiKeyRecord;
  }

  async putApiKey(name: string, value: string, label: string): Promise<ApiKeyRecord> {
    const ref = this.firestoreService.collection(COLLECTIONS.apiKeys).doc(name);
    const now = new Date().toISOString();
    return this.firestoreService.getDb().runTransaction(async (tx) => {
      const existing = await tx.get(ref);
      const createdAt = existing.exists ? String(existing.get('createdAt') ?? now) : now;
      const record: ApiKeyRecord = { name, label, value, createdAt, updatedAt: now };
      tx.set(ref, record);
      return record;
    });
  }

  async deleteApiKey(name: string): Promise<void> {
    await this.firestoreService.collection(COLLECTIONS.apiKeys).doc(name).delete();
  }
}
