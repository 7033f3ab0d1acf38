/**
 * Persistence seam for admin-edited settings and API keys.
 * Injected by class token; FirestoreSettingsRepository is the production binding.
 */

export interface SettingRecord {
  name: string;
  value: string;
  updatedAt: string; // ISO
}

export interface ApiKeyRecord {
  name: string;
  label: string;
  value: string;
  createdAt: string;
  updatedAt: string;
}

export abstract class SettingsRepository {
  abstract getSetting(name: string): Promise<SettingRecord | null>;
  abstract putSetting(name: string, value: string): Promise<SettingRecord>;
  abstract deleteSetting(name: string): Promise<void>;

  abstract listApiKeys(): Promise<ApiKeyRecord[]>;
  abstract getApiKey(name: string): Promise<ApiKeyRecord | null>;
  abstract putApiKey(name: string, value: string, label: string): Promise<ApiKeyRecord>;
  abstract deleteApiKey(name: string): Promise<void>;
}
