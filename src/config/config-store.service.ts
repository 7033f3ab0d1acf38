/**
 * Admin configuration with default-vs-override resolution.
 *
 * - system prompt: stored override, else the built-in text from prompt.txt
 * - model tuning: stored JSON object; a null field in an update removes it
 * - API keys: GEMINI_API_KEY in the environment wins over the stored "gemini" key
 *
 * Pipelines never read these live; they call snapshot() once and pass the
 * result along.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { guardStorage, InvalidRequestError } from '../common/errors.js';
import { isRecord } from '../common/guards.js';
import type { ConfigSnapshot, MediaResolution, ModelTuning } from '../types/reasoning.types.js';
import { SettingsRepository } from './settings.repository.js';

export const DEFAULT_SYSTEM_PROMPT = Symbol('DEFAULT_SYSTEM_PROMPT');

export const PROMPT_SETTING_NAME = 'system_prompt';
export const TUNING_SETTING_NAME = 'model_config';
export const GEMINI_KEY_NAME = 'gemini';

const MEDIA_RESOLUTIONS: readonly MediaResolution[] = ['low', 'medium', 'high'];

export interface SystemPromptView {
  prompt: string;
  updatedAt: string | null;
  isOverridden: boolean;
}

export interface ModelTuningView {
  config: ModelTuning;
  updatedAt: string | null;
  isOverridden: boolean;
}

/** null removes the override for that field */
export type ModelTuningPatch = {
  [K in keyof ModelTuning]?: ModelTuning[K] | null;
};

export interface ApiKeySummary {
  name: string;
  label: string;
  configured: boolean;
  lastFour: string | null;
  updatedAt: string | null;
}

/**
 * Keeps only well-formed tuning fields. Anything else falls back to the
 * provider default by being left out.
 */
export function sanitizeTuning(raw: unknown): ModelTuning {
  if (!isRecord(raw)) return {};
  const tuning: ModelTuning = {};

  const temperature = raw.temperature;
  if (typeof temperature === 'number' && temperature >= 0 && temperature <= 2) {
    tuning.temperature = temperature;
  }
  const topP = raw.topP ?? raw.top_p;
  if (typeof topP === 'number' && topP >= 0 && topP <= 1) {
    tuning.topP = topP;
  }
  const media = raw.mediaResolution ?? raw.media_resolution;
  if (typeof media === 'string') {
    const normalized = media.trim().toLowerCase();
    const match = MEDIA_RESOLUTIONS.find((m) => m === normalized);
    if (match) tuning.mediaResolution = match;
  }
  return tuning;
}

function lastFour(value: string): string | null {
  if (!value) return null;
  return value.length >= 4 ? value.slice(-4) : value;
}

@Injectable()
export class ConfigStore {
  private readonly logger = new Logger(ConfigStore.name);

  constructor(
    private readonly repository: SettingsRepository,
    private readonly config: ConfigService,
    @Inject(DEFAULT_SYSTEM_PROMPT) private readonly defaultPrompt: string,
  ) {}

  // ────────────────────────────────────────────
  // System prompt
  // ────────────────────────────────────────────
  async getSystemPrompt(): Promise<SystemPromptView> {
    const record = await guardStorage('read system prompt', () =>
      this.repository.getSetting(PROMPT_SETTING_NAME),
    );
    if (!record) {
      return { prompt: this.defaultPrompt, updatedAt: null, isOverridden: false };
    }
    return { prompt: record.value, updatedAt: record.updatedAt, isOverridden: true };
  }

  async setSystemPrompt(prompt: string): Promise<SystemPromptView> {
    const record = await guardStorage('save system prompt', () =>
      this.repository.putSetting(PROMPT_SETTING_NAME, prompt),
    );
    this.logger.log('System prompt override saved');
    return { prompt: record.value, updatedAt: record.updatedAt, isOverridden: true };
  }

  async resetSystemPrompt(): Promise<SystemPromptView> {
    await guardStorage('reset system prompt', () =>
      this.repository.deleteSetting(PROMPT_SETTING_NAME),
    );
    this.logger.log('System prompt reset to default');
    return { prompt: this.defaultPrompt, updatedAt: null, isOverridden: false };
  }

  // ────────────────────────────────────────────
  // Model tuning
  // ────────────────────────────────────────────
  async getModelTuning(): Promise<ModelTuningView> {
    const record = await guardStorage('read model config', () =>
      this.repository.getSetting(TUNING_SETTING_NAME),
    );
    if (!record) {
      return { config: {}, updatedAt: null, isOverridden: false };
    }
    const config = this.parseTuning(record.value);
    return {
      config,
      updatedAt: record.updatedAt,
      isOverridden: Object.keys(config).length > 0,
    };
  }

  async updateModelTuning(patch: ModelTuningPatch): Promise<ModelTuningView> {
    const current = await this.getModelTuning();
    const merged: Record<string, unknown> = { ...current.config };
    for (const [key, value] of Object.entries(patch)) {
      if (value === undefined) continue;
      if (value === null) {
        delete merged[key];
      } else {
        merged[key] = value;
      }
    }
    const config = sanitizeTuning(merged);
    const record = await guardStorage('save model config', () =>
      this.repository.putSetting(TUNING_SETTING_NAME, JSON.stringify(config)),
    );
    return {
      config,
      updatedAt: record.updatedAt,
      isOverridden: Object.keys(config).length > 0,
    };
  }

  // ────────────────────────────────────────────
  // API keys
  // ────────────────────────────────────────────
  async listApiKeys(): Promise<ApiKeySummary[]> {
    const records = await guardStorage('list API keys', () => this.repository.listApiKeys());
    return records
      .map((r) => this.toSummary(r.name, r.label, r.value, r.updatedAt))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async setApiKey(name: string, value: string, label?: string): Promise<ApiKeySummary> {
    const normalized = name.trim().toLowerCase();
    if (!normalized) throw new InvalidRequestError('API key name cannot be empty');
    if (!value) throw new InvalidRequestError('API key value cannot be empty');

    const existing = await guardStorage('read API key', () => this.repository.getApiKey(normalized));
    const effectiveLabel = label || existing?.label || normalized;
    const record = await guardStorage('save API key', () =>
      this.repository.putApiKey(normalized, value, effectiveLabel),
    );
    this.logger.log(`API key "${normalized}" saved`);
    return this.toSummary(record.name, record.label, record.value, record.updatedAt);
  }

  async deleteApiKey(name: string): Promise<string> {
    const normalized = name.trim().toLowerCase();
    if (normalized) {
      await guardStorage('delete API key', () => this.repository.deleteApiKey(normalized));
    }
    return normalized;
  }

  // ────────────────────────────────────────────
  // Snapshot
  // ────────────────────────────────────────────

  /** One immutable read of everything a pipeline needs */
  async snapshot(): Promise<ConfigSnapshot> {
    const [prompt, tuning, apiKey] = await Promise.all([
      this.getSystemPrompt(),
      this.getModelTuning(),
      this.resolveApiKey(),
    ]);
    return Object.freeze({
      apiKey,
      systemPrompt: prompt.prompt,
      tuning: Object.freeze({ ...tuning.config }),
      takenAt: new Date().toISOString(),
    });
  }

  private async resolveApiKey(): Promise<string | null> {
    const fromEnv = this.config.get<string>('GEMINI_API_KEY');
    if (fromEnv) return fromEnv;
    const stored = await guardStorage('read API key', () =>
      this.repository.getApiKey(GEMINI_KEY_NAME),
    );
    return stored?.value || null;
  }

  private parseTuning(value: string): ModelTuning {
    try {
      return sanitizeTuning(JSON.parse(value));
    } catch (err) {
      this.logger.warn('Stored model config is not valid JSON, ignoring it', err);
      return {};
    }
  }

  private toSummary(name: string, label: string, value: string, updatedAt: string): ApiKeySummary {
    return {
      name,
      label: label || name,
      configured: Boolean(value),
      lastFour: lastFour(value),
      updatedAt: updatedAt || null,
    };
  }
}
