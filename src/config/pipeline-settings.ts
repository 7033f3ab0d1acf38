/**
 * Pipeline tuning knobs read from the environment through ConfigService.
 */

import type { ConfigService } from '@nestjs/config';

export const PIPELINE_SETTINGS = Symbol('PIPELINE_SETTINGS');

export interface PipelineSettings {
  model: string;
  maxAttempts: number; // per gateway call, first attempt included
  retryBaseMs: number;
  callTimeoutMs: number;
  jobTimeoutMs: number;
  jobRetentionMs: number; // finished job records are dropped after this
  analysisConcurrency: number;
  batchConcurrency: number;
  maxBatchFiles: number;
  qualityMinRooms: number;
  qualityMaxRooms: number;
  qualityMissingAreaRatio: number;
}

export const DEFAULT_PIPELINE_SETTINGS: PipelineSettings = {
  model: 'gemini-2.5-pro',
  maxAttempts: 3,
  retryBaseMs: 1000,
  callTimeoutMs: 120_000,
  jobTimeoutMs: 600_000,
  jobRetentionMs: 24 * 60 * 60 * 1000,
  analysisConcurrency: 3,
  batchConcurrency: 4,
  maxBatchFiles: 200,
  qualityMinRooms: 1,
  qualityMaxRooms: 150,
  qualityMissingAreaRatio: 0.5,
};

function readNumber(
  config: ConfigService,
  key: string,
  fallback: number,
  accept: (value: number) => boolean,
): number {
  const raw = config.get<string>(key);
  if (raw === undefined || raw === '') return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) && accept(parsed) ? parsed : fallback;
}

const positiveInt = (v: number) => Number.isInteger(v) && v > 0;
const nonNegativeInt = (v: number) => Number.isInteger(v) && v >= 0;

export function readPipelineSettings(config: ConfigService): PipelineSettings {
  const d = DEFAULT_PIPELINE_SETTINGS;
  return {
    model: config.get<string>('GEMINI_MODEL') || d.model,
    maxAttempts: readNumber(config, 'GEMINI_MAX_ATTEMPTS', d.maxAttempts, positiveInt),
    retryBaseMs: readNumber(config, 'GEMINI_RETRY_BASE_MS', d.retryBaseMs, nonNegativeInt),
    callTimeoutMs: readNumber(config, 'GEMINI_CALL_TIMEOUT_MS', d.callTimeoutMs, positiveInt),
    jobTimeoutMs: readNumber(config, 'JOB_TIMEOUT_MS', d.jobTimeoutMs, positiveInt),
    jobRetentionMs: readNumber(config, 'JOB_RETENTION_MS', d.jobRetentionMs, positiveInt),
    analysisConcurrency: readNumber(config, 'ANALYSIS_CONCURRENCY', d.analysisConcurrency, positiveInt),
    batchConcurrency: readNumber(config, 'BATCH_CONCURRENCY', d.batchConcurrency, positiveInt),
    maxBatchFiles: d.maxBatchFiles,
    qualityMinRooms: readNumber(config, 'QUALITY_MIN_ROOMS', d.qualityMinRooms, nonNegativeInt),
    qualityMaxRooms: readNumber(config, 'QUALITY_MAX_ROOMS', d.qualityMaxRooms, positiveInt),
    qualityMissingAreaRatio: readNumber(
      config,
      'QUALITY_MISSING_AREA_RATIO',
      d.qualityMissingAreaRatio,
      (v) => v >= 0 && v <= 1,
    ),
  };
}
