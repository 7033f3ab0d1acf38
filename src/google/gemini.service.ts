/**
 * Google Gemini binding of ModelClient.
 * The SDK client is rebuilt only when the API key in the snapshot changes.
 */

import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import {
  FinishReason,
  GoogleGenAI,
  MediaResolution as GenAiMediaResolution,
  type GenerateContentConfig,
  type Part,
} from '@google/genai';
import { PermanentProviderError } from '../common/errors.js';
import { ModelClient, type ModelPart, type ModelRequest, type ModelResponse } from '../reasoning/model-client.js';
import type { MediaResolution, ModelTuning } from '../types/reasoning.types.js';

export const GENAI_CLIENT_FACTORY = Symbol('GENAI_CLIENT_FACTORY');

export type GenAiClientFactory = (apiKey: string) => GoogleGenAI;

const createGenAiClient: GenAiClientFactory = (apiKey) => new GoogleGenAI({ apiKey });

const MEDIA_RESOLUTION: Record<MediaResolution, GenAiMediaResolution> = {
  low: GenAiMediaResolution.MEDIA_RESOLUTION_LOW,
  medium: GenAiMediaResolution.MEDIA_RESOLUTION_MEDIUM,
  high: GenAiMediaResolution.MEDIA_RESOLUTION_HIGH,
};

const BLOCKED_FINISH_REASONS = new Set<FinishReason>([
  FinishReason.SAFETY,
  FinishReason.PROHIBITED_CONTENT,
  FinishReason.BLOCKLIST,
  FinishReason.SPII,
]);

function toPart(part: ModelPart): Part {
  if ('text' in part) {
    return { text: part.text };
  }
  return {
    inlineData: {
      mimeType: part.document.mimeType,
      data: part.document.data.toString('base64'),
    },
  };
}

/** Only the tuning fields that are set; the rest stay at provider defaults */
export function tuningConfig(tuning: ModelTuning): GenerateContentConfig {
  const config: GenerateContentConfig = {};
  if (tuning.temperature !== undefined) config.temperature = tuning.temperature;
  if (tuning.topP !== undefined) config.topP = tuning.topP;
  if (tuning.mediaResolution !== undefined) config.mediaResolution = MEDIA_RESOLUTION[tuning.mediaResolution];
  return config;
}

@Injectable()
export class GeminiService extends ModelClient {
  private readonly logger = new Logger(GeminiService.name);
  private ai: GoogleGenAI | null = null;
  private cachedKey: string | null = null;

  constructor(
    @Optional()
    @Inject(GENAI_CLIENT_FACTORY)
    private readonly createClient: GenAiClientFactory = createGenAiClient,
  ) {
    super();
  }

  async generate(request: ModelRequest): Promise<ModelResponse> {
    const ai = this.clientFor(request.apiKey);

    const response = await ai.models.generateContent({
      model: request.model,
      contents: [{ role: 'user', parts: request.parts.map(toPart) }],
      config: {
        ...tuningConfig(request.tuning),
        systemInstruction: request.systemInstruction,
        responseMimeType: 'application/json',
        abortSignal: request.signal,
      },
    });

    const blockReason = response.promptFeedback?.blockReason;
    if (blockReason) {
      throw new PermanentProviderError(`Request blocked by the provider (${blockReason})`, {
        reason: 'content_policy',
      });
    }
    const finishReason = response.candidates?.[0]?.finishReason;
    if (finishReason && BLOCKED_FINISH_REASONS.has(finishReason)) {
      throw new PermanentProviderError(`Response withheld by the provider (${finishReason})`, {
        reason: 'content_policy',
      });
    }

    const text = response.text ?? '';
    if (!text) {
      this.logger.warn(`Empty response from ${request.model} (finishReason=${finishReason ?? '-'})`);
    }
    return { text };
  }

  private clientFor(apiKey: string): GoogleGenAI {
    if (!this.ai || this.cachedKey !== apiKey) {
      this.ai = this.createClient(apiKey);
      this.cachedKey = apiKey;
      this.logger.log('Gemini client initialised');
    }
    return this.ai;
  }
}
