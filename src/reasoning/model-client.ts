/**
 * Transport seam between the Reasoning Gateway and the provider SDK.
 * GeminiService is the production binding; tests substitute a scripted fake.
 */

import type { DocumentInput, ModelTuning } from '../types/reasoning.types.js';

export type ModelPart = { text: string } | { document: DocumentInput };

export interface ModelRequest {
  model: string;
  apiKey: string;
  systemInstruction: string;
  parts: ModelPart[];
  tuning: ModelTuning;
  signal: AbortSignal;
}

export interface ModelResponse {
  text: string;
}

export abstract class ModelClient {
  /**
   * One provider call. Raw SDK/network errors are thrown as-is; the gateway
   * classifies them. Content-policy blocks are thrown as PermanentProviderError.
   */
  abstract generate(request: ModelRequest): Promise<ModelResponse>;
}
