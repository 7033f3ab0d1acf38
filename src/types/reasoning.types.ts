/**
 * Reasoning Gateway call shapes and the config snapshot a pipeline runs with.
 */

export type Capability =
  | 'analyze_floorplan'
  | 'analyze_template'
  | 'generate_plan'
  | 'convert_to_standard';

export type MediaResolution = 'low' | 'medium' | 'high';

/** Optional tuning; absent fields are left to the provider */
export interface ModelTuning {
  temperature?: number; // 0..2
  topP?: number; // 0..1
  mediaResolution?: MediaResolution;
}

export interface DocumentInput {
  filename: string;
  mimeType: string;
  data: Buffer;
}

export interface GatewayInputs {
  documents?: DocumentInput[];
  texts?: string[];
  payload?: unknown; // prior structured output (generate_plan)
}

/** Immutable view of admin config, taken once per pipeline invocation */
export interface ConfigSnapshot {
  readonly apiKey: string | null;
  readonly systemPrompt: string;
  readonly tuning: Readonly<ModelTuning>;
  readonly takenAt: string;
}

export interface GatewayResult {
  text: string;
  data: unknown; // undefined when no structured payload could be located
}
