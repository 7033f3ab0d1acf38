/**
 * Per-request floor-plan flags and the request shapes the orchestrators take.
 */

export type ReferenceUnit = 'm' | 'cm' | 'mm';

export interface FloorPlanOptions {
  hasRoomNames: boolean;
  hasArea: boolean;
  referenceLabel?: string;
  referenceWidth?: number;
  referenceUnit: ReferenceUnit;
  planCategory?: string; // plan category id
}

export interface GenerationRequest {
  fileIds: string[];
  templateId?: string;
  options: FloorPlanOptions;
}

export interface ConversionRequest {
  fileId: string;
}

export type BatchRequest = GenerationRequest;
