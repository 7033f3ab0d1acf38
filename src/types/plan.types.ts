/**
 * Room / PlanEntry / Plan types.
 * Timestamps are ISO 8601 strings. Areas are square metres or null when unknown.
 */

/** Day keys of the frequency map, in week order */
export const ALL_DAYS = ['MAN', 'TIRS', 'ONS', 'TORS', 'FRE', 'LØR', 'SØN'] as const;

export type DayKey = (typeof ALL_DAYS)[number];

export type FrequencyMap = Record<DayKey, boolean>;

export interface Room {
  id: string; // unique within its source document
  name: string;
  type: string;
  floor: string | null;
  building: string | null; // source tag when several documents are merged
  areaM2: number | null;
  notes: string | null;
}

export interface PlanEntry {
  id: number; // 1..N in provider order
  roomName: string;
  areaM2: number | null;
  floor: string | null;
  description: string;
  notes: string | null;
  frequency: FrequencyMap;
}

export type PlanSource = 'generator' | 'converter' | 'batch';

export interface PlanMetadata {
  fileCount: number;
  templateId: string | null;
  planCategory: string | null;
  jobId: string;
  fileId?: string; // batch members only
  generationMs: number;
}

/** Normalizer output, before the pipeline gives it an id */
export interface NormalizedPlan {
  entries: PlanEntry[];
  totalAreaM2: number;
  templateName: string | null;
}

export interface Plan extends NormalizedPlan {
  id: string;
  source: PlanSource;
  createdAt: string;
  metadata: PlanMetadata;
}

/** Structure inferred from an example plan */
export interface TemplateSchema {
  name: string;
  sections: string[];
  categories: string[];
  columns: string[];
}

export interface PlanCategory {
  id: string;
  no: string;
  en: string;
}
