import type { PipelineSettings } from '../config/pipeline-settings.js';
import type { QualityFlag } from '../types/job.types.js';
import type { PlanEntry } from '../types/plan.types.js';

type QualityLimits = Pick<PipelineSettings, 'qualityMinRooms' | 'qualityMaxRooms' | 'qualityMissingAreaRatio'>;

/**
 * Heuristic flags on a successful batch member. Flags never fail the member.
 */
export function qualityFlags(roomCount: number, entries: readonly PlanEntry[], limits: QualityLimits): QualityFlag[] {
  const flags: QualityFlag[] = [];
  if (roomCount < limits.qualityMinRooms || roomCount > limits.qualityMaxRooms) {
    flags.push('room_count_out_of_range');
  }
  if (entries.length > 0) {
    const missing = entries.filter((e) => e.areaM2 === null).length;
    if (missing / entries.length > limits.qualityMissingAreaRatio) {
      flags.push('missing_area_data');
    }
  }
  return flags;
}
