/**
 * Durable custody of generated plans. Writes are append-only: one create per
 * plan id, never an update.
 */

import type { Plan, PlanMetadata, PlanSource } from '../types/plan.types.js';

export interface StoredPlanRecord {
  plan: Plan;
  docxId: string | null; // export blob, once rendered
  requestPayload: unknown;
}

/** Listing row without the entry list */
export interface PlanListing {
  id: string;
  source: PlanSource;
  createdAt: string;
  docxId: string | null;
  metadata: PlanMetadata;
}

export abstract class PlanStore {
  abstract save(record: StoredPlanRecord): Promise<void>;
  abstract get(planId: string): Promise<StoredPlanRecord | null>;
  /** Most recent first */
  abstract listRecent(limit: number): Promise<PlanListing[]>;
}
