/**
 * Listing / detail summaries for the plan retrieval surface.
 */

import type { PlanMetadata, PlanSource } from '../types/plan.types.js';
import type { PlanListing } from './plan-store.js';

export interface PlanSummary {
  id: string;
  source: PlanSource;
  createdAt: string;
  docxUrl: string | null;
  metadata: PlanMetadata;
  fileCount: number;
  generationSeconds: number | null;
}

export function downloadUrl(blobId: string | null): string | null {
  return blobId ? `/api/download/${encodeURIComponent(blobId)}` : null;
}

export function toPlanSummary(listing: PlanListing): PlanSummary {
  const ms = listing.metadata.generationMs;
  return {
    id: listing.id,
    source: listing.source,
    createdAt: listing.createdAt,
    docxUrl: downloadUrl(listing.docxId),
    metadata: listing.metadata,
    fileCount: listing.metadata.fileCount,
    generationSeconds: Number.isFinite(ms) ? Math.round(ms / 10) / 100 : null,
  };
}
