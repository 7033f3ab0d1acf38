/**
 * Firestore binding of PlanStore.
 *
 * Collection: plans
 * Document:   plans/{planId}
 *   { id, source, createdAt, docxId, metadata, requestPayload,
 *     content: { entries, totalAreaM2, templateName } }
 */

import { Injectable, Logger } from '@nestjs/common';
import { guardStorage } from '../common/errors.js';
import { COLLECTIONS, FirestoreService, removeUndefined } from '../firestore/firestore.service.js';
import type { NormalizedPlan, PlanMetadata, PlanSource } from '../types/plan.types.js';
import { PlanListing, PlanStore, StoredPlanRecord } from './plan-store.js';

interface PlanDoc {
  id: string;
  source: PlanSource;
  createdAt: string;
  docxId: string | null;
  metadata: PlanMetadata;
  requestPayload: unknown;
  content: NormalizedPlan;
}

@Injectable()
export class FirestorePlanStore extends PlanStore {
  private readonly logger = new Logger(FirestorePlanStore.name);

  constructor(private readonly firestoreService: FirestoreService) {
    super();
  }

  async save(record: StoredPlanRecord): Promise<void> {
    const { plan } = record;
    const doc: PlanDoc = {
      id: plan.id,
      source: plan.source,
      createdAt: plan.createdAt,
      docxId: record.docxId,
      metadata: plan.metadata,
      requestPayload: record.requestPayload ?? null,
      content: {
        entries: plan.entries,
        totalAreaM2: plan.totalAreaM2,
        templateName: plan.templateName,
      },
    };
    // create() fails when the id exists, which keeps the collection append-only
    await guardStorage('plan save', () =>
      this.firestoreService.collection(COLLECTIONS.plans).doc(plan.id).create(removeUndefined(doc)),
    );
    this.logger.log(`save(${plan.id}): ${plan.entries.length} entries (${plan.source})`);
  }

  async get(planId: string): Promise<StoredPlanRecord | null> {
    const snap = await guardStorage('plan lookup', () =>
      this.firestoreService.collection(COLLECTIONS.plans).doc(planId).get(),
    );
    if (!snap.exists) {
      return null;
    }
    const doc = snap.data() as PlanDoc;
    return {
      plan: {
        id: doc.id,
        source: doc.source,
        createdAt: doc.createdAt,
        metadata: doc.metadata,
        ...doc.content,
      },
      docxId: doc.docxId ?? null,
      requestPayload: doc.requestPayload ?? null,
    };
  }

  async listRecent(limit: number): Promise<PlanListing[]> {
    const snap = await guardStorage('plan listing', () =>
      this.firestoreService
        .collection(COLLECTIONS.plans)
        .orderBy('createdAt', 'desc')
        .limit(limit)
        .select('id', 'source', 'createdAt', 'docxId', 'metadata')
        .get(),
    );
    return snap.docs.map((d) => {
      const doc = d.data() as Omit<PlanDoc, 'content' | 'requestPayload'>;
      return {
        id: doc.id,
        source: doc.source,
        createdAt: doc.createdAt,
        docxId: doc.docxId ?? null,
        metadata: doc.metadata,
      };
    });
  }
}
