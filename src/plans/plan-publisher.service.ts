/**
 * Last step of every pipeline: mint the plan id, render the export and
 * persist plan + export id in a single store write.
 */

import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { BlobStore } from '../storage/blob-store.js';
import type { JobDeadline } from '../types/job.types.js';
import type { NormalizedPlan, Plan, PlanMetadata, PlanSource } from '../types/plan.types.js';
import { PlanExporter } from './plan-exporter.js';
import { PlanStore } from './plan-store.js';

export interface PublishInput {
  normalized: NormalizedPlan;
  source: PlanSource;
  metadata: Omit<PlanMetadata, 'generationMs'>;
  startedAt: number; // epoch ms
  requestPayload: unknown;
  renderExport: boolean;
}

export interface PublishedPlan {
  plan: Plan;
  docxId: string | null;
}

@Injectable()
export class PlanPublisher {
  private readonly logger = new Logger(PlanPublisher.name);

  constructor(
    private readonly planStore: PlanStore,
    private readonly blobStore: BlobStore,
    private readonly exporter: PlanExporter,
  ) {}

  /**
   * Checks the deadline before and after rendering, so a job that has already
   * timed out never writes a plan. The save itself runs as the deadline's
   * commit and is not cut short.
   */
  async publish(input: PublishInput, deadline: JobDeadline): Promise<PublishedPlan> {
    deadline.signal.throwIfAborted();

    const plan: Plan = {
      ...input.normalized,
      id: randomUUID(),
      source: input.source,
      createdAt: new Date().toISOString(),
      metadata: { ...input.metadata, generationMs: Date.now() - input.startedAt },
    };

    const docxId = input.renderExport ? await this.renderExport(plan) : null;

    deadline.signal.throwIfAborted();
    await deadline.commit(() => this.planStore.save({ plan, docxId, requestPayload: input.requestPayload }));
    return { plan, docxId };
  }

  /** Export failures are logged; the plan is kept without a document */
  private async renderExport(plan: Plan): Promise<string | null> {
    try {
      const rendered = await this.exporter.render(plan);
      return await this.blobStore.put(rendered.data, rendered.filename, rendered.contentType, 'docx');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Export of plan ${plan.id} failed, continuing without document: ${message}`);
      return null;
    }
  }
}
