/**
 * Batch Orchestrator: one independent single-document pipeline per file.
 *
 * A member failure is recorded on that member and its siblings carry on.
 * Only orchestration faults (config snapshot, template analysis, storage)
 * fail the batch: files not yet started are marked failed without running,
 * members already in flight finish, and processedFiles ends at totalFiles.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { mapWithConcurrency } from '../common/concurrency.js';
import { InvalidRequestError, PipelineError, StorageError, toErrorDetail } from '../common/errors.js';
import { ConfigStore } from '../config/config-store.service.js';
import { PIPELINE_SETTINGS, type PipelineSettings } from '../config/pipeline-settings.js';
import { PlanCategories } from '../plans/plan-categories.js';
import { PlanPublisher } from '../plans/plan-publisher.service.js';
import { PlanStore } from '../plans/plan-store.js';
import type { BatchJob, JobDeadline, JobErrorDetail } from '../types/job.types.js';
import type { BatchRequest } from '../types/options.types.js';
import type { Plan, TemplateSchema } from '../types/plan.types.js';
import type { ConfigSnapshot } from '../types/reasoning.types.js';
import { withDeadline } from './job-deadline.js';
import { JobRegistry } from './job-registry.service.js';
import { PipelineSteps } from './pipeline-steps.service.js';
import { qualityFlags } from './quality.js';

export interface BatchResults {
  job: BatchJob;
  plans: Plan[]; // successful members, in file-submission order
}

interface BatchContext {
  batchId: string;
  request: BatchRequest;
  snapshot: ConfigSnapshot;
  schema: TemplateSchema | null;
}

/** Raised by a member to stop the whole batch */
class BatchAborted extends Error {
  constructor(readonly fault: unknown) {
    super('Batch aborted');
  }
}

function recount(draft: BatchJob): void {
  let successCount = 0;
  let failureCount = 0;
  let flaggedCount = 0;
  for (const result of draft.results) {
    if (result.status === 'success') {
      successCount += 1;
      if (result.qualityFlags.length > 0) flaggedCount += 1;
    } else if (result.status === 'failed') {
      failureCount += 1;
    }
  }
  draft.metrics = { successCount, failureCount, flaggedCount };
}

@Injectable()
export class BatchJobService {
  private readonly logger = new Logger(BatchJobService.name);

  constructor(
    private readonly registry: JobRegistry,
    private readonly steps: PipelineSteps,
    private readonly configStore: ConfigStore,
    private readonly planStore: PlanStore,
    private readonly publisher: PlanPublisher,
    private readonly categories: PlanCategories,
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
  ) {}

  startBatch(request: BatchRequest): BatchJob {
    const count = request.fileIds.length;
    if (count === 0 || count > this.settings.maxBatchFiles) {
      throw new InvalidRequestError(
        `A batch takes 1 to ${this.settings.maxBatchFiles} files, got ${count}`,
        'batch_size',
      );
    }
    if (request.options.planCategory && !this.categories.find(request.options.planCategory)) {
      throw new InvalidRequestError(`Unknown plan category ${request.options.planCategory}`, 'unknown_category');
    }

    const created = this.registry.createBatch(request.fileIds);
    const batch = this.registry.updateBatch(created.id, (draft) => {
      draft.status = 'running';
    });
    void this.run(batch.id, request).catch((err: unknown) => this.abort(batch.id, err));
    return batch;
  }

  getStatus(batchId: string): BatchJob | null {
    return this.registry.getBatch(batchId);
  }

  async getResults(batchId: string): Promise<BatchResults | null> {
    const job = this.registry.getBatch(batchId);
    if (!job) return null;
    const planIds = job.results.flatMap((r) => (r.planId ? [r.planId] : []));
    const records = await Promise.all(planIds.map((id) => this.planStore.get(id)));
    return {
      job,
      plans: records.flatMap((record) => (record ? [record.plan] : [])),
    };
  }

  // ────────────────────────────────────────────
  // Run
  // ────────────────────────────────────────────
  private async run(batchId: string, request: BatchRequest): Promise<void> {
    const { templateId } = request;
    const snapshot = await this.configStore.snapshot();
    const schema = templateId
      ? await withDeadline(this.settings.jobTimeoutMs, ({ signal }) =>
          this.steps.analyzeTemplate(templateId, snapshot, signal),
        )
      : null;
    const context: BatchContext = { batchId, request, snapshot, schema };

    this.registry.updateBatch(batchId, (draft) => {
      draft.message = `Behandler ${request.fileIds.length} filer`;
    });

    try {
      await mapWithConcurrency(request.fileIds, this.settings.batchConcurrency, (fileId, index) =>
        this.runMember(context, fileId, index),
      );
    } catch (err) {
      throw err instanceof BatchAborted ? err.fault : err;
    }

    const batch = this.registry.updateBatch(batchId, (draft) => {
      draft.status = 'success';
      draft.message = `${draft.metrics.successCount} av ${draft.totalFiles} planer generert`;
    });
    this.logger.log(
      `Batch ${batchId} done: ${batch.metrics.successCount} ok, ${batch.metrics.failureCount} failed, ${batch.metrics.flaggedCount} flagged`,
    );
  }

  /** Never rejects for a member failure; rejects with BatchAborted on a storage fault */
  private async runMember(context: BatchContext, fileId: string, index: number): Promise<void> {
    const { batchId } = context;
    try {
      const { plan, roomCount } = await withDeadline(this.settings.jobTimeoutMs, (deadline) =>
        this.processFile(context, fileId, deadline),
      );
      const flags = qualityFlags(roomCount, plan.entries, this.settings);
      this.registry.updateBatch(batchId, (draft) => {
        draft.results[index] = {
          fileId,
          status: 'success',
          error: null,
          planId: plan.id,
          roomCount,
          qualityFlags: flags,
        };
        draft.processedFiles += 1;
        recount(draft);
      });
    } catch (err) {
      const detail = toErrorDetail(err);
      this.logger.warn(`Batch ${batchId}: ${fileId} failed [${detail.kind}] ${detail.message}`);
      this.recordFailure(batchId, index, detail);
      if (err instanceof StorageError) {
        throw new BatchAborted(err);
      }
    }
  }

  private async processFile(
    context: BatchContext,
    fileId: string,
    deadline: JobDeadline,
  ): Promise<{ plan: Plan; roomCount: number }> {
    const startedAt = Date.now();
    const { batchId, request, snapshot, schema } = context;
    const { options, templateId } = request;

    const { signal } = deadline;
    const rooms = await this.steps.analyzeFloorplan(fileId, options, snapshot, signal);
    const normalized = await this.steps.synthesizePlan(rooms, schema, options, snapshot, signal);
    const { plan } = await this.publisher.publish(
      {
        normalized,
        source: 'batch',
        metadata: {
          fileCount: 1,
          templateId: templateId ?? null,
          planCategory: options.planCategory ?? null,
          jobId: batchId,
          fileId,
        },
        startedAt,
        requestPayload: { batchId, fileId, templateId: templateId ?? null, options },
        renderExport: false,
      },
      deadline,
    );
    return { plan, roomCount: rooms.length };
  }

  private recordFailure(batchId: string, index: number, detail: JobErrorDetail): void {
    this.registry.updateBatch(batchId, (draft) => {
      const current = draft.results[index];
      draft.results[index] = { ...current, status: 'failed', error: detail, planId: null };
      draft.processedFiles += 1;
      recount(draft);
    });
  }

  /**
   * Orchestration fault: every member still pending fails with the batch's
   * error and the batch ends failed.
   */
  private abort(batchId: string, err: unknown): void {
    const detail = toErrorDetail(err);
    if (err instanceof PipelineError) {
      this.logger.error(`Batch ${batchId} aborted [${detail.kind}] ${detail.message}`);
    } else {
      this.logger.error(`Batch ${batchId} aborted unexpectedly`, err instanceof Error ? err.stack : String(err));
    }
    try {
      this.registry.updateBatch(batchId, (draft) => {
        for (const [index, result] of draft.results.entries()) {
          if (result.status === 'pending') {
            draft.results[index] = { ...result, status: 'failed', error: detail };
          }
        }
        draft.processedFiles = draft.totalFiles;
        draft.status = 'failed';
        draft.message = detail.message;
        draft.detail = detail;
        recount(draft);
      });
    } catch (updateErr) {
      const reason = updateErr instanceof Error ? updateErr.message : String(updateErr);
      this.logger.error(`Batch ${batchId}: could not record failure: ${reason}`);
    }
  }
}
