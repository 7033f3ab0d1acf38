/**
 * Plan Job Orchestrator: single/multi-document generation and conversion of
 * an external plan.
 *
 * A start call registers the job and returns immediately; the pipeline runs
 * in the background and only ever reports through the job record. Any
 * failure aborts the calls still in flight and leaves no plan behind.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { InvalidRequestError, PipelineError, toErrorDetail } from '../common/errors.js';
import { mapWithConcurrency } from '../common/concurrency.js';
import { ConfigStore } from '../config/config-store.service.js';
import { PIPELINE_SETTINGS, type PipelineSettings } from '../config/pipeline-settings.js';
import { PlanCategories } from '../plans/plan-categories.js';
import { mergeRooms } from '../plans/plan-payload.js';
import { PlanPublisher } from '../plans/plan-publisher.service.js';
import { PlanStore } from '../plans/plan-store.js';
import { downloadUrl } from '../plans/plan-summary.js';
import type { JobDeadline, PlanJob } from '../types/job.types.js';
import type { ConversionRequest, GenerationRequest } from '../types/options.types.js';
import type { Plan } from '../types/plan.types.js';
import { withDeadline } from './job-deadline.js';
import { JobRegistry } from './job-registry.service.js';
import { PipelineSteps } from './pipeline-steps.service.js';

export interface PlanJobResult {
  job: PlanJob;
  plan: Plan | null;
  docxUrl: string | null;
}

@Injectable()
export class PlanJobService {
  private readonly logger = new Logger(PlanJobService.name);

  constructor(
    private readonly registry: JobRegistry,
    private readonly steps: PipelineSteps,
    private readonly configStore: ConfigStore,
    private readonly planStore: PlanStore,
    private readonly publisher: PlanPublisher,
    private readonly categories: PlanCategories,
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
  ) {}

  // ────────────────────────────────────────────
  // Start
  // ────────────────────────────────────────────
  startGeneration(request: GenerationRequest): PlanJob {
    if (request.fileIds.length === 0) {
      throw new InvalidRequestError('At least one floor plan is required', 'no_files');
    }
    if (request.options.planCategory && !this.categories.find(request.options.planCategory)) {
      throw new InvalidRequestError(`Unknown plan category ${request.options.planCategory}`, 'unknown_category');
    }
    const job = this.registry.createJob('generate', request.fileIds.length);
    return this.launch(job.id, (deadline) => this.generate(job.id, request, deadline));
  }

  startConversion(request: ConversionRequest): PlanJob {
    const job = this.registry.createJob('convert', 1);
    return this.launch(job.id, (deadline) => this.convert(job.id, request, deadline));
  }

  // ────────────────────────────────────────────
  // Query
  // ────────────────────────────────────────────
  getJob(jobId: string): PlanJob | null {
    return this.registry.getJob(jobId);
  }

  async getResult(jobId: string): Promise<PlanJobResult | null> {
    const job = this.registry.getJob(jobId);
    if (!job) return null;
    if (job.status !== 'success' || !job.planId) {
      return { job, plan: null, docxUrl: null };
    }
    const record = await this.planStore.get(job.planId);
    return {
      job,
      plan: record?.plan ?? null,
      docxUrl: record ? downloadUrl(record.docxId) : job.docxUrl,
    };
  }

  // ────────────────────────────────────────────
  // Pipeline
  // ────────────────────────────────────────────
  private launch(jobId: string, pipeline: (deadline: JobDeadline) => Promise<void>): PlanJob {
    const job = this.registry.updateJob(jobId, { status: 'running' });
    void withDeadline(this.settings.jobTimeoutMs, pipeline).catch((err: unknown) => this.fail(jobId, err));
    return job;
  }

  private fail(jobId: string, err: unknown): void {
    const detail = toErrorDetail(err);
    if (err instanceof PipelineError) {
      this.logger.warn(`Job ${jobId} failed [${detail.kind}] ${detail.message}`);
    } else {
      this.logger.error(`Job ${jobId} failed unexpectedly`, err instanceof Error ? err.stack : String(err));
    }
    try {
      this.registry.updateJob(jobId, { status: 'failed', message: detail.message, detail });
    } catch (updateErr) {
      const reason = updateErr instanceof Error ? updateErr.message : String(updateErr);
      this.logger.error(`Job ${jobId}: could not record failure: ${reason}`);
    }
  }

  private async generate(jobId: string, request: GenerationRequest, deadline: JobDeadline): Promise<void> {
    const startedAt = Date.now();
    const { fileIds, templateId, options } = request;
    const snapshot = await this.configStore.snapshot();

    // first failure aborts the sibling calls
    const scope = new AbortController();
    const signal = AbortSignal.any([deadline.signal, scope.signal]);
    const failFast = <T>(work: () => Promise<T>): Promise<T> =>
      work().catch((err: unknown) => {
        scope.abort(err);
        throw err;
      });

    let processed = 0;
    this.registry.updateJob(jobId, { message: 'Analyserer plantegninger' });
    const [perDocument, schema] = await Promise.all([
      mapWithConcurrency(fileIds, this.settings.analysisConcurrency, async (fileId) => {
        const rooms = await failFast(() => this.steps.analyzeFloorplan(fileId, options, snapshot, signal));
        processed += 1;
        this.registry.updateJob(jobId, { processedFiles: processed });
        return rooms;
      }),
      templateId ? failFast(() => this.steps.analyzeTemplate(templateId, snapshot, signal)) : null,
    ]);

    this.registry.updateJob(jobId, { message: 'Genererer renholdsplan' });
    const normalized = await this.steps.synthesizePlan(mergeRooms(perDocument), schema, options, snapshot, signal);

    const { plan, docxId } = await this.publisher.publish(
      {
        normalized,
        source: 'generator',
        metadata: {
          fileCount: fileIds.length,
          templateId: templateId ?? null,
          planCategory: options.planCategory ?? null,
          jobId,
        },
        startedAt,
        requestPayload: { fileIds, templateId: templateId ?? null, options },
        renderExport: true,
      },
      { signal, commit: deadline.commit },
    );

    this.registry.updateJob(jobId, {
      status: 'success',
      planId: plan.id,
      docxUrl: downloadUrl(docxId),
      message: `${plan.entries.length} oppføringer generert`,
    });
    this.logger.log(`Job ${jobId}: plan ${plan.id} from ${fileIds.length} document(s)`);
  }

  private async convert(jobId: string, request: ConversionRequest, deadline: JobDeadline): Promise<void> {
    const startedAt = Date.now();
    const snapshot = await this.configStore.snapshot();

    this.registry.updateJob(jobId, { message: 'Konverterer plan' });
    const { filename, plan: normalized } = await this.steps.convertDocument(request.fileId, snapshot, deadline.signal);
    this.registry.updateJob(jobId, { processedFiles: 1 });

    const { plan, docxId } = await this.publisher.publish(
      {
        normalized,
        source: 'converter',
        metadata: {
          fileCount: 1,
          templateId: null,
          planCategory: null,
          jobId,
          fileId: request.fileId,
        },
        startedAt,
        requestPayload: { fileId: request.fileId, filename },
        renderExport: true,
      },
      deadline,
    );

    this.registry.updateJob(jobId, {
      status: 'success',
      planId: plan.id,
      docxUrl: downloadUrl(docxId),
      message: `${plan.entries.length} oppføringer konvertert`,
    });
    this.logger.log(`Job ${jobId}: converted ${filename} into plan ${plan.id}`);
  }
}
