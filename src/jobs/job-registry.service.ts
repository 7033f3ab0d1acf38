/**
 * In-process job records polled by clients.
 *
 * Records are replaced, never mutated in place: readers get a copy and a
 * writer's change becomes visible in one step. A restart loses every job
 * still in flight; finished plans are already in the plan store.
 * Finished records are dropped once they are older than jobRetentionMs.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { PIPELINE_SETTINGS, type PipelineSettings } from '../config/pipeline-settings.js';
import type { BatchJob, JobBase, JobKind, PlanJob } from '../types/job.types.js';
import { assertTransition, isTerminal } from './job-state.js';

type PlanJobPatch = Partial<Omit<PlanJob, 'id' | 'kind' | 'totalFiles' | 'createdAt' | 'updatedAt'>>;

function newJobId(): string {
  return randomUUID().replace(/-/g, '');
}

@Injectable()
export class JobRegistry {
  private readonly logger = new Logger(JobRegistry.name);
  private readonly jobs = new Map<string, PlanJob>();
  private readonly batches = new Map<string, BatchJob>();

  constructor(@Inject(PIPELINE_SETTINGS) private readonly settings: Pick<PipelineSettings, 'jobRetentionMs'>) {}

  // ────────────────────────────────────────────
  // Plan jobs
  // ────────────────────────────────────────────
  createJob(kind: JobKind, totalFiles: number): PlanJob {
    this.evictExpired();
    const now = new Date().toISOString();
    const job: PlanJob = {
      id: newJobId(),
      kind,
      status: 'pending',
      totalFiles,
      processedFiles: 0,
      message: null,
      detail: null,
      createdAt: now,
      updatedAt: now,
      planId: null,
      docxUrl: null,
    };
    this.jobs.set(job.id, job);
    this.logger.log(`${kind} job ${job.id} created (${totalFiles} file(s))`);
    return structuredClone(job);
  }

  getJob(id: string): PlanJob | null {
    const job = this.jobs.get(id);
    return job ? structuredClone(job) : null;
  }

  updateJob(id: string, patch: PlanJobPatch): PlanJob {
    const current = this.jobs.get(id);
    if (!current) {
      throw new Error(`Job ${id} does not exist`);
    }
    const next: PlanJob = { ...current, ...patch, updatedAt: new Date().toISOString() };
    assertTransition(id, current.status, next.status);
    if (next.processedFiles < current.processedFiles) {
      next.processedFiles = current.processedFiles;
    }
    this.jobs.set(id, next);
    return structuredClone(next);
  }

  // ────────────────────────────────────────────
  // Batch jobs
  // ────────────────────────────────────────────
  createBatch(fileIds: readonly string[]): BatchJob {
    this.evictExpired();
    const now = new Date().toISOString();
    const batch: BatchJob = {
      id: newJobId(),
      status: 'pending',
      totalFiles: fileIds.length,
      processedFiles: 0,
      message: null,
      detail: null,
      createdAt: now,
      updatedAt: now,
      results: fileIds.map((fileId) => ({
        fileId,
        status: 'pending',
        error: null,
        planId: null,
        roomCount: null,
        qualityFlags: [],
      })),
      metrics: { successCount: 0, failureCount: 0, flaggedCount: 0 },
    };
    this.batches.set(batch.id, batch);
    this.logger.log(`batch ${batch.id} created (${fileIds.length} file(s))`);
    return structuredClone(batch);
  }

  getBatch(id: string): BatchJob | null {
    const batch = this.batches.get(id);
    return batch ? structuredClone(batch) : null;
  }

  /**
   * Applies `mutate` to a draft copy; the draft replaces the record only if
   * its status change is legal.
   */
  updateBatch(id: string, mutate: (draft: BatchJob) => void): BatchJob {
    const current = this.batches.get(id);
    if (!current) {
      throw new Error(`Batch ${id} does not exist`);
    }
    const draft = structuredClone(current);
    mutate(draft);
    assertTransition(id, current.status, draft.status);
    draft.processedFiles = Math.max(draft.processedFiles, current.processedFiles);
    draft.updatedAt = new Date().toISOString();
    this.batches.set(id, draft);
    return structuredClone(draft);
  }

  // ────────────────────────────────────────────
  // Retention
  // ────────────────────────────────────────────
  private evictExpired(): void {
    const cutoff = Date.now() - this.settings.jobRetentionMs;
    const evicted = evictFinished(this.jobs, cutoff) + evictFinished(this.batches, cutoff);
    if (evicted > 0) {
      this.logger.log(`Evicted ${evicted} finished job record(s)`);
    }
  }
}

function evictFinished<R extends JobBase>(records: Map<string, R>, cutoff: number): number {
  let evicted = 0;
  for (const [id, record] of records) {
    if (isTerminal(record.status) && Date.parse(record.updatedAt) < cutoff) {
      records.delete(id);
      evicted += 1;
    }
  }
  return evicted;
}
