/**
 * Job / BatchJob status records exposed to polling clients.
 */

export type JobStatus = 'pending' | 'running' | 'success' | 'failed';

export type JobKind = 'generate' | 'convert';

export type PipelineErrorKind =
  | 'transient_provider'
  | 'permanent_provider'
  | 'normalization'
  | 'storage'
  | 'timeout'
  | 'invalid_request'
  | 'internal';

/** Structured failure payload carried by a failed job or batch member */
export interface JobErrorDetail {
  kind: PipelineErrorKind;
  message: string;
  reason?: string;
  statusCode?: number;
  retryable: boolean;
}

export interface JobBase {
  id: string;
  status: JobStatus;
  totalFiles: number;
  processedFiles: number;
  message: string | null;
  detail: JobErrorDetail | null;
  createdAt: string;
  updatedAt: string;
}

export interface PlanJob extends JobBase {
  kind: JobKind;
  planId: string | null;
  docxUrl: string | null;
}

export type QualityFlag = 'room_count_out_of_range' | 'missing_area_data';

export interface BatchSubResult {
  fileId: string;
  status: 'pending' | 'success' | 'failed';
  error: JobErrorDetail | null;
  planId: string | null;
  roomCount: number | null;
  qualityFlags: QualityFlag[];
}

export interface BatchMetrics {
  successCount: number;
  failureCount: number;
  flaggedCount: number;
}

export interface BatchJob extends JobBase {
  results: BatchSubResult[]; // file-submission order
  metrics: BatchMetrics;
}

/** Job-level deadline handed to a running pipeline */
export interface JobDeadline {
  readonly signal: AbortSignal;
  /** Starts the final write; from here on the deadline no longer fires */
  commit<W>(write: () => Promise<W>): Promise<W>;
}
