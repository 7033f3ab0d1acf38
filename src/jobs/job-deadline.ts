import { JobTimeoutError } from '../common/errors.js';
import type { JobDeadline } from '../types/job.types.js';

/**
 * Runs `work` under a job-level deadline. When the deadline passes the signal
 * aborts with JobTimeoutError and the returned promise rejects with it at
 * once, even if `work` is still waiting on something that ignores the signal.
 *
 * `commit` ends the deadline: a write started through it always runs to
 * completion, so a stored plan never sits behind a timed-out job.
 */
export async function withDeadline<T>(timeoutMs: number, work: (deadline: JobDeadline) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new JobTimeoutError(timeoutMs)), timeoutMs);
  const expired = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
  });
  const deadline: JobDeadline = {
    signal: controller.signal,
    async commit<W>(write: () => Promise<W>): Promise<W> {
      controller.signal.throwIfAborted();
      clearTimeout(timer);
      return write();
    },
  };
  try {
    return await Promise.race([work(deadline), expired]);
  } finally {
    clearTimeout(timer);
  }
}
