/**
 * Maps raw SDK / network failures onto the transient-vs-permanent split.
 *
 * transient: 408, 429, 5xx, per-call timeouts, dropped connections
 * permanent: auth, other 4xx, anything unrecognised
 */

import { PermanentProviderError, PipelineError, TransientProviderError } from '../common/errors.js';
import { isRecord } from '../common/guards.js';

const NETWORK_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE', 'UND_ERR_SOCKET']);

function statusOf(err: unknown): number | undefined {
  if (!isRecord(err)) return undefined;
  const status = err.status ?? err.code;
  return typeof status === 'number' && Number.isInteger(status) ? status : undefined;
}

function codeOf(value: unknown): unknown {
  return isRecord(value) ? value.code : undefined;
}

// AbortSignal reasons are DOMExceptions, matched by name
function isTimeout(err: unknown): boolean {
  return isRecord(err) && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

function isNetworkFailure(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code = codeOf(err) ?? codeOf(err.cause);
  if (typeof code === 'string' && NETWORK_CODES.has(code)) return true;
  return err.name === 'TypeError' && /fetch failed/i.test(err.message);
}

export function classifyProviderError(err: unknown): PipelineError {
  if (err instanceof PipelineError) return err;

  const message = err instanceof Error ? err.message : String(err);

  if (isTimeout(err)) {
    return new TransientProviderError('Model call timed out', { reason: 'timeout', cause: err });
  }

  const status = statusOf(err);
  if (status !== undefined) {
    if (status === 408) {
      return new TransientProviderError(message, { reason: 'timeout', statusCode: status, cause: err });
    }
    if (status === 429) {
      return new TransientProviderError(message, { reason: 'rate_limited', statusCode: status, cause: err });
    }
    if (status >= 500) {
      return new TransientProviderError(message, { reason: 'server_error', statusCode: status, cause: err });
    }
    if (status === 401 || status === 403) {
      return new PermanentProviderError(message, { reason: 'auth', statusCode: status, cause: err });
    }
    if (status >= 400) {
      return new PermanentProviderError(message, { reason: 'invalid_request', statusCode: status, cause: err });
    }
  }

  if (isNetworkFailure(err)) {
    return new TransientProviderError(message, { reason: 'network', cause: err });
  }

  return new PermanentProviderError(message, { reason: 'unknown', cause: err });
}
