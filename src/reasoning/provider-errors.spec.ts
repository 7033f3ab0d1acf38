import { NormalizationError, PermanentProviderError, TransientProviderError } from '../common/errors.js';
import { classifyProviderError } from './provider-errors.js';

function withStatus(status: number): Error {
  return Object.assign(new Error(`HTTP ${status}`), { status });
}

describe('classifyProviderError', () => {
  it.each([
    [408, 'timeout'],
    [429, 'rate_limited'],
    [500, 'server_error'],
    [503, 'server_error'],
  ])('treats status %i as transient (%s)', (status, reason) => {
    const classified = classifyProviderError(withStatus(status));
    expect(classified).toBeInstanceOf(TransientProviderError);
    expect(classified.toDetail()).toEqual({
      kind: 'transient_provider',
      message: `HTTP ${status}`,
      reason,
      statusCode: status,
      retryable: true,
    });
  });

  it.each([
    [400, 'invalid_request'],
    [401, 'auth'],
    [403, 'auth'],
    [404, 'invalid_request'],
  ])('treats status %i as permanent (%s)', (status, reason) => {
    const classified = classifyProviderError(withStatus(status));
    expect(classified).toBeInstanceOf(PermanentProviderError);
    expect(classified.reason).toBe(reason);
    expect(classified.retryable).toBe(false);
  });

  it('treats aborted per-call timeouts as transient', () => {
    const timeout = new DOMException('The operation was aborted due to timeout', 'TimeoutError');
    expect(classifyProviderError(timeout)).toMatchObject({ kind: 'transient_provider', reason: 'timeout' });
  });

  it('treats dropped connections as transient', () => {
    const reset = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
    expect(classifyProviderError(reset)).toMatchObject({ kind: 'transient_provider', reason: 'network' });

    const fetchFailed = new TypeError('fetch failed', { cause: { code: 'UND_ERR_SOCKET' } });
    expect(classifyProviderError(fetchFailed)).toMatchObject({ reason: 'network' });
  });

  it('passes pipeline errors through and treats anything else as permanent', () => {
    const normalization = new NormalizationError('no entries');
    expect(classifyProviderError(normalization)).toBe(normalization);
    expect(classifyProviderError('boom')).toMatchObject({ kind: 'permanent_provider', reason: 'unknown', message: 'boom' });
  });
});
