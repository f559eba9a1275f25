import { SynthesisError } from './errors.js';
import { withRetry } from './retry.js';

describe('withRetry', () => {
  it('retries until the operation succeeds', async () => {
    let calls = 0;
    const onRetry = vi.fn();

    const result = await withRetry(async () => {
      calls++;
      if (calls < 3) throw new Error(`attempt ${calls}`);
      return 'ok';
    }, { maxAttempts: 3, baseDelayMs: 0, onRetry });

    expect(result).toBe('ok');
    expect(calls).toBe(3);
    expect(onRetry.mock.calls.map(c => c[0])).toEqual([1, 2]);
  });

  it('throws the last error once attempts are exhausted', async () => {
    let calls = 0;

    await expect(withRetry(async () => {
      calls++;
      throw new Error(`attempt ${calls}`);
    }, { maxAttempts: 2, baseDelayMs: 0 })).rejects.toThrow('attempt 2');
    expect(calls).toBe(2);
  });

  it('does not retry non-retryable pipeline errors', async () => {
    const fn = vi.fn(async () => {
      throw new SynthesisError('empty', 1, { retryable: false });
    });

    await expect(withRetry(fn, { maxAttempts: 3, baseDelayMs: 0 })).rejects.toBeInstanceOf(SynthesisError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries retryable pipeline errors', async () => {
    const fn = vi.fn(async () => {
      throw new SynthesisError('tts down', 1, { retryable: true });
    });

    await expect(withRetry(fn, { maxAttempts: 3, baseDelayMs: 0 })).rejects.toThrow('tts down');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('stops retrying once the signal is aborted', async () => {
    const fn = vi.fn(async () => {
      throw new Error('fail');
    });

    await expect(withRetry(fn, { maxAttempts: 5, baseDelayMs: 0, signal: AbortSignal.abort() }))
      .rejects.toThrow('fail');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('abandons the backoff wait when the signal aborts', async () => {
    const controller = new AbortController();
    const fn = vi.fn(async () => {
      throw new Error('fail');
    });

    const run = withRetry(fn, {
      maxAttempts: 3,
      baseDelayMs: 60_000,
      signal: controller.signal,
      onRetry: () => controller.abort(new Error('cancelled')),
    });

    await expect(run).rejects.toThrow('cancelled');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
