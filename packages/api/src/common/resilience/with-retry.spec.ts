import { SubsystemUnavailableError, TimeoutError } from '../errors/originality.errors';
import { isRetryable, withRetry, withTimeout } from './with-retry';

const policy = { subsystem: 'test', timeoutMs: 1_000, retries: 1, backoffMs: 0 };

describe('withTimeout', () => {
  it('should reject with TimeoutError when the task hangs', async () => {
    await expect(withTimeout(() => new Promise<never>(() => undefined), 10, 'test')).rejects.toThrow(
      'test unavailable: timed out after 10ms',
    );
  });

  it('should pass the result through', async () => {
    await expect(withTimeout(async () => 'done', 100, 'test')).resolves.toBe('done');
  });
});

describe('withRetry', () => {
  it('should succeed on the retry after one failure', async () => {
    const task = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new SubsystemUnavailableError('test', 'blip'))
      .mockResolvedValueOnce('ok');
    const onRetry = jest.fn();

    await expect(withRetry(task, { ...policy, onRetry })).resolves.toBe('ok');
    expect(task).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][0]).toBe(1);
  });

  it('should give up after the configured retries and rethrow the last error', async () => {
    const task = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new SubsystemUnavailableError('test', 'first'))
      .mockRejectedValueOnce(new SubsystemUnavailableError('test', 'second'));

    await expect(withRetry(task, policy)).rejects.toThrow('test unavailable: second');
    expect(task).toHaveBeenCalledTimes(2);
  });

  it('should not retry a non-retryable error', async () => {
    const task = jest.fn<Promise<string>, []>().mockRejectedValue(new SubsystemUnavailableError('test', 'denied', false));

    await expect(withRetry(task, policy)).rejects.toThrow('test unavailable: denied');
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('should retry a timed-out attempt', async () => {
    const task = jest
      .fn<Promise<string>, []>()
      .mockImplementationOnce(() => new Promise<string>(() => undefined))
      .mockResolvedValueOnce('late');

    await expect(withRetry(task, { ...policy, timeoutMs: 10 })).resolves.toBe('late');
  });
});

describe('isRetryable', () => {
  it('should respect the flag on subsystem errors', () => {
    expect(isRetryable(new TimeoutError('test', 5))).toBe(true);
    expect(isRetryable(new SubsystemUnavailableError('test', 'denied', false))).toBe(false);
    expect(isRetryable(new Error('anything else'))).toBe(true);
  });
});
