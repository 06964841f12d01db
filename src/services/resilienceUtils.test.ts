import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { TimeoutError, abortable, isAbortError, throwIfAborted, withTimeout } from './resilienceUtils';

describe('withTimeout', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve when the promise settles in time', async () => {
    const promise = withTimeout(Promise.resolve('done'), 1000, 'analysis');
    await vi.runAllTimersAsync();

    await expect(promise).resolves.toBe('done');
  });

  it('should reject with a TimeoutError when the deadline passes', async () => {
    const never = new Promise<string>(() => {});
    const promise = withTimeout(never, 500, 'analysis');
    const assertion = expect(promise).rejects.toThrow('analysis timed out after 500ms');

    await vi.advanceTimersByTimeAsync(500);
    await assertion;
    await expect(promise).rejects.toBeInstanceOf(TimeoutError);
  });

  it('should pass through the original rejection', async () => {
    const error = new Error('upstream 500');
    const promise = withTimeout(Promise.reject(error), 1000);

    await expect(promise).rejects.toBe(error);
  });
});

describe('abortable', () => {
  it('should reject with the abort reason when the signal fires', async () => {
    const controller = new AbortController();
    const reason = new Error('cancelled by caller');
    const promise = abortable(new Promise<string>(() => {}), controller.signal);

    controller.abort(reason);

    await expect(promise).rejects.toBe(reason);
  });

  it('should reject immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(abortable(Promise.resolve(1), controller.signal)).rejects.toSatisfy(
      (error: unknown) => isAbortError(error, controller.signal),
    );
  });

  it('should resolve when no signal is given', async () => {
    await expect(abortable(Promise.resolve(42))).resolves.toBe(42);
  });
});

describe('throwIfAborted', () => {
  it('should throw only once the signal has aborted', () => {
    const controller = new AbortController();

    expect(() => throwIfAborted(controller.signal)).not.toThrow();
    controller.abort(new Error('stop'));
    expect(() => throwIfAborted(controller.signal)).toThrow('stop');
    expect(() => throwIfAborted(undefined)).not.toThrow();
  });
});
