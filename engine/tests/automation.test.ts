import { BackoffStrategy } from '../src/automation/BackoffStrategy.js';
import { CancellationError, TimeoutError, TimeoutManager, sleep } from '../src/automation/TimeoutManager.js';

describe('BackoffStrategy', () => {
  it('computes fixed, linear and exponential delays', () => {
    expect(new BackoffStrategy({ type: 'fixed', baseDelayMs: 100 }).calculateDelay(3)).toBe(100);
    expect(new BackoffStrategy({ type: 'linear', baseDelayMs: 100 }).calculateDelay(3)).toBe(300);
    expect(new BackoffStrategy({ type: 'exponential', baseDelayMs: 100 }).calculateDelay(3)).toBe(400);
  });

  it('caps the delay', () => {
    const backoff = new BackoffStrategy({ type: 'exponential', baseDelayMs: 100, maxDelayMs: 250 });

    expect(backoff.calculateDelay(2)).toBe(200);
    expect(backoff.calculateDelay(3)).toBe(250);
  });

  it('spreads the delay by the jitter fraction', () => {
    const backoff = new BackoffStrategy({ type: 'fixed', baseDelayMs: 100, jitter: 0.5 }, () => 0.75);

    expect(backoff.calculateDelay(1)).toBe(125);
  });

  it('rejects bad settings', () => {
    expect(() => new BackoffStrategy({ type: 'fixed', baseDelayMs: -1 })).toThrow('Base delay must be >= 0, got: -1');
    expect(() => new BackoffStrategy({ type: 'fixed', baseDelayMs: 500, maxDelayMs: 100 })).toThrow(
      'Max delay (100ms) must be >= base delay (500ms)'
    );
    expect(() => new BackoffStrategy({ type: 'fixed' }).calculateDelay(0)).toThrow('Retry number must be >= 1, got: 0');
  });
});

/**
 * Operation that only settles once its signal fires
 */
function untilAborted(signal: AbortSignal): Promise<string> {
  return new Promise(resolve => {
    signal.addEventListener('abort', () => resolve('aborted'), { once: true });
  });
}

describe('TimeoutManager', () => {
  it('returns the operation result', async () => {
    await expect(TimeoutManager.execute(async () => 42, { timeoutMs: 1000 })).resolves.toBe(42);
  });

  it('rejects with TimeoutError after the deadline', async () => {
    const run = TimeoutManager.execute(untilAborted, { timeoutMs: 10, operation: 'fetch' });

    await expect(run).rejects.toBeInstanceOf(TimeoutError);
    await expect(run).rejects.toThrow('Operation "fetch" timed out after 10ms');
  });

  it('refuses to start when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      TimeoutManager.execute(untilAborted, { timeoutMs: 1000, operation: 'fetch', signal: controller.signal })
    ).rejects.toThrow('Operation "fetch" cancelled before it started');
  });

  it('rejects with CancellationError when the caller aborts', async () => {
    const controller = new AbortController();
    const run = TimeoutManager.execute(untilAborted, { timeoutMs: 1000, operation: 'fetch', signal: controller.signal });
    setTimeout(() => controller.abort(), 5);

    await expect(run).rejects.toBeInstanceOf(CancellationError);
  });

  it('formats durations', () => {
    expect(TimeoutManager.formatTimeout(850)).toBe('850ms');
    expect(TimeoutManager.formatTimeout(2500)).toBe('2.5s');
    expect(TimeoutManager.formatTimeout(90000)).toBe('1.5m');
  });
});

describe('sleep', () => {
  it('resolves immediately for zero', async () => {
    await expect(sleep(0)).resolves.toBeUndefined();
  });

  it('rejects when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(sleep(1000, controller.signal)).rejects.toBeInstanceOf(CancellationError);
  });

  it('stops waiting when aborted', async () => {
    const controller = new AbortController();
    const waiting = sleep(10000, controller.signal);
    controller.abort();

    await expect(waiting).rejects.toBeInstanceOf(CancellationError);
  });
});
