/**
 * Timeout Manager
 *
 * Wraps one asynchronous operation with a deadline and an optional
 * cancellation signal. The operation receives an AbortSignal that fires on
 * either, so capabilities that honour it can stop their own work.
 *
 * @module automation
 */

/**
 * Operation exceeded its deadline
 */
export class TimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs: number,
    public readonly operation?: string
  ) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Operation was cancelled by its caller
 */
export class CancellationError extends Error {
  constructor(message: string = 'Operation was cancelled') {
    super(message);
    this.name = 'AbortError';
  }
}

export interface TimeoutConfig {
  timeoutMs: number;

  /** Operation name for error messages */
  operation?: string;

  /** Caller's cancellation signal */
  signal?: AbortSignal;
}

export class TimeoutManager {
  /**
   * Execute an operation with a deadline
   *
   * @throws TimeoutError when the deadline passes first
   * @throws CancellationError when the caller's signal fires first
   */
  static async execute<T>(
    operation: (signal: AbortSignal) => Promise<T>,
    config: TimeoutConfig
  ): Promise<T> {
    if (config.signal?.aborted) {
      throw new CancellationError(this.describe('cancelled before it started', config));
    }

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    let onCancel: (() => void) | undefined;

    const interrupted = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new TimeoutError(
          this.describe(`timed out after ${config.timeoutMs}ms`, config),
          config.timeoutMs,
          config.operation
        );
        controller.abort(error);
        reject(error);
      }, config.timeoutMs);

      if (config.signal) {
        const parent = config.signal;
        onCancel = () => {
          const error = new CancellationError(this.describe('was cancelled', config));
          controller.abort(error);
          reject(error);
        };
        parent.addEventListener('abort', onCancel, { once: true });
      }
    });

    try {
      return await Promise.race([operation(controller.signal), interrupted]);
    } finally {
      clearTimeout(timer);
      if (onCancel) {
        config.signal?.removeEventListener('abort', onCancel);
      }
    }
  }

  static isTimeoutError(error: unknown): error is TimeoutError {
    return error instanceof TimeoutError;
  }

  /**
   * Format milliseconds for display ("850ms", "2.5s", "1.2m")
   */
  static formatTimeout(ms: number): string {
    if (ms < 1000) {
      return `${ms}ms`;
    }
    if (ms < 60000) {
      return `${(ms / 1000).toFixed(1)}s`;
    }
    if (ms < 3600000) {
      return `${(ms / 60000).toFixed(1)}m`;
    }
    return `${(ms / 3600000).toFixed(1)}h`;
  }

  private static describe(what: string, config: TimeoutConfig): string {
    return config.operation ? `Operation "${config.operation}" ${what}` : `Operation ${what}`;
  }
}

/**
 * Wait between retries. Rejects with CancellationError if the signal fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancellationError());
      return;
    }
    if (ms <= 0) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancellationError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
