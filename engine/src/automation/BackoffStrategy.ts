/**
 * Backoff Strategy
 *
 * Delays between retry attempts of a node: fixed, linear or exponential,
 * capped, with optional jitter.
 *
 * @module automation
 */

export type BackoffType = 'fixed' | 'linear' | 'exponential';

export interface BackoffConfig {
  type: BackoffType;

  /** Base delay in milliseconds (default 0: retry immediately) */
  baseDelayMs?: number;

  /** Cap in milliseconds (default 60s) */
  maxDelayMs?: number;

  /** Multiplier for exponential backoff (default 2) */
  multiplier?: number;

  /** Random spread as a fraction of the delay, 0-1 (default 0) */
  jitter?: number;
}

export class BackoffStrategy {
  private readonly config: Required<BackoffConfig>;

  /**
   * @param random - Source of randomness for jitter, in [0, 1)
   */
  constructor(config: BackoffConfig, private readonly random: () => number = Math.random) {
    this.config = {
      type: config.type,
      baseDelayMs: config.baseDelayMs ?? 0,
      maxDelayMs: config.maxDelayMs ?? 60000,
      multiplier: config.multiplier ?? 2,
      jitter: Math.max(0, Math.min(1, config.jitter ?? 0)),
    };

    this.validateConfig();
  }

  /**
   * Delay before retry number `retry` (1 = first retry)
   */
  calculateDelay(retry: number): number {
    if (retry < 1) {
      throw new Error(`Retry number must be >= 1, got: ${retry}`);
    }

    const { type, baseDelayMs, maxDelayMs, multiplier, jitter } = this.config;
    let delayMs: number;

    switch (type) {
      case 'fixed':
        delayMs = baseDelayMs;
        break;
      case 'linear':
        delayMs = baseDelayMs * retry;
        break;
      case 'exponential':
        delayMs = baseDelayMs * Math.pow(multiplier, retry - 1);
        break;
    }

    delayMs = Math.min(delayMs, maxDelayMs);

    if (jitter > 0) {
      const spread = delayMs * jitter;
      delayMs = Math.max(0, delayMs + (this.random() * 2 - 1) * spread);
    }

    return Math.round(delayMs);
  }

  getConfig(): Readonly<Required<BackoffConfig>> {
    return { ...this.config };
  }

  private validateConfig(): void {
    if (this.config.baseDelayMs < 0) {
      throw new Error(`Base delay must be >= 0, got: ${this.config.baseDelayMs}`);
    }
    if (this.config.maxDelayMs < this.config.baseDelayMs) {
      throw new Error(
        `Max delay (${this.config.maxDelayMs}ms) must be >= base delay (${this.config.baseDelayMs}ms)`
      );
    }
    if (this.config.multiplier <= 0) {
      throw new Error(`Multiplier must be > 0, got: ${this.config.multiplier}`);
    }
  }
}

/**
 * Retry immediately
 */
export const IMMEDIATE_BACKOFF = new BackoffStrategy({ type: 'fixed', baseDelayMs: 0 });
