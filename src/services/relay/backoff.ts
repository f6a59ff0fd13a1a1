const DEFAULT_MULTIPLIER = 2; // exponential growth per consecutive failure
const DEFAULT_JITTER_RATIO = 0.2; // +/- 20% random jitter

export type BackoffStrategy = "fixed" | "exponential";

export interface BackoffOptions {
  strategy: BackoffStrategy;
  baseDelayMs: number;
  maxDelayMs: number;
  multiplier?: number;
  jitterRatio?: number;
  random?: () => number;
}

/** One retry policy for store outages, missing configuration and loop errors. */
export class BackoffPolicy {
  private readonly multiplier: number;
  private readonly jitterRatio: number;
  private readonly random: () => number;

  constructor(private readonly options: BackoffOptions) {
    this.multiplier = options.multiplier ?? DEFAULT_MULTIPLIER;
    this.jitterRatio = options.jitterRatio ?? DEFAULT_JITTER_RATIO;
    this.random = options.random ?? Math.random;
  }

  /**
   * @param attempt 1 for the first consecutive failure.
   * @returns delay in milliseconds, never above `maxDelayMs`
   */
  delayFor(attempt: number): number {
    const { strategy, baseDelayMs, maxDelayMs } = this.options;
    const exponent = Math.max(0, attempt - 1);

    let delay = strategy === "fixed" ? baseDelayMs : baseDelayMs * Math.pow(this.multiplier, exponent);
    delay = Math.min(delay, maxDelayMs);

    const jitterAmount = delay * this.jitterRatio;
    delay += (this.random() - 0.5) * 2 * jitterAmount;

    return Math.min(Math.max(Math.round(delay), 0), maxDelayMs);
  }
}
