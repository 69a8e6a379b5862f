export interface AdaptiveTimeoutOptions {
  defaultMs: number;
  minMs: number;
  maxMs: number;
  window?: number;
  factor?: number;
}

/**
 * Attempt timeout derived from recent successful load times: `factor`
 * times the average of the last `window` loads, clamped to [minMs, maxMs].
 * Falls back to `defaultMs` until a load has been recorded.
 */
export class AdaptiveTimeout {
  private readonly samples: number[] = [];
  private readonly window: number;
  private readonly factor: number;

  constructor(private readonly options: AdaptiveTimeoutOptions) {
    this.window = options.window ?? 10;
    this.factor = options.factor ?? 1.5;
  }

  record(durationMs: number): void {
    this.samples.push(durationMs);
    if (this.samples.length > this.window) {
      this.samples.shift();
    }
  }

  current(): number {
    if (this.samples.length === 0) {
      return this.options.defaultMs;
    }
    const average =
      this.samples.reduce((sum, sample) => sum + sample, 0) /
      this.samples.length;
    const timeout = Math.floor(average * this.factor);
    return Math.max(this.options.minMs, Math.min(timeout, this.options.maxMs));
  }
}
