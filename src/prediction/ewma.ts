/**
 * Exponentially weighted moving average. The first sample seeds the value.
 */
export class Ewma {
  private current = 0;
  private samples = 0;

  constructor(readonly alpha: number) {
    if (!(alpha > 0 && alpha <= 1)) {
      throw new RangeError(`EWMA alpha must be in (0, 1], got ${alpha}`);
    }
  }

  update(sample: number): number {
    if (this.samples === 0) {
      this.current = sample;
    } else {
      this.current = this.alpha * sample + (1 - this.alpha) * this.current;
    }
    this.samples++;
    return this.current;
  }

  get value(): number {
    return this.current;
  }

  get count(): number {
    return this.samples;
  }

  reset(): void {
    this.current = 0;
    this.samples = 0;
  }
}

/**
 * Samples of a constant input needed before the estimate's remaining error
 * shrinks to `tolerance` times the initial gap: (1 - alpha)^k <= tolerance.
 */
export function samplesToConverge(alpha: number, tolerance: number): number {
  if (alpha >= 1) return 1;
  return Math.ceil(Math.log(tolerance) / Math.log(1 - alpha));
}
