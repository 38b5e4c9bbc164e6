/**
 * Streaming statistics over a bounded window of samples, each update O(1).
 *
 * Running sums pick up floating-point drift from repeated add/subtract, so
 * they are rebuilt from the window once every `capacity` updates (amortized
 * O(1)).
 */

import { CircularBuffer } from '../metrics/circular-buffer.js';

/**
 * Least-squares slope of sample value against sample index.
 *
 * With x = 0..n-1 the x sums have closed forms; only Σy and Σ(i·y) are
 * tracked. When the oldest sample leaves, every remaining index drops by
 * one, which subtracts (Σy − y_oldest) from Σ(i·y).
 */
export class TrendWindow {
  private readonly window: CircularBuffer<number>;
  private sumY = 0;
  private sumIY = 0;
  private updatesSinceRebuild = 0;

  constructor(readonly capacity: number) {
    this.window = new CircularBuffer<number>(capacity);
  }

  add(value: number): void {
    const n = this.window.getSize();
    const evicted = this.window.push(value);

    if (evicted === undefined) {
      this.sumIY += n * value;
      this.sumY += value;
    } else {
      this.sumIY = this.sumIY - (this.sumY - evicted) + (n - 1) * value;
      this.sumY = this.sumY - evicted + value;
    }

    if (++this.updatesSinceRebuild >= this.capacity) {
      this.rebuild();
    }
  }

  /**
   * Change per sample; 0 with fewer than three samples.
   */
  slope(): number {
    const n = this.window.getSize();
    if (n < 3) return 0;
    const sumX = (n * (n - 1)) / 2;
    const sumXX = ((n - 1) * n * (2 * n - 1)) / 6;
    const denominator = n * sumXX - sumX * sumX;
    if (denominator === 0) return 0;
    return (n * this.sumIY - sumX * this.sumY) / denominator;
  }

  get size(): number {
    return this.window.getSize();
  }

  values(): number[] {
    return this.window.toArray();
  }

  last(): number | undefined {
    return this.window.last();
  }

  clear(): void {
    this.window.clear();
    this.sumY = 0;
    this.sumIY = 0;
    this.updatesSinceRebuild = 0;
  }

  private rebuild(): void {
    const values = this.window.toArray();
    this.sumY = 0;
    this.sumIY = 0;
    values.forEach((value, index) => {
      this.sumY += value;
      this.sumIY += index * value;
    });
    this.updatesSinceRebuild = 0;
  }
}

/**
 * Rolling mean and population standard deviation.
 */
export class RollingMoments {
  private readonly window: CircularBuffer<number>;
  private sum = 0;
  private sumSquares = 0;
  private updatesSinceRebuild = 0;

  constructor(readonly capacity: number) {
    this.window = new CircularBuffer<number>(capacity);
  }

  add(value: number): void {
    const evicted = this.window.push(value);
    this.sum += value - (evicted ?? 0);
    this.sumSquares += value * value - (evicted ?? 0) * (evicted ?? 0);

    if (++this.updatesSinceRebuild >= this.capacity) {
      this.rebuild();
    }
  }

  get count(): number {
    return this.window.getSize();
  }

  mean(): number {
    const n = this.window.getSize();
    return n === 0 ? 0 : this.sum / n;
  }

  stddev(): number {
    const n = this.window.getSize();
    if (n === 0) return 0;
    const mean = this.sum / n;
    const variance = this.sumSquares / n - mean * mean;
    // Rounding can push a zero variance slightly negative or leave a tiny residue.
    return variance <= 1e-12 * Math.max(1, mean * mean) ? 0 : Math.sqrt(variance);
  }

  clear(): void {
    this.window.clear();
    this.sum = 0;
    this.sumSquares = 0;
    this.updatesSinceRebuild = 0;
  }

  private rebuild(): void {
    this.sum = 0;
    this.sumSquares = 0;
    for (const value of this.window.toArray()) {
      this.sum += value;
      this.sumSquares += value * value;
    }
    this.updatesSinceRebuild = 0;
  }
}
