// ---------------------------------------------------------------------------
// Rolling range history and trend
// ---------------------------------------------------------------------------

import type { RangeEstimate, RangeTrend } from '../types.js';

export const DEFAULT_HISTORY_SIZE = 10;
export const MIN_TREND_SAMPLES = 3;

/**
 * Fixed-capacity circular buffer of recent estimates.
 * When full, the oldest estimate is overwritten.
 */
export class RangeHistory {
  private readonly buffer: (RangeEstimate | undefined)[];
  private head = 0;
  private _size = 0;

  constructor(readonly capacity: number = DEFAULT_HISTORY_SIZE) {
    this.buffer = new Array<RangeEstimate | undefined>(capacity);
  }

  push(estimate: RangeEstimate): void {
    this.buffer[this.head] = estimate;
    this.head = (this.head + 1) % this.capacity;
    if (this._size < this.capacity) this._size++;
  }

  get size(): number {
    return this._size;
  }

  latest(): RangeEstimate | undefined {
    if (this._size === 0) return undefined;
    return this.buffer[(this.head - 1 + this.capacity) % this.capacity];
  }

  /** Oldest to newest. */
  toArray(): RangeEstimate[] {
    const out: RangeEstimate[] = [];
    for (let i = 0; i < this._size; i++) {
      const e = this.buffer[(this.head - this._size + i + this.capacity) % this.capacity];
      if (e) out.push(e);
    }
    return out;
  }

  clear(): void {
    this.head = 0;
    this._size = 0;
    this.buffer.fill(undefined);
  }

  /**
   * Direction of travel over the window from the least-squares slope of
   * distance against sample index. A total change within `band` × mean
   * distance counts as steady.
   */
  trend(band: number): RangeTrend {
    const distances = this.toArray().map(e => e.distanceMeters);
    return distanceTrend(distances, band);
  }
}

export function distanceTrend(distances: readonly number[], band: number): RangeTrend {
  const n = distances.length;
  if (n < MIN_TREND_SAMPLES) return 'unknown';

  const meanX = (n - 1) / 2;
  let meanY = 0;
  for (const d of distances) meanY += d;
  meanY /= n;

  let num = 0;
  let den = 0;
  distances.forEach((d, i) => {
    num += (i - meanX) * (d - meanY);
    den += (i - meanX) * (i - meanX);
  });

  const change = (num / den) * (n - 1);
  if (Math.abs(change) <= band * meanY) return 'steady';
  return change < 0 ? 'approaching' : 'receding';
}
