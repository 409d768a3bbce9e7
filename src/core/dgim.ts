export type Bit = 0 | 1;

export interface DgimOptions {
  /** N: how many of the most recent bits the window covers. */
  windowSize: number;
  /** r: max buckets of any one size. Defaults to 2. */
  bucketBound?: number;
}

export interface DgimStats {
  timestamp: number;
  windowSize: number;
  bucketBound: number;
  errorRate: number;
  bucketCount: number;
  largestBucket: number;
}

export interface WindowCounter {
  update(bit: Bit): void;
  consume(stream: Iterable<Bit>): number;
  estimateCount(): number;
  readonly errorRate: number;
  stats(): DgimStats;
}

import { Bucket, type BucketSnapshot } from './bucket.js';
import { InvalidConfigurationError, InvalidInputError } from './errors.js';

/**
 * DGIM estimator for the number of ones among the last `windowSize` bits of a
 * binary stream. Holds at most `bucketBound` buckets per power-of-two size,
 * so memory is O(r log N) whatever the stream length.
 *
 * See Datar, Gionis, Indyk, Motwani, "Maintaining stream statistics over
 * sliding windows", SIAM J. Comput. 31(6), 2002.
 *
 * Not safe for concurrent writers; callers serialize access.
 */
export class Dgim implements WindowCounter {
  readonly windowSize: number;
  readonly bucketBound: number;
  // newest first
  private readonly _buckets: Bucket[] = [];
  private _timestamp = 0;

  constructor(opts: DgimOptions) {
    const bound = opts.bucketBound ?? 2;
    if (!Number.isInteger(opts.windowSize) || opts.windowSize < 1) {
      throw new InvalidConfigurationError('windowSize', opts.windowSize, 'must be a positive integer');
    }
    if (!Number.isInteger(bound) || bound < 2) {
      throw new InvalidConfigurationError('bucketBound', bound, 'must be an integer >= 2');
    }
    this.windowSize = opts.windowSize;
    this.bucketBound = bound;
  }

  get timestamp(): number { return this._timestamp; }

  /** Upper bound on |true - estimate| / true. */
  get errorRate(): number { return 1 / this.bucketBound; }

  update(bit: Bit): void {
    if (bit !== 0 && bit !== 1) throw new InvalidInputError(bit);
    this._timestamp++;

    // timestamps are distinct, so at most one bucket leaves per tick
    const tail = this._buckets[this._buckets.length - 1];
    if (tail && tail.mostRecentTimestamp <= this._timestamp - this.windowSize) {
      this._buckets.pop();
    }

    if (bit === 0) return;
    this._buckets.unshift(new Bucket(this._timestamp));
    this.cascade();
  }

  consume(stream: Iterable<Bit>): number {
    let n = 0;
    for (const bit of stream) {
      this.update(bit);
      n++;
    }
    return n;
  }

  estimateCount(): number {
    const minTimestamp = this._timestamp - this.windowSize;
    let result = 0;
    let last = 0;
    for (const b of this._buckets) {
      if (b.mostRecentTimestamp <= minTimestamp) break;
      last = b.oneCount;
      result += last;
    }
    // on average half of the oldest counted bucket lies outside the window
    return result - Math.floor(last / 2);
  }

  buckets(): BucketSnapshot[] {
    return this._buckets.map((b) => b.snapshot());
  }

  stats(): DgimStats {
    return {
      timestamp: this._timestamp,
      windowSize: this.windowSize,
      bucketBound: this.bucketBound,
      errorRate: this.errorRate,
      bucketCount: this._buckets.length,
      largestBucket: this._buckets[this._buckets.length - 1]?.oneCount ?? 0,
    };
  }

  /**
   * Walks runs of equal size from the head. A run that reaches r + 1 buckets
   * has its two oldest members merged; the result joins the next run as its
   * newest member, which may overflow that run in turn.
   */
  private cascade(): void {
    const a = this._buckets;
    let start = 0;
    while (start < a.length) {
      const size = a[start].oneCount;
      let end = start + 1;
      while (end < a.length && a[end].oneCount === size) end++;
      if (end - start <= this.bucketBound) return;

      a[end - 2].merge(a[end - 1]);
      a.splice(end - 1, 1);
      start = end - 2;
    }
  }
}
