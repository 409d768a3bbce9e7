export interface BucketSnapshot {
  readonly mostRecentTimestamp: number;
  readonly oneCount: number;
}

/**
 * A run of the stream ending at `mostRecentTimestamp` holding `oneCount` ones.
 * `oneCount` is always a power of two: buckets start at 1 and only equal
 * sizes are ever merged.
 */
export class Bucket {
  mostRecentTimestamp: number;
  oneCount: number;

  constructor(mostRecentTimestamp: number, oneCount = 1) {
    this.mostRecentTimestamp = mostRecentTimestamp;
    this.oneCount = oneCount;
  }

  /**
   * Absorbs `other` into this bucket. Both must cover adjacent ranges and
   * hold the same `oneCount`; this is not checked.
   */
  merge(other: Bucket): this {
    this.mostRecentTimestamp = Math.max(this.mostRecentTimestamp, other.mostRecentTimestamp);
    this.oneCount += other.oneCount;
    return this;
  }

  snapshot(): BucketSnapshot {
    return { mostRecentTimestamp: this.mostRecentTimestamp, oneCount: this.oneCount };
  }
}
