import { describe, it, expect } from 'vitest';
import { Bucket } from '../src/core/bucket.js';

describe('Bucket', () => {
  it('starts with a single one', () => {
    expect(new Bucket(5).snapshot()).toEqual({ mostRecentTimestamp: 5, oneCount: 1 });
  });

  it('accepts an explicit count', () => {
    expect(new Bucket(9, 8).oneCount).toBe(8);
  });

  it('merge keeps the latest timestamp and sums counts', () => {
    const older = new Bucket(3, 2);
    const newer = new Bucket(7, 2);
    expect(older.merge(newer)).toBe(older);
    expect(older.snapshot()).toEqual({ mostRecentTimestamp: 7, oneCount: 4 });
    expect(newer.snapshot()).toEqual({ mostRecentTimestamp: 7, oneCount: 2 });
  });

  it('merge takes the max timestamp whichever side is newer', () => {
    const b = new Bucket(9).merge(new Bucket(4));
    expect(b.snapshot()).toEqual({ mostRecentTimestamp: 9, oneCount: 2 });
  });

  it('snapshots do not follow later merges', () => {
    const b = new Bucket(1);
    const s = b.snapshot();
    b.merge(new Bucket(2));
    expect(s).toEqual({ mostRecentTimestamp: 1, oneCount: 1 });
  });
});
