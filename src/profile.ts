import { Dgim } from './core/dgim.js';
import type { ProfileConfig } from './config.js';
import { randomBits } from './utils/stream.js';

export interface ProfileSummary {
  updates: number;
  elapsedMs: number;
  opsPerSec: number;
  estimate: number;
  errorRate: number;
  bucketCount: number;
}

/** Feeds a random stream through a fresh estimator and times the update loop. */
export function runProfile(cfg: Omit<ProfileConfig, 'logLevel'>): ProfileSummary {
  const dgim = new Dgim({ windowSize: cfg.windowSize, bucketBound: cfg.bucketBound });
  const stream = randomBits({ length: cfg.streamLength, probability: cfg.oneProbability, seed: cfg.seed });

  const t0 = process.hrtime.bigint();
  const updates = dgim.consume(stream);
  const elapsedMs = Number(process.hrtime.bigint() - t0) / 1e6;

  const s = dgim.stats();
  return {
    updates,
    elapsedMs,
    opsPerSec: elapsedMs > 0 ? Math.round(updates / (elapsedMs / 1000)) : 0,
    estimate: dgim.estimateCount(),
    errorRate: s.errorRate,
    bucketCount: s.bucketCount,
  };
}
