import { InvalidConfigurationError } from './core/errors.js';
import { isLogLevel, type LogLevel } from './utils/logger.js';

export interface ProfileConfig {
  windowSize: number;
  bucketBound: number;
  streamLength: number;
  oneProbability: number;
  seed?: number;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function intVar(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  // parseInt alone would read '1e6' as 1 and '12abc' as 12
  if (!/^-?\d+$/.test(raw)) throw new InvalidConfigurationError(name, raw, 'not an integer');
  return parseInt(raw, 10);
}

/**
 * Reads the profiler settings from the environment. Only parsing happens
 * here; the estimator validates N and r itself.
 */
export function loadConfig(env: Env = process.env): Readonly<ProfileConfig> {
  const rawP = env.ONE_PROBABILITY;
  const unsetP = rawP === undefined || rawP === '';
  // Number('  ') is 0, so blank values are rejected explicitly
  const oneProbability = unsetP ? 0.5 : rawP.trim() === '' ? NaN : Number(rawP);
  if (!Number.isFinite(oneProbability)) {
    throw new InvalidConfigurationError('ONE_PROBABILITY', rawP, 'not a number');
  }

  const logLevel = (env.LOG_LEVEL || 'info').toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new InvalidConfigurationError('LOG_LEVEL', env.LOG_LEVEL, 'expected debug, info, warn or error');
  }

  const seed = env.SEED ? intVar(env, 'SEED', 0) : undefined;

  return Object.freeze({
    windowSize: intVar(env, 'WINDOW_SIZE', 100),
    bucketBound: intVar(env, 'BUCKET_BOUND', 2),
    streamLength: intVar(env, 'STREAM_LENGTH', 1_000_000),
    oneProbability,
    seed,
    logLevel,
  });
}
