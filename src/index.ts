export { Dgim, type Bit, type DgimOptions, type DgimStats, type WindowCounter } from './core/dgim.js';
export { Bucket, type BucketSnapshot } from './core/bucket.js';
export { DgimError, InvalidConfigurationError, InvalidInputError } from './core/errors.js';
export { randomBits, mulberry32, toBit, type RandomBitsOptions } from './utils/stream.js';
