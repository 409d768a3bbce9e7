import { loadConfig } from './config.js';
import { runProfile } from './profile.js';
import { createLogger } from './utils/logger.js';

let log = createLogger();

try {
  const cfg = loadConfig();
  log = createLogger(cfg.logLevel);
  log.debug('config', cfg);
  log.info('profiling', { windowSize: cfg.windowSize, bucketBound: cfg.bucketBound, streamLength: cfg.streamLength });
  log.info('done', runProfile(cfg));
} catch (err) {
  log.error('profile failed', err);
  process.exitCode = 1;
}
