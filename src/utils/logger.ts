/**
 * One JSON object per line on the console. Records below the configured
 * level are dropped.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function isLogLevel(s: string): s is LogLevel {
  return Object.prototype.hasOwnProperty.call(ORDER, s);
}

export interface Logger {
  debug(msg: string, meta?: object): void;
  info(msg: string, meta?: object): void;
  warn(msg: string, meta?: object): void;
  error(msg: string, error?: unknown): void;
}

export function createLogger(level: LogLevel = 'info', name = 'dgim'): Logger {
  const write = (lvl: LogLevel, msg: string, meta?: object) => {
    if (ORDER[lvl] < ORDER[level]) return;
    const line = JSON.stringify({ ...meta, level: lvl, logger: name, message: msg, timestamp: Date.now() });
    if (lvl === 'error') console.error(line);
    else if (lvl === 'warn') console.warn(line);
    else console.log(line);
  };
  return {
    debug: (msg, meta) => write('debug', msg, meta),
    info: (msg, meta) => write('info', msg, meta),
    warn: (msg, meta) => write('warn', msg, meta),
    error: (msg, error) => write('error', msg, { error: error instanceof Error ? error.message : String(error) }),
  };
}
