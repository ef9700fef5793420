export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

// Read per call so LOG_LEVEL changes after import still apply
function minLevel(): LogLevel {
  const env = process.env.LOG_LEVEL?.toUpperCase();
  return isLogLevel(env) ? env : 'INFO';
}

function timestamp(): string {
  return new Date().toISOString();
}

function log(level: LogLevel, module: string, msg: string, data?: unknown) {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minLevel()]) return;

  const entry = {
    time: timestamp(),
    level,
    module,
    msg,
    ...(data !== undefined && { data }),
  };

  const line = JSON.stringify(entry);

  if (level === 'ERROR') {
    console.error(line);
  } else if (level === 'WARN') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export interface Logger {
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
}

export function createLogger(module: string): Logger {
  return {
    debug: (msg, data) => log('DEBUG', module, msg, data),
    info: (msg, data) => log('INFO', module, msg, data),
    warn: (msg, data) => log('WARN', module, msg, data),
    error: (msg, data) => log('ERROR', module, msg, data),
  };
}
