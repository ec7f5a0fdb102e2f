type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogData = Record<string, unknown>;

const levels: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levels, value);
}

const configuredLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();
const currentLevel: LogLevel = isLogLevel(configuredLevel) ? configuredLevel : 'info';

function log(level: LogLevel, message: string, data?: LogData) {
  if (levels[level] < levels[currentLevel]) return;
  const entry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...data,
  };
  if (level === 'error') {
    console.error(JSON.stringify(entry));
  } else {
    console.log(JSON.stringify(entry));
  }
}

export interface Logger {
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, data?: LogData): void;
  child(bindings: LogData): Logger;
}

function createLogger(bindings: LogData = {}): Logger {
  return {
    debug: (msg, data) => log('debug', msg, { ...bindings, ...data }),
    info: (msg, data) => log('info', msg, { ...bindings, ...data }),
    warn: (msg, data) => log('warn', msg, { ...bindings, ...data }),
    error: (msg, data) => log('error', msg, { ...bindings, ...data }),
    child: (extra) => createLogger({ ...bindings, ...extra }),
  };
}

export const logger = createLogger();
