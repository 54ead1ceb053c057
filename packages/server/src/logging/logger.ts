export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

let globalLevel: LogLevel = 'info';

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

/**
 * Set the process-wide minimum log level
 */
export function setLogLevel(level: LogLevel): void {
  globalLevel = level;
}

function serializeError(error: Error): LogFields {
  return { name: error.name, message: error.message };
}

/**
 * Structured JSON-line logger on top of console
 *
 * Never pass token values or secrets in `fields`.
 */
export function createLogger(scope: string): Logger {
  const write = (level: Exclude<LogLevel, 'silent'>, message: string, fields?: LogFields) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[globalLevel]) {
      return;
    }

    const entry: LogFields = {
      timestamp: new Date().toISOString(),
      level,
      scope,
      message,
    };

    if (fields) {
      for (const [key, value] of Object.entries(fields)) {
        entry[key] = value instanceof Error ? serializeError(value) : value;
      }
    }

    const line = JSON.stringify(entry);

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  };

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
  };
}
