export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
}

export interface LoggerOptions {
  enabled?: boolean;
  level?: LogLevel;
  // where formatted lines go; defaults to the matching console method
  sink?: (level: LogLevel, line: string) => void;
  fields?: LogData;
}

const levelOrder: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function consoleSink(level: LogLevel, line: string): void {
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'info':
      console.info(line);
      break;
    default:
      console.debug(line);
  }
}

/** JSON-line logger: one object per line with timestamp, level and message. */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { enabled = true, level = 'info', sink = consoleSink, fields = {} } = options;
  const threshold = levelOrder[level];

  const write = (lineLevel: LogLevel, message: string, data?: LogData) => {
    if (!enabled || levelOrder[lineLevel] < threshold) return;
    const logData = {
      timestamp: new Date().toISOString(),
      level: lineLevel,
      message,
      ...fields,
      ...data,
    };
    sink(lineLevel, JSON.stringify(logData));
  };

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
  };
}

export const silentLogger: Logger = createLogger({ enabled: false });
