export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
}

export type LogSink = (line: string) => void;

let threshold: LogLevel = parseLevel(process.env.TABRUNNER_LOG_LEVEL);
let sink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

function parseLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase();
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error' || value === 'silent') {
    return value;
  }
  return 'info';
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

/** Redirect log output, e.g. to capture lines in tests. Returns the previous sink. */
export function setLogSink(next: LogSink): LogSink {
  const previous = sink;
  sink = next;
  return previous;
}

function format(level: LogLevel, scope: string, message: string, fields?: Record<string, unknown>): string {
  const head = `[${new Date().toISOString()}] ${level.toUpperCase()} [${scope}] ${message}`;
  if (!fields || Object.keys(fields).length === 0) return head;
  return `${head} ${JSON.stringify(fields)}`;
}

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, fields?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
    sink(format(level, scope, message, fields));
  };

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
  };
}
