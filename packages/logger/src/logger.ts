export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  level: LogLevel;
  category: string;
  timestamp: Date;
  msg: string;
  context?: Record<string, unknown>;
}

export interface Sink {
  write(entry: LogEntry): void;
  flush(): void;
}

type LogMethod = {
  (msg: string): void;
  (obj: Record<string, unknown>, msg: string): void;
};

export type Logger = Record<LogLevel, LogMethod>;

export interface LoggerConfig {
  level?: LogLevel | undefined;
  sinks?: Sink[] | undefined;
}

interface ActiveConfig {
  threshold: number;
  sinks: Sink[];
}

// Read on every call, so initLogger() also reconfigures loggers created at module load.
let active: ActiveConfig = { threshold: LOG_LEVELS.indexOf('info'), sinks: [] };

const loggers = new Map<string, Logger>();

/**
 * Reduce a context value to plain JSON data.
 * Only a value that contains itself is cut; the same object under two keys is kept twice.
 */
function toLogValue(value: unknown, ancestors: Set<object>): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Uint8Array) return Buffer.from(value).toString('hex');
  if (value instanceof Date) return value.toISOString();
  if (value === null || typeof value !== 'object') return value;

  if (ancestors.has(value)) return '[Circular]';
  ancestors.add(value);

  let result: unknown;
  if (value instanceof Error) {
    result = { name: value.name, message: value.message, stack: value.stack };
  } else if (Array.isArray(value)) {
    result = value.map((item: unknown) => toLogValue(item, ancestors));
  } else {
    result = toLogRecord(Object.entries(value), ancestors);
  }

  ancestors.delete(value);
  return result;
}

function toLogRecord(entries: [string, unknown][], ancestors: Set<object>): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  for (const [key, item] of entries) {
    if (item === undefined || typeof item === 'function') continue;
    record[key] = toLogValue(item, ancestors);
  }
  return record;
}

function emit(category: string, level: LogLevel, first: string | Record<string, unknown>, msg?: string): void {
  if (active.sinks.length === 0 || LOG_LEVELS.indexOf(level) < active.threshold) return;

  const entry: LogEntry =
    typeof first === 'string'
      ? { level, category, timestamp: new Date(), msg: first }
      : { level, category, timestamp: new Date(), msg: msg ?? '', context: toLogRecord(Object.entries(first), new Set()) };

  for (const sink of active.sinks) {
    sink.write(entry);
  }
}

function createLogger(category: string): Logger {
  const method =
    (level: LogLevel): LogMethod =>
    (first: string | Record<string, unknown>, msg?: string) => {
      emit(category, level, first, msg);
    };

  return {
    trace: method('trace'),
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error'),
  };
}

export function initLogger(config: LoggerConfig): void {
  active = {
    threshold: LOG_LEVELS.indexOf(config.level ?? 'info'),
    sinks: config.sinks ?? [],
  };
}

export function getLogger(category: string): Logger {
  const existing = loggers.get(category);
  if (existing) {
    return existing;
  }

  const logger = createLogger(category);
  loggers.set(category, logger);
  return logger;
}

/**
 * Write out whatever the sinks still hold. The CLI calls this before every exit.
 */
export function flushLoggers(): void {
  for (const sink of active.sinks) {
    sink.flush();
  }
}
