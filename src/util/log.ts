export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  readonly level: LogLevel;
  readonly subsystem: string;
  readonly message: string;
  readonly timestamp: number;
  readonly context?: Record<string, unknown>;
}

export type LogWriter = (entry: LogEntry) => void;
export type NowFn = () => number;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const toIsoTimestamp = (timestamp: number): string => new Date(timestamp).toISOString();

const bindConsole = (method: LogLevel): ((...parts: unknown[]) => void) => {
  const { console } = globalThis;
  const candidate: ((...parts: unknown[]) => void) | undefined = console[method];
  if (typeof candidate === 'function') {
    return candidate.bind(console);
  }
  return console.log.bind(console);
};

export const formatLogLine = (entry: LogEntry): string => {
  const prefix = `[${entry.level.toUpperCase()}][${entry.subsystem}]`;
  return `${toIsoTimestamp(entry.timestamp)} ${prefix} ${entry.message}`;
};

export const defaultLogWriter: LogWriter = (entry) => {
  const sink = bindConsole(entry.level);
  const line = formatLogLine(entry);

  if (entry.context && Object.keys(entry.context).length > 0) {
    sink(line, entry.context);
    return;
  }

  sink(line);
};

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);

export interface Logger {
  readonly debug: (message: string, context?: Record<string, unknown>) => void;
  readonly info: (message: string, context?: Record<string, unknown>) => void;
  readonly warn: (message: string, context?: Record<string, unknown>) => void;
  readonly error: (message: string, context?: Record<string, unknown>) => void;
  readonly child: (subsystem: string) => Logger;
}

export interface LoggerOptions {
  readonly writer?: LogWriter;
  readonly now?: NowFn;
  /** Entries below this level are dropped before reaching the writer. */
  readonly minLevel?: LogLevel;
}

const sanitizeSubsystem = (subsystem: string): string => subsystem.trim() || 'unknown';

const createLoggerForLevel = (
  level: LogLevel,
  subsystem: string,
  writer: LogWriter,
  now: NowFn,
  minLevel: LogLevel,
): ((message: string, context?: Record<string, unknown>) => void) => {
  if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) {
    return () => undefined;
  }

  return (message, context) => {
    writer({
      level,
      subsystem,
      message,
      context,
      timestamp: now(),
    });
  };
};

export const createLogger = (subsystem: string, options: LoggerOptions = {}): Logger => {
  const writer = options.writer ?? defaultLogWriter;
  const now = options.now ?? Date.now;
  const minLevel = options.minLevel ?? 'debug';
  const normalized = sanitizeSubsystem(subsystem);

  const child: Logger['child'] = (suffix) =>
    createLogger(`${normalized}:${sanitizeSubsystem(suffix)}`, { writer, now, minLevel });

  return {
    debug: createLoggerForLevel('debug', normalized, writer, now, minLevel),
    info: createLoggerForLevel('info', normalized, writer, now, minLevel),
    warn: createLoggerForLevel('warn', normalized, writer, now, minLevel),
    error: createLoggerForLevel('error', normalized, writer, now, minLevel),
    child,
  };
};

const resolveDefaultLevel = (): LogLevel => {
  const fromEnv = typeof process !== 'undefined' ? process.env?.EMBER_DODGE_LOG_LEVEL : undefined;
  return isLogLevel(fromEnv) ? fromEnv : 'info';
};

export const rootLogger = createLogger('ember-dodge', { minLevel: resolveDefaultLevel() });
