/**
 * Structured logging.
 *
 * Every entry carries a level, a message and the fields bound by the
 * logger that wrote it. Entries go to a single process-wide sink, JSON
 * lines on the console unless a handler is installed with setLogHandler().
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
  /** Invariant violations: the process kept running but the code has a bug. */
  Fatal = 'fatal',
}

export type LogFields = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  fields: LogFields;
  time: string;
}

export type LogHandler = (entry: LogEntry) => void;

/** Levels from least to most severe. */
const SEVERITY: readonly LogLevel[] = [LogLevel.Debug, LogLevel.Info, LogLevel.Warn, LogLevel.Error, LogLevel.Fatal];

const CONSOLE_METHOD: Record<LogLevel, 'log' | 'warn' | 'error'> = {
  [LogLevel.Debug]: 'log',
  [LogLevel.Info]: 'log',
  [LogLevel.Warn]: 'warn',
  [LogLevel.Error]: 'error',
  [LogLevel.Fatal]: 'error',
};

/** One JSON line per entry; bound fields follow level, time and message. */
export function formatEntry(entry: LogEntry): string {
  return JSON.stringify({ level: entry.level, time: entry.time, msg: entry.message, ...entry.fields });
}

function writeToConsole(entry: LogEntry): void {
  console[CONSOLE_METHOD[entry.level]](formatEntry(entry));
}

const sink: { handler: LogHandler; threshold: number } = {
  handler: writeToConsole,
  threshold: SEVERITY.indexOf(LogLevel.Info),
};

export function setLogHandler(handler: LogHandler): void {
  sink.handler = handler;
}

export function resetLogHandler(): void {
  sink.handler = writeToConsole;
}

/** Entries below `level` are dropped. */
export function setLogLevel(level: LogLevel): void {
  sink.threshold = SEVERITY.indexOf(level);
}

/** Case-insensitive level name; unknown or missing names give `fallback`. */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.Info): LogLevel {
  const name = value?.trim().toLowerCase();
  return SEVERITY.find((level) => level === name) ?? fallback;
}

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  fatal(message: string, fields?: LogFields): void;
  /** A logger that adds `fields` to everything it writes. */
  child(fields: LogFields): Logger;
}

class FieldLogger implements Logger {
  constructor(private readonly bound: LogFields) {}

  debug(message: string, fields?: LogFields): void {
    this.write(LogLevel.Debug, message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.write(LogLevel.Info, message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.write(LogLevel.Warn, message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.write(LogLevel.Error, message, fields);
  }

  fatal(message: string, fields?: LogFields): void {
    this.write(LogLevel.Fatal, message, fields);
  }

  child(fields: LogFields): Logger {
    return new FieldLogger({ ...this.bound, ...fields });
  }

  private write(level: LogLevel, message: string, fields?: LogFields): void {
    if (SEVERITY.indexOf(level) < sink.threshold) return;
    sink.handler({ level, message, fields: { ...this.bound, ...fields }, time: new Date().toISOString() });
  }
}

export function createLogger(fields: LogFields = {}): Logger {
  return new FieldLogger(fields);
}

export const logger = createLogger({ component: 'registrar' });
