import * as fs from 'fs';
import * as path from 'path';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

/**
 * One log record, as written to the daily JSON-lines file
 */
export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  context?: Record<string, unknown>;
  traceId?: string;
  /** Milliseconds, set on operation completion */
  duration?: number;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

type EntryExtras = Pick<LogEntry, 'context' | 'traceId' | 'duration'> & { error?: Error };

function today(): string {
  return new Date().toISOString().slice(0, 10);
}

/**
 * Static logger with a level threshold, daily JSON-lines files and operation timing.
 * Console output is always on; file output is skipped under NODE_ENV=test.
 */
export class Logger {
  private static threshold: LogLevel = Logger.parseLogLevel(process.env.LOG_LEVEL || 'info');
  private static directory: string = process.env.LOG_DIR || './logs';
  private static fileWriteFailed = false;
  private static operations = new Map<string, { label: string; startedAt: number }>();
  private static traceCounter = 0;

  static parseLogLevel(level: string): LogLevel {
    switch (level.toLowerCase()) {
      case 'debug':
        return LogLevel.DEBUG;
      case 'warn':
        return LogLevel.WARN;
      case 'error':
        return LogLevel.ERROR;
      default:
        return LogLevel.INFO;
    }
  }

  static setLogLevel(level: LogLevel): void {
    Logger.threshold = level;
  }

  static setLogDirectory(directory: string): void {
    Logger.directory = directory;
    Logger.fileWriteFailed = false;
  }

  static debug(message: string, context?: Record<string, unknown>): void {
    Logger.log(LogLevel.DEBUG, message, { context });
  }

  static info(message: string, context?: Record<string, unknown>): void {
    Logger.log(LogLevel.INFO, message, { context });
  }

  static warn(message: string, context?: Record<string, unknown>): void {
    Logger.log(LogLevel.WARN, message, { context });
  }

  static error(message: string, error?: Error, context?: Record<string, unknown>): void {
    Logger.log(LogLevel.ERROR, message, { context, error });
  }

  /**
   * Start timing a batch run; pass the returned trace ID to endOperation
   */
  static startOperation(label: string): string {
    const traceId = `trace-${Date.now()}-${++Logger.traceCounter}`;
    Logger.operations.set(traceId, { label, startedAt: Date.now() });
    Logger.log(LogLevel.DEBUG, `Operation started: ${label}`, { context: { traceId } });
    return traceId;
  }

  static endOperation(traceId: string, success = true, context?: Record<string, unknown>): void {
    const operation = Logger.operations.get(traceId);
    if (!operation) {
      return;
    }
    Logger.operations.delete(traceId);
    Logger.log(success ? LogLevel.INFO : LogLevel.WARN, `Operation completed: ${operation.label}`, {
      context: { ...context, success },
      traceId,
      duration: Date.now() - operation.startedAt,
    });
  }

  private static log(level: LogLevel, message: string, extras: EntryExtras): void {
    if (level < Logger.threshold) {
      return;
    }

    const { error, ...rest } = extras;
    const entry: LogEntry = { timestamp: new Date().toISOString(), level: LogLevel[level], message };
    if (rest.context) entry.context = rest.context;
    if (rest.traceId) entry.traceId = rest.traceId;
    if (rest.duration !== undefined) entry.duration = rest.duration;
    if (error) entry.error = { name: error.name, message: error.message, stack: error.stack };

    Logger.toConsole(level, entry);
    Logger.toFile(entry);
  }

  private static toConsole(level: LogLevel, entry: LogEntry): void {
    const time = new Date(entry.timestamp).toLocaleTimeString();
    const error = entry.error ? `: ${entry.error.message}` : '';
    const duration = entry.duration !== undefined ? ` (${entry.duration}ms)` : '';
    const context = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
    const line = `[${time}] [${entry.level.padEnd(5)}] ${entry.message}${error}${duration}${context}`;

    if (level === LogLevel.ERROR) {
      console.error(line);
    } else if (level === LogLevel.WARN) {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private static toFile(entry: LogEntry): void {
    if (process.env.NODE_ENV === 'test' || Logger.fileWriteFailed) {
      return;
    }

    // One file per day
    const file = path.join(Logger.directory, `${today()}.log`);
    try {
      fs.mkdirSync(Logger.directory, { recursive: true });
      fs.appendFileSync(file, `${JSON.stringify(entry)}\n`);
    } catch (error) {
      Logger.fileWriteFailed = true;
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`[logger] cannot write ${file}: ${reason}`);
    }
  }
}
