import { Logger } from './logger';

/**
 * Centralized error categorization for subprocess, file-system and configuration failures
 */

export enum ErrorType {
  // An external binary (yt-dlp, ffmpeg) cannot be found
  MissingDependency = 'MissingDependency',

  // External process errors
  ProcessFailed = 'ProcessFailed',
  Timeout = 'Timeout',
  MalformedOutput = 'MalformedOutput',

  // File-system errors
  NotFound = 'NotFound',
  FileSystem = 'FileSystem',

  // Application errors
  ValidationError = 'ValidationError',
  ConfigurationError = 'ConfigurationError',

  Unknown = 'Unknown',
}

export interface ErrorContext {
  operation: string;
  resource?: string;
  details?: Record<string, unknown>;
}

/**
 * Base application error with type and context information
 */
export class AppError extends Error {
  constructor(
    public type: ErrorType,
    message: string,
    public context?: ErrorContext,
    public originalError?: unknown,
  ) {
    super(message);
    this.name = 'AppError';
    Object.setPrototypeOf(this, AppError.prototype);
  }

  /**
   * Fatal errors end the process non-zero; everything else is reported and recovered
   */
  isFatal(): boolean {
    return this.type === ErrorType.MissingDependency;
  }

  getUserMessage(): string {
    const contextStr = this.context ? ` (${this.context.operation})` : '';

    switch (this.type) {
      case ErrorType.MissingDependency:
        return `Required tool is not installed: ${this.message}${contextStr}`;
      case ErrorType.Timeout:
        return `Operation timed out.${contextStr}`;
      case ErrorType.MalformedOutput:
        return `Unexpected output from external tool.${contextStr}`;
      case ErrorType.NotFound:
        return `File or folder not found: ${this.message}${contextStr}`;
      case ErrorType.ValidationError:
        return `Invalid input. ${this.message}${contextStr}`;
      case ErrorType.ConfigurationError:
        return `Configuration error. ${this.message}${contextStr}`;
      default:
        return `Error: ${this.message}${contextStr}`;
    }
  }
}

const FILE_SYSTEM_CODES = ['EACCES', 'EPERM', 'EBUSY', 'EISDIR', 'ENOTDIR', 'EEXIST', 'ENOTEMPTY'];

function errnoCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

export class ErrorHandler {
  /**
   * Parse and categorize an error into AppError
   */
  static parse(error: unknown, context: ErrorContext): AppError {
    if (error instanceof AppError) {
      return new AppError(error.type, error.message, error.context ?? context, error.originalError);
    }

    if (error instanceof SyntaxError) {
      return new AppError(ErrorType.MalformedOutput, error.message, context, error);
    }

    if (error instanceof Error) {
      return this.parseStandardError(error, context);
    }

    return new AppError(ErrorType.Unknown, String(error), context, error);
  }

  private static parseStandardError(error: Error, context: ErrorContext): AppError {
    const code = errnoCode(error);

    if (code === 'ENOENT') {
      return new AppError(ErrorType.NotFound, error.message, context, error);
    }
    if (code && FILE_SYSTEM_CODES.includes(code)) {
      return new AppError(ErrorType.FileSystem, error.message, context, error);
    }

    const msg = error.message.toLowerCase();
    let type: ErrorType = ErrorType.Unknown;

    if (msg.includes('timed out') || msg.includes('timeout')) {
      type = ErrorType.Timeout;
    } else if (msg.includes('invalid') || msg.includes('validation')) {
      type = ErrorType.ValidationError;
    } else if (msg.includes('configuration') || msg.includes('not set')) {
      type = ErrorType.ConfigurationError;
    }

    return new AppError(type, error.message, context, error);
  }

  static log(error: AppError, severity: 'error' | 'warn' | 'info' = 'error'): void {
    const baseMsg = `[${error.context?.operation || 'unknown'}] ${error.message}`;

    if (severity === 'error') {
      Logger.error(baseMsg);
    } else if (severity === 'warn') {
      Logger.warn(baseMsg);
    } else {
      Logger.info(baseMsg);
    }

    if (error.context?.details) {
      Logger.debug(`Details: ${JSON.stringify(error.context.details)}`);
    }
  }

  static messageOf(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
