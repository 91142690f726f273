import * as fs from 'fs';
import * as path from 'path';
import { FailedDownloadRecord } from '../types';
import { ErrorHandler, ErrorType } from '../utils/error-handler';
import { formatTimestamp } from '../utils/formatters';
import { Logger } from '../utils/logger';

export const LOG_DIVIDER = '-'.repeat(50);
const URL_PREFIX = 'URL: ';

export type NewFailure = Omit<FailedDownloadRecord, 'timestamp'>;

/**
 * Render one failure block. Line breaks inside fields are flattened so every
 * labelled field stays on its own line.
 */
export function formatLogBlock(record: FailedDownloadRecord): string {
  const flat = (value: string) => value.replace(/\s*[\r\n]+\s*/g, ' ').trim();
  return (
    [
      `Time: ${record.timestamp}`,
      `Title: ${flat(record.title)}`,
      `Artist: ${flat(record.artist)}`,
      `URL: ${flat(record.url)}`,
      `Error: ${flat(record.error)}`,
      LOG_DIVIDER,
    ].join('\n') + '\n\n'
  );
}

/**
 * URLs recorded in a failure log, in first-seen order, without duplicates
 */
export function parseLogUrls(content: string): string[] {
  const urls: string[] = [];
  for (const line of content.split(/\r?\n/)) {
    if (!line.startsWith(URL_PREFIX)) continue;
    const url = line.slice(URL_PREFIX.length).trim();
    if (url && !urls.includes(url)) {
      urls.push(url);
    }
  }
  return urls;
}

/**
 * Failed downloads of the current run plus the append-only log they are mirrored to
 */
export class FailedDownloadSession implements Iterable<FailedDownloadRecord> {
  private failures: FailedDownloadRecord[] = [];

  constructor(
    public readonly logPath: string,
    private now: () => Date = () => new Date(),
  ) {}

  get size(): number {
    return this.failures.length;
  }

  get records(): readonly FailedDownloadRecord[] {
    return [...this.failures];
  }

  [Symbol.iterator](): Iterator<FailedDownloadRecord> {
    return this.records[Symbol.iterator]();
  }

  /**
   * Keep the failure in memory and append it to the log. A log write error is
   * reported but the in-memory record is kept.
   */
  record(failure: NewFailure): FailedDownloadRecord {
    const entry: FailedDownloadRecord = { ...failure, timestamp: formatTimestamp(this.now()) };
    this.failures.push(entry);

    try {
      fs.mkdirSync(path.dirname(this.logPath), { recursive: true });
      fs.appendFileSync(this.logPath, formatLogBlock(entry), 'utf8');
    } catch (error) {
      Logger.error(
        `Failed to write to error log ${this.logPath}`,
        error instanceof Error ? error : new Error(String(error)),
      );
    }

    return entry;
  }

  clear(): void {
    this.failures = [];
  }

  /**
   * Take every recorded failure and empty the list, so only new failures remain afterwards
   */
  drain(): FailedDownloadRecord[] {
    const drained = this.failures;
    this.failures = [];
    return drained;
  }

  logHasEntries(): boolean {
    try {
      return fs.readFileSync(this.logPath, 'utf8').trim().length > 0;
    } catch (error) {
      const appError = ErrorHandler.parse(error, { operation: 'readFailureLog', resource: this.logPath });
      if (appError.type !== ErrorType.NotFound) {
        Logger.warn(`Could not read failed downloads log: ${appError.message}`);
      }
      return false;
    }
  }

  logExists(): boolean {
    return fs.existsSync(this.logPath);
  }

  /**
   * URLs from the log; throws if the log exists but cannot be read
   */
  readLogUrls(): string[] {
    if (!this.logExists()) {
      return [];
    }
    return parseLogUrls(fs.readFileSync(this.logPath, 'utf8'));
  }
}
