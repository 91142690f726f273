import { ProcessRunner, ProcessResult, describeFailure } from '../services/process-runner';
import { AppError, ErrorType } from '../utils/error-handler';
import { Logger } from '../utils/logger';
import { YtDlpPlaylist, YtDlpTrackInfo } from '../types';

/** Prefer the native Opus stream, fall back to any audio */
export const NATIVE_OPUS_FORMAT = 'bestaudio[ext=webm][acodec=opus]/bestaudio';
export const STRICT_OPUS_FORMAT = 'bestaudio[ext=webm][acodec=opus]';

export interface YtDlpTimeouts {
  infoTimeoutMs: number;
  playlistTimeoutMs: number;
  downloadTimeoutMs: number;
}

export interface YtDlpDownloadOptions {
  cwd?: string;
  onLine?: (line: string) => void;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON document from yt-dlp stdout
 */
export function parseJsonOutput(stdout: string, operation: string): Record<string, unknown> {
  const trimmed = stdout.trim();
  if (!trimmed) {
    throw new AppError(ErrorType.MalformedOutput, 'yt-dlp returned no output', { operation });
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (error) {
    throw new AppError(ErrorType.MalformedOutput, 'yt-dlp returned invalid JSON', { operation }, error);
  }
  if (!isRecord(parsed)) {
    throw new AppError(ErrorType.MalformedOutput, 'yt-dlp returned a non-object JSON document', { operation });
  }
  return parsed;
}

function optionalString(value: unknown): string | null | undefined {
  return typeof value === 'string' ? value : value === null ? null : undefined;
}

function optionalScalar(value: unknown): string | number | null | undefined {
  return typeof value === 'string' || typeof value === 'number' ? value : value === null ? null : undefined;
}

export function toTrackInfo(raw: Record<string, unknown>): YtDlpTrackInfo {
  return {
    id: typeof raw.id === 'string' ? raw.id : undefined,
    title: optionalString(raw.title),
    artist: optionalString(raw.artist),
    uploader: optionalString(raw.uploader),
    album: optionalString(raw.album),
    playlist: optionalString(raw.playlist),
    track_number: optionalScalar(raw.track_number),
    release_year: optionalScalar(raw.release_year),
    release_date: optionalString(raw.release_date),
    genre: optionalString(raw.genre),
  };
}

export function toPlaylist(raw: Record<string, unknown>): YtDlpPlaylist {
  const entries = Array.isArray(raw.entries) ? raw.entries : [];
  return {
    title: optionalString(raw.title),
    entries: entries.map((entry: unknown) =>
      isRecord(entry)
        ? { id: optionalString(entry.id), title: optionalString(entry.title), url: optionalString(entry.url) }
        : null,
    ),
  };
}

/**
 * Thin client over the yt-dlp binary: builds argument lists and interprets results
 */
export class YtDlpClient {
  constructor(
    private runner: ProcessRunner,
    private binary: string,
    private timeouts: YtDlpTimeouts,
  ) {}

  get command(): string {
    return this.binary;
  }

  private ensureSuccess(result: ProcessResult, operation: string): void {
    if (result.timedOut) {
      throw new AppError(ErrorType.Timeout, `${operation} timed out`, { operation });
    }
    if (result.exitCode !== 0) {
      throw new AppError(ErrorType.ProcessFailed, `${operation} failed (${describeFailure(result)})`, { operation });
    }
  }

  async isAvailable(): Promise<boolean> {
    try {
      const result = await this.runner.run(this.binary, ['--version'], { timeoutMs: this.timeouts.infoTimeoutMs });
      return result.exitCode === 0;
    } catch (error) {
      if (error instanceof AppError && error.type === ErrorType.MissingDependency) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Full metadata of a single video (never the surrounding playlist)
   */
  async getTrackInfo(url: string): Promise<YtDlpTrackInfo> {
    const operation = 'getTrackInfo';
    const result = await this.runner.run(this.binary, ['--dump-json', '--no-playlist', url], {
      timeoutMs: this.timeouts.infoTimeoutMs,
    });
    this.ensureSuccess(result, operation);
    return toTrackInfo(parseJsonOutput(result.stdout, operation));
  }

  /**
   * Flat listing: entry ids only, without resolving each entry
   */
  async getPlaylist(url: string): Promise<YtDlpPlaylist> {
    const operation = 'getPlaylist';
    const result = await this.runner.run(this.binary, ['--flat-playlist', '--dump-single-json', url], {
      timeoutMs: this.timeouts.playlistTimeoutMs,
    });
    this.ensureSuccess(result, operation);
    return toPlaylist(parseJsonOutput(result.stdout, operation));
  }

  /**
   * Resolve the direct media URL of the native Opus stream
   */
  async getDirectAudioUrl(url: string): Promise<string> {
    const operation = 'getDirectAudioUrl';
    const result = await this.runner.run(
      this.binary,
      ['-f', STRICT_OPUS_FORMAT, '--get-url', '--no-playlist', url],
      { timeoutMs: this.timeouts.infoTimeoutMs },
    );
    this.ensureSuccess(result, operation);
    const directUrl = result.stdout.trim().split(/\r?\n/)[0]?.trim() ?? '';
    if (!directUrl) {
      throw new AppError(ErrorType.MalformedOutput, 'Empty direct URL received', { operation });
    }
    return directUrl;
  }

  /**
   * Download the native audio stream, letting yt-dlp name the file after the title
   */
  downloadNative(url: string, options: YtDlpDownloadOptions): Promise<ProcessResult> {
    Logger.debug('Downloading native audio stream', { url });
    return this.runner.run(
      this.binary,
      [
        '-f',
        NATIVE_OPUS_FORMAT,
        '--no-playlist',
        '--no-embed-thumbnail',
        '--restrict-filenames',
        '-o',
        '%(title)s.%(ext)s',
        url,
      ],
      { timeoutMs: this.timeouts.downloadTimeoutMs, cwd: options.cwd, onLine: options.onLine },
    );
  }

  /**
   * Download and extract to Opus at the given output path (yt-dlp appends the extension)
   */
  downloadAndExtract(url: string, outputPath: string, options: YtDlpDownloadOptions): Promise<ProcessResult> {
    Logger.debug('Downloading with audio extraction', { url, outputPath });
    return this.runner.run(
      this.binary,
      [
        '-f',
        NATIVE_OPUS_FORMAT,
        '-x',
        '--audio-format',
        'opus',
        '--audio-quality',
        '0',
        '--no-playlist',
        '--no-overwrites',
        '--no-embed-thumbnail',
        '--no-embed-metadata',
        '--restrict-filenames',
        '--output',
        outputPath,
        url,
      ],
      { timeoutMs: this.timeouts.downloadTimeoutMs, cwd: options.cwd, onLine: options.onLine },
    );
  }
}
