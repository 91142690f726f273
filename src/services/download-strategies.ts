import * as fs from 'fs';
import * as path from 'path';
import { YtDlpClient } from '../api/yt-dlp';
import { FfmpegClient } from '../api/ffmpeg';
import { StrategyResult } from '../types';
import { ErrorHandler } from '../utils/error-handler';
import { Logger } from '../utils/logger';
import { describeFailure } from './process-runner';

export interface DownloadRequest {
  url: string;
  /** Directory the track is written to */
  directory: string;
  /** Full path of the final .opus file */
  targetPath: string;
  onProgress?: (line: string) => void;
}

export interface DownloadStrategy {
  /** Label used in the aggregated error text, e.g. "native download" */
  readonly label: string;
  attempt(request: DownloadRequest): Promise<StrategyResult>;
}

const AUDIO_EXTENSIONS = ['.webm', '.opus'];

function failure(reason: string): StrategyResult {
  return { success: false, reason };
}

/**
 * Remove a leftover from a failed attempt; a removal failure is only worth a warning
 */
function discard(file: string): void {
  if (!fs.existsSync(file)) return;
  try {
    fs.rmSync(file);
    Logger.debug(`Removed partial file ${path.basename(file)}`);
  } catch (error) {
    Logger.warn(`Could not remove partial file ${file}: ${ErrorHandler.messageOf(error)}`);
  }
}

function isProgressLine(line: string): boolean {
  return line.includes('%') || line.includes('[download]') || line.includes('[info]');
}

function progressForwarder(onProgress?: (line: string) => void): ((line: string) => void) | undefined {
  if (!onProgress) return undefined;
  return (line) => {
    if (isProgressLine(line)) onProgress(line);
  };
}

/**
 * Let yt-dlp pick the filename, then find what it wrote and move it onto the target
 */
export class NativeDownloadStrategy implements DownloadStrategy {
  readonly label = 'native download';

  constructor(private ytDlp: YtDlpClient) {}

  async attempt(request: DownloadRequest): Promise<StrategyResult> {
    const before = new Set(fs.readdirSync(request.directory));

    const result = await this.ytDlp.downloadNative(request.url, {
      cwd: request.directory,
      onLine: progressForwarder(request.onProgress),
    });
    if (result.timedOut || result.exitCode !== 0) {
      return failure(describeFailure(result));
    }

    const created = fs
      .readdirSync(request.directory)
      .filter((name) => !before.has(name) && AUDIO_EXTENSIONS.includes(path.extname(name).toLowerCase()))
      .sort();

    if (created.length === 0) {
      return failure('No audio file found after download');
    }

    const downloaded = created[0];
    const targetName = path.basename(request.targetPath);
    if (downloaded.toLowerCase() !== targetName.toLowerCase()) {
      fs.renameSync(path.join(request.directory, downloaded), request.targetPath);
      Logger.debug(`Renamed ${downloaded} to ${targetName}`);
    }

    return { success: true };
  }
}

/**
 * Resolve the stream URL with yt-dlp and let ffmpeg copy it into the target file
 */
export class DirectStreamStrategy implements DownloadStrategy {
  readonly label = 'direct stream';

  constructor(
    private ytDlp: YtDlpClient,
    private ffmpeg: FfmpegClient,
  ) {}

  async attempt(request: DownloadRequest): Promise<StrategyResult> {
    const directUrl = await this.ytDlp.getDirectAudioUrl(request.url);
    request.onProgress?.('Copying audio stream with ffmpeg');

    // ffmpeg writes straight into the target, so a failed copy must not leave it behind
    const existedBefore = fs.existsSync(request.targetPath);
    let outcome: StrategyResult = failure('ffmpeg did not finish');
    try {
      const result = await this.ffmpeg.copyStream(directUrl, request.targetPath);
      if (result.timedOut || result.exitCode !== 0) {
        outcome = failure(`ffmpeg ${describeFailure(result)}`);
      } else if (!fs.existsSync(request.targetPath)) {
        outcome = failure('ffmpeg reported success but the output file is missing');
      } else {
        outcome = { success: true };
      }
      return outcome;
    } finally {
      if (!outcome.success && !existedBefore) {
        discard(request.targetPath);
      }
    }
  }
}

/**
 * Have yt-dlp extract Opus into a temporary name, then move it onto the target
 */
export class ExtractAndConvertStrategy implements DownloadStrategy {
  readonly label = 'extract and convert';

  constructor(
    private ytDlp: YtDlpClient,
    private clock: () => number = Date.now,
  ) {}

  async attempt(request: DownloadRequest): Promise<StrategyResult> {
    const tempBase = path.join(request.directory, `temp_${Math.floor(this.clock() / 1000)}`);

    let outcome: StrategyResult = failure('yt-dlp did not finish');
    try {
      outcome = await this.extract(request, tempBase);
      return outcome;
    } finally {
      if (!outcome.success) {
        this.removeLeftovers(request.directory, path.basename(tempBase));
      }
    }
  }

  private async extract(request: DownloadRequest, tempBase: string): Promise<StrategyResult> {
    const result = await this.ytDlp.downloadAndExtract(request.url, tempBase, {
      cwd: request.directory,
      onLine: progressForwarder(request.onProgress),
    });
    if (result.timedOut || result.exitCode !== 0) {
      return failure(describeFailure(result));
    }

    for (const extension of ['.opus', '.webm']) {
      const candidate = `${tempBase}${extension}`;
      if (fs.existsSync(candidate)) {
        fs.renameSync(candidate, request.targetPath);
        return { success: true };
      }
    }
    return failure('Converted file not found');
  }

  /** temp_<n>.webm, temp_<n>.webm.part, temp_<n>.opus and the like */
  private removeLeftovers(directory: string, tempName: string): void {
    let names: string[];
    try {
      names = fs.readdirSync(directory);
    } catch (error) {
      Logger.warn(`Could not list ${directory} for cleanup: ${ErrorHandler.messageOf(error)}`);
      return;
    }
    for (const name of names) {
      if (name.startsWith(`${tempName}.`)) {
        discard(path.join(directory, name));
      }
    }
  }
}

export function createDefaultStrategies(ytDlp: YtDlpClient, ffmpeg: FfmpegClient): DownloadStrategy[] {
  return [new NativeDownloadStrategy(ytDlp), new DirectStreamStrategy(ytDlp, ffmpeg), new ExtractAndConvertStrategy(ytDlp)];
}

export interface StrategyRunOutcome {
  success: boolean;
  /** "Method N (label) failed: reason" for every strategy that ran and failed */
  errors: string[];
}

/**
 * Try strategies in order and stop at the first success. A strategy that throws
 * counts as a failure with the error message as its reason.
 */
export async function runStrategies(
  strategies: DownloadStrategy[],
  request: DownloadRequest,
): Promise<StrategyRunOutcome> {
  const errors: string[] = [];

  for (const [index, strategy] of strategies.entries()) {
    let outcome: StrategyResult;
    try {
      outcome = await strategy.attempt(request);
    } catch (error) {
      outcome = failure(ErrorHandler.messageOf(error));
    }

    if (outcome.success) {
      Logger.info(`Downloaded with method ${index + 1} (${strategy.label})`, { url: request.url });
      return { success: true, errors };
    }

    const message = `Method ${index + 1} (${strategy.label}) failed: ${outcome.reason}`;
    Logger.warn(message, { url: request.url });
    errors.push(message);
  }

  return { success: false, errors };
}
