import * as fs from 'fs';
import * as path from 'path';
import { YtDlpClient } from '../api/yt-dlp';
import { FfmpegClient } from '../api/ffmpeg';
import {
  PlaylistResult,
  TrackDownloadResult,
  TrackMetadata,
  UrlKind,
  YtDlpPlaylist,
  YtDlpTrackInfo,
} from '../types';
import { ErrorHandler } from '../utils/error-handler';
import { Logger } from '../utils/logger';
import { ProgressCallback, noopProgress } from '../utils/progress';
import { FilenameSanitizer } from '../utils/sanitizer';
import { Sleeper, sleep } from '../utils/sleep';
import { formatFileSize } from '../utils/formatters';
import { DownloadStrategy, createDefaultStrategies, runStrategies } from './download-strategies';
import { FailedDownloadSession } from './failed-downloads';
import { UNKNOWN_ARTIST, UNKNOWN_TITLE, buildTagEntries, extractMetadata } from './metadata';
import { describeFailure } from './process-runner';

export const TRACK_URL_PREFIX = 'https://music.youtube.com/watch?v=';

export interface TrackFetcherOptions {
  outputDir: string;
  /** Pause between playlist entries */
  trackDelayMs: number;
  sleep?: Sleeper;
  strategies?: DownloadStrategy[];
}

export interface UrlOutcome {
  kind: UrlKind | 'invalid';
  success: boolean;
  /** Failures recorded while handling this URL */
  newFailures: number;
  playlist?: PlaylistResult;
}

export interface RetryResult {
  attempted: number;
  successful: number;
}

/**
 * Route a URL: null when it is not a YouTube URL
 */
export function classifyUrl(url: string): UrlKind | null {
  const lower = url.toLowerCase();
  if (!lower.includes('youtube.com')) {
    return null;
  }
  if (lower.includes('playlist')) {
    return 'playlist';
  }
  if (lower.includes('album') || lower.includes('release')) {
    return 'album';
  }
  return 'track';
}

/**
 * Downloads tracks and playlists as tagged Opus files.
 * Per-track failures are recorded in the session and never thrown.
 */
export class TrackFetcher {
  private strategies: DownloadStrategy[];
  private sleep: Sleeper;

  constructor(
    private ytDlp: YtDlpClient,
    private ffmpeg: FfmpegClient,
    private session: FailedDownloadSession,
    private options: TrackFetcherOptions,
  ) {
    this.strategies = options.strategies ?? createDefaultStrategies(ytDlp, ffmpeg);
    this.sleep = options.sleep ?? sleep;
  }

  get outputDir(): string {
    return this.options.outputDir;
  }

  get failures(): FailedDownloadSession {
    return this.session;
  }

  /**
   * Download one track into directory, tag it, and report the outcome
   */
  async downloadTrack(
    url: string,
    directory: string = this.options.outputDir,
    onProgress: ProgressCallback = noopProgress,
  ): Promise<TrackDownloadResult> {
    let title = UNKNOWN_TITLE;
    let artist = UNKNOWN_ARTIST;
    const fail = (error: string): TrackDownloadResult => {
      this.session.record({ url, title, artist, error, destination: directory });
      return { success: false, message: error };
    };

    try {
      fs.mkdirSync(directory, { recursive: true });

      onProgress({ stage: 'Getting video information', current: 0, total: 0 });
      const info = await this.fetchTrackInfo(url);
      if (!info) {
        return fail('Failed to get video information');
      }
      const metadata = extractMetadata(info);
      title = metadata.title;
      artist = metadata.artist;

      const filename = FilenameSanitizer.createSafeFilename(info.title);
      const filePath = path.join(directory, filename);

      if (fs.existsSync(filePath)) {
        Logger.info(`File already exists: ${filename} (${formatFileSize(fs.statSync(filePath).size)})`);
        return { success: true, message: 'File already exists', filePath };
      }

      Logger.info(`Downloading: ${artist} - ${title}`, { filename });
      const outcome = await runStrategies(this.strategies, {
        url,
        directory,
        targetPath: filePath,
        onProgress: (line) => onProgress({ stage: 'Downloading', current: 0, total: 0, message: line }),
      });

      if (!outcome.success || !fs.existsSync(filePath)) {
        const reasons = outcome.errors.length > 0 ? outcome.errors.join(', ') : 'downloaded file is missing';
        return fail(`All download methods failed. Errors: ${reasons}`);
      }

      onProgress({ stage: 'Tagging', current: 0, total: 0, message: filename });
      await this.tagFile(filePath, metadata);

      Logger.info(`Successfully downloaded: ${filename} (${formatFileSize(fs.statSync(filePath).size)})`);
      return { success: true, message: 'Download successful', filePath };
    } catch (error) {
      Logger.error('Download pipeline failed', error instanceof Error ? error : undefined, { url });
      return fail(`Unexpected error in download pipeline: ${ErrorHandler.messageOf(error)}`);
    }
  }

  private async fetchTrackInfo(url: string): Promise<YtDlpTrackInfo | null> {
    try {
      return await this.ytDlp.getTrackInfo(url);
    } catch (error) {
      Logger.warn(`Could not get video information: ${ErrorHandler.messageOf(error)}`, { url });
      return null;
    }
  }

  /**
   * Stamp metadata into the file through a temp copy. Never fails the download.
   */
  private async tagFile(filePath: string, metadata: TrackMetadata): Promise<void> {
    const tags = buildTagEntries(metadata);
    if (tags.length === 0) {
      Logger.info('No metadata to add');
      return;
    }

    const tempPath = path.join(path.dirname(filePath), `${path.basename(filePath, '.opus')}.temp.opus`);
    let failure: string;
    try {
      const result = await this.ffmpeg.writeMetadata(filePath, tempPath, tags);
      if (!result.timedOut && result.exitCode === 0 && fs.existsSync(tempPath)) {
        fs.renameSync(tempPath, filePath);
        Logger.debug('Metadata added', { file: filePath });
        return;
      }
      failure = describeFailure(result);
    } catch (error) {
      failure = ErrorHandler.messageOf(error);
    }

    Logger.warn(`Could not add metadata: ${failure}`, { file: filePath });
    try {
      if (fs.existsSync(tempPath)) {
        fs.unlinkSync(tempPath);
      }
    } catch (error) {
      Logger.warn(`Could not remove temporary file ${tempPath}: ${ErrorHandler.messageOf(error)}`);
    }
  }

  /**
   * Download every entry of a playlist or album into its own folder
   */
  async processPlaylist(url: string, onProgress: ProgressCallback = noopProgress): Promise<PlaylistResult | null> {
    let listing: YtDlpPlaylist;
    try {
      onProgress({ stage: 'Getting playlist information', current: 0, total: 0 });
      listing = await this.ytDlp.getPlaylist(url);
    } catch (error) {
      Logger.error(`Failed to get playlist info: ${ErrorHandler.messageOf(error)}`, undefined, { url });
      return null;
    }

    const playlistTitle = listing.title || 'Playlist';
    const entries = listing.entries ?? [];
    const directory = path.join(this.options.outputDir, FilenameSanitizer.createSafeFolderName(playlistTitle));
    fs.mkdirSync(directory, { recursive: true });

    const traceId = Logger.startOperation(`playlist ${playlistTitle}`);
    const result: PlaylistResult = { title: playlistTitle, total: entries.length, successful: 0, failed: 0, skipped: 0 };

    for (const [index, entry] of entries.entries()) {
      const position = index + 1;
      if (!entry || !entry.id) {
        Logger.warn(`Skipping invalid entry ${position}`);
        result.skipped++;
        continue;
      }

      onProgress({ stage: 'Playlist', current: position, total: entries.length, message: entry.title ?? entry.id });
      const track = await this.downloadTrack(`${TRACK_URL_PREFIX}${entry.id}`, directory, (progress) =>
        onProgress({ ...progress, stage: `Track ${position}/${entries.length}: ${progress.stage}` }),
      );
      if (track.success) {
        result.successful++;
      } else {
        result.failed++;
        Logger.warn(`Failed to download track ${position}`);
      }

      if (position < entries.length) {
        await this.sleep(this.options.trackDelayMs);
      }
    }

    Logger.endOperation(traceId, result.successful > 0, { ...result });
    return result;
  }

  /**
   * Route a URL to the playlist or single-track pipeline
   */
  async processUrl(url: string, onProgress: ProgressCallback = noopProgress): Promise<UrlOutcome> {
    const kind = classifyUrl(url);
    if (kind === null) {
      return { kind: 'invalid', success: false, newFailures: 0 };
    }

    const failuresBefore = this.session.size;
    try {
      if (kind === 'track') {
        const track = await this.downloadTrack(url, this.options.outputDir, onProgress);
        return { kind, success: track.success, newFailures: this.session.size - failuresBefore };
      }
      const playlist = await this.processPlaylist(url, onProgress);
      return {
        kind,
        success: playlist !== null && playlist.successful > 0,
        newFailures: this.session.size - failuresBefore,
        playlist: playlist ?? undefined,
      };
    } catch (error) {
      const message = `Error processing URL: ${ErrorHandler.messageOf(error)}`;
      Logger.error(message, error instanceof Error ? error : undefined);
      this.session.record({ url, title: 'Unknown', artist: 'Unknown', error: message });
      return { kind, success: false, newFailures: this.session.size - failuresBefore };
    }
  }

  /**
   * Re-run every failure of this session. The list is drained first, so only
   * tracks that fail again remain afterwards.
   */
  async retryFailed(onProgress: ProgressCallback = noopProgress): Promise<RetryResult> {
    const toRetry = this.session.drain();
    let successful = 0;

    for (const [index, failed] of toRetry.entries()) {
      Logger.info(`Retrying: ${failed.title} - ${failed.artist}`);
      const track = await this.downloadTrack(failed.url, failed.destination ?? this.options.outputDir, (progress) =>
        onProgress({ ...progress, stage: `Retry ${index + 1}/${toRetry.length}: ${progress.stage}` }),
      );
      if (track.success) {
        successful++;
        Logger.info(`Successfully retried: ${failed.title}`);
      } else {
        Logger.warn(`Still failed: ${failed.title}`);
      }
    }

    return { attempted: toRetry.length, successful };
  }
}
