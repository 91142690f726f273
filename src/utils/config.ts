import * as path from 'path';
import { AppError, ErrorType } from './error-handler';

export interface AppConfig {
  outputDir: string;
  failedLogPath: string;
  ytDlpPath: string;
  ffmpegPath: string;
  infoTimeoutMs: number;
  playlistTimeoutMs: number;
  downloadTimeoutMs: number;
  tagTimeoutMs: number;
  trackDelayMs: number;
  logLevel: string;
  logDir: string;
}

export const DEFAULT_CONFIG: AppConfig = {
  outputDir: './YouTube Music Downloads',
  failedLogPath: './failed_downloads.txt',
  ytDlpPath: 'yt-dlp',
  ffmpegPath: 'ffmpeg',
  infoTimeoutMs: 30_000,
  playlistTimeoutMs: 60_000,
  downloadTimeoutMs: 300_000,
  tagTimeoutMs: 60_000,
  trackDelayMs: 1_000,
  logLevel: 'info',
  logDir: './logs',
};

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'];

function readNumber(env: NodeJS.ProcessEnv, key: string, fallback: number, allowZero = false): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0 || (!allowZero && value === 0)) {
    throw new AppError(ErrorType.ConfigurationError, `${key} must be a positive integer, got "${raw}"`, {
      operation: 'loadConfig',
      details: { key },
    });
  }
  return value;
}

function readString(env: NodeJS.ProcessEnv, key: string, fallback: string): string {
  const raw = env[key]?.trim();
  return raw ? raw : fallback;
}

/**
 * Build the configuration from environment variables (usually after dotenv has run)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const logLevel = readString(env, 'LOG_LEVEL', DEFAULT_CONFIG.logLevel).toLowerCase();
  if (!LOG_LEVELS.includes(logLevel)) {
    throw new AppError(ErrorType.ConfigurationError, `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`, {
      operation: 'loadConfig',
      details: { key: 'LOG_LEVEL' },
    });
  }

  return {
    outputDir: path.resolve(readString(env, 'OUTPUT_DIR', DEFAULT_CONFIG.outputDir)),
    failedLogPath: path.resolve(readString(env, 'FAILED_LOG_PATH', DEFAULT_CONFIG.failedLogPath)),
    ytDlpPath: readString(env, 'YT_DLP_PATH', DEFAULT_CONFIG.ytDlpPath),
    ffmpegPath: readString(env, 'FFMPEG_PATH', DEFAULT_CONFIG.ffmpegPath),
    infoTimeoutMs: readNumber(env, 'INFO_TIMEOUT_MS', DEFAULT_CONFIG.infoTimeoutMs),
    playlistTimeoutMs: readNumber(env, 'PLAYLIST_TIMEOUT_MS', DEFAULT_CONFIG.playlistTimeoutMs),
    downloadTimeoutMs: readNumber(env, 'DOWNLOAD_TIMEOUT_MS', DEFAULT_CONFIG.downloadTimeoutMs),
    tagTimeoutMs: readNumber(env, 'TAG_TIMEOUT_MS', DEFAULT_CONFIG.tagTimeoutMs),
    trackDelayMs: readNumber(env, 'TRACK_DELAY_MS', DEFAULT_CONFIG.trackDelayMs, true),
    logLevel,
    logDir: readString(env, 'LOG_DIR', DEFAULT_CONFIG.logDir),
  };
}
