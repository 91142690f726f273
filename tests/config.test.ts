import * as path from 'path';
import { DEFAULT_CONFIG, loadConfig } from '../src/utils/config';
import { AppError, ErrorType } from '../src/utils/error-handler';

describe('loadConfig', () => {
  it('should use defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.outputDir).toBe(path.resolve('./YouTube Music Downloads'));
    expect(config.failedLogPath).toBe(path.resolve('./failed_downloads.txt'));
    expect(config.ytDlpPath).toBe('yt-dlp');
    expect(config.ffmpegPath).toBe('ffmpeg');
    expect(config.infoTimeoutMs).toBe(DEFAULT_CONFIG.infoTimeoutMs);
    expect(config.downloadTimeoutMs).toBe(300_000);
    expect(config.trackDelayMs).toBe(1_000);
    expect(config.logLevel).toBe('info');
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      OUTPUT_DIR: '/music/in',
      YT_DLP_PATH: '/opt/bin/yt-dlp',
      TAG_TIMEOUT_MS: '1500',
      TRACK_DELAY_MS: '0',
      LOG_LEVEL: 'DEBUG',
    });

    expect(config.outputDir).toBe(path.resolve('/music/in'));
    expect(config.ytDlpPath).toBe('/opt/bin/yt-dlp');
    expect(config.tagTimeoutMs).toBe(1500);
    expect(config.trackDelayMs).toBe(0);
    expect(config.logLevel).toBe('debug');
  });

  it('should treat blank values as unset', () => {
    expect(loadConfig({ FFMPEG_PATH: '  ', INFO_TIMEOUT_MS: '' }).ffmpegPath).toBe('ffmpeg');
  });

  it.each([
    ['INFO_TIMEOUT_MS', 'soon'],
    ['DOWNLOAD_TIMEOUT_MS', '0'],
    ['PLAYLIST_TIMEOUT_MS', '-5'],
    ['TRACK_DELAY_MS', '-1'],
    ['TAG_TIMEOUT_MS', '2.5'],
  ])('should reject %s=%s', (key, value) => {
    let caught: unknown;
    try {
      loadConfig({ [key]: value });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(AppError);
    expect(caught instanceof AppError && caught.type).toBe(ErrorType.ConfigurationError);
    expect(caught instanceof AppError && caught.isFatal()).toBe(true);
  });

  it('should reject an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow('LOG_LEVEL must be one of debug, info, warn, error');
  });
});
