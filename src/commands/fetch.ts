import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import * as path from 'path';
import { YtDlpClient } from '../api/yt-dlp';
import { FfmpegClient } from '../api/ffmpeg';
import { FailedDownloadSession } from '../services/failed-downloads';
import { SpawnProcessRunner } from '../services/process-runner';
import { TrackFetcher } from '../services/track-fetcher';
import { AppConfig } from '../utils/config';
import { AppError, ErrorHandler, ErrorType } from '../utils/error-handler';
import { CommandBuilder } from '../utils/command-builder';
import { divider, truncate } from '../utils/formatters';
import { Logger } from '../utils/logger';
import { Prompter, confirm, createPrompter } from '../utils/prompt';

const EXIT_WORDS = ['exit', 'quit', 'q'];
const CLEAR_WORDS = ['clear', 'cls'];

const YT_DLP_HINTS = ['Install it with: pip install yt-dlp'];
const FFMPEG_HINTS = [
  'Windows: https://ffmpeg.org/download.html',
  'Linux: sudo apt install ffmpeg',
  'macOS: brew install ffmpeg',
];

export interface FetchContext {
  fetcher: TrackFetcher;
  session: FailedDownloadSession;
  prompter: Prompter;
}

export function printHeader(outputDir: string): void {
  console.log(chalk.bold('[*] YouTube Music Downloader - Pure Opus Edition'));
  console.log('[*] Download original Opus audio from YouTube Music');
  console.log('[*] Supports: Single tracks, Playlists, and Albums');
  console.log("[*] Paste YouTube Music URLs. Type 'exit' to quit.");
  console.log(`[*] Downloading to: ${outputDir}`);
  console.log(divider('-'));
}

export function printFailureList(session: FailedDownloadSession, context?: string): void {
  console.log(`\n${divider('=', 60)}`);
  console.log(chalk.red('[!] FAILED DOWNLOADS SUMMARY'));
  if (context) {
    console.log(`[!] Context: ${context}`);
  }
  console.log(divider('=', 60));

  [...session].forEach((failed, index) => {
    console.log(`\n[${index + 1}] ${failed.title} - ${failed.artist}`);
    console.log(`    URL: ${failed.url}`);
    console.log(`    Error: ${truncate(failed.error, 200)}`);
    console.log(`    Time: ${failed.timestamp}`);
  });

  console.log(`\n[*] Total failed downloads: ${session.size}`);
  console.log(`[*] Failed downloads log saved to: ${session.logPath}`);
  console.log(divider('=', 60));
}

/**
 * List this session's failures and offer to retry them, repeating while
 * failures remain and the user agrees
 */
export async function showFailureSummary(ctx: FetchContext, context?: string): Promise<void> {
  while (ctx.session.size > 0) {
    printFailureList(ctx.session, context);
    if (!(await confirm(ctx.prompter, '\n[*] Do you want to retry failed downloads? (y/n): '))) {
      return;
    }
    await retryInSession(ctx, false);
    context = 'After retry';
  }
}

export async function retryInSession(ctx: FetchContext, summarize = true): Promise<void> {
  if (ctx.session.size === 0) {
    console.log('[*] No failed downloads to retry');
    return;
  }

  console.log(`\n[*] Retrying ${ctx.session.size} failed downloads...`);
  const spinner = CommandBuilder.createSpinner('Retrying...');
  const result = await ctx.fetcher.retryFailed(CommandBuilder.createProgressCallback(spinner));
  spinner.stop();
  console.log(`\n[*] Retry completed: ${result.successful}/${result.attempted} successful`);

  if (summarize && ctx.session.size > 0) {
    await showFailureSummary(ctx, 'After retry');
  }
}

/**
 * Route one URL through the fetcher and report the outcome
 */
export async function handleUrl(ctx: FetchContext, url: string, summarize = true): Promise<boolean> {
  const spinner = CommandBuilder.createSpinner(`Processing ${url}`);
  const outcome = await ctx.fetcher.processUrl(url, CommandBuilder.createProgressCallback(spinner));
  spinner.stop();

  if (outcome.kind === 'invalid') {
    console.log(CommandBuilder.formatWarning('Please provide a valid YouTube URL'));
    return false;
  }

  if (outcome.kind === 'track') {
    console.log(
      outcome.success
        ? CommandBuilder.formatSuccess(`Track ready: ${url}`)
        : CommandBuilder.formatError(`Failed to download: ${url}`),
    );
    if (summarize && outcome.newFailures > 0) {
      await showFailureSummary(ctx, 'Single track');
    }
    return outcome.success;
  }

  if (!outcome.playlist) {
    console.log(CommandBuilder.formatError('Failed to get playlist info'));
    return false;
  }

  const { title, successful, total } = outcome.playlist;
  console.log(`\n[*] Playlist: ${title}`);
  console.log('[*] Playlist download completed!');
  console.log(`[*] Successful: ${successful}/${total} tracks`);
  if (summarize && outcome.newFailures > 0) {
    await showFailureSummary(ctx, `Playlist: ${title}`);
  }
  return outcome.success;
}

/**
 * Replay every URL named in the failure log
 */
export async function retryFromLog(ctx: FetchContext): Promise<void> {
  if (!ctx.session.logExists()) {
    console.log('[*] No failed downloads log found');
    return;
  }
  if (!ctx.session.logHasEntries()) {
    console.log('[*] Failed downloads log is empty');
    return;
  }

  let urls: string[];
  try {
    console.log('[*] Loading failed downloads from log...');
    urls = ctx.session.readLogUrls();
  } catch (error) {
    console.log(CommandBuilder.formatError(`Error reading failed downloads log: ${ErrorHandler.messageOf(error)}`));
    return;
  }

  if (urls.length === 0) {
    console.log('[*] No failed downloads found in log');
    return;
  }

  console.log(`[*] Found ${urls.length} failed downloads to retry`);
  for (const url of urls) {
    console.log(`\n${divider()}`);
    await handleUrl(ctx, url);
    console.log(`${divider()}\n`);
  }
}

export async function processUrlFile(ctx: FetchContext, file: string): Promise<void> {
  let urls: string[];
  try {
    urls = fs
      .readFileSync(file, 'utf8')
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter(Boolean);
  } catch (error) {
    const appError = ErrorHandler.parse(error, { operation: 'readUrlFile', resource: file });
    console.log(
      appError.type === ErrorType.NotFound
        ? `[*] File not found: ${file}`
        : CommandBuilder.formatError(`Error processing file: ${appError.message}`),
    );
    return;
  }

  for (const url of urls) {
    console.log(`\n${divider()}`);
    await handleUrl(ctx, url);
    console.log(`${divider()}\n`);
  }
}

/**
 * Read URLs and commands until the user exits or input ends
 */
export async function interactiveLoop(ctx: FetchContext, redrawHeader: () => void): Promise<void> {
  redrawHeader();

  for (;;) {
    const input = await ctx.prompter.ask('\n[*] Enter YouTube Music URL: ');

    if (input === null) {
      console.log('\n[*] Exiting...');
      await showFailureSummary(ctx, 'Interrupted');
      return;
    }

    const command = input.toLowerCase();
    if (EXIT_WORDS.includes(command)) {
      await showFailureSummary(ctx, 'Before exit');
      return;
    }
    if (CLEAR_WORDS.includes(command)) {
      console.clear();
      redrawHeader();
      continue;
    }
    if (command === 'failed') {
      if (ctx.session.size === 0) {
        console.log('[*] No failed downloads in this session');
      } else {
        await showFailureSummary(ctx);
      }
      continue;
    }
    if (command === 'retry') {
      await retryInSession(ctx);
      continue;
    }
    if (!input) {
      continue;
    }

    try {
      await handleUrl(ctx, input);
    } catch (error) {
      Logger.error('Unexpected error while processing URL', error instanceof Error ? error : undefined);
      console.log(CommandBuilder.formatError(`Error: ${ErrorHandler.messageOf(error)}`));
    }
  }
}

/**
 * Exit with install hints when yt-dlp or ffmpeg cannot be run
 */
export async function ensureDependencies(ytDlp: YtDlpClient, ffmpeg: FfmpegClient): Promise<void> {
  if (!(await ytDlp.isAvailable())) {
    CommandBuilder.exitWithError(
      new AppError(ErrorType.MissingDependency, ytDlp.command, { operation: 'startup' }),
      YT_DLP_HINTS,
    );
  }
  if (!(await ffmpeg.isAvailable())) {
    CommandBuilder.exitWithError(
      new AppError(ErrorType.MissingDependency, ffmpeg.command, { operation: 'startup' }),
      FFMPEG_HINTS,
    );
  }
}

interface FetchOptions {
  file?: string;
  retry?: boolean;
  output?: string;
  log?: string;
}

export function createFetchCommand(config: AppConfig) {
  return new Command('fetch')
    .description('Download YouTube Music tracks, playlists and albums as tagged Opus files')
    .argument('[url]', 'YouTube Music URL (interactive mode when omitted)')
    .option('-f, --file <path>', 'Text file with one URL per line')
    .option('-r, --retry', 'Retry the downloads listed in the failed downloads log')
    .option('-o, --output <dir>', 'Download directory', config.outputDir)
    .option('-l, --log <path>', 'Failed downloads log', config.failedLogPath)
    .action(async (url: string | undefined, options: FetchOptions) => {
      const outputDir = path.resolve(options.output ?? config.outputDir);
      const logPath = path.resolve(options.log ?? config.failedLogPath);

      const runner = new SpawnProcessRunner();
      const ytDlp = new YtDlpClient(runner, config.ytDlpPath, config);
      const ffmpeg = new FfmpegClient(runner, config.ffmpegPath, config);
      await ensureDependencies(ytDlp, ffmpeg);

      fs.mkdirSync(outputDir, { recursive: true });
      const session = new FailedDownloadSession(logPath);
      const fetcher = new TrackFetcher(ytDlp, ffmpeg, session, { outputDir, trackDelayMs: config.trackDelayMs });
      const prompter = createPrompter();
      const ctx: FetchContext = { fetcher, session, prompter };

      if (session.logHasEntries()) {
        console.log(CommandBuilder.formatInfo(`Found existing failed downloads log: ${logPath}`));
      }

      try {
        if (options.retry) {
          await retryFromLog(ctx);
        } else if (options.file) {
          await processUrlFile(ctx, options.file);
        } else if (url) {
          await handleUrl(ctx, url, false);
          await showFailureSummary(ctx, 'Final summary');
        } else {
          await interactiveLoop(ctx, () => printHeader(outputDir));
        }
      } finally {
        prompter.close();
      }
    });
}
