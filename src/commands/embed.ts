import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { CoverEmbedder } from '../services/cover-embedder';
import { findCoverForSong } from '../services/cover-finder';
import { AppError, ErrorType } from '../utils/error-handler';
import { CommandBuilder } from '../utils/command-builder';
import { divider } from '../utils/formatters';
import { Prompter, createPrompter } from '../utils/prompt';

function printFilenameTips(): void {
  console.log('\n[*] Expected filename format:');
  console.log("    Song:   'Song Title.opus'");
  console.log("    Cover:  'Song Title.jpg' (or .png/.jpeg)");
  console.log('');
  console.log('[*] Tips:');
  console.log('    1. Make sure cover art files are in the same folder');
  console.log('    2. Cover art should have same base name as the song');
  console.log('    3. Supported formats: .jpg, .jpeg, .png');
}

export function printExpectedFormat(): void {
  console.log('\n[*] EXPECTED FILENAME FORMAT:');
  console.log(divider('=', 30));
  console.log('FOLDER STRUCTURE:');
  console.log('/Music Folder/');
  console.log('├── Song One.opus');
  console.log('├── Song One.jpg    ← Same base name!');
  console.log('├── Song Two.opus');
  console.log('├── Song Two.png    ← Same base name!');
  console.log('├── Song Three.opus');
  console.log('└── Song Three.jpeg ← Same base name!');
  console.log();
  console.log('[*] If no exact match is found, it will look for:');
  console.log('    - cover.jpg, cover.jpeg, cover.png');
  console.log('    - album.jpg, folder.jpg');
  console.log('    - Any other .jpg/.jpeg/.png file in the folder');
}

/**
 * Embed covers into every Opus file of a folder and print the summary
 */
export async function runBatch(folder: string, embedder: CoverEmbedder): Promise<void> {
  if (!fs.existsSync(folder)) {
    console.log(CommandBuilder.formatError(`Folder not found: ${folder}`));
    return;
  }

  const spinner = CommandBuilder.createSpinner('Searching for matching cover art...');
  const result = await embedder.batchProcess(folder, CommandBuilder.createProgressCallback(spinner), (event) => {
    const name = path.basename(event.audioPath);
    spinner.stop();
    if (event.status === 'embedded') {
      console.log(CommandBuilder.formatSuccess(`Embedded cover → ${name}`));
    } else if (event.status === 'failed') {
      console.log(CommandBuilder.formatError(`Failed to embed cover for ${name}`));
    } else {
      console.log(CommandBuilder.formatWarning(`No matching cover art found for: ${name}`));
      console.log(`    Expected: ${path.parse(name).name}.jpg/.png/.jpeg`);
    }
    spinner.start();
  });
  spinner.stop();

  if (result.total === 0) {
    console.log(CommandBuilder.formatWarning(`No .opus files found in ${folder}`));
    return;
  }

  console.log(`\n${divider()}`);
  console.log('[*] PROCESSING COMPLETE');
  console.log(`[*] Total files: ${result.total}`);
  console.log(`[*] Successfully processed: ${result.processed}`);
  console.log(`[*] Skipped (no cover): ${result.skipped}`);
  console.log(`[*] Failed: ${result.failed}`);
  console.log(divider());

  if (result.skipped > 0) {
    printFilenameTips();
  }
}

/**
 * Embed a cover into one Opus file. Without a cover path, the cover is matched
 * automatically and, failing that, asked for when a prompter is given.
 */
export async function runSingle(
  opusPath: string,
  embedder: CoverEmbedder,
  prompter: Prompter | null,
  coverPath?: string,
): Promise<boolean> {
  if (!fs.existsSync(opusPath) || path.extname(opusPath).toLowerCase() !== '.opus') {
    console.log(CommandBuilder.formatError(`Invalid Opus file: ${opusPath}`));
    return false;
  }

  console.log(`\n[*] Processing single file: ${path.basename(opusPath)}`);
  let cover = coverPath ?? findCoverForSong(opusPath);

  if (cover && !fs.existsSync(cover)) {
    console.log(CommandBuilder.formatWarning(`Cover not found, skipping: ${cover}`));
    return false;
  }

  if (!cover) {
    console.log(CommandBuilder.formatWarning(`No matching cover art found for: ${path.basename(opusPath)}`));
    console.log(`    Expected: ${path.parse(opusPath).name}.jpg/.png/.jpeg`);
    const custom = prompter ? await prompter.ask('\nEnter custom cover art path (or press Enter to skip): ') : null;
    if (!custom || !fs.existsSync(custom)) {
      return false;
    }
    cover = custom;
  }

  console.log(`[*] Found cover: ${path.basename(cover)}`);
  const embedded = await embedder.embedCover(opusPath, cover);
  console.log(
    embedded
      ? CommandBuilder.formatSuccess(`Embedded cover → ${path.basename(opusPath)}`)
      : CommandBuilder.formatError(`Failed to embed cover for ${path.basename(opusPath)}`),
  );
  return embedded;
}

export async function embedMenu(embedder: CoverEmbedder, prompter: Prompter): Promise<void> {
  for (;;) {
    console.log(`\n${divider()}`);
    console.log('    OPUS COVER ART EMBEDDER');
    console.log(divider());
    console.log('[1] Process folder');
    console.log('[2] Process single Opus file');
    console.log('[3] Show expected filename format');
    console.log('[0] Exit');
    console.log(divider('-'));

    const choice = await prompter.ask('\nEnter choice [0-3]: ');
    if (choice === null || choice === '0') {
      console.log('\n[*] Goodbye!');
      return;
    }

    if (choice === '1') {
      const folder = await prompter.ask('\nEnter folder path: ');
      if (!folder) {
        console.log(CommandBuilder.formatError('No folder path provided'));
        continue;
      }
      await runBatch(folder, embedder);
    } else if (choice === '2') {
      const file = await prompter.ask('\nEnter Opus file path: ');
      if (!file) {
        console.log(CommandBuilder.formatError('No file path provided'));
        continue;
      }
      await runSingle(file, embedder, prompter);
    } else if (choice === '3') {
      printExpectedFormat();
    } else {
      console.log(CommandBuilder.formatError('Invalid choice'));
    }
  }
}

export function createEmbedCommand(embedder: CoverEmbedder = new CoverEmbedder()) {
  return new Command('embed')
    .description('Embed cover art into Opus files')
    .argument('[folder]', 'Folder of .opus files (interactive menu when omitted)')
    .option('-f, --file <opus>', 'Process a single Opus file')
    .option('-c, --cover <image>', 'Cover image to use with --file')
    .action(async (folder: string | undefined, options: { file?: string; cover?: string }) => {
      if (options.cover && !options.file) {
        CommandBuilder.reportError(
          new AppError(ErrorType.ValidationError, '--cover can only be used together with --file', {
            operation: 'embed',
          }),
        );
        return;
      }

      const prompter = createPrompter();
      try {
        if (options.file) {
          await runSingle(options.file, embedder, prompter, options.cover);
        } else if (folder) {
          await runBatch(folder, embedder);
        } else {
          await embedMenu(embedder, prompter);
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(CommandBuilder.formatError(`Embedding failed: ${message}`));
      } finally {
        prompter.close();
      }
    });
}
