import { Command, Option } from 'commander';
import chalk from 'chalk';
import * as path from 'path';
import { ImageCleanup, scanFolder } from '../services/image-cleanup';
import { CleanupMode, CleanupPlan } from '../types';
import { AppError, ErrorType } from '../utils/error-handler';
import { CommandBuilder } from '../utils/command-builder';
import { divider } from '../utils/formatters';
import { Prompter, confirm, createPrompter } from '../utils/prompt';

export interface CleanupOptions {
  mode?: CleanupMode;
  /** Skip the y/n confirmation */
  yes?: boolean;
  verify?: boolean;
}

const MODE_CHOICES: Record<string, CleanupMode> = { '1': 'all', '2': 'matched', '3': 'dry-run' };

function banner(title: string): void {
  console.log(divider());
  console.log(`     ${title}`);
  console.log(divider());
}

async function chooseMode(prompter: Prompter): Promise<CleanupMode | 'cancel' | null> {
  console.log('\n[1] Delete ALL image files');
  console.log('[2] Delete only images that have matching OPUS files (safer)');
  console.log('[3] Preview what would be deleted (dry run)');
  console.log('[0] Cancel');

  const choice = (await prompter.ask('\nSelect option: ')) ?? '0';
  if (choice === '0') {
    return 'cancel';
  }
  return MODE_CHOICES[choice] ?? null;
}

function printDryRun(plan: CleanupPlan, verify: boolean): void {
  banner('DRY RUN - NO FILES WILL BE DELETED');

  const selected = new Set(plan.toDelete.map((item) => item.path));
  if (plan.matches.length > 0) {
    console.log('\n[*] Images that WOULD be deleted (matching OPUS files):');
    for (const match of plan.matches) {
      let line = `    ✓ ${match.image.name} → matches ${match.audioBaseName}.opus`;
      if (verify) {
        line += match.hasEmbeddedCover ? ' (cover embedded)' : ' (no embedded cover, kept)';
      }
      console.log(selected.has(match.image.path) ? chalk.green(line) : chalk.yellow(line));
    }
  }

  if (plan.unmatched.length > 0) {
    console.log('\n[*] Images that would NOT be deleted (no matching OPUS):');
    for (const image of plan.unmatched) {
      console.log(chalk.gray(`    ✗ ${image.name}`));
    }
  }

  console.log(`\n[*] Total images that would be deleted: ${plan.toDelete.length}`);
  console.log('[*] This was a dry run. No files were deleted.');
}

/**
 * One cleanup run over a folder. Everything is reported on stdout; nothing is thrown
 * for a missing folder or an empty selection.
 */
export async function runCleanup(
  folder: string,
  cleanup: ImageCleanup,
  prompter: Prompter,
  options: CleanupOptions = {},
): Promise<void> {
  banner('IMAGE CLEANUP TOOL');
  const folderPath = path.normalize(folder);

  let scan: ReturnType<typeof scanFolder>;
  try {
    scan = scanFolder(folderPath);
  } catch (error) {
    if (error instanceof AppError && error.type === ErrorType.NotFound) {
      console.log(CommandBuilder.formatError(`Folder not found: ${folderPath}`));
      return;
    }
    throw error;
  }

  console.log(`[*] Scanning folder: ${folderPath}`);
  console.log(`[*] Found ${scan.audioFiles.length} .opus files`);
  console.log(`[*] Found ${scan.imageFiles.length} image files`);

  if (scan.imageFiles.length === 0) {
    console.log(CommandBuilder.formatWarning('No image files found to delete'));
    return;
  }

  console.log('\n[*] Image files found:');
  for (const image of scan.imageFiles) {
    console.log(`    - ${image.name}`);
  }

  const mode = options.mode ?? (await chooseMode(prompter));
  if (mode === 'cancel') {
    console.log('[*] Operation cancelled');
    return;
  }
  if (mode === null) {
    console.log(CommandBuilder.formatError('Invalid choice'));
    return;
  }

  const verify = Boolean(options.verify);
  const plan = await cleanup.plan(folderPath, mode, { verify });

  if (mode === 'dry-run') {
    printDryRun(plan, verify);
    return;
  }

  if (plan.toDelete.length === 0) {
    console.log(CommandBuilder.formatWarning('No files to delete based on selected condition'));
    return;
  }

  const condition = mode === 'all' ? 'ALL' : 'matching OPUS files only';
  console.log(`\n[*] About to delete ${plan.toDelete.length} image files (${condition})`);
  console.log('\nFiles to be deleted:');
  for (const image of plan.toDelete) {
    console.log(`    - ${image.name}`);
  }

  if (!options.yes && !(await confirm(prompter, '\nAre you sure you want to delete these files? (y/n): '))) {
    console.log('[*] Deletion cancelled');
    return;
  }

  const result = cleanup.deleteFiles(folderPath, plan.toDelete, (outcome) => {
    console.log(
      outcome.success
        ? CommandBuilder.formatSuccess(`Deleted: ${outcome.file}`)
        : CommandBuilder.formatError(`Error deleting ${outcome.file}: ${outcome.error}`),
    );
  });

  console.log();
  banner('CLEANUP COMPLETE');
  console.log(`[*] Total images deleted: ${result.deleted}`);
  console.log(`[*] Errors: ${result.errors}`);
  console.log(`[*] Remaining files in folder: ${result.remaining}`);
  console.log(divider());
}

/**
 * Top-level menu, repeated until the user exits
 */
export async function cleanupMenu(cleanup: ImageCleanup, prompter: Prompter, options: CleanupOptions = {}): Promise<void> {
  for (;;) {
    banner('OPUS IMAGE CLEANUP TOOL');
    console.log('[1] Clean up images in folder');
    console.log('[2] Clean current working directory');
    console.log('[0] Exit');

    const choice = await prompter.ask('\nSelect option: ');
    if (choice === null || choice === '0') {
      console.log('[*] Goodbye!');
      return;
    }

    if (choice === '1') {
      const folder = await prompter.ask('Enter folder path: ');
      if (folder === null) {
        return;
      }
      if (!folder) {
        console.log(CommandBuilder.formatError('No folder path provided'));
      } else {
        await runCleanup(folder, cleanup, prompter, options);
      }
    } else if (choice === '2') {
      await runCleanup(process.cwd(), cleanup, prompter, options);
    } else {
      console.log(CommandBuilder.formatError('Invalid choice'));
    }
    console.log();
  }
}

export function createCleanupCommand(cleanup: ImageCleanup = new ImageCleanup()) {
  return new Command('cleanup')
    .description('Delete cover images left beside Opus files')
    .argument('[folder]', 'Folder to clean (interactive menu when omitted)')
    .addOption(new Option('-m, --mode <mode>', 'Which images to delete').choices(['all', 'matched', 'dry-run']))
    .option('-y, --yes', 'Delete without asking for confirmation')
    .option('--verify', 'Only delete images whose matching Opus file already has an embedded cover')
    .action(async (folder: string | undefined, options: { mode?: CleanupMode; yes?: boolean; verify?: boolean }) => {
      const prompter = createPrompter();
      try {
        if (folder) {
          await runCleanup(folder, cleanup, prompter, options);
        } else {
          await cleanupMenu(cleanup, prompter, options);
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(CommandBuilder.formatError(`Cleanup failed: ${message}`));
      } finally {
        prompter.close();
      }
    });
}
