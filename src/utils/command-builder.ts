import chalk from 'chalk';
import ora, { Ora } from 'ora';
import { AppError } from './error-handler';
import { ProgressCallback, formatProgress } from './progress';

/**
 * Shared helpers for commands: spinners, progress rendering and message formatting
 */
export class CommandBuilder {
  /**
   * Create and start a new spinner. Spinners are disabled when stdout is not a TTY.
   */
  static createSpinner(text = ''): Ora {
    return ora({ text, isEnabled: Boolean(process.stdout.isTTY) }).start();
  }

  /**
   * Progress callback that mirrors progress into the spinner text
   */
  static createProgressCallback(spinner: Ora): ProgressCallback {
    return (progress) => {
      spinner.text = formatProgress(progress);
    };
  }

  static formatSuccess(message: string): string {
    return chalk.green(`✓ ${message}`);
  }

  static formatError(message: string): string {
    return chalk.red(`✗ ${message}`);
  }

  static formatWarning(message: string): string {
    return chalk.yellow(`⚠ ${message}`);
  }

  static formatInfo(message: string): string {
    return `${chalk.cyan('[*]')} ${message}`;
  }

  static reportError(error: AppError, hints: string[] = []): void {
    console.error(this.formatError(error.getUserMessage()));
    for (const hint of hints) {
      console.log(chalk.yellow(`  ${hint}`));
    }
  }

  /**
   * Print a fatal start-up error and exit non-zero. Only a missing external tool ends this way.
   */
  static exitWithError(error: AppError, hints: string[] = []): never {
    this.reportError(error, hints);
    process.exit(1);
  }
}
