#!/usr/bin/env node

import dotenv from 'dotenv';
import { program } from 'commander';
import { createCleanupCommand } from './commands/cleanup';
import { createEmbedCommand } from './commands/embed';
import { createFetchCommand } from './commands/fetch';
import { AppConfig, loadConfig } from './utils/config';
import { AppError, ErrorHandler } from './utils/error-handler';
import { CommandBuilder } from './utils/command-builder';
import { Logger } from './utils/logger';

dotenv.config();

function readConfig(): AppConfig | null {
  try {
    return loadConfig();
  } catch (error) {
    const appError = error instanceof AppError ? error : ErrorHandler.parse(error, { operation: 'loadConfig' });
    CommandBuilder.reportError(appError, ['Check the values in your .env file. See .env.example for reference.']);
    return null;
  }
}

// A bad configuration is reported and nothing runs; the exit code stays 0
const config = readConfig();

if (config) {
  Logger.setLogLevel(Logger.parseLogLevel(config.logLevel));
  Logger.setLogDirectory(config.logDir);

  program
    .name('opus-shelf')
    .description('Download, tag and tidy a personal Opus music library')
    .version('1.0.0');

  program.addCommand(createFetchCommand(config));
  program.addCommand(createEmbedCommand());
  program.addCommand(createCleanupCommand());

  program.parseAsync(process.argv).catch((error: unknown) => {
    const appError = ErrorHandler.parse(error, { operation: 'cli' });
    ErrorHandler.log(appError);
    if (appError.isFatal()) {
      CommandBuilder.exitWithError(appError);
    }
    CommandBuilder.reportError(appError);
  });
}
