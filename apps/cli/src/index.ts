#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Batch converter: every source file in a directory becomes an
 * adaptive-bitrate HLS package next to it.
 */

import { config as dotenvConfig } from 'dotenv';
import { Command } from 'commander';
import chalk from 'chalk';
import { convertCommand } from './commands/convert.js';

// .env in the working directory; real environment variables win
dotenvConfig();

const program = new Command();

program
  .name('hls-ladder')
  .description('Convert media files into adaptive-bitrate HLS packages')
  .version('1.0.0')
  .argument('[directory]', 'Directory containing the source files', '.')
  .option('-e, --extension <ext>', 'Source file extension (default: .mkv)')
  .option('-d, --delete-intermediates', 'Remove the source file and segment files after conversion')
  .option('-c, --concurrency <n>', 'Encode jobs to run at once (default: 1)')
  .option('--hwaccel <mode>', 'Hardware encoding: auto, on or off (default: auto)')
  .option('--rungs <heights>', 'Comma-separated ladder heights, e.g. 360,720,1080')
  .option('--log-level <level>', 'Log level: fatal, error, warn, info, debug or trace')
  .option('-v, --verbose', 'Also write log entries to the console')
  .action(convertCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
