/**
 * CLI Logger
 */

import { createLogger, type Logger } from '@hls-ladder/utils';
import type { AppConfig } from '../config/index.js';

export function createAppLogger(config: AppConfig): Logger {
  return createLogger({
    level: config.logLevel,
    logFile: config.logFile,
    console: config.logConsole,
    env: config.nodeEnv,
  });
}
