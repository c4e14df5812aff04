/**
 * CLI Configuration
 *
 * Settings come from the environment (a `.env` file in the working
 * directory is loaded first); command line flags are folded in as
 * environment overrides so both go through the same validation.
 */

import { z } from 'zod';
import { ConfigurationError, getBinariesConfig, type BinariesConfig } from '@hls-ladder/core';
import type { HardwareAccelMode } from '@hls-ladder/processing';
import type { LogLevel } from '@hls-ladder/utils';

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

function booleanFlag(fallback: 'true' | 'false') {
  return z
    .string()
    .default(fallback)
    .transform((value, ctx) => {
      const normalized = value.trim().toLowerCase();
      if (TRUE_VALUES.has(normalized)) return true;
      if (FALSE_VALUES.has(normalized)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean, got "${value}"` });
      return z.NEVER;
    });
}

const rungList = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (value === undefined || value.trim() === '') return undefined;

    const rungs = value.split(',').map(part => Number(part.trim()));
    if (rungs.some(rung => !Number.isInteger(rung) || rung <= 0)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected a comma-separated list of positive heights, got "${value}"`,
      });
      return z.NEVER;
    }
    return rungs;
  });

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  LOG_FILE: z.string().default('conversion.log'),
  LOG_CONSOLE: booleanFlag('false'),

  // Conversion
  HLS_SOURCE_EXTENSION: z
    .string()
    .default('.mkv')
    .transform(ext => (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase())
    .refine(ext => ext.length > 1, 'Extension must not be empty'),
  HLS_DELETE_INTERMEDIATES: booleanFlag('false'),
  HLS_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(1),
  HLS_HWACCEL: z.enum(['auto', 'on', 'off']).default('auto'),
  HLS_LADDER_RUNGS: rungList,
});

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevel;
  /** Persistent log; undefined disables it */
  logFile?: string;
  logConsole: boolean;
  binaries: BinariesConfig;
  conversion: {
    sourceExtension: string;
    deleteIntermediates: boolean;
    concurrency: number;
    hwaccel: HardwareAccelMode;
    rungs?: number[];
  };
}

/**
 * Command line flags, as commander hands them over
 */
export interface CliOptions {
  extension?: string;
  deleteIntermediates?: boolean;
  concurrency?: string;
  hwaccel?: string;
  rungs?: string;
  logLevel?: string;
  verbose?: boolean;
}

/**
 * Validate the environment
 *
 * Throws ConfigurationError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError('Invalid configuration', issues);
  }

  const vars = parsed.data;

  return {
    nodeEnv: vars.NODE_ENV,
    logLevel: vars.LOG_LEVEL,
    logFile: vars.LOG_FILE.trim() || undefined,
    logConsole: vars.LOG_CONSOLE,
    binaries: getBinariesConfig(env),
    conversion: {
      sourceExtension: vars.HLS_SOURCE_EXTENSION,
      deleteIntermediates: vars.HLS_DELETE_INTERMEDIATES,
      concurrency: vars.HLS_CONCURRENCY,
      hwaccel: vars.HLS_HWACCEL,
      rungs: vars.HLS_LADDER_RUNGS,
    },
  };
}

/**
 * Environment entries that command line flags override
 */
export function cliOverrides(options: CliOptions): NodeJS.ProcessEnv {
  const overrides: NodeJS.ProcessEnv = {};

  if (options.extension !== undefined) overrides['HLS_SOURCE_EXTENSION'] = options.extension;
  if (options.deleteIntermediates) overrides['HLS_DELETE_INTERMEDIATES'] = 'true';
  if (options.concurrency !== undefined) overrides['HLS_CONCURRENCY'] = options.concurrency;
  if (options.hwaccel !== undefined) overrides['HLS_HWACCEL'] = options.hwaccel;
  if (options.rungs !== undefined) overrides['HLS_LADDER_RUNGS'] = options.rungs;
  if (options.logLevel !== undefined) overrides['LOG_LEVEL'] = options.logLevel;
  if (options.verbose) overrides['LOG_CONSOLE'] = 'true';

  return overrides;
}
