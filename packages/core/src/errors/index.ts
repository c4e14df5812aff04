/**
 * Custom Error Classes
 */

import type { FileState } from '../stateMachine.js';

/**
 * Base error class for all hls-ladder errors
 */
export class HlsLadderError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'HlsLadderError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Required external binaries are missing or not functional
 */
export class ToolUnavailableError extends HlsLadderError {
  constructor(tools: string[]) {
    super(
      `Required tools are not available: ${tools.join(', ')}`,
      'TOOL_UNAVAILABLE',
      { tools }
    );
    this.name = 'ToolUnavailableError';
  }
}

/**
 * The prober could not return structured metadata for a file
 */
export class ProbeFailureError extends HlsLadderError {
  constructor(filePath: string, reason: string) {
    super(
      `Could not probe ${filePath}: ${reason}`,
      'PROBE_FAILURE',
      { filePath, reason }
    );
    this.name = 'ProbeFailureError';
  }
}

/**
 * One rendition's encoder process failed
 */
export class RenditionFailureError extends HlsLadderError {
  constructor(jobId: string, exitCode: number, stderr: string) {
    super(
      `Rendition ${jobId} failed with exit code ${exitCode}`,
      'RENDITION_FAILURE',
      { jobId, exitCode, stderr: stderr.slice(-1000) }
    );
    this.name = 'RenditionFailureError';
  }
}

/**
 * A playlist could not be written
 */
export class ManifestWriteError extends HlsLadderError {
  constructor(path: string, reason: string) {
    super(
      `Could not write ${path}: ${reason}`,
      'MANIFEST_WRITE_FAILURE',
      { path, reason }
    );
    this.name = 'ManifestWriteError';
  }
}

/**
 * An intermediate file could not be removed
 */
export class CleanupError extends HlsLadderError {
  constructor(path: string, reason: string) {
    super(
      `Could not remove ${path}: ${reason}`,
      'CLEANUP_FAILURE',
      { path, reason }
    );
    this.name = 'CleanupError';
  }
}

/**
 * Invalid environment or command line configuration
 */
export class ConfigurationError extends HlsLadderError {
  constructor(message: string, issues: string[] = []) {
    super(message, 'CONFIGURATION_ERROR', { issues });
    this.name = 'ConfigurationError';
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends HlsLadderError {
  constructor(
    filePath: string,
    fromState: FileState,
    toState: FileState
  ) {
    super(
      `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      { filePath, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * Normalise an unknown thrown value to a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
