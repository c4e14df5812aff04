/**
 * File State Machine
 *
 * Lifecycle of one source file through the conversion pipeline.
 *
 * State Flow:
 * PROBING → CLASSIFYING → PROCESSING → ASSEMBLING → (CLEANUP) → DONE
 *        ↘ FAILED (probing only)
 *
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - Per-rendition failures never fail the file
 */

import { StateTransitionError } from './errors/index.js';

export type FileState =
  | 'PROBING'
  | 'CLASSIFYING'
  | 'PROCESSING'
  | 'ASSEMBLING'
  | 'CLEANUP'
  | 'DONE'
  | 'FAILED';

/**
 * Represents a state transition with metadata
 */
export interface FileStateTransition {
  from: FileState;
  to: FileState;
  timestamp: Date;
  reason?: string;
}

/**
 * Valid state transitions
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<FileState, ReadonlySet<FileState>> = {
  PROBING: new Set<FileState>(['CLASSIFYING', 'FAILED']),
  CLASSIFYING: new Set<FileState>(['PROCESSING']),
  PROCESSING: new Set<FileState>(['ASSEMBLING']),
  ASSEMBLING: new Set<FileState>([
    'CLEANUP',
    'DONE',
  ]),
  CLEANUP: new Set<FileState>(['DONE']),
  DONE: new Set<FileState>([]), // Terminal state
  FAILED: new Set<FileState>([]), // Terminal state
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: FileState, to: FileState): boolean {
  return validTransitions[from].has(to);
}

export class FileStateMachine {
  private currentState: FileState = 'PROBING';
  private readonly history: FileStateTransition[] = [];

  constructor(private readonly filePath: string) {}

  getState(): FileState {
    return this.currentState;
  }

  /**
   * Get the full transition history
   */
  getHistory(): ReadonlyArray<FileStateTransition> {
    return [...this.history];
  }

  canTransitionTo(targetState: FileState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(targetState: FileState, reason?: string): FileStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.filePath, this.currentState, targetState);
    }

    const transition: FileStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
    };

    this.history.push(transition);
    this.currentState = targetState;

    return transition;
  }

  /**
   * Fail the file with a reason
   */
  fail(reason: string): FileStateTransition {
    return this.transitionTo('FAILED', reason);
  }
}
