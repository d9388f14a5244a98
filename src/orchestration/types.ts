// Orchestration-specific types
import { Logger } from '../logging/logger';
import { BuildState, StateKey } from './state';

export type StepAction = 'continue' | 'halt';

export interface StepContext {
  signal: AbortSignal;
  logger: Logger;
}

/**
 * One unit of the build. `cleanup` compensates whatever `run` did and is called only after `run`
 * was entered, in reverse order, even when a later step failed.
 */
export interface BuildStep {
  readonly name: string;
  /** State the step requires to have been written by an earlier step */
  readonly reads: readonly StateKey[];
  readonly writes: readonly StateKey[];
  run(state: BuildState, context: StepContext): Promise<StepAction>;
  cleanup(state: BuildState, context: StepContext): Promise<void>;
}

export type RunStatus = 'completed' | 'halted' | 'failed' | 'cancelled';

export interface CleanupFailure {
  step: string;
  error: Error;
}

export interface RunOutcome {
  status: RunStatus;
  /** Step that halted or failed */
  step?: string;
  error?: Error;
  executed: string[];
  cleanupFailures: CleanupFailure[];
}

export type StepEvent =
  | { type: 'step-start'; step: string; index: number; total: number }
  | { type: 'step-done'; step: string; action: StepAction }
  | { type: 'step-failed'; step: string; error: Error }
  | { type: 'cleanup-start'; step: string }
  | { type: 'cleanup-failed'; step: string; error: Error };

export interface RunOptions {
  signal: AbortSignal;
  logger: Logger;
  /** Halt benignly right after the step with this name */
  haltAfter?: string;
  onEvent?: (event: StepEvent) => void;
}
