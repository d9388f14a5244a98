import { abortReason, BuildCancelledError, BuildError } from '../errors';
import { BuildState } from './state';
import { BuildStep, CleanupFailure, RunOptions, RunOutcome, StepAction, StepContext } from './types';

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function isCancellation(error: Error): boolean {
  return error instanceof BuildCancelledError;
}

/**
 * Runs steps strictly in order and unwinds every entered step in reverse once the pipeline stops.
 */
export class PipelineRunner {
  constructor(private readonly steps: readonly BuildStep[]) {}

  async run(state: BuildState, options: RunOptions): Promise<RunOutcome> {
    const context: StepContext = { signal: options.signal, logger: options.logger };
    const entered: BuildStep[] = [];
    const outcome: RunOutcome = { status: 'completed', executed: [], cleanupFailures: [] };

    for (const [index, step] of this.steps.entries()) {
      if (options.signal.aborted) {
        const error = abortReason(options.signal);
        options.logger.warn(`Stopping before ${step.name}: ${error.message}`);
        outcome.status = isCancellation(error) ? 'cancelled' : 'failed';
        outcome.error = error;
        break;
      }

      options.onEvent?.({ type: 'step-start', step: step.name, index, total: this.steps.length });
      options.logger.debug(`Running step ${step.name}`);
      entered.push(step);

      let action: StepAction;
      try {
        action = await step.run(state, context);
      } catch (caught) {
        const error = toError(caught);
        options.onEvent?.({ type: 'step-failed', step: step.name, error });
        options.logger.error(`Step ${step.name} failed: ${error.message}`);
        outcome.status = isCancellation(error) ? 'cancelled' : 'failed';
        outcome.step = step.name;
        outcome.error = error;
        break;
      }

      outcome.executed.push(step.name);
      options.onEvent?.({ type: 'step-done', step: step.name, action });

      if (action === 'halt') {
        options.logger.warn(`Step ${step.name} halted the build`);
        outcome.status = 'halted';
        outcome.step = step.name;
        break;
      }

      if (options.haltAfter === step.name) {
        options.logger.warn(`Halting after ${step.name} as requested`);
        outcome.status = 'halted';
        outcome.step = step.name;
        break;
      }
    }

    // compensation must finish even when the build itself was aborted
    const cleanupContext: StepContext = { signal: new AbortController().signal, logger: options.logger };
    outcome.cleanupFailures = await this.unwind(entered, state, cleanupContext, options);
    return outcome;
  }

  private async unwind(
    entered: BuildStep[],
    state: BuildState,
    context: StepContext,
    options: RunOptions
  ): Promise<CleanupFailure[]> {
    const failures: CleanupFailure[] = [];

    for (const step of [...entered].reverse()) {
      options.onEvent?.({ type: 'cleanup-start', step: step.name });
      try {
        await step.cleanup(state, context);
      } catch (caught) {
        const error = toError(caught);
        failures.push({ step: step.name, error });
        options.onEvent?.({ type: 'cleanup-failed', step: step.name, error });
        options.logger.error(`Cleanup of ${step.name} failed: ${error.message}`, {
          code: error instanceof BuildError ? error.code : undefined
        });
      }
    }

    return failures;
  }
}
