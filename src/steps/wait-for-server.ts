import { ActionFailedError } from '../errors';
import { BuildState } from '../orchestration/state';
import { BuildStep, StepAction, StepContext } from '../orchestration/types';
import { StepDependencies } from './types';

/**
 * Waits for the create action, then for the server to report running, and records its addresses.
 */
export class WaitForServerStep implements BuildStep {
  readonly name = 'wait-for-server';
  readonly reads = ['server', 'createAction'] as const;
  readonly writes = ['server', 'startupDeadline', 'serverCreateFailed'] as const;

  constructor(private readonly deps: StepDependencies) {}

  async run(state: BuildState, { signal, logger }: StepContext): Promise<StepAction> {
    const { client, poller } = this.deps;
    const server = state.get('server');
    const deadline = poller.deadlineAfter();
    state.set('startupDeadline', deadline);

    logger.info(`Waiting for server ${server.id} to start`);
    try {
      await poller.waitForAction(client, state.get('createAction'), { signal, deadline });
    } catch (error) {
      if (error instanceof ActionFailedError) {
        state.set('serverCreateFailed', true);
      }
      throw error;
    }

    const running = await poller.waitForServerStatus(client, server.id, 'running', { signal, deadline });
    state.set('server', running);
    logger.info(`Server ${running.id} is running`, {
      ipv4: running.publicIPv4,
      ipv6: running.publicIPv6,
      private: running.privateIPs
    });
    return 'continue';
  }

  async cleanup(): Promise<void> {
    // server deletion belongs to create-server
  }
}
