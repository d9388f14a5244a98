import { ActionFailedError, PollTimeoutError } from '../errors';
import { BuildState } from '../orchestration/state';
import { BuildStep, StepAction, StepContext } from '../orchestration/types';
import { ServerRecord } from '../provisioning/types';
import { StepDependencies } from './types';

/**
 * Asks the guest to shut down and falls back to a hard power-off when it does not stop in time.
 */
export class PowerOffStep implements BuildStep {
  readonly name = 'power-off';
  readonly reads = ['server'] as const;
  readonly writes = ['server'] as const;

  constructor(private readonly deps: StepDependencies) {}

  async run(state: BuildState, { signal, logger }: StepContext): Promise<StepAction> {
    const server = state.get('server');
    if (server.status === 'stopped') {
      return 'continue';
    }

    logger.info(`Shutting down server ${server.id}`);
    let stopped: ServerRecord;
    try {
      stopped = await this.shutdown(server.id, signal);
    } catch (error) {
      if (!(error instanceof PollTimeoutError || error instanceof ActionFailedError)) {
        throw error;
      }
      logger.warn(`Graceful shutdown did not complete (${error.message}), forcing power off`);
      stopped = await this.forcePowerOff(server.id, signal);
    }

    state.set('server', stopped);
    return 'continue';
  }

  async cleanup(): Promise<void> {
    // a stopped server is deleted or kept by create-server
  }

  private async shutdown(serverId: number, signal: AbortSignal): Promise<ServerRecord> {
    const { client, poller } = this.deps;
    const deadline = poller.deadlineAfter();
    await poller.waitForAction(client, await client.shutdown(serverId), { signal, deadline });
    return poller.waitForServerStatus(client, serverId, 'stopped', { signal, deadline });
  }

  private async forcePowerOff(serverId: number, signal: AbortSignal): Promise<ServerRecord> {
    const { client, poller } = this.deps;
    const deadline = poller.deadlineAfter();
    await poller.waitForAction(client, await client.powerOff(serverId), { signal, deadline });
    return poller.waitForServerStatus(client, serverId, 'stopped', { signal, deadline });
  }
}
