import { BuildState } from '../orchestration/state';
import { BuildStep, StepAction, StepContext } from '../orchestration/types';
import { StepDependencies } from './types';

/**
 * Moves the running server to `upgrade_server_type` (disk untouched) so provisioning runs on a
 * larger machine. create-snapshot moves it back before imaging.
 */
export class UpgradeServerTypeStep implements BuildStep {
  readonly name = 'upgrade-server-type';
  readonly reads = ['server'] as const;
  readonly writes = ['server', 'serverTypeUpgraded'] as const;

  constructor(private readonly deps: StepDependencies) {}

  async run(state: BuildState, { signal, logger }: StepContext): Promise<StepAction> {
    const { client, poller, config } = this.deps;
    const target = config.upgrade_server_type;
    if (!target) {
      return 'continue';
    }

    const server = state.get('server');
    logger.info(`Upgrading server ${server.id} from ${server.serverType} to ${target}`);

    await poller.waitForAction(client, await client.powerOff(server.id), { signal });
    await poller.waitForServerStatus(client, server.id, 'stopped', { signal });

    await poller.waitForAction(client, await client.changeType(server.id, target, false), { signal });
    state.set('serverTypeUpgraded', true);

    await poller.waitForAction(client, await client.powerOn(server.id), { signal });
    state.set('server', await poller.waitForServerStatus(client, server.id, 'running', { signal }));
    return 'continue';
  }

  async cleanup(): Promise<void> {
    // the server type is reverted by create-snapshot; a deleted server needs nothing
  }
}
