import { ProviderRequestError } from '../errors';
import { BuildState } from '../orchestration/state';
import { BuildStep, StepAction, StepContext } from '../orchestration/types';
import { StepDependencies } from './types';

/**
 * Enables the requested rescue system and reboots into it. The rescue system gets the build key and
 * every key named in `ssh_keys`. The wait either gets a fresh action timeout or only what is left of
 * the startup wait, per `rescue_poll_budget`.
 */
export class RescueBootStep implements BuildStep {
  readonly name = 'rescue-boot';
  readonly reads = ['server', 'sshKey', 'startupDeadline'] as const;
  readonly writes = ['server', 'rootPassword'] as const;

  constructor(private readonly deps: StepDependencies) {}

  async run(state: BuildState, { signal, logger }: StepContext): Promise<StepAction> {
    const { client, poller, config } = this.deps;
    if (!config.rescue) {
      return 'continue';
    }

    const server = state.get('server');
    const key = state.get('sshKey');
    const deadline = config.rescue_poll_budget === 'remaining'
      ? state.get('startupDeadline')
      : poller.deadlineAfter();

    const sshKeyIds = await this.resolveKeyIds(config.ssh_keys ?? []);
    if (key.keyId !== undefined && !sshKeyIds.includes(key.keyId)) {
      sshKeyIds.push(key.keyId);
    }

    logger.info(`Enabling rescue system ${config.rescue} on server ${server.id}`);
    const rescue = await client.enableRescue(server.id, { type: config.rescue, sshKeyIds });
    if (rescue.rootPassword) {
      logger.addRedaction(rescue.rootPassword);
      state.set('rootPassword', rescue.rootPassword);
    }
    await poller.waitForAction(client, rescue.action, { signal, deadline });

    logger.info(`Rebooting server ${server.id} into rescue mode`);
    await poller.waitForAction(client, await client.reboot(server.id), { signal, deadline });

    const rebooted = await poller.waitForServerStatus(client, server.id, 'running', { signal, deadline });
    state.set('server', rebooted);
    return 'continue';
  }

  private async resolveKeyIds(refs: string[]): Promise<number[]> {
    const ids: number[] = [];
    for (const ref of refs) {
      const key = await this.deps.client.getSshKey(ref);
      if (!key) {
        throw new ProviderRequestError('get ssh key', 404, `ssh key ${ref} not found`, 'not_found');
      }
      ids.push(key.id);
    }
    return ids;
  }

  async cleanup(): Promise<void> {
    // rescue mode ends with the server
  }
}
