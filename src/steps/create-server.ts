import { BuildState } from '../orchestration/state';
import { BuildStep, StepAction, StepContext } from '../orchestration/types';
import { CreateServerRequest } from '../provisioning/types';
import { StepDependencies } from './types';

/**
 * Submits the server. Deleting it is this step's compensation, skipped when `keep_server` is set
 * or when the provider reported that creation itself failed.
 */
export class CreateServerStep implements BuildStep {
  readonly name = 'create-server';
  readonly reads = ['image', 'sshKey'] as const;
  readonly writes = ['server', 'createAction'] as const;

  constructor(private readonly deps: StepDependencies) {}

  buildRequest(state: BuildState): CreateServerRequest {
    const { config } = this.deps;
    const key = state.get('sshKey');
    const image = state.get('image');

    return {
      name: config.server_name,
      serverType: config.server_type,
      image: image.ref,
      location: config.location,
      labels: config.server_labels ?? {},
      userData: config.user_data || undefined,
      sshKeys: [...(config.ssh_keys ?? []), ...(key.keyId !== undefined ? [String(key.keyId)] : [])],
      networks: config.networks ?? [],
      firewalls: config.firewalls ?? [],
      volumes: config.volumes ?? [],
      publicNet: {
        enableIPv4: !config.public_ipv4_disabled,
        enableIPv6: !config.public_ipv6_disabled,
        ipv4: config.public_ipv4,
        ipv6: config.public_ipv6
      }
    };
  }

  async run(state: BuildState, { logger }: StepContext): Promise<StepAction> {
    const request = this.buildRequest(state);

    logger.info(`Creating server ${request.name} (${request.serverType} in ${request.location})`);
    const result = await this.deps.client.createServer(request);

    state.set('server', result.server);
    state.set('createAction', result.action);
    if (result.rootPassword) {
      logger.addRedaction(result.rootPassword);
      state.set('rootPassword', result.rootPassword);
    }

    logger.debug(`Server ${result.server.id} submitted`, { action: result.action.id });
    return 'continue';
  }

  async cleanup(state: BuildState, { logger }: StepContext): Promise<void> {
    const server = state.getOptional('server');
    if (!server) {
      return;
    }
    if (state.getOptional('serverCreateFailed')) {
      logger.warn(`Server ${server.id} was never created by the provider, nothing to delete`);
      return;
    }
    if (this.deps.config.keep_server) {
      logger.info(`Keeping server ${server.name} (${server.id})`);
      return;
    }

    logger.info(`Deleting server ${server.name} (${server.id})`);
    await this.deps.client.deleteServer(server.id);
  }
}
