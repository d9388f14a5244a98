import { BuildState } from '../orchestration/state';
import { BuildStep, StepAction, StepContext } from '../orchestration/types';
import { StepDependencies } from './types';

/**
 * Images the stopped server. Restores the original server type first when it was upgraded, and
 * removes snapshots that `force` marked as replaced once the new one exists.
 */
export class CreateSnapshotStep implements BuildStep {
  readonly name = 'create-snapshot';
  readonly reads = ['server', 'staleSnapshotIds'] as const;
  readonly writes = ['snapshot'] as const;

  constructor(private readonly deps: StepDependencies) {}

  async run(state: BuildState, { signal, logger }: StepContext): Promise<StepAction> {
    const { client, poller, config } = this.deps;
    const server = state.get('server');

    if (state.getOptional('serverTypeUpgraded')) {
      logger.info(`Restoring server ${server.id} to ${config.server_type}`);
      await poller.waitForAction(client, await client.changeType(server.id, config.server_type, false), { signal });
    }

    logger.info(`Creating snapshot "${config.snapshot_name}" from server ${server.id}`);
    const result = await client.createImage(server.id, {
      description: config.snapshot_name,
      labels: config.snapshot_labels ?? {}
    });
    await poller.waitForAction(client, result.action, { signal });
    state.set('snapshot', result.image);
    logger.info(`Snapshot ${result.image.id} created`);

    for (const imageId of state.get('staleSnapshotIds')) {
      try {
        await client.deleteImage(imageId);
        logger.info(`Deleted replaced snapshot ${imageId}`);
      } catch (error) {
        logger.warn(`Could not delete replaced snapshot ${imageId}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
    return 'continue';
  }

  async cleanup(): Promise<void> {
    // the snapshot is the build's artifact and is never removed
  }
}
