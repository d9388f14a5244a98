import { SnapshotExistsError } from '../errors';
import { BuildState } from '../orchestration/state';
import { BuildStep, StepAction, StepContext } from '../orchestration/types';
import { StepDependencies } from './types';

/**
 * Refuses to start when a snapshot with the target name already exists, unless `force` is set,
 * in which case the old snapshots are recorded for removal once the new one exists.
 */
export class PreValidateStep implements BuildStep {
  readonly name = 'pre-validate';
  readonly reads = [] as const;
  readonly writes = ['staleSnapshotIds'] as const;

  constructor(private readonly deps: StepDependencies) {}

  async run(state: BuildState, { logger }: StepContext): Promise<StepAction> {
    const { config, client } = this.deps;
    const snapshotName = config.snapshot_name;

    if (config.skip_snapshot) {
      state.set('staleSnapshotIds', []);
      return 'continue';
    }

    logger.info(`Checking that snapshot name "${snapshotName}" is free`);
    const snapshots = await client.listImages({ type: 'snapshot' });
    const existing = snapshots.filter(image => image.description === snapshotName).map(image => image.id);

    if (existing.length > 0 && !config.force) {
      throw new SnapshotExistsError(snapshotName, existing);
    }
    if (existing.length > 0) {
      logger.warn(`Snapshot "${snapshotName}" exists and will be replaced`, { imageIds: existing });
    }

    state.set('staleSnapshotIds', existing);
    return 'continue';
  }

  async cleanup(): Promise<void> {
    // read-only step
  }
}
