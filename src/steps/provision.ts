import { BuildState } from '../orchestration/state';
import { BuildStep, StepAction, StepContext } from '../orchestration/types';
import { Provisioner } from '../transport/types';

/**
 * Hands the connected session to the external provisioning phase.
 */
export class ProvisionStep implements BuildStep {
  readonly name = 'provision';
  readonly reads = ['session'] as const;
  readonly writes = [] as const;

  constructor(private readonly provisioner: Provisioner) {}

  async run(state: BuildState, { signal, logger }: StepContext): Promise<StepAction> {
    const session = state.get('session');

    logger.info(`Provisioning ${session.target.host}`);
    await this.provisioner.provision(session, signal);
    return 'continue';
  }

  async cleanup(): Promise<void> {
    // the provisioner owns whatever it changed inside the machine
  }
}
