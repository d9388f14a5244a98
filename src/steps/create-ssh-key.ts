import { BuildState } from '../orchestration/state';
import { BuildStep, StepAction, StepContext } from '../orchestration/types';
import { generateSshKeyPair, KeyPairGenerator } from '../provisioning/ssh-keypair';
import { generateKeyName } from '../config/naming';
import { StepDependencies } from './types';

/**
 * Uses the operator's private key when one is configured; otherwise generates a keypair for this
 * build only and registers its public half with the provider.
 */
export class CreateSshKeyStep implements BuildStep {
  readonly name = 'create-ssh-key';
  readonly reads = [] as const;
  readonly writes = ['sshKey'] as const;

  constructor(
    private readonly deps: StepDependencies,
    private readonly generateKeyPair: KeyPairGenerator = generateSshKeyPair
  ) {}

  async run(state: BuildState, { logger }: StepContext): Promise<StepAction> {
    const { config, client } = this.deps;
    const communicator = config.communicator ?? { type: 'ssh' };

    if (communicator.type !== 'ssh') {
      state.set('sshKey', { generated: false });
      return 'continue';
    }

    if (communicator.ssh_private_key) {
      logger.info('Using operator-supplied SSH private key');
      logger.addRedaction(communicator.ssh_private_key);
      state.set('sshKey', { privateKey: communicator.ssh_private_key, generated: false });
      return 'continue';
    }

    const keyName = generateKeyName();
    const pair = this.generateKeyPair(keyName);
    logger.addRedaction(pair.privateKey);

    logger.info(`Creating temporary SSH key ${keyName}`);
    const key = await client.createSshKey(keyName, pair.publicKey, config.ssh_keys_labels ?? {});

    state.set('sshKey', {
      privateKey: pair.privateKey,
      publicKey: pair.publicKey,
      keyId: key.id,
      generated: true
    });
    return 'continue';
  }

  async cleanup(state: BuildState, { logger }: StepContext): Promise<void> {
    const key = state.getOptional('sshKey');
    if (!key?.generated || key.keyId === undefined) {
      return;
    }

    logger.info(`Deleting temporary SSH key ${key.keyId}`);
    await this.deps.client.deleteSshKey(key.keyId);
  }
}
