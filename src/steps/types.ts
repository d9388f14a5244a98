import { Poller } from '../orchestration/polling';
import { CloudClient } from '../provisioning/types';
import { ResolvedBuilderConfig } from '../types';

export interface StepDependencies {
  client: CloudClient;
  config: ResolvedBuilderConfig;
  poller: Poller;
}

export const STEP_NAMES = [
  'pre-validate',
  'create-ssh-key',
  'resolve-image',
  'create-server',
  'wait-for-server',
  'upgrade-server-type',
  'rescue-boot',
  'wait-for-connectivity',
  'provision',
  'power-off',
  'create-snapshot'
] as const;

export type StepName = (typeof STEP_NAMES)[number];
