import { MissingStateError } from '../errors';
import { ActionHandle, ImageRecord, ServerRecord } from '../provisioning/types';
import { ConnectionTarget, RemoteSession } from '../transport/types';

export interface SshKeyMaterial {
  privateKey?: string;
  publicKey?: string;
  /** Provider id of the key uploaded by this build */
  keyId?: number;
  /** True only when this build created the key at the provider */
  generated: boolean;
}

export interface ResolvedImage {
  /** Value passed to server creation: an image name or numeric id */
  ref: string;
  id?: number;
}

/**
 * Everything steps hand to each other during one build. Each key is written by exactly one step
 * (server is refreshed by the steps that change its state).
 */
export interface BuildStateShape {
  staleSnapshotIds: number[];
  sshKey: SshKeyMaterial;
  image: ResolvedImage;
  server: ServerRecord;
  createAction: ActionHandle;
  serverCreateFailed: boolean;
  rootPassword: string;
  startupDeadline: number;
  serverTypeUpgraded: boolean;
  connection: ConnectionTarget;
  session: RemoteSession;
  snapshot: ImageRecord;
}

export type StateKey = keyof BuildStateShape;

/**
 * Per-build store. Steps run one at a time, so there is no locking.
 */
export class BuildState {
  private readonly values: Partial<BuildStateShape> = {};

  set<K extends StateKey>(key: K, value: BuildStateShape[K]): void {
    this.values[key] = value;
  }

  get<K extends StateKey>(key: K): BuildStateShape[K] {
    const value: BuildStateShape[K] | undefined = this.values[key];
    if (value === undefined) {
      throw new MissingStateError(key);
    }
    return value;
  }

  getOptional<K extends StateKey>(key: K): BuildStateShape[K] | undefined {
    return this.values[key];
  }

  has(key: StateKey): boolean {
    return this.values[key] !== undefined;
  }

  delete(key: StateKey): void {
    delete this.values[key];
  }
}
