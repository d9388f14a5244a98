// Cloud control-plane contract consumed by the build steps

export type ServerStatus =
  | 'creating'
  | 'starting'
  | 'running'
  | 'stopping'
  | 'stopped'
  | 'deleted'
  | 'unknown';

export interface ServerRecord {
  id: number;
  name: string;
  status: ServerStatus;
  serverType: string;
  publicIPv4?: string;
  publicIPv6?: string;
  privateIPs: string[];
}

export interface ActionHandle {
  id: number;
  command: string;
}

export type ActionState = 'in-progress' | 'succeeded' | 'failed';

export interface ActionStatus {
  id: number;
  state: ActionState;
  progress: number;
  error?: { code: string; message: string };
}

export interface SshKeyRecord {
  id: number;
  name: string;
  publicKey: string;
}

export interface ImageRecord {
  id: number;
  name?: string;
  description: string;
  type: string;
  architecture?: string;
  created: string;
  labels: Record<string, string>;
}

export interface ServerTypeRecord {
  name: string;
  architecture: string;
}

export interface CreateServerRequest {
  name: string;
  serverType: string;
  image: string;
  location: string;
  labels: Record<string, string>;
  userData?: string;
  sshKeys: string[];
  networks: number[];
  firewalls: number[];
  volumes: number[];
  publicNet: {
    enableIPv4: boolean;
    enableIPv6: boolean;
    ipv4?: number;
    ipv6?: number;
  };
}

export interface CreateServerResult {
  server: ServerRecord;
  action: ActionHandle;
  rootPassword?: string;
}

export interface ImageQuery {
  labelSelector?: string;
  type?: 'system' | 'snapshot' | 'backup' | 'app';
  architecture?: string;
}

export interface CreateImageRequest {
  description: string;
  labels: Record<string, string>;
}

export interface CreateImageResult {
  image: ImageRecord;
  action: ActionHandle;
}

export interface RescueRequest {
  type: string;
  sshKeyIds: number[];
}

export interface RescueResult {
  action: ActionHandle;
  rootPassword?: string;
}

/**
 * The client holds no per-build state, so one instance may serve concurrent builds.
 */
export interface CloudClient {
  createServer(request: CreateServerRequest): Promise<CreateServerResult>;
  getServer(id: number): Promise<ServerRecord | undefined>;
  deleteServer(id: number): Promise<void>;

  createSshKey(name: string, publicKey: string, labels: Record<string, string>): Promise<SshKeyRecord>;
  /** Looks a key up by numeric id or by name */
  getSshKey(nameOrId: string): Promise<SshKeyRecord | undefined>;
  deleteSshKey(id: number): Promise<void>;

  listImages(query: ImageQuery): Promise<ImageRecord[]>;
  deleteImage(id: number): Promise<void>;
  getServerType(name: string): Promise<ServerTypeRecord>;

  shutdown(serverId: number): Promise<ActionHandle>;
  powerOff(serverId: number): Promise<ActionHandle>;
  powerOn(serverId: number): Promise<ActionHandle>;
  reboot(serverId: number): Promise<ActionHandle>;
  enableRescue(serverId: number, request: RescueRequest): Promise<RescueResult>;
  changeType(serverId: number, serverType: string, upgradeDisk: boolean): Promise<ActionHandle>;
  createImage(serverId: number, request: CreateImageRequest): Promise<CreateImageResult>;

  getAction(id: number): Promise<ActionStatus>;
}
