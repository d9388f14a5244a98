import { ProviderRequestError } from '../errors';
import {
  ActionHandle,
  ActionState,
  ActionStatus,
  CloudClient,
  CreateImageRequest,
  CreateImageResult,
  CreateServerRequest,
  CreateServerResult,
  ImageQuery,
  ImageRecord,
  RescueRequest,
  RescueResult,
  ServerRecord,
  ServerStatus,
  ServerTypeRecord,
  SshKeyRecord
} from './types';

export const HCLOUD_ENDPOINT = 'https://api.hetzner.cloud/v1';

type HttpMethod = 'GET' | 'POST' | 'DELETE';

interface ApiAction {
  id: number;
  command: string;
  status: 'running' | 'success' | 'error';
  progress: number;
  error: { code: string; message: string } | null;
}

interface ApiServer {
  id: number;
  name: string;
  status: string;
  server_type: { name: string };
  public_net: {
    ipv4: { ip: string } | null;
    ipv6: { ip: string } | null;
  };
  private_net: Array<{ ip: string }>;
}

interface ApiImage {
  id: number;
  name: string | null;
  description: string;
  type: string;
  architecture?: string;
  created: string;
  labels: Record<string, string>;
}

interface ApiSshKey {
  id: number;
  name: string;
  public_key: string;
}

interface ApiPagination {
  meta?: { pagination?: { next_page: number | null } };
}

export interface HcloudClientOptions {
  token: string;
  endpoint?: string;
  fetch?: typeof fetch;
  perPage?: number;
}

const SERVER_STATUS: Record<string, ServerStatus> = {
  initializing: 'creating',
  starting: 'starting',
  running: 'running',
  stopping: 'stopping',
  off: 'stopped',
  deleting: 'deleted'
};

const ACTION_STATE: Record<ApiAction['status'], ActionState> = {
  running: 'in-progress',
  success: 'succeeded',
  error: 'failed'
};

/**
 * Hetzner Cloud implementation of the control-plane contract, over the public REST API.
 */
export class HcloudClient implements CloudClient {
  private readonly token: string;
  private readonly endpoint: string;
  private readonly fetchImpl: typeof fetch;
  private readonly perPage: number;

  constructor(options: HcloudClientOptions) {
    this.token = options.token;
    this.endpoint = (options.endpoint || HCLOUD_ENDPOINT).replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? fetch;
    this.perPage = options.perPage ?? 50;
  }

  async createServer(request: CreateServerRequest): Promise<CreateServerResult> {
    const body = {
      name: request.name,
      server_type: request.serverType,
      image: request.image,
      location: request.location,
      labels: request.labels,
      user_data: request.userData,
      ssh_keys: request.sshKeys,
      networks: request.networks,
      firewalls: request.firewalls.map(firewall => ({ firewall })),
      volumes: request.volumes,
      public_net: {
        enable_ipv4: request.publicNet.enableIPv4,
        enable_ipv6: request.publicNet.enableIPv6,
        ipv4: request.publicNet.ipv4,
        ipv6: request.publicNet.ipv6
      },
      start_after_create: true
    };

    const result = await this.request<{ server: ApiServer; action: ApiAction; root_password: string | null }>(
      'create server', 'POST', '/servers', body
    );

    return {
      server: toServerRecord(result.server),
      action: toHandle(result.action),
      rootPassword: result.root_password ?? undefined
    };
  }

  async getServer(id: number): Promise<ServerRecord | undefined> {
    try {
      const result = await this.request<{ server: ApiServer }>('get server', 'GET', `/servers/${id}`);
      return toServerRecord(result.server);
    } catch (error) {
      if (error instanceof ProviderRequestError && error.status === 404) {
        return undefined;
      }
      throw error;
    }
  }

  async deleteServer(id: number): Promise<void> {
    await this.send('delete server', 'DELETE', `/servers/${id}`);
  }

  async createSshKey(name: string, publicKey: string, labels: Record<string, string>): Promise<SshKeyRecord> {
    const result = await this.request<{ ssh_key: ApiSshKey }>('create ssh key', 'POST', '/ssh_keys', {
      name,
      public_key: publicKey,
      labels
    });
    return toSshKeyRecord(result.ssh_key);
  }

  async getSshKey(nameOrId: string): Promise<SshKeyRecord | undefined> {
    if (/^\d+$/.test(nameOrId)) {
      try {
        const result = await this.request<{ ssh_key: ApiSshKey }>('get ssh key', 'GET', `/ssh_keys/${nameOrId}`);
        return toSshKeyRecord(result.ssh_key);
      } catch (error) {
        if (error instanceof ProviderRequestError && error.status === 404) {
          return undefined;
        }
        throw error;
      }
    }

    const params = new URLSearchParams({ name: nameOrId });
    const result = await this.request<{ ssh_keys: ApiSshKey[] }>('get ssh key', 'GET', `/ssh_keys?${params.toString()}`);
    const key = result.ssh_keys.find(candidate => candidate.name === nameOrId);
    return key ? toSshKeyRecord(key) : undefined;
  }

  async deleteSshKey(id: number): Promise<void> {
    await this.send('delete ssh key', 'DELETE', `/ssh_keys/${id}`);
  }

  async listImages(query: ImageQuery): Promise<ImageRecord[]> {
    const images: ImageRecord[] = [];
    let page: number | null = 1;

    while (page !== null) {
      const params = new URLSearchParams({ page: String(page), per_page: String(this.perPage) });
      if (query.labelSelector) params.set('label_selector', query.labelSelector);
      if (query.type) params.set('type', query.type);
      if (query.architecture) params.set('architecture', query.architecture);

      const result: { images: ApiImage[] } & ApiPagination = await this.request<{ images: ApiImage[] } & ApiPagination>(
        'list images', 'GET', `/images?${params.toString()}`
      );
      images.push(...result.images.map(toImageRecord));
      page = result.meta?.pagination?.next_page ?? null;
    }

    return images;
  }

  async deleteImage(id: number): Promise<void> {
    await this.send('delete image', 'DELETE', `/images/${id}`);
  }

  async getServerType(name: string): Promise<ServerTypeRecord> {
    const params = new URLSearchParams({ name });
    const result = await this.request<{ server_types: Array<{ name: string; architecture: string }> }>(
      'get server type', 'GET', `/server_types?${params.toString()}`
    );
    const serverType = result.server_types.find(candidate => candidate.name === name);
    if (!serverType) {
      throw new ProviderRequestError('get server type', 404, `server type ${name} not found`, 'not_found');
    }
    return { name: serverType.name, architecture: serverType.architecture };
  }

  async shutdown(serverId: number): Promise<ActionHandle> {
    return this.serverAction(serverId, 'shutdown');
  }

  async powerOff(serverId: number): Promise<ActionHandle> {
    return this.serverAction(serverId, 'poweroff');
  }

  async powerOn(serverId: number): Promise<ActionHandle> {
    return this.serverAction(serverId, 'poweron');
  }

  async reboot(serverId: number): Promise<ActionHandle> {
    return this.serverAction(serverId, 'reboot');
  }

  async enableRescue(serverId: number, request: RescueRequest): Promise<RescueResult> {
    const result = await this.request<{ action: ApiAction; root_password: string | null }>(
      'enable rescue', 'POST', `/servers/${serverId}/actions/enable_rescue`,
      { type: request.type, ssh_keys: request.sshKeyIds }
    );
    return { action: toHandle(result.action), rootPassword: result.root_password ?? undefined };
  }

  async changeType(serverId: number, serverType: string, upgradeDisk: boolean): Promise<ActionHandle> {
    return this.serverAction(serverId, 'change_type', { server_type: serverType, upgrade_disk: upgradeDisk });
  }

  async createImage(serverId: number, request: CreateImageRequest): Promise<CreateImageResult> {
    const result = await this.request<{ image: ApiImage; action: ApiAction }>(
      'create image', 'POST', `/servers/${serverId}/actions/create_image`,
      { description: request.description, type: 'snapshot', labels: request.labels }
    );
    return { image: toImageRecord(result.image), action: toHandle(result.action) };
  }

  async getAction(id: number): Promise<ActionStatus> {
    const result = await this.request<{ action: ApiAction }>('get action', 'GET', `/actions/${id}`);
    return {
      id: result.action.id,
      state: ACTION_STATE[result.action.status],
      progress: result.action.progress,
      error: result.action.error ?? undefined
    };
  }

  private async serverAction(serverId: number, action: string, body: unknown = {}): Promise<ActionHandle> {
    const result = await this.request<{ action: ApiAction }>(
      action.replace('_', ' '), 'POST', `/servers/${serverId}/actions/${action}`, body
    );
    return toHandle(result.action);
  }

  private async request<T>(operation: string, method: HttpMethod, path: string, body?: unknown): Promise<T> {
    const res = await this.send(operation, method, path, body);
    return (await res.json()) as T;
  }

  private async send(operation: string, method: HttpMethod, path: string, body?: unknown): Promise<Response> {
    let res: Response;
    try {
      res = await this.fetchImpl(`${this.endpoint}${path}`, {
        method,
        headers: {
          Authorization: `Bearer ${this.token}`,
          'Content-Type': 'application/json'
        },
        body: body === undefined ? undefined : JSON.stringify(body)
      });
    } catch (error) {
      throw new ProviderRequestError(operation, 0, error instanceof Error ? error.message : String(error));
    }

    if (!res.ok) {
      const apiError = parseApiError(await res.text());
      throw new ProviderRequestError(operation, res.status, apiError.message, apiError.code);
    }

    return res;
  }
}

function parseApiError(bodyText: string): { code?: string; message: string } {
  try {
    const parsed: unknown = JSON.parse(bodyText);
    if (isRecord(parsed) && isRecord(parsed.error)) {
      const code = typeof parsed.error.code === 'string' ? parsed.error.code : undefined;
      const message = typeof parsed.error.message === 'string' ? parsed.error.message : bodyText;
      return { code, message };
    }
  } catch {
    // not JSON; fall through to the raw body
  }
  return { message: bodyText };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toHandle(action: ApiAction): ActionHandle {
  return { id: action.id, command: action.command };
}

function toSshKeyRecord(key: ApiSshKey): SshKeyRecord {
  return { id: key.id, name: key.name, publicKey: key.public_key };
}

function toServerRecord(server: ApiServer): ServerRecord {
  return {
    id: server.id,
    name: server.name,
    status: SERVER_STATUS[server.status] ?? 'unknown',
    serverType: server.server_type.name,
    publicIPv4: server.public_net.ipv4?.ip,
    publicIPv6: server.public_net.ipv6 ? hostAddressOf(server.public_net.ipv6.ip) : undefined,
    privateIPs: server.private_net.map(net => net.ip)
  };
}

/**
 * The API reports the server's IPv6 network; the host takes the first address in it.
 */
export function hostAddressOf(network: string): string {
  const prefix = network.split('/')[0] ?? network;
  return prefix.endsWith('::') ? `${prefix}1` : prefix;
}

function toImageRecord(image: ApiImage): ImageRecord {
  return {
    id: image.id,
    name: image.name ?? undefined,
    description: image.description,
    type: image.type,
    architecture: image.architecture,
    created: image.created,
    labels: image.labels
  };
}
