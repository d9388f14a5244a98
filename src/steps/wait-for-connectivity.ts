import { ConnectivityTimeoutError, MissingStateError } from '../errors';
import { BuildState } from '../orchestration/state';
import { BuildStep, StepAction, StepContext } from '../orchestration/types';
import { ServerRecord } from '../provisioning/types';
import { ConnectionAuth, ConnectionTarget, RemoteSession, SessionTransport } from '../transport/types';
import { CommunicatorConfig } from '../types';
import { StepDependencies } from './types';

export const DEFAULT_CONNECT_TIMEOUT_MS = 5 * 60 * 1000;
export const DEFAULT_CONNECT_RETRY_MS = 5000;

export function serverAddress(server: ServerRecord): string | undefined {
  return server.publicIPv4 ?? server.publicIPv6 ?? server.privateIPs[0];
}

export function buildConnectionTarget(
  communicator: CommunicatorConfig,
  host: string,
  state: BuildState
): ConnectionTarget {
  if (communicator.type === 'winrm') {
    const useTls = communicator.winrm_use_ssl ?? false;
    return {
      protocol: 'winrm',
      host,
      port: communicator.port ?? (useTls ? 5986 : 5985),
      username: communicator.username ?? 'Administrator',
      auth: communicator.password ? { kind: 'password', password: communicator.password } : { kind: 'none' },
      useTls
    };
  }

  const key = state.getOptional('sshKey');
  const rootPassword = state.getOptional('rootPassword');
  let auth: ConnectionAuth = { kind: 'none' };
  if (key?.privateKey) {
    auth = { kind: 'ssh-key', privateKey: key.privateKey };
  } else if (rootPassword) {
    auth = { kind: 'password', password: rootPassword };
  }

  return {
    protocol: communicator.type,
    host,
    port: communicator.port ?? 22,
    username: communicator.username ?? 'root',
    auth
  };
}

/**
 * Publishes the connection target and, unless the communicator is `none`, keeps trying the
 * transport until it connects or the connect window closes.
 */
export class WaitForConnectivityStep implements BuildStep {
  readonly name = 'wait-for-connectivity';
  readonly reads = ['server'] as const;
  readonly writes = ['connection', 'session'] as const;

  constructor(
    private readonly deps: StepDependencies,
    private readonly transport: SessionTransport
  ) {}

  async run(state: BuildState, { signal, logger }: StepContext): Promise<StepAction> {
    const { config, poller } = this.deps;
    const communicator: CommunicatorConfig = config.communicator ?? { type: 'ssh' };

    const server = state.get('server');
    const host = serverAddress(server);
    if (!host) {
      throw new MissingStateError('server.address');
    }

    const target = buildConnectionTarget(communicator, host, state);
    if (target.auth.kind === 'password') {
      logger.addRedaction(target.auth.password);
    }
    state.set('connection', target);

    if (communicator.type === 'none') {
      logger.info(`Server address is ${host}; no communicator configured`);
      return 'continue';
    }

    const timeoutMs = communicator.timeout ?? DEFAULT_CONNECT_TIMEOUT_MS;
    let lastError: unknown;
    logger.info(`Waiting for ${target.protocol} on ${host}:${target.port}`);

    const session = await poller.until<RemoteSession>(async () => {
      try {
        return { done: true, value: await this.transport.connect(target, signal) };
      } catch (error) {
        if (signal.aborted) throw error;
        lastError = error;
        logger.debug(`Connection attempt failed: ${error instanceof Error ? error.message : String(error)}`);
        return { done: false };
      }
    }, {
      description: `${host}:${target.port}`,
      signal,
      timeoutMs,
      intervalMs: communicator.retry_interval ?? DEFAULT_CONNECT_RETRY_MS,
      onTimeout: budget => new ConnectivityTimeoutError(host, target.port, budget, lastError)
    });

    state.set('session', session);
    logger.info(`Connected to ${host}:${target.port}`);
    return 'continue';
  }

  async cleanup(state: BuildState): Promise<void> {
    const session = state.getOptional('session');
    if (!session) {
      return;
    }
    state.delete('session');
    await session.close();
  }
}
