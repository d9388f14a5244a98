import { abortReason, ActionFailedError, PollTimeoutError, ProviderRequestError } from '../errors';
import { Logger } from '../logging/logger';
import { ActionHandle, ActionStatus, CloudClient, ServerRecord, ServerStatus } from '../provisioning/types';

export type Clock = () => number;
export type Sleeper = (ms: number, signal: AbortSignal) => Promise<void>;

export type PollProbe<T> = { done: true; value: T } | { done: false };

export const DEFAULT_POLL_INTERVAL_MS = 500;
export const DEFAULT_ACTION_TIMEOUT_MS = 10 * 60 * 1000;

/**
 * setTimeout that rejects with the signal's reason as soon as the build is aborted.
 */
export const abortableSleep: Sleeper = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });

export interface PollerOptions {
  intervalMs?: number;
  actionTimeoutMs?: number;
  now?: Clock;
  sleep?: Sleeper;
  logger?: Logger;
}

export interface PollOptions {
  description: string;
  signal: AbortSignal;
  /** Absolute deadline (per the poller's clock); overrides timeoutMs */
  deadline?: number;
  timeoutMs?: number;
  intervalMs?: number;
  onTimeout?: (budgetMs: number) => Error;
}

/**
 * The single wait-and-query loop every step uses. One interval for the whole build.
 */
export class Poller {
  readonly intervalMs: number;
  readonly actionTimeoutMs: number;
  readonly now: Clock;
  private readonly sleep: Sleeper;
  private readonly logger?: Logger;

  constructor(options: PollerOptions = {}) {
    this.intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.actionTimeoutMs = options.actionTimeoutMs ?? DEFAULT_ACTION_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? abortableSleep;
    this.logger = options.logger;
  }

  deadlineAfter(timeoutMs: number = this.actionTimeoutMs): number {
    return this.now() + timeoutMs;
  }

  async until<T>(probe: () => Promise<PollProbe<T>>, options: PollOptions): Promise<T> {
    const start = this.now();
    const deadline = options.deadline ?? start + (options.timeoutMs ?? this.actionTimeoutMs);
    const budget = Math.max(0, deadline - start);
    const interval = options.intervalMs ?? this.intervalMs;

    for (;;) {
      if (options.signal.aborted) {
        throw abortReason(options.signal);
      }

      const result = await probe();
      if (result.done) {
        return result.value;
      }

      const remaining = deadline - this.now();
      if (remaining <= 0) {
        throw options.onTimeout ? options.onTimeout(budget) : new PollTimeoutError(options.description, budget);
      }
      await this.sleep(Math.min(interval, remaining), options.signal);
    }
  }

  async waitForAction(client: CloudClient, action: ActionHandle, options: Omit<PollOptions, 'description'>): Promise<ActionStatus> {
    const description = `action ${action.id} (${action.command})`;
    return this.until<ActionStatus>(async () => {
      const status = await client.getAction(action.id);
      if (status.state === 'failed') {
        throw new ActionFailedError(action.id, status.error?.message ?? `${action.command} failed`, status.error?.code);
      }
      if (status.state === 'succeeded') {
        return { done: true, value: status };
      }
      this.logger?.debug(`Waiting for ${description}`, { progress: status.progress });
      return { done: false };
    }, { ...options, description });
  }

  async waitForServerStatus(
    client: CloudClient,
    serverId: number,
    wanted: ServerStatus,
    options: Omit<PollOptions, 'description'>
  ): Promise<ServerRecord> {
    return this.until<ServerRecord>(async () => {
      const server = await client.getServer(serverId);
      if (!server) {
        throw new ProviderRequestError('get server', 404, `server ${serverId} no longer exists`, 'not_found');
      }
      return server.status === wanted ? { done: true, value: server } : { done: false };
    }, { ...options, description: `server ${serverId} to be ${wanted}` });
  }
}
