// Error taxonomy shared by the orchestrator, the steps and the cloud client

export type BuildErrorCode =
  | 'VALIDATION_FAILED'
  | 'PROVIDER_REQUEST_FAILED'
  | 'ACTION_FAILED'
  | 'POLL_TIMEOUT'
  | 'NO_MATCHING_IMAGE'
  | 'AMBIGUOUS_IMAGE'
  | 'CONNECTIVITY_TIMEOUT'
  | 'MISSING_STATE'
  | 'SNAPSHOT_EXISTS'
  | 'BUILD_CANCELLED'
  | 'BUILD_TIMEOUT';

export class BuildError extends Error {
  readonly code: BuildErrorCode;
  readonly remediation?: string;

  constructor(code: BuildErrorCode, message: string, options: { remediation?: string; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.remediation = options.remediation;
  }
}

export class ValidationError extends BuildError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super('VALIDATION_FAILED', `Configuration validation failed:\n${errors.join('\n')}`, {
      remediation: 'Fix the listed configuration entries and run the build again'
    });
    this.errors = errors;
  }
}

export class SnapshotExistsError extends BuildError {
  constructor(snapshotName: string, imageIds: number[]) {
    super('SNAPSHOT_EXISTS', `Snapshot "${snapshotName}" already exists (image ${imageIds.join(', ')})`, {
      remediation: 'Choose another snapshot_name or set force: true to replace the existing snapshot'
    });
  }
}

/**
 * The control plane rejected a request. Never retried.
 */
export class ProviderRequestError extends BuildError {
  readonly status: number;
  readonly providerCode?: string;

  constructor(operation: string, status: number, message: string, providerCode?: string) {
    super('PROVIDER_REQUEST_FAILED', `${operation} failed: HTTP ${status}${providerCode ? ` (${providerCode})` : ''}: ${message}`, {
      remediation: status === 401 ? 'Check that the API token is valid and has read/write access' : undefined
    });
    this.status = status;
    this.providerCode = providerCode;
  }
}

/**
 * An asynchronous provider operation finished in the failed state. The message is the provider's own.
 */
export class ActionFailedError extends BuildError {
  readonly actionId: number;
  readonly providerCode?: string;

  constructor(actionId: number, message: string, providerCode?: string) {
    super('ACTION_FAILED', message);
    this.actionId = actionId;
    this.providerCode = providerCode;
  }
}

export class PollTimeoutError extends BuildError {
  readonly timeoutMs: number;

  constructor(description: string, timeoutMs: number) {
    super('POLL_TIMEOUT', `Timed out after ${timeoutMs}ms waiting for ${description}`, {
      remediation: 'Raise action_timeout if the provider is slow, or check the provider status page'
    });
    this.timeoutMs = timeoutMs;
  }
}

export class NoMatchingImageError extends BuildError {
  constructor(selector: string) {
    super('NO_MATCHING_IMAGE', `No image matches selector "${selector}"`, {
      remediation: 'Check image_filter.with_selector against the labels of your images'
    });
  }
}

export class AmbiguousImageError extends BuildError {
  constructor(selector: string, count: number) {
    super('AMBIGUOUS_IMAGE', `${count} images match selector "${selector}"`, {
      remediation: 'Narrow image_filter.with_selector or set image_filter.most_recent: true'
    });
  }
}

export class ConnectivityTimeoutError extends BuildError {
  constructor(address: string, port: number, timeoutMs: number, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super('CONNECTIVITY_TIMEOUT', `${address}:${port} not reachable within ${timeoutMs}ms${reason}`, {
      remediation: 'Check firewalls attached to the server and communicator.timeout',
      cause
    });
  }
}

export class MissingStateError extends BuildError {
  readonly key: string;

  constructor(key: string) {
    super('MISSING_STATE', `Build state "${key}" is not available yet`);
    this.key = key;
  }
}

export class BuildCancelledError extends BuildError {
  constructor(reason = 'Build cancelled by operator') {
    super('BUILD_CANCELLED', reason);
  }
}

export class BuildTimeoutError extends BuildError {
  constructor(timeoutMs: number) {
    super('BUILD_TIMEOUT', `Build exceeded build_timeout of ${timeoutMs}ms`, {
      remediation: 'Raise build_timeout or investigate the slowest step in the log'
    });
  }
}

/**
 * Turns an AbortSignal's reason into the error the runner reports.
 */
export function abortReason(signal: AbortSignal): BuildError {
  return signal.reason instanceof BuildError ? signal.reason : new BuildCancelledError();
}
