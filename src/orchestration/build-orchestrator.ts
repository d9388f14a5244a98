import { v4 as uuidv4 } from 'uuid';
import { BuildError, BuildTimeoutError, ProviderRequestError, ValidationError } from '../errors';
import { applyNamingDefaults } from '../config/naming';
import { createLogger, Logger } from '../logging/logger';
import { HcloudClient } from '../provisioning/hcloud-client';
import { generateSshKeyPair, KeyPairGenerator } from '../provisioning/ssh-keypair';
import { CloudClient } from '../provisioning/types';
import {
  CreateServerStep,
  CreateSnapshotStep,
  CreateSshKeyStep,
  PowerOffStep,
  PreValidateStep,
  ProvisionStep,
  RescueBootStep,
  ResolveImageStep,
  StepDependencies,
  UpgradeServerTypeStep,
  WaitForConnectivityStep,
  WaitForServerStep
} from '../steps';
import { TcpProbeTransport } from '../transport/tcp-probe';
import { Provisioner, SessionTransport } from '../transport/types';
import {
  BuildArtifact,
  BuilderConfig,
  BuildErrorReport,
  BuildMetadata,
  BuildResult,
  ResolvedBuilderConfig
} from '../types';
import { Clock, Poller, Sleeper } from './polling';
import { PipelineRunner } from './runner';
import { BuildState } from './state';
import { BuildStep, RunOutcome, StepEvent } from './types';

export interface OrchestratorDependencies {
  client?: CloudClient;
  transport?: SessionTransport;
  provisioner?: Provisioner;
  logger?: Logger;
  generateKeyPair?: KeyPairGenerator;
  now?: Clock;
  sleep?: Sleeper;
}

export interface BuildOptions {
  /** Operator cancellation */
  signal?: AbortSignal;
  onEvent?: (event: StepEvent) => void;
}

export function toErrorReport(error: Error, step?: string): BuildErrorReport {
  if (error instanceof BuildError) {
    return {
      code: error.code,
      message: error.message,
      step,
      details: error instanceof ProviderRequestError
        ? { status: error.status, providerCode: error.providerCode }
        : undefined,
      remediation: error.remediation
    };
  }
  return { code: 'UNEXPECTED_ERROR', message: error.message, step };
}

/**
 * Assembles the step pipeline from configuration and turns the runner's outcome into a result.
 */
export class BuildOrchestrator {
  readonly config: ResolvedBuilderConfig;
  private readonly client: CloudClient;
  private readonly transport: SessionTransport;
  private readonly provisioner?: Provisioner;
  private readonly logger: Logger;
  private readonly poller: Poller;
  private readonly generateKeyPair: KeyPairGenerator;

  constructor(config: BuilderConfig, deps: OrchestratorDependencies = {}) {
    if (deps.provisioner && config.communicator?.type === 'none') {
      throw new ValidationError(['a provisioner needs a communicator, but communicator.type is none']);
    }

    this.config = applyNamingDefaults(config);
    this.logger = deps.logger ?? createLogger();
    this.logger.addRedaction(config.token);
    if (config.communicator?.password) {
      this.logger.addRedaction(config.communicator.password);
    }

    this.client = deps.client ?? new HcloudClient({ token: config.token, endpoint: config.endpoint });
    this.transport = deps.transport ?? new TcpProbeTransport();
    this.provisioner = deps.provisioner;
    this.generateKeyPair = deps.generateKeyPair ?? generateSshKeyPair;
    this.poller = new Poller({
      intervalMs: config.poll_interval,
      actionTimeoutMs: config.action_timeout,
      now: deps.now,
      sleep: deps.sleep,
      logger: this.logger
    });
  }

  assembleSteps(): BuildStep[] {
    const deps: StepDependencies = { client: this.client, config: this.config, poller: this.poller };
    const { config } = this;
    const steps: BuildStep[] = [
      new PreValidateStep(deps),
      new CreateSshKeyStep(deps, this.generateKeyPair),
      new ResolveImageStep(deps),
      new CreateServerStep(deps),
      new WaitForServerStep(deps)
    ];

    if (config.upgrade_server_type) steps.push(new UpgradeServerTypeStep(deps));
    if (config.rescue) steps.push(new RescueBootStep(deps));
    steps.push(new WaitForConnectivityStep(deps, this.transport));
    if (this.provisioner) steps.push(new ProvisionStep(this.provisioner));
    // a kept server without a snapshot is left running for the operator
    if (!(config.skip_snapshot && config.keep_server)) steps.push(new PowerOffStep(deps));
    if (!config.skip_snapshot) steps.push(new CreateSnapshotStep(deps));

    return steps;
  }

  async build(options: BuildOptions = {}): Promise<BuildResult> {
    const startTime = Date.now();
    const metadata: BuildMetadata = {
      buildId: uuidv4(),
      timestamp: new Date(startTime),
      location: this.config.location,
      serverName: this.config.server_name
    };

    const controller = new AbortController();
    const forwardAbort = () => controller.abort(options.signal?.reason);
    if (options.signal?.aborted) forwardAbort();
    options.signal?.addEventListener('abort', forwardAbort, { once: true });

    const buildTimeout = this.config.build_timeout;
    const timer = buildTimeout
      ? setTimeout(() => controller.abort(new BuildTimeoutError(buildTimeout)), buildTimeout)
      : undefined;
    timer?.unref();

    this.logger.info(`Starting build ${metadata.buildId} (server ${metadata.serverName})`);
    const state = new BuildState();
    let outcome: RunOutcome;
    try {
      outcome = await new PipelineRunner(this.assembleSteps()).run(state, {
        signal: controller.signal,
        logger: this.logger,
        haltAfter: this.config.halt_after,
        onEvent: options.onEvent
      });
    } finally {
      if (timer) clearTimeout(timer);
      options.signal?.removeEventListener('abort', forwardAbort);
    }

    metadata.duration = Date.now() - startTime;
    return this.toResult(outcome, state, metadata);
  }

  private toResult(outcome: RunOutcome, state: BuildState, metadata: BuildMetadata): BuildResult {
    const cleanupErrors: BuildErrorReport[] = outcome.cleanupFailures.map(failure => ({
      ...toErrorReport(failure.error, failure.step),
      code: 'CLEANUP_FAILED'
    }));

    if (outcome.status === 'completed') {
      this.logger.info(`Build ${metadata.buildId} finished`);
      return {
        success: true,
        artifact: this.extractArtifact(state),
        errors: cleanupErrors.length > 0 ? cleanupErrors : undefined,
        metadata
      };
    }

    const primary: BuildErrorReport = outcome.status === 'halted'
      ? { code: 'BUILD_HALTED', message: `Build halted after step ${outcome.step ?? 'unknown'}`, step: outcome.step }
      : toErrorReport(outcome.error ?? new Error('Build stopped without an error'), outcome.step);

    return {
      success: false,
      errors: [primary, ...cleanupErrors],
      metadata
    };
  }

  private extractArtifact(state: BuildState): BuildArtifact {
    const snapshot = state.getOptional('snapshot');
    const server = state.getOptional('server');
    const artifact: BuildArtifact = {
      imageId: snapshot?.id,
      imageName: snapshot?.description
    };

    if (this.config.keep_server && server) {
      artifact.server = {
        id: server.id,
        name: server.name,
        status: server.status,
        publicIPv4: server.publicIPv4,
        publicIPv6: server.publicIPv6
      };
    }

    return artifact;
  }
}

// Convenience function mirroring the orchestrator for one-shot builds
export async function build(
  config: BuilderConfig,
  deps?: OrchestratorDependencies,
  options?: BuildOptions
): Promise<BuildResult> {
  const orchestrator = new BuildOrchestrator(config, deps);
  return orchestrator.build(options);
}
