export * from './types';
export { BuildState } from './state';
export type { BuildStateShape, StateKey, SshKeyMaterial, ResolvedImage } from './state';
export { PipelineRunner } from './runner';
export { Poller, abortableSleep, DEFAULT_POLL_INTERVAL_MS, DEFAULT_ACTION_TIMEOUT_MS } from './polling';
export type { Clock, Sleeper, PollProbe, PollOptions, PollerOptions } from './polling';
export { BuildOrchestrator, build, toErrorReport } from './build-orchestrator';
export type { OrchestratorDependencies, BuildOptions } from './build-orchestrator';
