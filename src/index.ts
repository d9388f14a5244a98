// Main entry point for the image builder
export * from './types';
export * from './errors';
export * from './config';
export * from './orchestration';
export * from './steps';
export * from './provisioning/types';
export { HcloudClient, HCLOUD_ENDPOINT } from './provisioning/hcloud-client';
export type { HcloudClientOptions } from './provisioning/hcloud-client';
export { generateSshKeyPair } from './provisioning/ssh-keypair';
export type { SshKeyPair, KeyPairGenerator } from './provisioning/ssh-keypair';
export * from './transport/types';
export { TcpProbeTransport } from './transport/tcp-probe';
export { ConsoleLogger, createLogger, REDACTED } from './logging/logger';
export type { Logger, LogLevel, LogMeta, LogSink, ConsoleLoggerOptions } from './logging/logger';

