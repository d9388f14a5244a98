import { v4 as uuidv4 } from 'uuid';
import { BuilderConfig, ResolvedBuilderConfig } from '../types';

export const LABEL_MAX_LENGTH = 63;

/**
 * Generated resource names for one build
 */
export interface BuildNames {
  serverName: string;
  snapshotName: string;
}

function isAsciiAlphaNum(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || (ch >= '0' && ch <= '9');
}

/**
 * Label keys may carry a prefix separated by "/"; both parts follow the value rules.
 */
export function isValidLabelKey(key: string): boolean {
  if (!key || key.length > LABEL_MAX_LENGTH) return false;
  if (!isAsciiAlphaNum(key[0] ?? '') || !isAsciiAlphaNum(key[key.length - 1] ?? '')) return false;
  return /^[A-Za-z0-9._/-]+$/.test(key);
}

export function isValidLabelValue(value: string): boolean {
  if (value.length === 0) return true;
  if (value.length > LABEL_MAX_LENGTH) return false;
  if (!isAsciiAlphaNum(value[0] ?? '') || !isAsciiAlphaNum(value[value.length - 1] ?? '')) return false;
  return /^[A-Za-z0-9._-]+$/.test(value);
}

/**
 * Server names double as hostnames: one RFC 1123 label or a dotted name of them.
 */
export function isValidServerName(name: string): boolean {
  if (!name || name.length > 253) return false;
  return name.split('.').every(label => /^[A-Za-z0-9]([A-Za-z0-9-]{0,61}[A-Za-z0-9])?$/.test(label));
}

export function generateServerName(): string {
  return `builder-${uuidv4()}`;
}

export function generateKeyName(): string {
  return `builder-key-${uuidv4()}`;
}

/**
 * Default snapshot name: image-<unix timestamp in seconds>
 */
export function generateSnapshotName(now: Date = new Date()): string {
  return `image-${Math.floor(now.getTime() / 1000)}`;
}

export function generateBuildNames(config: BuilderConfig, now: Date = new Date()): BuildNames {
  return {
    serverName: config.server_name || generateServerName(),
    snapshotName: config.snapshot_name || generateSnapshotName(now)
  };
}

export function applyNamingDefaults(config: BuilderConfig, now: Date = new Date()): ResolvedBuilderConfig {
  const names = generateBuildNames(config, now);
  return { ...config, server_name: names.serverName, snapshot_name: names.snapshotName };
}
