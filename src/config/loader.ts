// Configuration loading logic
import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { dirname, isAbsolute, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { BuildError, ValidationError } from '../errors';
import { HCLOUD_ENDPOINT } from '../provisioning/hcloud-client';
import { BuilderConfig } from '../types';
import { ConfigLoader, ConfigValidationResult } from './types';
import { validateAndNormalizeConfig, validateConfig } from './validator';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const PLACEHOLDER = /\$\{([^}:]+)(?::-[^}]*)?\}/g;

/**
 * Lists every `${VAR}` left in the configuration, keyed by the setting that holds it
 */
export function findUnresolvedPlaceholders(value: unknown, path = ''): string[] {
  if (typeof value === 'string') {
    return [...value.matchAll(PLACEHOLDER)].map(
      ([, name]) => `${path || 'configuration'} references environment variable ${name ?? ''}, which is not set`
    );
  }
  if (Array.isArray(value)) {
    return value.flatMap((item, index) => findUnresolvedPlaceholders(item, `${path}[${index}]`));
  }
  if (isPlainObject(value)) {
    return Object.entries(value).flatMap(([key, item]) =>
      findUnresolvedPlaceholders(item, path ? `${path}.${key}` : key)
    );
  }
  return [];
}

/**
 * Configuration loader that supports YAML and JSON files with environment variable substitution.
 * Files the configuration points at are read here, so the build itself never touches the disk.
 */
export class BuilderConfigLoader implements ConfigLoader {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * Load and parse configuration from a file
   * @param path - Path to the configuration file (YAML or JSON)
   * @returns Promise resolving to validated and normalized BuilderConfig
   */
  async load(path: string): Promise<BuilderConfig> {
    try {
      if (!existsSync(path)) {
        throw new Error(`Configuration file not found: ${path}`);
      }

      const content = await readFile(path, 'utf-8');

      let rawConfig: unknown;
      if (path.endsWith('.json')) {
        rawConfig = JSON.parse(content);
      } else if (path.endsWith('.yml') || path.endsWith('.yaml')) {
        rawConfig = parseYaml(content);
      } else {
        throw new Error('Unsupported file format. Only .json, .yml, and .yaml files are supported.');
      }

      const configWithEnvVars = this.resolveEnvironmentVariables(rawConfig);
      const unresolved = findUnresolvedPlaceholders(configWithEnvVars);
      if (unresolved.length > 0) {
        throw new ValidationError(unresolved);
      }
      const mergedConfig = this.applyDefaults(configWithEnvVars);
      const normalizedConfig = validateAndNormalizeConfig(mergedConfig);

      return await this.resolveFiles(normalizedConfig, dirname(resolve(path)));
    } catch (error) {
      if (error instanceof BuildError) {
        throw error;
      }
      if (error instanceof Error) {
        throw new Error(`Failed to load configuration from ${path}: ${error.message}`);
      }
      throw new Error(`Failed to load configuration from ${path}: ${String(error)}`);
    }
  }

  /**
   * Validate configuration without loading from file
   */
  validate(config: unknown): ConfigValidationResult {
    return validateConfig(this.applyDefaults(config));
  }

  /**
   * Load configuration from the first path that loads
   * @param searchPaths - Array of paths to search for configuration files
   */
  async loadFromPaths(searchPaths: string[]): Promise<BuilderConfig> {
    const errors: string[] = [];

    for (const path of searchPaths) {
      try {
        return await this.load(path);
      } catch (error) {
        errors.push(`${path}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    throw new Error(`Could not load configuration from any of the specified paths:\n${errors.join('\n')}`);
  }

  /**
   * Recursively resolve environment variables in configuration object
   * Supports ${VAR_NAME} and ${VAR_NAME:-default_value} syntax
   */
  resolveEnvironmentVariables(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.substituteEnvironmentVariables(value);
    }

    if (Array.isArray(value)) {
      return value.map(item => this.resolveEnvironmentVariables(item));
    }

    if (isPlainObject(value)) {
      const result: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        result[key] = this.resolveEnvironmentVariables(item);
      }
      return result;
    }

    return value;
  }

  private substituteEnvironmentVariables(str: string): string {
    return str.replace(/\$\{([^}]+)\}/g, (match, varExpression: string) => {
      const [varName = '', defaultValue] = varExpression.split(':-');
      const envValue = this.env[varName];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue;
      }

      // Unset and no default: keep the placeholder so load() can report it with its setting
      return match;
    });
  }

  /**
   * An empty or absent token and endpoint fall back to HCLOUD_TOKEN and HCLOUD_ENDPOINT
   */
  private applyDefaults(config: unknown): unknown {
    if (!isPlainObject(config)) {
      return config;
    }

    return {
      ...config,
      token: config.token || this.env.HCLOUD_TOKEN,
      endpoint: config.endpoint || this.env.HCLOUD_ENDPOINT || HCLOUD_ENDPOINT
    };
  }

  private async resolveFiles(config: BuilderConfig, baseDir: string): Promise<BuilderConfig> {
    const { user_data_file: userDataFile, ...rest } = config;
    const resolved: BuilderConfig = { ...rest };

    if (userDataFile) {
      resolved.user_data = await this.readReferencedFile('user_data_file', userDataFile, baseDir);
    }

    const keyFile = config.communicator?.ssh_private_key_file;
    if (config.communicator && keyFile) {
      resolved.communicator = {
        ...config.communicator,
        ssh_private_key: await this.readReferencedFile('communicator.ssh_private_key_file', keyFile, baseDir)
      };
    }

    return resolved;
  }

  private async readReferencedFile(setting: string, path: string, baseDir: string): Promise<string> {
    const fullPath = isAbsolute(path) ? path : resolve(baseDir, path);
    if (!existsSync(fullPath)) {
      throw new ValidationError([`${setting} not found: ${path}`]);
    }
    return readFile(fullPath, 'utf-8');
  }
}

/**
 * Convenience function to create a new configuration loader
 */
export function createConfigLoader(env?: NodeJS.ProcessEnv): BuilderConfigLoader {
  return new BuilderConfigLoader(env);
}
