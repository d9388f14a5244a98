// Configuration-specific types
import { BuilderConfig } from '../types';

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

export interface ConfigLoader {
  load(path: string): Promise<BuilderConfig>;
  validate(config: unknown): ConfigValidationResult;
}
