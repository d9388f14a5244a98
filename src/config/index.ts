export * from './types';
export * from './naming';
export { validateConfig, validateAndNormalizeConfig, getConfigSchema, MAX_DELAY_MS } from './validator';
export { BuilderConfigLoader, createConfigLoader, findUnresolvedPlaceholders } from './loader';
