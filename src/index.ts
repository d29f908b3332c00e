// src/index.ts

export { config, resolveConfig, configSchema } from './config.js';
export type { EngineConfig, ConfigOverrides } from './config.js';
export * from './errors.js';
export * from './types.js';
export * from './rules/index.js';
export * from './risk/index.js';
export * from './decision/index.js';
export * from './hooks/index.js';
export * from './session/index.js';
export * from './swarm/index.js';
export * from './workflow/index.js';
export { logger, createComponentLogger } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
