export { loadConfig } from './loader';
export { configSchema, LOG_LEVELS } from './schema';
export type { ValidatedConfig } from './schema';
