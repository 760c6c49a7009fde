/**
 * Configuration entry point
 */

export * from './constants';
export { createAppConfig, LogLevelSchema, type AppConfig } from './app-config';
export { parseIntEnv, parseOptionalEnv, type EnvRecord } from './env-utils';
