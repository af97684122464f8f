export * from './core';
export * from './memory';
export * from './repositories';
export * from './services';
export { openDatabase } from './config/database';
export type { SQLiteConfig } from './config/database';
export { env, envSchema, validateEnv } from './config/env';
export type { Env } from './config/env';
export { createChildLogger, logger } from './logger';
export type { Logger, LoggerBindings } from './logger';
export { createSchedulingCore } from './scheduling-core';
export type { SchedulingCore, SchedulingCoreOptions } from './scheduling-core';
