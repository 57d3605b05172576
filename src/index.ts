/**
 * src/index.ts
 *
 * WHY:
 * - Single entrypoint for the package.
 * - Embedding apps either build everything from env (buildConfig + buildDeps) or
 *   construct HasherFactory / HasherRegistry themselves.
 */

export * from './modules/hashers';
export { buildConfig } from './app/config';
export type { AppConfig, NodeEnv } from './app/config';
export { buildDeps } from './app/di';
export type { AppDeps } from './app/di';
export { AppError } from './shared/errors/app-error';
export type { AppErrorCode, AppErrorMeta } from './shared/errors/app-error';
export {
  createStaticEnvResolver,
  processEnvResolver,
  type EnvResolver,
} from './shared/config/env-resolver';
export { LruCache } from './shared/cache/lru-cache';
export type { InstanceCache } from './shared/cache/instance-cache';
export { logger } from './shared/logger/logger';
export type { Logger } from './shared/logger/logger';
