/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for an embedding application.
 * - Creates the factory and registry ONCE from config and shares them.
 *
 * RULES:
 * - No business logic here.
 * - Environment-dependent decisions belong HERE, not inside the classes themselves.
 */

import type { AppConfig } from './config';
import { processEnvResolver, type EnvResolver } from '../shared/config/env-resolver';
import { logger as defaultLogger, type Logger } from '../shared/logger/logger';
import { createHasherModule, type HasherModule } from '../modules/hashers';

export type AppDeps = {
  logger: Logger;
  hashers: HasherModule;
};

export function buildDeps(
  config: AppConfig,
  overrides: { logger?: Logger; envResolver?: EnvResolver } = {},
): AppDeps {
  const logger = overrides.logger ?? defaultLogger;
  logger.level = config.logLevel;

  const hashers = createHasherModule({
    defaults: {
      salt: config.hashids.salt,
      minLength: config.hashids.minLength,
      alphabet: config.hashids.alphabet,
      maxCacheSize: config.hashids.maxCacheSize,
    },
    logger,
    envResolver: overrides.envResolver ?? processEnvResolver,
    hashers: config.hashids.hashers,
  });

  logger.info('hashers.ready', {
    flow: 'di',
    env: config.nodeEnv,
    service: config.serviceName,
    hashers: hashers.registry.getHasherNames(),
  });

  return { logger, hashers };
}
