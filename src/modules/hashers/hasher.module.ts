import type { EnvResolver } from '../../shared/config/env-resolver';
import type { Logger } from '../../shared/logger/logger';
import { HasherFactory, type HasherFactoryOptions } from './hasher.factory';
import { HasherRegistry } from './hasher.registry';

/**
 * HasherModule = the factory plus the named registry built on top of it.
 * Both share one logger; the registry materializes converters through this factory.
 */

export type HasherModule = {
  factory: HasherFactory;
  registry: HasherRegistry;
};

export function createHasherModule(deps: {
  defaults: Omit<HasherFactoryOptions, 'logger'>;
  logger: Logger;
  envResolver?: EnvResolver;
  hashers?: Record<string, unknown>;
}): HasherModule {
  const { defaults, logger, envResolver, hashers } = deps;

  const factory = new HasherFactory({ ...defaults, logger });
  const registry = new HasherRegistry({ factory, envResolver, logger });

  if (hashers) {
    registry.registerHashers(hashers);
  }

  return { factory, registry };
}
