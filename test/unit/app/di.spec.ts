import { describe, it, expect } from 'vitest';
import { buildConfig } from '../../../src/app/config';
import { buildDeps } from '../../../src/app/di';
import { createStaticEnvResolver } from '../../../src/shared/config/env-resolver';
import { ConfigurationValidationError } from '../../../src/modules/hashers/hasher.errors';
import { buildSilentLogger } from '../../helpers/build-test-hashers';

describe('buildDeps', () => {
  it('wires the factory and registry from config', () => {
    const config = buildConfig({
      LOG_LEVEL: 'error',
      HASHID_SALT: 'app-salt',
      HASHID_MAX_CACHE_SIZE: '4',
      HASHID_HASHERS: '{"api":{"salt":"%env(API_SALT)%","min_length":16}}',
    });

    const { hashers, logger } = buildDeps(config, {
      logger: buildSilentLogger(),
      envResolver: createStaticEnvResolver({ API_SALT: 'api-salt' }),
    });

    expect(logger.level).toBe('error');
    expect(hashers.registry.getHasherNames()).toEqual(['default', 'api']);
    expect(hashers.factory.getCacheStatistics().maxSize).toBe(4);
    expect(hashers.registry.getConverter('api').encode(3)).toBe(
      hashers.factory.createConverter('default', { salt: 'api-salt', min_length: 16 }).encode(3),
    );
    expect(hashers.registry.getConverter('default').encode(3)).toBe(
      hashers.factory.createConverter('default', { salt: 'app-salt' }).encode(3),
    );
  });

  it('fails at startup on an invalid alphabet', () => {
    const config = buildConfig({ HASHID_ALPHABET: 'abc' });
    expect(() => buildDeps(config, { logger: buildSilentLogger() })).toThrow(
      ConfigurationValidationError,
    );
  });
});
