import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { buildConfig } from '../../../src/app/config';
import { DEFAULT_ALPHABET } from '../../../src/modules/hashers/hasher.constants';

describe('buildConfig', () => {
  it('applies defaults', () => {
    expect(buildConfig({})).toEqual({
      nodeEnv: 'development',
      logLevel: 'info',
      serviceName: 'hashid-hashers',
      hashids: {
        salt: '',
        minLength: 10,
        alphabet: DEFAULT_ALPHABET,
        maxCacheSize: 10,
        hashers: {},
      },
    });
  });

  it('coerces numeric variables and parses named hashers', () => {
    const config = buildConfig({
      NODE_ENV: 'test',
      HASHID_SALT: 'env-salt',
      HASHID_MIN_LENGTH: '12',
      HASHID_MAX_CACHE_SIZE: '3',
      HASHID_HASHERS: '{"secure-api":{"type":"secure","salt":"%env(API_SALT)%"}}',
    });

    expect(config.nodeEnv).toBe('test');
    expect(config.hashids).toMatchObject({ salt: 'env-salt', minLength: 12, maxCacheSize: 3 });
    expect(config.hashids.hashers).toEqual({
      'secure-api': { type: 'secure', salt: '%env(API_SALT)%' },
    });
  });

  it('rejects out-of-range values', () => {
    expect(() => buildConfig({ HASHID_MIN_LENGTH: '-1' })).toThrow(ZodError);
    expect(() => buildConfig({ HASHID_MAX_CACHE_SIZE: '0' })).toThrow(ZodError);
    expect(() => buildConfig({ NODE_ENV: 'staging' })).toThrow(ZodError);
  });

  it('rejects HASHID_HASHERS that is not a JSON object', () => {
    expect(() => buildConfig({ HASHID_HASHERS: '{not json' })).toThrow(ZodError);
    expect(() => buildConfig({ HASHID_HASHERS: '[1,2]' })).toThrow(ZodError);
  });
});
