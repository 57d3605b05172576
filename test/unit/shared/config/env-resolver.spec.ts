import { describe, it, expect } from 'vitest';
import {
  createStaticEnvResolver,
  parseEnvPlaceholder,
} from '../../../../src/shared/config/env-resolver';

describe('parseEnvPlaceholder', () => {
  it('reads a bare variable name', () => {
    expect(parseEnvPlaceholder('%env(API_SALT)%')).toEqual({ variable: 'API_SALT', cast: null });
  });

  it('splits a cast prefix from the variable name', () => {
    expect(parseEnvPlaceholder('%env(string:API_SALT)%')).toEqual({
      variable: 'API_SALT',
      cast: 'string',
    });
    expect(parseEnvPlaceholder('%env(json:base64:API_SALT)%')).toEqual({
      variable: 'API_SALT',
      cast: 'json:base64',
    });
  });

  it('returns null for anything that is not a placeholder', () => {
    expect(parseEnvPlaceholder('plain-salt')).toBeNull();
    expect(parseEnvPlaceholder('%env()%')).toBeNull();
    expect(parseEnvPlaceholder('prefix %env(API_SALT)%')).toBeNull();
  });
});

describe('createStaticEnvResolver', () => {
  it('answers only for its own keys', () => {
    const env = createStaticEnvResolver({ API_SALT: 'value' });

    expect(env.get('API_SALT')).toBe('value');
    expect(env.get('toString')).toBeUndefined();
    expect(env.get('OTHER')).toBeUndefined();
  });
});
