/**
 * src/shared/config/env-resolver.ts
 *
 * WHY:
 * - Hasher salts are secrets and are usually written as `%env(HASHID_SALT)%` in
 *   configuration instead of inline.
 * - The value is read when the hasher is first used, so registration can happen
 *   before the environment is complete.
 *
 * HOW TO USE:
 * - parseEnvPlaceholder('%env(API_SALT)%')         -> { variable: 'API_SALT', cast: null }
 * - parseEnvPlaceholder('%env(string:API_SALT)%')  -> { variable: 'API_SALT', cast: 'string' }
 * - parseEnvPlaceholder('plain-salt')              -> null
 * - processEnvResolver.get('API_SALT')      -> string | undefined
 */

export interface EnvResolver {
  get(name: string): string | undefined;
}

export type EnvPlaceholder = {
  variable: string;
  /** Everything before the last `:`, e.g. `string` in `%env(string:API_SALT)%`. */
  cast: string | null;
};

const ENV_PLACEHOLDER = /^%env\(([^)]+)\)%$/;

export function parseEnvPlaceholder(value: string): EnvPlaceholder | null {
  const body = ENV_PLACEHOLDER.exec(value)?.[1];
  if (body === undefined) return null;

  const separator = body.lastIndexOf(':');
  if (separator === -1) return { variable: body, cast: null };

  return { variable: body.slice(separator + 1), cast: body.slice(0, separator) };
}

export const processEnvResolver: EnvResolver = {
  get: (name) => process.env[name],
};

/** Fixed map resolver, mostly for tests and scripts. */
export function createStaticEnvResolver(values: Record<string, string>): EnvResolver {
  return {
    get: (name) => (Object.prototype.hasOwnProperty.call(values, name) ? values[name] : undefined),
  };
}
