/**
 * src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, `.env` is loaded via dotenv.
 * - buildConfig() reads process.env; tests pass their own env object.
 *
 * RULES:
 * - Only shape and range checks live here. Alphabet rules belong to the hashers
 *   module and are enforced when the factory is built.
 * - HASHID_HASHERS is a JSON object of named hasher configs, e.g.
 *   {"secure-api":{"type":"secure","salt":"%env(API_SALT)%"}}
 */

import 'dotenv/config';
import { z } from 'zod';
import { DEFAULT_ALPHABET } from '../modules/hashers';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const HashersJsonSchema = z
  .string()
  .optional()
  .transform((raw, ctx): Record<string, unknown> => {
    if (raw === undefined || raw.trim() === '') return {};
    try {
      const parsed: unknown = JSON.parse(raw);
      return z.record(z.unknown()).parse(parsed);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `HASHID_HASHERS must be a JSON object (${err instanceof Error ? err.message : 'parse error'})`,
      });
      return z.NEVER;
    }
  });

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('hashid-hashers'),

  // Factory defaults
  HASHID_SALT: z.string().default(''),
  HASHID_MIN_LENGTH: z.coerce.number().int().min(0).default(10),
  HASHID_ALPHABET: z.string().min(1).default(DEFAULT_ALPHABET),
  HASHID_MAX_CACHE_SIZE: z.coerce.number().int().min(1).default(10),

  HASHID_HASHERS: HashersJsonSchema,
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;

  logLevel: string;
  serviceName: string;

  hashids: {
    salt: string;
    minLength: number;
    alphabet: string;
    maxCacheSize: number;
    hashers: Record<string, unknown>;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    hashids: {
      salt: parsed.HASHID_SALT,
      minLength: parsed.HASHID_MIN_LENGTH,
      alphabet: parsed.HASHID_ALPHABET,
      maxCacheSize: parsed.HASHID_MAX_CACHE_SIZE,
      hashers: parsed.HASHID_HASHERS,
    },
  };
}
