/**
 * src/modules/hashers/hasher.schemas.ts
 *
 * WHY:
 * - Configuration maps arrive untyped (config files, env, callers in JS).
 * - Shape errors (wrong types, unknown keys) surface as ConfigurationValidationError
 *   before any invariant is checked.
 *
 * RULES:
 * - Use Zod for shape only. Value invariants live in policies/hasher-config.policy.ts
 *   so construction, overrides and registration share them.
 * - Unknown keys are rejected: a typo must not silently fall back to a default.
 * - A null field counts as omitted.
 */

import { z, type ZodIssue } from 'zod';
import { HasherErrors } from './hasher.errors';
import type { HasherOverrides } from './hasher.types';

export const hasherOverridesSchema = z
  .object({
    salt: z.string().nullable().optional(),
    min_length: z.number().nullable().optional(),
    alphabet: z.string().nullable().optional(),
  })
  .strict();

/**
 * Registry entries accept the factory keys plus:
 * - `type`: strategy whose defaults apply (checked against the closed set later)
 * - `min_hash_length`: the older spelling of `min_length`
 */
export const hasherRegistrationSchema = hasherOverridesSchema
  .extend({
    type: z.string().optional(),
    min_hash_length: z.number().nullable().optional(),
  })
  .strict();

export type HasherRegistrationInput = z.infer<typeof hasherRegistrationSchema>;

function toConfigurationError(issues: ZodIssue[]) {
  const [first] = issues;
  const field = first && first.path.length > 0 ? first.path.join('.') : 'config';
  return HasherErrors.invalidField(field, first?.message ?? 'Invalid configuration');
}

export function parseHasherOverrides(input: unknown): HasherOverrides {
  const parsed = hasherOverridesSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw toConfigurationError(parsed.error.issues);
  }
  return parsed.data;
}

export function parseHasherRegistration(input: unknown): HasherRegistrationInput {
  const parsed = hasherRegistrationSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw toConfigurationError(parsed.error.issues);
  }
  return parsed.data;
}
