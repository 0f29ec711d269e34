import { z } from 'zod';
import { annotationKind, type AttributeBag } from '../core/annotation-kind.js';
import {
  DirectiveKind,
  ResolutionPolicy,
  UNSET,
  type MutationFamily,
  type StateMutation,
} from '../types/types.js';
import { parseAttributes } from './attributes.js';

/** State domain the environment families write to. */
export const ENVIRONMENT_DOMAIN = 'environment';

/** Family name shared by the Set and Clear kinds; key for policy overrides. */
export const ENVIRONMENT_FAMILY = 'environment';

export const SetEnvironmentVariableKind = annotationKind<{ key: string; value: string }>(
  'SetEnvironmentVariable',
  { repeatable: true }
);

export const ClearEnvironmentVariableKind = annotationKind<{ key: string }>(
  'ClearEnvironmentVariable',
  { repeatable: true }
);

const key = z
  .string({ required_error: 'key is required', invalid_type_error: 'key must be a string' })
  .refine((k) => k.trim() !== '', { message: 'Environment variable key must not be blank.' })
  .refine((k) => !k.includes('='), { message: "Environment variable key must not contain '='." });

const setSchema = z
  .object({
    key,
    value: z.string({ required_error: 'value is required', invalid_type_error: 'value must be a string' }),
  })
  .strict();

const clearSchema = z.object({ key }).strict();

/**
 * `@SetEnvironmentVariable(key, value)`: the variable holds `value` while the unit runs.
 */
export const SetEnvironmentVariableFamily: MutationFamily = Object.freeze({
  family: ENVIRONMENT_FAMILY,
  annotation: SetEnvironmentVariableKind,
  directive: DirectiveKind.SetExternalValue,
  policy: ResolutionPolicy.StopAtFirst,
  translate(attributes: AttributeBag): StateMutation {
    const parsed = parseAttributes(SetEnvironmentVariableKind, setSchema, attributes);
    return { domain: ENVIRONMENT_DOMAIN, key: parsed.key, value: parsed.value };
  },
});

/**
 * `@ClearEnvironmentVariable(key)`: the variable is absent while the unit runs.
 */
export const ClearEnvironmentVariableFamily: MutationFamily = Object.freeze({
  family: ENVIRONMENT_FAMILY,
  annotation: ClearEnvironmentVariableKind,
  directive: DirectiveKind.ClearExternalValue,
  policy: ResolutionPolicy.StopAtFirst,
  translate(attributes: AttributeBag): StateMutation {
    const parsed = parseAttributes(ClearEnvironmentVariableKind, clearSchema, attributes);
    return { domain: ENVIRONMENT_DOMAIN, key: parsed.key, value: UNSET };
  },
});

export const ENVIRONMENT_FAMILIES: readonly MutationFamily[] = Object.freeze([
  ClearEnvironmentVariableFamily,
  SetEnvironmentVariableFamily,
]);
