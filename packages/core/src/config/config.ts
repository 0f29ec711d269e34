import { z } from 'zod';
import { ProcessEnvironmentStore, type ExternalKeyValueStore } from '../core/external-store.js';
import { InvalidConfigError } from '../errors/errors.js';
import { ResolutionPolicy, type PinionConfig } from '../types/types.js';

/**
 * Environment variable that sets the policy of every family without a
 * per-family override.
 */
export const POLICY_ENV_VAR = 'PINION_RESOLUTION_POLICY';

/**
 * Configuration after validation and defaulting. Frozen.
 */
export interface ResolvedConfig {
  readonly policies: Readonly<Record<string, ResolutionPolicy>>;
  readonly defaultPolicy?: ResolutionPolicy;
  readonly environment: ExternalKeyValueStore;
}

/** Default `environment` backing, shared by every resolved config. */
const PROCESS_ENVIRONMENT = new ProcessEnvironmentStore();

const policySchema = z.enum([ResolutionPolicy.StopAtFirst, ResolutionPolicy.Accumulate]);

function isKeyValueStore(value: unknown): value is ExternalKeyValueStore {
  return (
    typeof value === 'object' &&
    value !== null &&
    'get' in value &&
    'set' in value &&
    'unset' in value &&
    typeof value.get === 'function' &&
    typeof value.set === 'function' &&
    typeof value.unset === 'function'
  );
}

const configSchema = z
  .object({
    policies: z.record(policySchema).optional(),
    defaultPolicy: policySchema.optional(),
    environment: z
      .custom<ExternalKeyValueStore>(isKeyValueStore, {
        message: 'environment must implement get(), set() and unset()',
      })
      .optional(),
  })
  .strict();

function describeIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

/**
 * Validate `config` and fill in defaults.
 *
 * `PINION_RESOLUTION_POLICY` (read from `env`) applies only when `defaultPolicy`
 * is not given explicitly.
 *
 * @throws {InvalidConfigError} on unknown keys, unknown policies or a malformed store
 *
 * @example
 * ```typescript
 * const config = resolveConfig({ policies: { environment: 'accumulate' } });
 * config.environment; // ProcessEnvironmentStore
 * ```
 */
export function resolveConfig(
  config: PinionConfig = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig {
  const parsed = configSchema.safeParse(config);
  if (!parsed.success) {
    throw new InvalidConfigError(describeIssue(parsed.error.issues[0]));
  }

  let defaultPolicy = parsed.data.defaultPolicy;
  const fromEnv = env[POLICY_ENV_VAR];
  if (defaultPolicy === undefined && fromEnv !== undefined && fromEnv !== '') {
    const policy = policySchema.safeParse(fromEnv);
    if (!policy.success) {
      throw new InvalidConfigError(`${POLICY_ENV_VAR} has unknown policy '${fromEnv}'.`);
    }
    defaultPolicy = policy.data;
  }

  return Object.freeze({
    policies: Object.freeze({ ...parsed.data.policies }),
    defaultPolicy,
    environment: parsed.data.environment ?? PROCESS_ENVIRONMENT,
  });
}
