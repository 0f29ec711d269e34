import {
  ClearEnvironmentVariableKind,
  SetEnvironmentVariableKind,
} from '../extensions/environment.js';
import { scopeAnnotation, type ScopeDecorator } from './annotate.js';

/**
 * Sets an environment variable for the duration of the annotated test or class.
 *
 * The previous value (or its absence) is restored afterwards. Repeatable; on a
 * class, the value applies to every test in it, and a method-level annotation of
 * the environment family takes precedence over the class's.
 *
 * @example
 * ```typescript
 * @SetEnvironmentVariable('REGION', 'eu-west-1')
 * class RegionTests {
 *   @Test()
 *   @SetEnvironmentVariable('REGION', 'us-east-2')
 *   @SetEnvironmentVariable('STAGE', 'test')
 *   usesOverride() {}
 * }
 * ```
 */
export function SetEnvironmentVariable(key: string, value: string): ScopeDecorator {
  return scopeAnnotation(SetEnvironmentVariableKind.name, {
    kind: SetEnvironmentVariableKind,
    attributes: { key, value },
  });
}

/**
 * Container form of {@link SetEnvironmentVariable}.
 */
export function SetEnvironmentVariables(
  entries: ReadonlyArray<{ key: string; value: string }>
): ScopeDecorator {
  return scopeAnnotation('SetEnvironmentVariables', {
    kind: SetEnvironmentVariableKind,
    repeated: entries,
  });
}

/**
 * Removes an environment variable for the duration of the annotated test or class.
 */
export function ClearEnvironmentVariable(key: string): ScopeDecorator {
  return scopeAnnotation(ClearEnvironmentVariableKind.name, {
    kind: ClearEnvironmentVariableKind,
    attributes: { key },
  });
}

/**
 * Container form of {@link ClearEnvironmentVariable}.
 */
export function ClearEnvironmentVariables(keys: readonly string[]): ScopeDecorator {
  return scopeAnnotation('ClearEnvironmentVariables', {
    kind: ClearEnvironmentVariableKind,
    repeated: keys.map((key) => ({ key })),
  });
}
