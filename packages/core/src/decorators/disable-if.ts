import {
  DisableIfAllParametersKind,
  DisableIfAnyParameterKind,
  DisableIfParameterKind,
  type DisableIfParameterAttributes,
} from '../extensions/disable-if-parameter.js';
import { scopeAnnotation, type ScopeDecorator } from './annotate.js';

type ContentOptions = Omit<DisableIfParameterAttributes, 'index' | 'name'>;

/**
 * Disables invocations of a parameterized test whose targeted argument contains
 * (or fully matches) one of the given values.
 *
 * Targets the argument at `index`, the parameter called `name`, or the first
 * argument when neither is given. Repeatable.
 *
 * @example
 * ```typescript
 * @ParameterizedTest()
 * @ValueSource({ strings: ['alpha', 'beta', 'gamma'] })
 * @DisableIfParameter({ contains: 'et' })
 * skipsBeta(value: string) {}
 * ```
 */
export function DisableIfParameter(options: DisableIfParameterAttributes): ScopeDecorator {
  return scopeAnnotation(DisableIfParameterKind.name, { kind: DisableIfParameterKind, attributes: options });
}

/** Disables an invocation if any of its arguments matches. */
export function DisableIfAnyParameter(options: ContentOptions): ScopeDecorator {
  return scopeAnnotation(DisableIfAnyParameterKind.name, {
    kind: DisableIfAnyParameterKind,
    attributes: options,
  });
}

/** Disables an invocation if every one of its arguments matches. */
export function DisableIfAllParameters(options: ContentOptions): ScopeDecorator {
  return scopeAnnotation(DisableIfAllParametersKind.name, {
    kind: DisableIfAllParametersKind,
    attributes: options,
  });
}
