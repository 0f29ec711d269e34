import { ConfigurationError } from '../errors/errors.js';
import { logger } from '../logging/logger.js';
import {
  ResolutionPolicy,
  type AnnotationFamily,
  type Directive,
  type DirectiveKind,
  type PinionConfig,
} from '../types/types.js';
import { walkOutward, type ResolutionContext } from './resolution-context.js';

const log = logger('locator');

export type PolicyOverrides = Pick<PinionConfig, 'policies' | 'defaultPolicy'>;

/**
 * Finds the annotations that apply to a test unit and turns them into directives.
 *
 * The walk starts at the innermost scope (the method, or the class for container
 * units) and moves outward through enclosing classes. Which scopes contribute is
 * decided by the resolution policy:
 *
 *   - StopAtFirst: the first scope carrying at least one instance, and nothing beyond it
 *   - Accumulate: every scope, innermost first
 *
 * Each family declares its own default policy. Configuration may override it per
 * family name, or globally through `defaultPolicy`.
 *
 * @example
 * ```typescript
 * const locator = new AnnotationLocator({ policies: { environment: 'accumulate' } });
 * const directives = locator.locate(context, SetEnvironmentVariableFamily);
 * ```
 */
export class AnnotationLocator {
  constructor(private readonly overrides: PolicyOverrides = {}) {}

  /**
   * Effective policy for `family`: per-family override, then global default, then
   * the family's own policy.
   */
  policyFor(family: AnnotationFamily): ResolutionPolicy {
    return this.overrides.policies?.[family.family] ?? this.overrides.defaultPolicy ?? family.policy;
  }

  /**
   * Collect the directives of `family` applicable to `context`.
   *
   * Every matched instance is translated (and so validated) before this returns.
   * An empty result means no scope carries the annotation.
   *
   * @throws {ConfigurationError} if a non-repeatable annotation is declared twice on
   *   one scope, or if the family's translator rejects an instance
   */
  locate<K extends DirectiveKind, P>(
    context: ResolutionContext,
    family: AnnotationFamily<K, P>,
    policy: ResolutionPolicy = this.policyFor(family)
  ): readonly Directive<K, P>[] {
    return this.locateAll(context, [family], policy);
  }

  /**
   * Collect the directives of several related kinds in one walk.
   *
   * Under StopAtFirst the kinds are treated as one family: the walk stops at the
   * first scope carrying an instance of any of them. This is what lets a method-level
   * `@SetEnvironmentVariable('A')` shadow a class-level `@ClearEnvironmentVariable('A')`.
   *
   * Directives come back innermost scope first; within a scope, in the order the
   * families are given and then in declaration order.
   */
  locateAll<K extends DirectiveKind, P>(
    context: ResolutionContext,
    families: readonly AnnotationFamily<K, P>[],
    policy: ResolutionPolicy = families.length > 0 ? this.policyFor(families[0]) : ResolutionPolicy.StopAtFirst
  ): readonly Directive<K, P>[] {
    const found: Directive<K, P>[] = [];

    let level = 0;
    for (const scope of walkOutward(context)) {
      let matched = 0;

      for (const family of families) {
        const kind = family.annotation;
        const instances = scope.annotations.instancesOf(kind);

        if (instances.length > 1 && !kind.repeatable) {
          throw new ConfigurationError(
            kind.name,
            `@${kind.name} is not repeatable but is declared ${instances.length} times on ${scope.name}.`
          );
        }

        for (const attributes of instances) {
          found.push(
            Object.freeze({
              kind: family.directive,
              scopeLevel: level,
              scopeName: scope.name,
              annotation: kind.name,
              payload: family.translate(attributes, scope),
            })
          );
        }
        matched += instances.length;
      }

      if (policy === ResolutionPolicy.StopAtFirst && matched > 0) break;
      level++;
    }

    if (found.length > 0) {
      log(
        '%s on %s: %d directive(s) (%s)',
        families.map((f) => `@${f.annotation.name}`).join(', '),
        context.name,
        found.length,
        policy
      );
    }
    return found;
  }
}
