/*
 * LifecycleBinder
 * ---------------
 * Connects resolved annotations to a host's test lifecycle:
 *
 *   beforeUnit(context)              resolve Set/Clear directives and apply them
 *   afterUnit(token)                 restore everything beforeUnit applied
 *   filterInvocation(context, args)  decide whether a parameterized invocation runs
 *
 * A host calls beforeUnit once per container (class) and once per test
 * invocation, and afterUnit for every token it received, whatever the outcome
 * of the unit. Units nest: a method's state is applied on top of its class's,
 * and restored before it.
 */
import { resolveConfig, type ResolvedConfig } from '../config/config.js';
import { ConfigurationError, ConflictError, RestorationError, ResolutionError } from '../errors/errors.js';
import { DISABLE_IF_FAMILIES, describeMatch } from '../extensions/disable-if-parameter.js';
import { ENVIRONMENT_DOMAIN, ENVIRONMENT_FAMILIES } from '../extensions/environment.js';
import { logger } from '../logging/logger.js';
import type {
  AnnotationFamily,
  DirectiveKind,
  FilterDirective,
  FilterFamily,
  InvocationDecision,
  MutationDirective,
  MutationFamily,
  PinionConfig,
} from '../types/types.js';
import { AnnotationLocator } from './annotation-locator.js';
import type { ExternalKeyValueStore } from './external-store.js';
import { methodScopeOf, type ResolutionContext } from './resolution-context.js';
import { nextUnitId, ScopedStateStore, type RestoreReport, type UnitId } from './scoped-state-store.js';

const log = logger('binder');

export const UnitPhase = {
  StateApplied: 'state-applied',
  StateRestored: 'state-restored',
} as const;

export type UnitPhase = (typeof UnitPhase)[keyof typeof UnitPhase];

/**
 * Handle for one unit's applied state. Pass it back to afterUnit().
 */
export interface UnitToken {
  readonly unitId: UnitId;
  /** Name of the unit's innermost scope */
  readonly scope: string;
  /** Domains written to, in first-write order */
  readonly domains: readonly string[];
  phase: UnitPhase;
}

export interface LifecycleBinderOptions {
  /** Mutation families to resolve; defaults to the environment family */
  mutations?: readonly MutationFamily[];
  /** Filter families to resolve; defaults to the DisableIf family */
  filters?: readonly FilterFamily[];
  config?: PinionConfig;
  /** Backing stores of additional state domains, keyed by domain */
  stores?: Readonly<Record<string, ExternalKeyValueStore>>;
}

const CONTINUE: InvocationDecision = Object.freeze({ action: 'continue' });

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function origin(directive: { annotation: string; scopeName: string }): string {
  return `@${directive.annotation} on ${directive.scopeName}`;
}

/**
 * Group families by family name, keeping first-seen order.
 */
function byFamily<K extends DirectiveKind, P>(
  families: readonly AnnotationFamily<K, P>[]
): AnnotationFamily<K, P>[][] {
  const groups = new Map<string, AnnotationFamily<K, P>[]>();
  for (const family of families) {
    const group = groups.get(family.family);
    if (group) group.push(family);
    else groups.set(family.family, [family]);
  }
  return [...groups.values()];
}

export class LifecycleBinder {
  readonly locator: AnnotationLocator;
  readonly config: ResolvedConfig;

  private readonly mutations: MutationFamily[][];
  private readonly filters: FilterFamily[][];
  private readonly backings: ReadonlyMap<string, ExternalKeyValueStore>;

  constructor(options: LifecycleBinderOptions = {}) {
    this.config = resolveConfig(options.config);
    this.locator = new AnnotationLocator(this.config);
    this.mutations = byFamily(options.mutations ?? ENVIRONMENT_FAMILIES);
    this.filters = byFamily(options.filters ?? DISABLE_IF_FAMILIES);
    this.backings = new Map(
      Object.entries({ [ENVIRONMENT_DOMAIN]: this.config.environment, ...options.stores })
    );
  }

  /**
   * Resolve and apply the unit's state directives.
   *
   * The whole plan is resolved and checked before anything is written, so a
   * ConfigurationError or ConflictError leaves external state untouched.
   * Directives from outer scopes are applied first.
   *
   * @throws {ConfigurationError} on invalid annotation attributes
   * @throws {ConflictError} if two directives target the same key
   */
  beforeUnit(context: ResolutionContext): UnitToken {
    const plan = this.plan(context);
    const unitId = nextUnitId();
    const domains: string[] = [];

    try {
      for (const directive of plan) {
        const { domain, key, value } = directive.payload;
        if (!domains.includes(domain)) domains.push(domain);
        this.storeFor(domain).apply(unitId, key, value, origin(directive));
      }
    } catch (err) {
      const rollback = this.restoreDomains(unitId, domains).errors;
      if (rollback.length > 0) throw new RestorationError([toError(err), ...rollback]);
      throw err;
    }

    log('unit %s (%s): applied %d directive(s)', unitId, context.name, plan.length);
    return { unitId, scope: context.name, domains, phase: UnitPhase.StateApplied };
  }

  /**
   * Restore everything `token`'s unit applied. Idempotent.
   *
   * Every domain is restored even if an earlier one fails.
   *
   * @throws {RestorationError} listing every entry that could not be restored
   */
  afterUnit(token: UnitToken): RestoreReport[] {
    if (token.phase === UnitPhase.StateRestored) return [];
    token.phase = UnitPhase.StateRestored;

    const { reports, errors } = this.restoreDomains(token.unitId, token.domains);
    log('unit %s (%s): restored', token.unitId, token.scope);
    if (errors.length > 0) throw new RestorationError(errors);
    return reports;
  }

  /**
   * Decide whether an invocation with `args` runs.
   *
   * Filters are checked innermost scope first and in declaration order; the
   * first one that matches aborts the invocation.
   *
   * @throws {ConfigurationError} if the test has no parameters or an index is out of range
   * @throws {ResolutionError} if a parameter name is not declared
   */
  filterInvocation(context: ResolutionContext, args: readonly unknown[]): InvocationDecision {
    const method = methodScopeOf(context);
    const unitName = method?.name ?? context.name;
    const parameterNames = method?.signature?.parameterNames ?? [];
    // Function.length skips rest and defaulted parameters; declared names take precedence.
    const declared = method?.signature
      ? Math.max(method.signature.parameterCount, parameterNames.length)
      : args.length;

    for (const group of this.filters) {
      for (const directive of this.locator.locateAll(context, group)) {
        if (declared === 0) {
          throw new ConfigurationError(
            directive.annotation,
            `Can't disable based on arguments, because method ${unitName} had no parameters.`
          );
        }

        const reason = this.evaluate(directive, args, parameterNames);
        if (reason !== undefined) {
          log('%s: %s', unitName, reason);
          return { action: 'abort', reason };
        }
      }
    }
    return CONTINUE;
  }

  private evaluate(
    directive: FilterDirective,
    args: readonly unknown[],
    parameterNames: readonly string[]
  ): string | undefined {
    const { target, predicate } = directive.payload;
    const prefix = `Invocation disabled by @${directive.annotation}`;

    switch (target.type) {
      case 'any': {
        for (let i = 0; i < args.length; i++) {
          const match = describeMatch(predicate, args[i]);
          if (match !== undefined) return `${prefix}: argument [${i}] '${String(args[i])}' ${match}.`;
        }
        return undefined;
      }
      case 'all': {
        if (args.length === 0) return undefined;
        const matches = args.map((arg) => describeMatch(predicate, arg));
        return matches.every((m) => m !== undefined) ? `${prefix}: every argument matched.` : undefined;
      }
      case 'index':
      case 'name': {
        const index = target.type === 'index' ? target.index : parameterNames.indexOf(target.name);
        if (index === -1 && target.type === 'name') {
          throw new ResolutionError(target.name, [...parameterNames]);
        }
        if (index >= args.length) {
          throw new ConfigurationError(
            directive.annotation,
            `Annotation has invalid index [${index}] but only ${args.length} argument(s) were provided.`
          );
        }
        const match = describeMatch(predicate, args[index]);
        if (match === undefined) return undefined;
        const label = target.type === 'name' ? `'${target.name}'` : `[${index}]`;
        return `${prefix}: argument ${label} '${String(args[index])}' ${match}.`;
      }
    }
  }

  /**
   * Locate and order the unit's mutations, failing before any write.
   */
  private plan(context: ResolutionContext): MutationDirective[] {
    const directives: MutationDirective[] = [];
    for (const group of this.mutations) directives.push(...this.locator.locateAll(context, group));

    const seen = new Map<string, MutationDirective>();
    for (const directive of directives) {
      const { domain, key } = directive.payload;
      this.storeFor(domain);
      const id = `${domain}\u0000${key}`;
      const previous = seen.get(id);
      if (previous) throw new ConflictError(domain, key, [origin(previous), origin(directive)]);
      seen.set(id, directive);
    }

    // Stable sort: outermost scope first, declaration order within a scope.
    return directives.sort((a, b) => b.scopeLevel - a.scopeLevel);
  }

  private storeFor(domain: string): ScopedStateStore {
    const backing = this.backings.get(domain);
    if (!backing) throw new Error(`No backing store registered for state domain '${domain}'.`);
    return ScopedStateStore.forDomain(domain, backing);
  }

  private restoreDomains(
    unitId: UnitId,
    domains: readonly string[]
  ): { reports: RestoreReport[]; errors: Error[] } {
    const reports: RestoreReport[] = [];
    const errors: Error[] = [];
    for (let i = domains.length - 1; i >= 0; i--) {
      try {
        reports.push(this.storeFor(domains[i]).restoreAll(unitId));
      } catch (err) {
        if (err instanceof RestorationError) errors.push(...err.errors);
        else errors.push(toError(err));
      }
    }
    return { reports, errors };
  }
}
