import type { AnnotationKind, AttributeBag } from '../core/annotation-kind.js';
import type { ExternalKeyValueStore } from '../core/external-store.js';
import type { ScopeDescriptor } from '../core/resolution-context.js';

/**
 * Generic constructor signature used for decorated test classes.
 *
 * @template T - Type produced by the constructor
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = object> = new (...args: any[]) => T;

/**
 * Runtime check that a decorator target can be instantiated with `new`.
 * Arrow functions and plain functions without a prototype fail it.
 */
export function isConstructor(value: unknown): value is Constructor {
  return typeof value === 'function' && value.prototype !== undefined;
}

/**
 * How far the locator walks once a scope has yielded matches.
 *
 *   - **StopAtFirst**: the innermost scope carrying the annotation wins; outer scopes are ignored
 *   - **Accumulate**: every enclosing scope contributes, innermost first
 *
 * @example
 * ```typescript
 * locate(context, SetEnvironmentFamily, ResolutionPolicy.Accumulate);
 * ```
 */
export const ResolutionPolicy = {
  StopAtFirst: 'stop-at-first',
  Accumulate: 'accumulate',
} as const;

export type ResolutionPolicy = (typeof ResolutionPolicy)[keyof typeof ResolutionPolicy];

/**
 * What a resolved annotation asks the binder to do.
 */
export const DirectiveKind = {
  /** Write a value to an external key for the unit's duration */
  SetExternalValue: 'set-external-value',
  /** Remove an external key for the unit's duration */
  ClearExternalValue: 'clear-external-value',
  /** Abort an invocation whose arguments match a predicate */
  FilterByArgumentContent: 'filter-by-argument-content',
  /** Publish a key/value pair to the test report */
  PublishReportEntry: 'publish-report-entry',
  /** Supply the argument rows of a parameterized test */
  ProvideArguments: 'provide-arguments',
} as const;

export type DirectiveKind = (typeof DirectiveKind)[keyof typeof DirectiveKind];

/**
 * A resolved instruction derived from one annotation instance.
 *
 * Directives are frozen and live for one resolution pass only.
 */
export interface Directive<K extends DirectiveKind = DirectiveKind, P = unknown> {
  readonly kind: K;
  /** 0 for the innermost scope, increasing outward */
  readonly scopeLevel: number;
  /** Name of the scope the annotation was found on */
  readonly scopeName: string;
  /** Name of the annotation the directive came from */
  readonly annotation: string;
  readonly payload: P;
}

/**
 * An annotation kind together with how it is resolved and translated.
 *
 * The translator validates an instance's attributes and throws a
 * ConfigurationError when they contradict each other.
 */
export interface AnnotationFamily<K extends DirectiveKind = DirectiveKind, P = unknown> {
  /** Family name, shared by related kinds; keys policy overrides in {@link PinionConfig} */
  readonly family: string;
  readonly annotation: AnnotationKind;
  readonly directive: K;
  /** Policy used unless configuration overrides it */
  readonly policy: ResolutionPolicy;
  translate(attributes: AttributeBag, scope: ScopeDescriptor): P;
}

/** Sentinel for "the key was absent". */
export const UNSET: unique symbol = Symbol('pinion.unset');
export type Unset = typeof UNSET;

export type ExternalValue = string | Unset;

/** Payload of Set/Clear directives. */
export interface StateMutation {
  /** State domain, e.g. `environment` */
  readonly domain: string;
  readonly key: string;
  readonly value: ExternalValue;
}

export type TargetSelector =
  | { readonly type: 'index'; readonly index: number; readonly explicit: boolean }
  | { readonly type: 'name'; readonly name: string }
  | { readonly type: 'any' }
  | { readonly type: 'all' };

export type ContentPredicate =
  | { readonly type: 'contains'; readonly values: readonly string[] }
  | {
      readonly type: 'matches';
      /** Anchored versions of `sources` (whole-string match) */
      readonly patterns: readonly RegExp[];
      /** Patterns as written in the annotation */
      readonly sources: readonly string[];
    };

/** Payload of FilterByArgumentContent directives. */
export interface ArgumentFilter {
  readonly target: TargetSelector;
  readonly predicate: ContentPredicate;
}

export type MutationDirective = Directive<
  typeof DirectiveKind.SetExternalValue | typeof DirectiveKind.ClearExternalValue,
  StateMutation
>;

export type FilterDirective = Directive<typeof DirectiveKind.FilterByArgumentContent, ArgumentFilter>;

export type MutationFamily = AnnotationFamily<
  typeof DirectiveKind.SetExternalValue | typeof DirectiveKind.ClearExternalValue,
  StateMutation
>;

export type FilterFamily = AnnotationFamily<
  typeof DirectiveKind.FilterByArgumentContent,
  ArgumentFilter
>;

/**
 * Outcome of {@link LifecycleBinder.filterInvocation}.
 */
export type InvocationDecision =
  | { readonly action: 'continue' }
  | { readonly action: 'abort'; readonly reason: string };

/**
 * Configuration accepted by the binder and the engine.
 */
export interface PinionConfig {
  /**
   * Per-family policy overrides, keyed by family name
   * (`environment`, `disable-if-parameter`, `report-entry`, `range-source`).
   */
  policies?: Record<string, ResolutionPolicy>;

  /**
   * Policy applied to every family without an explicit override.
   * Defaults to `PINION_RESOLUTION_POLICY` when that variable is set.
   */
  defaultPolicy?: ResolutionPolicy;

  /**
   * Backing store of the `environment` domain.
   *
   * @default process.env
   */
  environment?: ExternalKeyValueStore;
}
