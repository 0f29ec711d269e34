export { TestKit } from './api/test-kit.js';

export {
  ClearEnvironmentVariable,
  ClearEnvironmentVariables,
  DisableIfAllParameters,
  DisableIfAnyParameter,
  DisableIfParameter,
  MethodSource,
  Nested,
  ParameterizedTest,
  RangeSource,
  ReportEntry,
  SetEnvironmentVariable,
  SetEnvironmentVariables,
  Test,
  ValueSource,
  VintageTest,
} from './decorators/index.js';
export type { ParameterizedTestOptions, ScopeDecorator } from './decorators/index.js';
export { AnnotationRegistry } from './registry/annotation-registry.js';
export type { TestDeclaration, TestMethod } from './registry/annotation-registry.js';

export { ResolutionPolicy, DirectiveKind, UNSET, isConstructor } from './types/types.js';
export type {
  AnnotationFamily,
  ArgumentFilter,
  Constructor,
  ContentPredicate,
  Directive,
  ExternalValue,
  FilterDirective,
  FilterFamily,
  InvocationDecision,
  MutationDirective,
  MutationFamily,
  PinionConfig,
  StateMutation,
  TargetSelector,
  Unset,
} from './types/types.js';

export * from './core/annotation-kind.js';
export * from './core/resolution-context.js';

export { AnnotationLocator } from './core/annotation-locator.js';
export { LifecycleBinder, UnitPhase } from './core/lifecycle-binder.js';
export type { LifecycleBinderOptions, UnitToken } from './core/lifecycle-binder.js';
export { ScopedStateStore, nextUnitId } from './core/scoped-state-store.js';
export type { RestoreReport, SavedEntry, SavedEntryHandle, UnitId } from './core/scoped-state-store.js';
export { InMemoryKeyValueStore, ProcessEnvironmentStore } from './core/external-store.js';
export type { ExternalKeyValueStore } from './core/external-store.js';
export { resolveConfig, POLICY_ENV_VAR } from './config/config.js';
export type { ResolvedConfig } from './config/config.js';

// Engine
export { TestEngine, abortTest } from './engine/engine.js';
export { ExecutionResults } from './engine/execution-results.js';
export type { DriftedKey, TestResult, TestStatus } from './engine/execution-results.js';

// Annotation families
export * from './extensions/environment.js';
export * from './extensions/disable-if-parameter.js';
export * from './extensions/report-entry.js';
export * from './extensions/range-source.js';
export * from './extensions/argument-sources.js';
export * from './extensions/vintage.js';

// Errors
export {
  ConfigurationError,
  ConflictError,
  DomainLockedError,
  ExpectedErrorNotThrownError,
  InvalidConfigError,
  ResolutionError,
  RestorationError,
  TestAbortedError,
  TestTimeoutExceededError,
} from './errors/errors.js';
