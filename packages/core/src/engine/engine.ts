/*
 * TestEngine
 * ----------
 * In-process host for decorated test classes. Drives each unit through:
 *
 *   Resolving → (Aborted | StateApplied) → Executing → StateRestored
 *
 * Containers (a class and each class enclosing it) are units too. Their state is
 * applied before any of their tests run and restored after the last one, so a
 * test sees its method state on top of its class state on top of the enclosing
 * classes' state.
 */
import { LifecycleBinder, type UnitToken } from '../core/lifecycle-binder.js';
import type { RestoreReport } from '../core/scoped-state-store.js';
import type { ResolutionContext } from '../core/resolution-context.js';
import { TestAbortedError } from '../errors/errors.js';
import { resolveArguments, type ArgumentRow } from '../extensions/argument-sources.js';
import { reportEntriesFor, type ReportEntryRecord } from '../extensions/report-entry.js';
import { parseVintageOptions, runVintage } from '../extensions/vintage.js';
import { logger } from '../logging/logger.js';
import { AnnotationRegistry, type TestMethod } from '../registry/annotation-registry.js';
import type { Constructor, PinionConfig } from '../types/types.js';
import { classChain, contextForClass, contextForMethod } from './context-builder.js';
import { ExecutionResults, type DriftedKey, type TestResult, type TestStatus } from './execution-results.js';

const log = logger('engine');

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Abort the running test. The engine reports it as aborted, not failed.
 */
export function abortTest(reason: string): never {
  throw new TestAbortedError(reason);
}

function driftOf(unit: string, reports: readonly RestoreReport[]): DriftedKey[] {
  return reports.flatMap((r) => r.drifted.map((key) => ({ domain: r.domain, key, unit })));
}

/** What container teardown produced, collected across a run. */
type ContainerLog = {
  errors: Error[];
  drifted: DriftedKey[];
};

type Outcome = {
  status: TestStatus;
  error?: Error;
  suppressed?: Error[];
  abortReason?: string;
  reportEntries?: ReportEntryRecord[];
  drifted?: DriftedKey[];
};

export class TestEngine {
  readonly binder: LifecycleBinder;

  constructor(config: PinionConfig = {}) {
    this.binder = new LifecycleBinder({ config });
  }

  /**
   * Run every test of `cls`, then of each class @Nested in it.
   */
  async executeClass(cls: Constructor): Promise<ExecutionResults> {
    const tests: TestResult[] = [];
    const containers: ContainerLog = { errors: [], drifted: [] };

    await this.within(classChain(cls).slice(0, -1), { cls }, tests, containers, () =>
      this.runContainer(cls, tests, containers)
    );

    return new ExecutionResults(tests, containers.errors, containers.drifted);
  }

  /**
   * Run a single test method of `cls`, inside the containers of `cls` and its
   * enclosing classes.
   *
   * @throws Error if `cls` has no test method called `name`
   */
  async executeMethod(cls: Constructor, name: string): Promise<ExecutionResults> {
    const method = AnnotationRegistry.testMethods(cls).find((m) => m.name === name);
    if (!method) throw new Error(`${cls.name} has no test method '${name}'.`);

    const tests: TestResult[] = [];
    const containers: ContainerLog = { errors: [], drifted: [] };
    await this.within(classChain(cls), { cls, only: [method] }, tests, containers, async () => {
      tests.push(...(await this.runTest(cls, method)));
    });

    return new ExecutionResults(tests, containers.errors, containers.drifted);
  }

  /**
   * Apply the container units of `chain` (outermost first), run `body` inside
   * them, and restore them innermost first.
   *
   * If a container cannot be set up, the tests of `target` (all of them, or
   * `target.only`) are reported as failed with the setup error.
   */
  private async within(
    chain: readonly Constructor[],
    target: { cls: Constructor; only?: readonly TestMethod[] },
    tests: TestResult[],
    containers: ContainerLog,
    body: () => Promise<void>
  ): Promise<void> {
    if (chain.length === 0) return body();

    const [outer, ...rest] = chain;
    let token: UnitToken;
    try {
      token = this.binder.beforeUnit(contextForClass(outer));
    } catch (err) {
      const error = toError(err);
      log('container %s failed to start: %s', outer.name, error.message);
      tests.push(...this.failAll(target.cls, error, target.only));
      return;
    }

    try {
      await this.within(rest, target, tests, containers, body);
    } finally {
      try {
        containers.drifted.push(...driftOf(outer.name, this.binder.afterUnit(token)));
      } catch (err) {
        containers.errors.push(toError(err));
      }
    }
  }

  private async runContainer(cls: Constructor, tests: TestResult[], containers: ContainerLog): Promise<void> {
    await this.within([cls], { cls }, tests, containers, async () => {
      for (const method of AnnotationRegistry.testMethods(cls)) {
        tests.push(...(await this.runTest(cls, method)));
      }
      for (const nested of AnnotationRegistry.nestedIn(cls)) {
        await this.runContainer(nested, tests, containers);
      }
    });
  }

  /**
   * Results for every test under `cls` (nested classes included) failing with `error`.
   */
  private failAll(cls: Constructor, error: Error, only?: readonly TestMethod[]): TestResult[] {
    const methods = only ?? AnnotationRegistry.testMethods(cls);
    const own = methods.map((m) => this.result(cls, m, undefined, undefined, { status: 'failed', error }, 0));
    if (only) return own;
    return [...own, ...AnnotationRegistry.nestedIn(cls).flatMap((n) => this.failAll(n, error))];
  }

  private async runTest(cls: Constructor, method: TestMethod): Promise<TestResult[]> {
    const context = contextForMethod(cls, method);
    if (method.declaration.type !== 'parameterized') {
      return [await this.invoke(cls, method, context)];
    }

    let rows: readonly ArgumentRow[];
    try {
      rows = resolveArguments(this.binder.locator, context);
    } catch (err) {
      return [this.result(cls, method, undefined, undefined, { status: 'failed', error: toError(err) }, 0)];
    }

    const results: TestResult[] = [];
    for (let i = 0; i < rows.length; i++) {
      results.push(await this.invoke(cls, method, context, rows[i], i + 1));
    }
    return results;
  }

  /**
   * Run one test unit.
   */
  private async invoke(
    cls: Constructor,
    method: TestMethod,
    context: ResolutionContext,
    args?: ArgumentRow,
    invocation?: number
  ): Promise<TestResult> {
    const started = performance.now();
    const done = (outcome: Outcome): TestResult =>
      this.result(cls, method, invocation, args, outcome, performance.now() - started);

    // Resolving
    let token: UnitToken;
    try {
      if (args) {
        const decision = this.binder.filterInvocation(context, args);
        if (decision.action === 'abort') return done({ status: 'aborted', abortReason: decision.reason });
      }
      token = this.binder.beforeUnit(context);
    } catch (err) {
      return done({ status: 'failed', error: toError(err) });
    }

    // StateApplied → Executing
    const reportEntries: ReportEntryRecord[] = [];
    let outcome: Outcome;
    try {
      reportEntries.push(...reportEntriesFor(this.binder.locator, context));
      await this.execute(cls, method, args ?? [], context.name);
      outcome = { status: 'succeeded' };
    } catch (err) {
      outcome =
        err instanceof TestAbortedError
          ? { status: 'aborted', abortReason: err.reason }
          : { status: 'failed', error: toError(err) };
    }

    // StateRestored
    let drifted: DriftedKey[] = [];
    try {
      drifted = driftOf(context.name, this.binder.afterUnit(token));
    } catch (err) {
      const error = toError(err);
      outcome =
        outcome.status === 'failed'
          ? { ...outcome, suppressed: [error] }
          : { status: 'failed', error };
    }

    return done({ ...outcome, reportEntries, drifted });
  }

  private async execute(
    cls: Constructor,
    method: TestMethod,
    args: readonly unknown[],
    displayName: string
  ): Promise<void> {
    const instance = new cls();
    const fn: unknown = Reflect.get(instance, method.name);
    if (typeof fn !== 'function') {
      throw new Error(`${displayName} is not a method.`);
    }
    const body = async (): Promise<unknown> => fn.apply(instance, args);

    if (method.declaration.type === 'vintage') {
      await runVintage(parseVintageOptions(method.declaration.options), displayName, body);
    } else {
      await body();
    }
  }

  private result(
    cls: Constructor,
    method: TestMethod,
    invocation: number | undefined,
    args: ArgumentRow | undefined,
    outcome: Outcome,
    durationMs: number
  ): TestResult {
    const base = `${cls.name}#${method.name}`;
    const result: TestResult = {
      displayName: invocation === undefined ? base : `${base}[${invocation}]`,
      className: cls.name,
      methodName: method.name,
      invocation,
      arguments: args,
      status: outcome.status,
      error: outcome.error,
      suppressed: outcome.suppressed ?? [],
      abortReason: outcome.abortReason,
      reportEntries: outcome.reportEntries ?? [],
      drifted: outcome.drifted ?? [],
      durationMs,
    };
    log('%s: %s', result.displayName, result.status);
    if (result.drifted.length > 0) {
      log('%s: drifted %s', result.displayName, result.drifted.map((d) => d.key).join(', '));
    }
    return result;
  }
}
