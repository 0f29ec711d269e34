import type { ReportEntryRecord } from '../extensions/report-entry.js';

/** A key whose value changed while a unit's state was applied. */
export interface DriftedKey {
  readonly domain: string;
  readonly key: string;
  /** Scope of the unit that applied the key */
  readonly unit: string;
}

export type TestStatus = 'succeeded' | 'failed' | 'aborted';

/**
 * Outcome of one test invocation.
 */
export interface TestResult {
  /** `Class#method`, with `[n]` appended for parameterized invocations */
  readonly displayName: string;
  readonly className: string;
  readonly methodName: string;
  /** 1-based invocation index of a parameterized test */
  readonly invocation?: number;
  readonly arguments?: readonly unknown[];
  readonly status: TestStatus;
  readonly error?: Error;
  /** Further errors raised after `error`, such as a failed restore */
  readonly suppressed: readonly Error[];
  readonly abortReason?: string;
  readonly reportEntries: readonly ReportEntryRecord[];
  /** Keys the test changed behind its own annotations; restored regardless */
  readonly drifted: readonly DriftedKey[];
  readonly durationMs: number;
}

/**
 * Everything an engine run produced.
 *
 * @example
 * ```typescript
 * const results = await TestKit.executeTestClass(MyTests);
 * results.counts;     // { total: 3, succeeded: 2, failed: 1, aborted: 0 }
 * results.failed()[0].error?.message;
 * ```
 */
export class ExecutionResults {
  constructor(
    readonly tests: readonly TestResult[],
    /** Errors raised while tearing down container units */
    readonly containerErrors: readonly Error[] = [],
    /** Drift detected while tearing down container units */
    readonly containerDrift: readonly DriftedKey[] = []
  ) {}

  succeeded(): TestResult[] {
    return this.tests.filter((t) => t.status === 'succeeded');
  }

  failed(): TestResult[] {
    return this.tests.filter((t) => t.status === 'failed');
  }

  aborted(): TestResult[] {
    return this.tests.filter((t) => t.status === 'aborted');
  }

  get counts(): { total: number; succeeded: number; failed: number; aborted: number } {
    return {
      total: this.tests.length,
      succeeded: this.succeeded().length,
      failed: this.failed().length,
      aborted: this.aborted().length,
    };
  }

  /**
   * The only test of the run.
   *
   * @throws Error if the run did not produce exactly one test
   */
  single(): TestResult {
    if (this.tests.length !== 1) {
      throw new Error(`Expected exactly one test, but the run produced ${this.tests.length}.`);
    }
    return this.tests[0];
  }

  /** Every drifted key of the run, tests first, then containers. */
  drifted(): DriftedKey[] {
    return [...this.tests.flatMap((t) => t.drifted), ...this.containerDrift];
  }

  /** Every published report entry, in publication order. */
  reportEntries(): ReportEntryRecord[] {
    return this.tests.flatMap((t) => t.reportEntries);
  }
}
