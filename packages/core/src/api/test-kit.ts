import { TestEngine } from '../engine/engine.js';
import type { ExecutionResults } from '../engine/execution-results.js';
import type { Constructor, PinionConfig } from '../types/types.js';

/**
 * The `TestKit` class runs decorated test classes in process and returns their
 * results, for testing extensions end to end.
 *
 * @remarks
 * - Every call builds a fresh engine, so configuration never leaks between runs
 * - State is applied and restored exactly as in a real run; pass an
 *   `InMemoryKeyValueStore` as `environment` to keep `process.env` untouched
 */
export class TestKit {
  /**
   * Run every test of `testClass`, including its @Nested classes.
   *
   * @example
   * ```typescript
   * @SetEnvironmentVariable('MODE', 'strict')
   * class ModeTests {
   *   @Test()
   *   seesMode() {
   *     expect(process.env.MODE).toBe('strict');
   *   }
   * }
   *
   * const results = await TestKit.executeTestClass(ModeTests);
   * results.counts.succeeded; // 1
   * ```
   */
  static executeTestClass(testClass: Constructor, config?: PinionConfig): Promise<ExecutionResults> {
    return new TestEngine(config).executeClass(testClass);
  }

  /**
   * Run one test method of `testClass`.
   *
   * @throws Error if `testClass` has no test method called `methodName`
   */
  static executeTestMethod(
    testClass: Constructor,
    methodName: string,
    config?: PinionConfig
  ): Promise<ExecutionResults> {
    return new TestEngine(config).executeMethod(testClass, methodName);
  }
}
