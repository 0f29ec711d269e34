import { z } from 'zod';
import { annotationKind } from '../core/annotation-kind.js';
import {
  ExpectedErrorNotThrownError,
  TestTimeoutExceededError,
} from '../errors/errors.js';
import { parseAttributes } from './attributes.js';

/** Any error class, including abstract ones. */
export type ErrorClass = abstract new (...args: never[]) => Error;

/**
 * Options of `@VintageTest`, mirroring the old-style `@Test(expected, timeout)`.
 */
export type VintageOptions = {
  /** The test passes only if it throws an instance of this class */
  expected?: ErrorClass;
  /** Maximum run time in milliseconds; measured after the fact, not enforced */
  timeout?: number;
};

export const VintageTestKind = annotationKind<VintageOptions>('VintageTest');

const schema = z
  .object({
    expected: z
      .custom<ErrorClass>((v) => typeof v === 'function', { message: 'expected must be an error class' })
      .optional(),
    timeout: z.number().int().positive().optional(),
  })
  .strict();

/**
 * @throws {ConfigurationError} if `timeout` is not a positive integer or
 *   `expected` is not a class
 */
export function parseVintageOptions(options: VintageOptions): VintageOptions {
  return parseAttributes(VintageTestKind, schema, options);
}

/**
 * Run a vintage test body and apply its `expected` and `timeout` rules.
 *
 * An error of the expected class (or a subclass) counts as success. Any other
 * error is rethrown unchanged. The timeout is checked once the body settled.
 */
export async function runVintage(
  options: VintageOptions,
  testName: string,
  body: () => Promise<unknown>
): Promise<void> {
  const started = performance.now();
  try {
    await body();
  } catch (err) {
    if (options.expected && err instanceof options.expected) return;
    throw err;
  }

  if (options.expected) throw new ExpectedErrorNotThrownError(options.expected.name);

  const elapsed = Math.round(performance.now() - started);
  if (options.timeout !== undefined && elapsed > options.timeout) {
    throw new TestTimeoutExceededError(testName, options.timeout, elapsed);
  }
}
