import {
  MethodSourceKind,
  ValueSourceKind,
  type RowFactory,
  type ValueSourceAttributes,
} from '../extensions/argument-sources.js';
import { RangeSourceKind, type RangeSourceAttributes } from '../extensions/range-source.js';
import { methodAnnotation } from './annotate.js';

/** One invocation per literal value. */
export function ValueSource(values: ValueSourceAttributes): MethodDecorator {
  return methodAnnotation(ValueSourceKind, values);
}

/**
 * One invocation per row returned by `rows`. A row that is not an array is a
 * single argument.
 */
export function MethodSource(rows: RowFactory): MethodDecorator {
  return methodAnnotation(MethodSourceKind, { rows });
}

/**
 * One invocation per number of the range `from` (inclusive) to `to` (exclusive
 * unless `closed`), `step` apart.
 *
 * @example
 * ```typescript
 * @ParameterizedTest()
 * @RangeSource({ from: 10, to: 0, step: -5 }) // 10, 5
 * countsDown(n: number) {}
 * ```
 */
export function RangeSource(range: RangeSourceAttributes): MethodDecorator {
  return methodAnnotation(RangeSourceKind, range);
}
