import { z } from 'zod';
import { annotationKind, type AttributeBag } from '../core/annotation-kind.js';
import { ConfigurationError } from '../errors/errors.js';
import {
  DirectiveKind,
  ResolutionPolicy,
  type AnnotationFamily,
} from '../types/types.js';
import { parseAttributes } from './attributes.js';

/**
 * A validated numeric range.
 *
 * Values are `from + i * step` for i = 0, 1, ... while they stay before `to`
 * (or reach it, when `closed`).
 */
export interface NumericRange {
  readonly from: number;
  readonly to: number;
  readonly step: number;
  readonly closed: boolean;
}

export type RangeSourceAttributes = {
  from: number;
  to: number;
  step?: number;
  closed?: boolean;
};

export const RangeSourceKind = annotationKind<RangeSourceAttributes>('RangeSource');

const finite = z.number().finite();

const schema = z
  .object({ from: finite, to: finite, step: finite.default(1), closed: z.boolean().default(false) })
  .strict();

/**
 * Check the range's bounds against its step.
 *
 * @throws {ConfigurationError} when the range is empty or never reaches `to`
 */
export function validateRange(range: NumericRange): NumericRange {
  const { from, to, step, closed } = range;
  if (step === 0) {
    throw new ConfigurationError(RangeSourceKind.name, 'Illegal range. The step cannot be zero.');
  }
  if (!closed && from === to) {
    throw new ConfigurationError(
      RangeSourceKind.name,
      'Illegal range. Equal from and to will produce an empty range.'
    );
  }
  if ((from < to && step < 0) || (from > to && step > 0)) {
    throw new ConfigurationError(
      RangeSourceKind.name,
      `Illegal range. There's no way to get from ${from} to ${to} with a step of ${step}.`
    );
  }
  return range;
}

/**
 * Materialise the range.
 *
 * @example
 * ```typescript
 * rangeValues({ from: 0, to: 6, step: 2, closed: false }); // [0, 2, 4]
 * rangeValues({ from: 0, to: 6, step: 2, closed: true });  // [0, 2, 4, 6]
 * ```
 */
export function rangeValues(range: NumericRange): number[] {
  const { from, to, step, closed } = range;
  const inRange = (v: number): boolean =>
    step > 0 ? (closed ? v <= to : v < to) : closed ? v >= to : v > to;

  const out: number[] = [];
  for (let i = 0, v = from; inRange(v); v = from + ++i * step) out.push(v);
  return out;
}

export const RangeSourceFamily: AnnotationFamily<typeof DirectiveKind.ProvideArguments, NumericRange> =
  Object.freeze({
    family: 'range-source',
    annotation: RangeSourceKind,
    directive: DirectiveKind.ProvideArguments,
    policy: ResolutionPolicy.StopAtFirst,
    translate(attributes: AttributeBag): NumericRange {
      return validateRange(parseAttributes(RangeSourceKind, schema, attributes));
    },
  });
