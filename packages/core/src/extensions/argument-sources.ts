/*
 * Argument sources of @ParameterizedTest methods.
 *
 * A parameterized test takes its rows from exactly one of:
 *   - @ValueSource({ strings | numbers | booleans })   one argument per row
 *   - @MethodSource(() => rows)                        rows from a factory
 *   - @RangeSource({ from, to, step, closed })         one number per row
 */
import { z } from 'zod';
import { annotationKind, type AttributeBag } from '../core/annotation-kind.js';
import type { AnnotationLocator } from '../core/annotation-locator.js';
import type { ResolutionContext } from '../core/resolution-context.js';
import { ConfigurationError } from '../errors/errors.js';
import { DirectiveKind, ResolutionPolicy, type AnnotationFamily } from '../types/types.js';
import { parseAttributes } from './attributes.js';
import { RangeSourceFamily, rangeValues } from './range-source.js';

/** Arguments of one invocation. */
export type ArgumentRow = readonly unknown[];

export type ValueSourceAttributes = {
  strings?: readonly string[];
  numbers?: readonly number[];
  booleans?: readonly boolean[];
};

export type RowFactory = () => Iterable<unknown>;

export const ValueSourceKind = annotationKind<ValueSourceAttributes>('ValueSource');

export const MethodSourceKind = annotationKind<{ rows: RowFactory }>('MethodSource');

type ArgumentsFamily = AnnotationFamily<typeof DirectiveKind.ProvideArguments, readonly ArgumentRow[]>;

const valueSchema = z
  .object({
    strings: z.array(z.string()).optional(),
    numbers: z.array(z.number()).optional(),
    booleans: z.array(z.boolean()).optional(),
  })
  .strict()
  .superRefine((attributes, ctx) => {
    const provided = Object.values(attributes).filter((v) => v !== undefined).length;
    if (provided !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Exactly one type of input must be provided in the @ValueSource annotation, but there were ${provided}.`,
      });
    }
  });

const methodSchema = z
  .object({
    rows: z.custom<RowFactory>((v) => typeof v === 'function', { message: 'rows must be a function' }),
  })
  .strict();

export const ValueSourceFamily: ArgumentsFamily = Object.freeze({
  family: 'value-source',
  annotation: ValueSourceKind,
  directive: DirectiveKind.ProvideArguments,
  policy: ResolutionPolicy.StopAtFirst,
  translate(attributes: AttributeBag): readonly ArgumentRow[] {
    const { strings, numbers, booleans } = parseAttributes(ValueSourceKind, valueSchema, attributes);
    const values: readonly unknown[] = strings ?? numbers ?? booleans ?? [];
    return values.map((v) => [v]);
  },
});

export const MethodSourceFamily: ArgumentsFamily = Object.freeze({
  family: 'method-source',
  annotation: MethodSourceKind,
  directive: DirectiveKind.ProvideArguments,
  policy: ResolutionPolicy.StopAtFirst,
  translate(attributes: AttributeBag): readonly ArgumentRow[] {
    const { rows } = parseAttributes(MethodSourceKind, methodSchema, attributes);
    return Array.from(rows(), (row): ArgumentRow => (Array.isArray(row) ? row : [row]));
  },
});

/**
 * The argument rows of a parameterized test.
 *
 * @throws {ConfigurationError} unless exactly one argument source is declared
 */
export function resolveArguments(
  locator: AnnotationLocator,
  context: ResolutionContext
): readonly ArgumentRow[] {
  const sources: (readonly ArgumentRow[])[] = [
    ...locator.locate(context, ValueSourceFamily).map((d) => d.payload),
    ...locator.locate(context, MethodSourceFamily).map((d) => d.payload),
    ...locator.locate(context, RangeSourceFamily).map((d) => rangeValues(d.payload).map((v) => [v])),
  ];

  if (sources.length !== 1) {
    throw new ConfigurationError(
      'ParameterizedTest',
      `Expected exactly one annotation to provide an ArgumentSource, found ${sources.length}.`
    );
  }
  return sources[0];
}
