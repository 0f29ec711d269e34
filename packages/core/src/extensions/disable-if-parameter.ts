/*
 * Argument-content filters for parameterized tests.
 *
 *   @DisableIfParameter({ index | name, contains | matches })   one argument
 *   @DisableIfAnyParameter({ contains | matches })              at least one argument
 *   @DisableIfAllParameters({ contains | matches })             every argument
 *
 * Arguments are compared by their string form. `contains` is a case-sensitive
 * substring test; `matches` is a regular expression that must match the whole
 * string. The family accumulates across scopes, so a class-level filter still
 * applies to a method carrying its own.
 */
import { z } from 'zod';
import { annotationKind, type AttributeBag } from '../core/annotation-kind.js';
import { ConfigurationError } from '../errors/errors.js';
import {
  DirectiveKind,
  ResolutionPolicy,
  type ArgumentFilter,
  type ContentPredicate,
  type FilterFamily,
  type TargetSelector,
} from '../types/types.js';
import { parseAttributes, stringList } from './attributes.js';

export const DISABLE_IF_FAMILY = 'disable-if-parameter';

type ContentAttributes = {
  contains?: string | readonly string[];
  matches?: string | readonly string[];
};

export type DisableIfParameterAttributes = ContentAttributes & {
  index?: number;
  name?: string;
};

export const DisableIfParameterKind = annotationKind<DisableIfParameterAttributes>(
  'DisableIfParameter',
  { repeatable: true }
);

export const DisableIfAnyParameterKind = annotationKind<ContentAttributes>('DisableIfAnyParameter');

export const DisableIfAllParametersKind = annotationKind<ContentAttributes>('DisableIfAllParameters');

const values = z.union([z.string(), z.array(z.string())]).optional();

function requireContent(annotation: string) {
  return (attributes: ContentAttributes, ctx: z.RefinementCtx): void => {
    const hasContains = stringList(attributes.contains).length > 0;
    const hasMatches = stringList(attributes.matches).length > 0;
    if (hasContains === hasMatches) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${annotation} requires that either \`contains\` or \`matches\` is set.`,
      });
    }
  };
}

const singleSchema = z
  .object({ index: z.number().optional(), name: z.string().optional(), contains: values, matches: values })
  .strict()
  .superRefine((attributes, ctx) => {
    const { index, name } = attributes;
    if (index !== undefined && name !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Using both name and index parameter targeting in a single @DisableIfParameter is not permitted.',
      });
      return;
    }
    if (index !== undefined && (!Number.isInteger(index) || index < 0)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Annotation has invalid index [${index}].` });
      return;
    }
    if (name !== undefined && name.trim() === '') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Parameter name must not be blank.' });
      return;
    }
    requireContent('DisableIfParameter')(attributes, ctx);
  });

const anySchema = z
  .object({ contains: values, matches: values })
  .strict()
  .superRefine(requireContent('DisableIfAnyParameter'));

const allSchema = z
  .object({ contains: values, matches: values })
  .strict()
  .superRefine(requireContent('DisableIfAllParameters'));

function compile(annotation: string, source: string): RegExp {
  try {
    return new RegExp(`^(?:${source})$`);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(annotation, `Invalid pattern '${source}': ${detail}`);
  }
}

function toPredicate(annotation: string, attributes: ContentAttributes): ContentPredicate {
  const contains = stringList(attributes.contains);
  if (contains.length > 0) return { type: 'contains', values: contains };

  const sources = stringList(attributes.matches);
  return { type: 'matches', sources, patterns: sources.map((s) => compile(annotation, s)) };
}

/**
 * How `argument` satisfies `predicate` (for example `contains 'x'`), or undefined
 * when it does not.
 */
export function describeMatch(predicate: ContentPredicate, argument: unknown): string | undefined {
  const text = String(argument);
  if (predicate.type === 'contains') {
    const hit = predicate.values.find((v) => text.includes(v));
    return hit === undefined ? undefined : `contains '${hit}'`;
  }
  const at = predicate.patterns.findIndex((p) => p.test(text));
  return at === -1 ? undefined : `matches '${predicate.sources[at]}'`;
}

export const DisableIfParameterFamily: FilterFamily = Object.freeze({
  family: DISABLE_IF_FAMILY,
  annotation: DisableIfParameterKind,
  directive: DirectiveKind.FilterByArgumentContent,
  policy: ResolutionPolicy.Accumulate,
  translate(attributes: AttributeBag): ArgumentFilter {
    const parsed = parseAttributes(DisableIfParameterKind, singleSchema, attributes);
    const target: TargetSelector =
      parsed.name !== undefined
        ? { type: 'name', name: parsed.name }
        : { type: 'index', index: parsed.index ?? 0, explicit: parsed.index !== undefined };
    return { target, predicate: toPredicate(DisableIfParameterKind.name, parsed) };
  },
});

export const DisableIfAnyParameterFamily: FilterFamily = Object.freeze({
  family: DISABLE_IF_FAMILY,
  annotation: DisableIfAnyParameterKind,
  directive: DirectiveKind.FilterByArgumentContent,
  policy: ResolutionPolicy.Accumulate,
  translate(attributes: AttributeBag): ArgumentFilter {
    const parsed = parseAttributes(DisableIfAnyParameterKind, anySchema, attributes);
    return { target: { type: 'any' }, predicate: toPredicate(DisableIfAnyParameterKind.name, parsed) };
  },
});

export const DisableIfAllParametersFamily: FilterFamily = Object.freeze({
  family: DISABLE_IF_FAMILY,
  annotation: DisableIfAllParametersKind,
  directive: DirectiveKind.FilterByArgumentContent,
  policy: ResolutionPolicy.Accumulate,
  translate(attributes: AttributeBag): ArgumentFilter {
    const parsed = parseAttributes(DisableIfAllParametersKind, allSchema, attributes);
    return { target: { type: 'all' }, predicate: toPredicate(DisableIfAllParametersKind.name, parsed) };
  },
});

export const DISABLE_IF_FAMILIES: readonly FilterFamily[] = Object.freeze([
  DisableIfParameterFamily,
  DisableIfAnyParameterFamily,
  DisableIfAllParametersFamily,
]);
