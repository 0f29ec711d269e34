import type { z } from 'zod';
import type { AnnotationKind, AttributeBag } from '../core/annotation-kind.js';
import { ConfigurationError } from '../errors/errors.js';

/**
 * Validate an annotation instance's attributes against `schema`.
 *
 * The first zod issue becomes the ConfigurationError's reason; issues raised at
 * the root (cross-attribute refinements) are reported without a path prefix.
 */
export function parseAttributes<S extends z.ZodTypeAny>(
  kind: AnnotationKind,
  schema: S,
  attributes: AttributeBag
): z.output<S> {
  const result = schema.safeParse(attributes);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const reason = issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
  throw new ConfigurationError(kind.name, reason);
}

/** `string | string[]` attribute normalised to an array; absent means empty. */
export function stringList(values: string | readonly string[] | undefined): readonly string[] {
  if (values === undefined) return [];
  return typeof values === 'string' ? [values] : values;
}
