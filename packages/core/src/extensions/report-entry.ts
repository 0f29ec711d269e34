import { z } from 'zod';
import { annotationKind, type AttributeBag } from '../core/annotation-kind.js';
import type { AnnotationLocator } from '../core/annotation-locator.js';
import type { ResolutionContext } from '../core/resolution-context.js';
import {
  DirectiveKind,
  ResolutionPolicy,
  type AnnotationFamily,
} from '../types/types.js';
import { parseAttributes } from './attributes.js';

/** Key used by `@ReportEntry('text')`. */
export const DEFAULT_REPORT_KEY = 'value';

export interface ReportEntryRecord {
  readonly key: string;
  readonly value: string;
}

export const ReportEntryKind = annotationKind<{ key?: string; value: string }>('ReportEntry', {
  repeatable: true,
});

const schema = z
  .object({ key: z.string().default(DEFAULT_REPORT_KEY), value: z.string() })
  .strict()
  .superRefine(({ key, value }, ctx) => {
    if (key.trim() === '' || value.trim() === '') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Report entries can't have blank key or value: { key="${key}", value="${value}" }`,
      });
    }
  });

export const ReportEntryFamily: AnnotationFamily<typeof DirectiveKind.PublishReportEntry, ReportEntryRecord> =
  Object.freeze({
    family: 'report-entry',
    annotation: ReportEntryKind,
    directive: DirectiveKind.PublishReportEntry,
    policy: ResolutionPolicy.StopAtFirst,
    translate(attributes: AttributeBag): ReportEntryRecord {
      const { key, value } = parseAttributes(ReportEntryKind, schema, attributes);
      return { key, value };
    },
  });

/**
 * Entries a test publishes, in declaration order.
 *
 * `@ReportEntry` only targets methods, so under the default policy this is
 * exactly the method's own annotations.
 */
export function reportEntriesFor(
  locator: AnnotationLocator,
  context: ResolutionContext
): ReportEntryRecord[] {
  return locator.locate(context, ReportEntryFamily).map((d) => d.payload);
}
