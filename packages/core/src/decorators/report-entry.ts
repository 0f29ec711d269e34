import { ReportEntryKind } from '../extensions/report-entry.js';
import { methodAnnotation } from './annotate.js';

/**
 * Publishes a key/value pair to the test report when the test starts.
 *
 * `@ReportEntry('text')` uses the key `value`. Repeatable.
 */
export function ReportEntry(entry: string | { key?: string; value: string }): MethodDecorator {
  return methodAnnotation(ReportEntryKind, typeof entry === 'string' ? { value: entry } : entry);
}
