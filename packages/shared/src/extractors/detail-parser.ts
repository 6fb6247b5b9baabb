/**
 * Detail Parser
 *
 * Collects the repeating per-period lines of a segment. Values stay as
 * captured text here; numeric coercion happens when rows are built.
 */

import type { NamedPattern, RawDetailRecord, Segment } from '../types';
import { execLine } from './profile';
import { splitLines } from './segmenter';

/**
 * Every line matching detailLine, in order of appearance. Periods are not
 * sorted; callers that need chronological order sort downstream.
 *
 * A line that passes detailLine but not detailFields is still returned, with
 * `fields: null`, so the caller can report it.
 */
export function parseDetails(
  segment: Segment,
  detailLine: NamedPattern,
  detailFields: NamedPattern
): RawDetailRecord[] {
  const records: RawDetailRecord[] = [];

  splitLines(segment.text).forEach((line, i) => {
    if (execLine(detailLine.regex, line) === null) return;

    const match = execLine(detailFields.regex, line);
    const groups: Array<string | undefined> = match ? [...match] : [];
    const [, period, countA, countB, countC] = groups;
    const fields =
      period !== undefined && countA !== undefined && countB !== undefined && countC !== undefined
        ? { period, countA, countB, countC }
        : null;

    records.push({ kind: 'raw_detail', lineNumber: i + 1, line, fields });
  });

  return records;
}
