/**
 * Header Parser
 *
 * Finds the entity identity line of a segment with a coarse existence
 * pattern, then captures id, name and contact from that same line with the
 * strict field pattern.
 */

import type { Diagnostic, HeaderRecord, NamedPattern, Segment } from '../types';
import { execLine } from './profile';
import { splitLines } from './segmenter';

export type HeaderOutcome =
  | { ok: true; header: HeaderRecord }
  | { ok: false; diagnostic: Diagnostic };

/**
 * Parse the header of one segment.
 *
 * Only the first line matching headerLine is considered. If the strict
 * pattern then disagrees with it the segment is reported as malformed rather
 * than searching further.
 */
export function parseHeader(
  segment: Segment,
  headerLine: NamedPattern,
  headerFields: NamedPattern
): HeaderOutcome {
  const lines = splitLines(segment.text);
  const lineIndex = lines.findIndex(line => execLine(headerLine.regex, line) !== null);

  if (lineIndex === -1) {
    return {
      ok: false,
      diagnostic: {
        segmentIndex: segment.index,
        kind: 'SegmentHeaderMissing',
        reason: `No line matches header pattern ${headerLine.name}`,
        patterns: [headerLine.name],
      },
    };
  }

  const lineNumber = lineIndex + 1;
  const match = execLine(headerFields.regex, lines[lineIndex]);
  const groups: Array<string | undefined> = match ? [...match] : [];
  const [, entityId, rawName, contact] = groups;

  if (entityId === undefined || rawName === undefined || contact === undefined) {
    return {
      ok: false,
      diagnostic: {
        segmentIndex: segment.index,
        kind: 'SegmentHeaderMalformed',
        reason: `Line ${lineNumber} matches ${headerLine.name} but ${headerFields.name} did not capture id, name and contact`,
        lineNumber,
        patterns: [headerLine.name, headerFields.name],
      },
    };
  }

  return {
    ok: true,
    header: { kind: 'header', entityId, rawName, contact, lineNumber },
  };
}
