/**
 * Segmenter
 *
 * Splits a report into per-entity segments on a delimiter pattern. The
 * delimiter match is consumed and kept as the preceding segment's
 * terminator, so joining text + terminator over all segments gives back
 * the input document.
 */

import type { NamedPattern, Segment } from '../types';

/**
 * Global copy of the pattern, so scanning never touches the caller's RegExp state.
 */
function toScanner(regex: RegExp): RegExp {
  const flags = regex.flags.includes('g') ? regex.flags : `${regex.flags}g`;
  return new RegExp(regex.source, flags.replace('y', ''));
}

/**
 * Index just past the character at `index`: one code unit, or a whole
 * surrogate pair when the pattern matches by code point.
 */
function advance(document: string, index: number, byCodePoint: boolean): number {
  if (!byCodePoint) return index + 1;
  const codePoint = document.codePointAt(index);
  return codePoint !== undefined && codePoint > 0xffff ? index + 2 : index + 1;
}

function* scan(document: string, regex: RegExp): Generator<Segment> {
  const scanner = toScanner(regex);
  const byCodePoint = /[uv]/.test(scanner.flags);
  let index = 0;
  let offset = 0;
  let match: RegExpExecArray | null;

  while ((match = scanner.exec(document)) !== null) {
    const delimiter = match[0];
    if (delimiter === '') {
      // zero-length boundary: step past it so the scan always advances
      scanner.lastIndex = advance(document, match.index, byCodePoint);
      if ((index > 0 && match.index === offset) || match.index >= document.length) continue;
    }

    yield {
      index: index++,
      offset,
      text: document.slice(offset, match.index),
      terminator: delimiter,
    };
    offset = match.index + delimiter.length;
  }

  const tail = document.slice(offset);
  if (tail !== '') {
    yield { index, offset, text: tail, terminator: '' };
  }
}

/**
 * Segment a document. The returned iterable is lazy and restartable: each
 * iteration rescans the document from the beginning.
 *
 * Segment 0 is the preamble before the first delimiter. An empty trailing
 * segment is not emitted. The delimiter is always scanned globally; a sticky
 * flag is not honoured (compileProfile rejects one).
 */
export function segmentDocument(document: string, delimiter: NamedPattern): Iterable<Segment> {
  return {
    [Symbol.iterator]: () => scan(document, delimiter.regex),
  };
}

/**
 * Inverse of segmentDocument.
 */
export function joinSegments(segments: Iterable<Segment>): string {
  let out = '';
  for (const segment of segments) {
    out += segment.text + segment.terminator;
  }
  return out;
}

/**
 * Split segment text into lines (LF or CRLF).
 */
export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}
