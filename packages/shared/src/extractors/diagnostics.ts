/**
 * Diagnostic Sink
 *
 * Append-only record of every skipped segment or row. Entries are never
 * rewritten or removed, so independent producers can share one sink.
 */

import type { Diagnostic, DiagnosticKind } from '../types';

export class DiagnosticSink {
  private readonly entries: Diagnostic[] = [];

  append(...diagnostics: Diagnostic[]): void {
    for (const diagnostic of diagnostics) {
      this.entries.push(Object.freeze({ ...diagnostic }));
    }
  }

  countByKind(): Record<DiagnosticKind, number> {
    const counts: Record<DiagnosticKind, number> = {
      SegmentHeaderMissing: 0,
      SegmentHeaderMalformed: 0,
      DetailFieldParseError: 0,
    };
    for (const entry of this.entries) {
      counts[entry.kind] += 1;
    }
    return counts;
  }

  toArray(): Diagnostic[] {
    return [...this.entries];
  }
}
