/**
 * Report Extractor
 *
 * Runs the per-segment pipeline over a whole document:
 * segment -> header -> details -> numeric coercion -> join -> name cleanup.
 *
 * Every failure is local. A segment without a usable header is dropped, a
 * detail line whose fields do not coerce loses only its own row, and each
 * drop is recorded as a Diagnostic. Nothing here throws for bad report text.
 */

import type {
  DetailRecord,
  Diagnostic,
  ExtractionResult,
  OutputRow,
  Period,
  RawDetailFields,
  RawDetailRecord,
  Segment,
} from '../types';
import type { DocumentExtractor, ExtractionContext } from './types';
import type { CompiledProfile } from './profile';
import { segmentDocument } from './segmenter';
import { parseHeader } from './header-parser';
import { parseDetails } from './detail-parser';
import { joinRecords } from './record-joiner';
import { clean, coerceNumeric } from './field-cleaner';
import { DiagnosticSink } from './diagnostics';
import { FieldParseError } from './errors';
import { getContext, getCorrelationId, runWithContext } from '../context';
import { logger } from '../logger';
import {
  diagnosticsCounter,
  extractionDurationHistogram,
  rowsExtractedCounter,
  segmentsProcessedCounter,
} from '../metrics';

/**
 * Algorithm version for tracking
 */
export const ALGORITHM_VERSION = '1.0.0';

export interface SegmentResult {
  segmentIndex: number;
  outcome: 'extracted' | 'dropped';
  rows: OutputRow[];
  diagnostics: Diagnostic[];
}

type Coerced = { ok: true; detail: DetailRecord } | { ok: false; diagnostic: Diagnostic };

function coerceFields(fields: RawDetailFields, profile: CompiledProfile): Omit<DetailRecord, 'kind' | 'lineNumber'> {
  const period: Period =
    profile.periodType === 'integer' ? coerceNumeric(fields.period, 'period') : fields.period;

  return {
    period,
    countA: coerceNumeric(fields.countA, 'countA'),
    countB: coerceNumeric(fields.countB, 'countB'),
    countC: coerceNumeric(fields.countC, 'countC'),
  };
}

function coerceDetail(segment: Segment, raw: RawDetailRecord, profile: CompiledProfile): Coerced {
  const patterns = [profile.detailLine.name, profile.detailFields.name];

  if (!raw.fields) {
    return {
      ok: false,
      diagnostic: {
        segmentIndex: segment.index,
        kind: 'DetailFieldParseError',
        reason: `Line ${raw.lineNumber} matches ${profile.detailLine.name} but ${profile.detailFields.name} did not capture period and counts`,
        lineNumber: raw.lineNumber,
        patterns,
      },
    };
  }

  try {
    const values = coerceFields(raw.fields, profile);
    return { ok: true, detail: { kind: 'detail', lineNumber: raw.lineNumber, ...values } };
  } catch (error) {
    if (!(error instanceof FieldParseError)) throw error;
    return {
      ok: false,
      diagnostic: {
        segmentIndex: segment.index,
        kind: 'DetailFieldParseError',
        reason: `Line ${raw.lineNumber}: ${error.message}`,
        lineNumber: raw.lineNumber,
        patterns,
      },
    };
  }
}

/**
 * Extract one segment. Pure: the result depends only on the segment and the
 * profile, so segments can be processed in any order or in parallel and
 * merged by segmentIndex.
 */
export function extractSegment(segment: Segment, profile: CompiledProfile): SegmentResult {
  const headerOutcome = parseHeader(segment, profile.headerLine, profile.headerFields);
  if (!headerOutcome.ok) {
    return {
      segmentIndex: segment.index,
      outcome: 'dropped',
      rows: [],
      diagnostics: [headerOutcome.diagnostic],
    };
  }

  const { header } = headerOutcome;
  const details: DetailRecord[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const raw of parseDetails(segment, profile.detailLine, profile.detailFields)) {
    const coerced = coerceDetail(segment, raw, profile);
    if (coerced.ok) {
      details.push(coerced.detail);
    } else {
      diagnostics.push(coerced.diagnostic);
    }
  }

  const entityName = clean(header.rawName, profile.nameRules);

  return {
    segmentIndex: segment.index,
    outcome: 'extracted',
    rows: joinRecords(segment.index, header, entityName, details),
    diagnostics,
  };
}

/**
 * Extractor bound to one compiled profile.
 */
export class ReportExtractor implements DocumentExtractor {
  readonly profileName: string;
  readonly description: string;
  readonly periodType: CompiledProfile['periodType'];

  constructor(readonly profile: CompiledProfile) {
    this.profileName = profile.name;
    this.description = profile.description;
    this.periodType = profile.periodType;
  }

  extract(document: string, ctx: ExtractionContext = {}): ExtractionResult {
    const parent = getContext();

    return runWithContext(
      {
        correlationId: ctx.correlationId ?? getCorrelationId(),
        profile: this.profileName,
        documentName: ctx.documentName ?? parent?.documentName,
      },
      () => this.run(document)
    );
  }

  private run(document: string): ExtractionResult {
    const startTime = Date.now();
    const endTimer = extractionDurationHistogram.startTimer({ profile: this.profileName });

    logger.info('Starting extraction', {
      document_length: document.length,
      algorithm_version: ALGORITHM_VERSION,
    });

    const sink = new DiagnosticSink();
    const rows: OutputRow[] = [];
    let segmentsSeen = 0;
    let segmentsExtracted = 0;

    for (const segment of segmentDocument(document, this.profile.delimiter)) {
      if (segment.index === 0) {
        logger.debug('Discarding preamble', { preamble_length: segment.text.length });
        continue;
      }

      segmentsSeen += 1;
      const result = extractSegment(segment, this.profile);

      segmentsProcessedCounter.inc({ profile: this.profileName, outcome: result.outcome });
      if (result.outcome === 'extracted') {
        segmentsExtracted += 1;
      }

      for (const diagnostic of result.diagnostics) {
        logger.warn(
          diagnostic.kind === 'DetailFieldParseError' ? 'Dropping detail row' : 'Dropping segment',
          {
            segment_index: diagnostic.segmentIndex,
            kind: diagnostic.kind,
            reason: diagnostic.reason,
          }
        );
        diagnosticsCounter.inc({ profile: this.profileName, kind: diagnostic.kind });
      }

      sink.append(...result.diagnostics);
      rows.push(...result.rows);
    }

    rowsExtractedCounter.inc({ profile: this.profileName }, rows.length);
    endTimer();

    const durationMs = Date.now() - startTime;
    const diagnostics = sink.toArray();

    logger.info('Extraction complete', {
      segments: segmentsSeen,
      segments_extracted: segmentsExtracted,
      rows: rows.length,
      diagnostics: diagnostics.length,
      duration_ms: durationMs,
    });

    return {
      profile: this.profileName,
      rows,
      diagnostics,
      stats: {
        segmentsSeen,
        segmentsExtracted,
        segmentsDropped: segmentsSeen - segmentsExtracted,
        rows: rows.length,
        diagnosticsByKind: sink.countByKind(),
      },
      metadata: {
        algorithmVersion: ALGORITHM_VERSION,
        durationMs,
      },
    };
  }
}
