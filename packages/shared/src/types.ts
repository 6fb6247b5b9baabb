/**
 * Shared TypeScript Types
 *
 * Records produced by the report extraction pipeline, matching the JSON
 * schemas in packages/shared/schemas/
 */

// ============================================================================
// Patterns
// ============================================================================

/**
 * A configured regular expression with a stable identifier. The name is what
 * diagnostics report, so a mismatch between two patterns can be traced.
 */
export interface NamedPattern {
  name: string;
  regex: RegExp;
}

/** JSON form of a NamedPattern, as stored in profile files. */
export interface PatternSpec {
  name: string;
  source: string;
  flags?: string;
}

export interface CleaningRuleSpec {
  pattern: string;
  flags?: string;
  replacement: string;
}

export interface CleaningRule {
  pattern: RegExp;
  replacement: string;
}

// ============================================================================
// Segments
// ============================================================================

export interface Segment {
  /** Position in the segmented document; 0 is the preamble. */
  index: number;
  /** Offset of the segment's first character in the document. */
  offset: number;
  text: string;
  /** Delimiter text consumed right after this segment ('' for the last one). */
  terminator: string;
}

// ============================================================================
// Records
// ============================================================================

export interface HeaderRecord {
  kind: 'header';
  entityId: string;
  rawName: string;
  contact: string;
  /** 1-based line number within the segment. */
  lineNumber: number;
}

export interface RawDetailRecord {
  kind: 'raw_detail';
  lineNumber: number;
  line: string;
  /** Captured groups as text; null when the field pattern did not match the line. */
  fields: RawDetailFields | null;
}

export interface RawDetailFields {
  period: string;
  countA: string;
  countB: string;
  countC: string;
}

export type PeriodType = 'integer' | 'text';

export type Period = number | string;

export interface DetailRecord {
  kind: 'detail';
  lineNumber: number;
  period: Period;
  countA: number;
  countB: number;
  countC: number;
}

export interface OutputRow {
  kind: 'row';
  segmentIndex: number;
  entityId: string;
  entityName: string;
  entityContact: string;
  period: Period;
  countA: number;
  countB: number;
  countC: number;
}

// ============================================================================
// Diagnostics
// ============================================================================

export type DiagnosticKind =
  | 'SegmentHeaderMissing'
  | 'SegmentHeaderMalformed'
  | 'DetailFieldParseError';

export interface Diagnostic {
  segmentIndex: number;
  kind: DiagnosticKind;
  reason: string;
  /** 1-based line within the segment, when the problem is tied to one line. */
  lineNumber?: number;
  /** Identifiers of the patterns involved. */
  patterns?: string[];
}

// ============================================================================
// Extraction Result
// ============================================================================

export interface ExtractionStats {
  segmentsSeen: number;
  segmentsExtracted: number;
  segmentsDropped: number;
  rows: number;
  diagnosticsByKind: Record<DiagnosticKind, number>;
}

export interface ExtractionMetadata {
  algorithmVersion: string;
  durationMs?: number;
}

export interface ExtractionResult {
  profile: string;
  rows: OutputRow[];
  diagnostics: Diagnostic[];
  stats: ExtractionStats;
  metadata: ExtractionMetadata;
}

// ============================================================================
// API Types
// ============================================================================

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}

export interface ExtractResponse {
  correlation_id: string;
  profile: string;
  rows: OutputRow[];
  diagnostics: Diagnostic[];
  stats: ExtractionStats;
}

export interface ProfileSummary {
  name: string;
  description: string;
  period_type: PeriodType;
}
