/**
 * Report Extractor Types
 */

import type { ExtractionResult, PeriodType } from '../types';

/**
 * Context passed to extractors during extraction
 */
export interface ExtractionContext {
  /** Correlation ID for tracing */
  correlationId?: string;
  /** Name of the document, for logs only */
  documentName?: string;
}

/**
 * Interface for report extractors. One extractor per report profile.
 */
export interface DocumentExtractor {
  /** Profile name this extractor is registered under */
  readonly profileName: string;

  /** Human-readable description of the report layout */
  readonly description: string;

  readonly periodType: PeriodType;

  /**
   * Extract rows from one in-memory report.
   *
   * @param document - Full report text
   * @returns Rows in segment order plus every diagnostic raised on the way
   */
  extract(document: string, ctx?: ExtractionContext): ExtractionResult;
}
