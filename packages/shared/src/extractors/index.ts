/**
 * Report Extractors Module
 *
 * Pipeline pieces (segmenter, parsers, cleaner, joiner), the profile
 * compiler and loader, and the registry of extractors keyed by profile name.
 */

// Core types and interfaces
export type { DocumentExtractor, ExtractionContext } from './types';

// Errors
export { ProfileConfigError, UnknownProfileError, FieldParseError } from './errors';

// Pipeline
export { segmentDocument, joinSegments, splitLines } from './segmenter';
export { parseHeader, type HeaderOutcome } from './header-parser';
export { parseDetails } from './detail-parser';
export { joinRecords } from './record-joiner';
export { clean, coerceNumeric, DEFAULT_NAME_RULES } from './field-cleaner';
export { DiagnosticSink } from './diagnostics';
export {
  ReportExtractor,
  extractSegment,
  ALGORITHM_VERSION,
  type SegmentResult,
} from './report-extractor';

// Profiles
export {
  compileProfile,
  countCaptureGroups,
  execLine,
  HEADER_FIELD_GROUPS,
  DETAIL_FIELD_GROUPS,
  type ReportProfileDefinition,
  type CompiledProfile,
} from './profile';
export { loadProfilesFromDirectory, PROFILE_FILE_SUFFIX, type ProfileLoadResult } from './loader';

// Registry
export {
  registerExtractor,
  getExtractor,
  getExtractorOrThrow,
  hasExtractor,
  getRegisteredProfiles,
  getAllExtractors,
  clearRegistry,
} from './registry';

// Built-in profiles
export {
  dealerFranchiseExtractor,
  DEALER_FRANCHISE_PROFILE,
  DEALER_DELIMITER,
  DEALER_HEADER_LINE,
  DEALER_HEADER_FIELDS,
  UNITS_SOLD_LINE,
  UNITS_SOLD_FIELDS,
} from './dealer-franchise';

import { registerExtractor } from './registry';
import { dealerFranchiseExtractor } from './dealer-franchise';

/**
 * Register all built-in extractors.
 * Call this at application startup.
 */
export function registerBuiltInExtractors(): void {
  registerExtractor(dealerFranchiseExtractor);
}

// Auto-register built-in extractors on module load
registerBuiltInExtractors();
