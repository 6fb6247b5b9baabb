/**
 * Extractor Registry
 *
 * Maps report profile names to their extractors.
 */

import type { DocumentExtractor } from './types';
import { UnknownProfileError } from './errors';
import { logger } from '../logger';

const extractorRegistry = new Map<string, DocumentExtractor>();

/**
 * Register an extractor under its profile name.
 * Overwrites any existing extractor for that profile.
 */
export function registerExtractor(extractor: DocumentExtractor): void {
  extractorRegistry.set(extractor.profileName, extractor);

  logger.debug('Registered extractor', {
    profile: extractor.profileName,
    period_type: extractor.periodType,
    description: extractor.description,
  });
}

/**
 * Get the extractor for a profile, or undefined if not registered.
 */
export function getExtractor(profileName: string): DocumentExtractor | undefined {
  return extractorRegistry.get(profileName);
}

/**
 * Get the extractor for a profile, throwing if not found.
 *
 * @throws UnknownProfileError if no extractor is registered for that profile
 */
export function getExtractorOrThrow(profileName: string): DocumentExtractor {
  const extractor = extractorRegistry.get(profileName);
  if (!extractor) {
    throw new UnknownProfileError(profileName);
  }
  return extractor;
}

export function hasExtractor(profileName: string): boolean {
  return extractorRegistry.has(profileName);
}

export function getRegisteredProfiles(): string[] {
  return Array.from(extractorRegistry.keys());
}

export function getAllExtractors(): DocumentExtractor[] {
  return Array.from(extractorRegistry.values());
}

/**
 * Clear all registered extractors.
 * Useful for testing.
 */
export function clearRegistry(): void {
  extractorRegistry.clear();
}
