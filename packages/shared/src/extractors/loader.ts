/**
 * Profile Loader
 *
 * Reads `*.profile.json` files from a directory, validates them against
 * report_profile.schema.json, compiles them and registers an extractor for
 * each. A bad file is logged and skipped; the others still load.
 */

import fs from 'fs';
import path from 'path';
import { validateProfileDefinition } from '../schemas';
import { logger } from '../logger';
import { compileProfile, type ReportProfileDefinition } from './profile';
import { ProfileConfigError } from './errors';
import { ReportExtractor } from './report-extractor';
import { registerExtractor } from './registry';

export const PROFILE_FILE_SUFFIX = '.profile.json';

export interface ProfileLoadResult {
  loaded: string[];
  failed: Array<{ file: string; errors: string[] }>;
}

function readDefinition(filePath: string): { definition?: ReportProfileDefinition; errors: string[] } {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    return { errors: [error instanceof Error ? error.message : String(error)] };
  }

  const validation = validateProfileDefinition(data);
  if (!validation.valid) {
    return { errors: validation.errors ?? ['invalid profile'] };
  }
  return { definition: validation.value, errors: [] };
}

/**
 * Load and register every profile file in a directory.
 */
export function loadProfilesFromDirectory(dir: string): ProfileLoadResult {
  const result: ProfileLoadResult = { loaded: [], failed: [] };

  const files = fs
    .readdirSync(dir)
    .filter(file => file.endsWith(PROFILE_FILE_SUFFIX))
    .sort();

  for (const file of files) {
    const { definition, errors } = readDefinition(path.join(dir, file));

    if (!definition) {
      logger.warn('Skipping invalid profile file', { file, errors });
      result.failed.push({ file, errors });
      continue;
    }

    try {
      registerExtractor(new ReportExtractor(compileProfile(definition)));
      result.loaded.push(definition.name);
    } catch (error) {
      if (!(error instanceof ProfileConfigError)) throw error;
      const message = error.message;
      logger.warn('Skipping profile that does not compile', { file, error: message });
      result.failed.push({ file, errors: [message] });
    }
  }

  logger.info('Loaded report profiles', {
    dir,
    loaded: result.loaded.length,
    failed: result.failed.length,
  });

  return result;
}
