/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

export type LogLevel = 'debug' | 'info' | 'silent';

export interface Config {
  // HTTP
  port: number;
  maxDocumentBytes: number;

  // Profiles
  defaultProfile: string;
  profilesDir: string;

  // Logging
  logLevel: LogLevel;
}

function parseLogLevel(value: string | undefined): LogLevel {
  if (value === 'debug' || value === 'silent') return value;
  return 'info';
}

export const config: Config = {
  // HTTP
  port: parseInt(process.env.PORT || '8090', 10),
  maxDocumentBytes: parseInt(process.env.MAX_DOCUMENT_BYTES || String(20 * 1024 * 1024), 10),

  // Profiles
  defaultProfile: process.env.DEFAULT_PROFILE || 'dealer_franchise',
  profilesDir: process.env.PROFILES_DIR || '',

  // Logging
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
};
