/**
 * Extraction Errors
 *
 * Malformed report text never throws out of the pipeline; it becomes a
 * Diagnostic. These errors are for invalid configuration and for the
 * internal coercion step whose failures the extractor converts.
 */

export class ProfileConfigError extends Error {
  constructor(
    readonly profile: string,
    message: string
  ) {
    super(`Invalid report profile "${profile}": ${message}`);
    this.name = 'ProfileConfigError';
  }
}

export class UnknownProfileError extends Error {
  constructor(readonly profile: string) {
    super(`No extractor registered for report profile: ${profile}`);
    this.name = 'UnknownProfileError';
  }
}

/**
 * Raised by coerceNumeric when a captured field is not a non-negative integer
 * or is too large to hold exactly.
 */
export class FieldParseError extends Error {
  constructor(
    readonly field: string,
    readonly rawValue: string,
    problem: string = 'is not a non-negative integer'
  ) {
    super(`Field ${field} ${problem}: ${JSON.stringify(rawValue)}`);
    this.name = 'FieldParseError';
  }
}
