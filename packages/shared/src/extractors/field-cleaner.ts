/**
 * Field Cleaner
 *
 * Ordered find-and-replace normalization for captured text, and strict
 * integer coercion for captured counts.
 */

import type { CleaningRule } from '../types';
import { FieldParseError } from './errors';

/**
 * Name cleanup used when a profile declares no rules of its own.
 * Order matters: whitespace is collapsed and trimmed before the suffix rule
 * so the suffix anchor sees the real end of the name.
 *
 * "ACME MOTORS, LLC." -> "ACME MOTORS"
 * "BIG  STATE AUTO INC  " -> "BIG STATE AUTO"
 */
export const DEFAULT_NAME_RULES: readonly CleaningRule[] = [
  { pattern: /\s+/g, replacement: ' ' },
  { pattern: /^ | $/g, replacement: '' },
  // one or more trailing legal-entity suffixes, each with optional comma and period
  { pattern: /(?:\s*,\s*|\s+)(?:(?:LLC|INC)\.?(?:\s*,\s*|\s+))*(?:LLC|INC)\.?$/, replacement: '' },
  { pattern: /^ | $/g, replacement: '' },
];

/**
 * Apply rules in declared order.
 */
export function clean(rawField: string, rules: readonly CleaningRule[]): string {
  return rules.reduce((value, rule) => {
    rule.pattern.lastIndex = 0;
    return value.replace(rule.pattern, rule.replacement);
  }, rawField);
}

const NON_NEGATIVE_INTEGER = /^[0-9]+$/;

/**
 * Coerce a captured field to an integer.
 *
 * @param field - Field name reported in the error
 * @throws FieldParseError unless the value is all ASCII digits and fits a safe integer
 */
export function coerceNumeric(rawField: string, field: string = 'value'): number {
  if (!NON_NEGATIVE_INTEGER.test(rawField)) {
    throw new FieldParseError(field, rawField);
  }
  const value = Number(rawField);
  if (!Number.isSafeInteger(value)) {
    throw new FieldParseError(field, rawField, 'exceeds the safe integer range');
  }
  return value;
}
