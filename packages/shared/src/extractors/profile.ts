/**
 * Report Profiles
 *
 * A profile is the full configuration for one report layout: the five
 * patterns, the name-cleaning rules and how the period key is typed.
 * Definitions are plain JSON-compatible objects; compileProfile turns them
 * into RegExps and checks the capture-group contract once, up front.
 */

import type {
  CleaningRule,
  CleaningRuleSpec,
  NamedPattern,
  PatternSpec,
  PeriodType,
} from '../types';
import { ProfileConfigError } from './errors';
import { DEFAULT_NAME_RULES } from './field-cleaner';

export const HEADER_FIELD_GROUPS = 3;
export const DETAIL_FIELD_GROUPS = 4;

export interface ReportProfileDefinition {
  name: string;
  description: string;
  delimiter: PatternSpec;
  headerLine: PatternSpec;
  headerFields: PatternSpec;
  detailLine: PatternSpec;
  detailFields: PatternSpec;
  /** Applied in order to the captured entity name. Omit to use DEFAULT_NAME_RULES. */
  nameRules?: CleaningRuleSpec[];
  periodType: PeriodType;
}

export interface CompiledProfile {
  name: string;
  description: string;
  delimiter: NamedPattern;
  headerLine: NamedPattern;
  headerFields: NamedPattern;
  detailLine: NamedPattern;
  detailFields: NamedPattern;
  nameRules: CleaningRule[];
  periodType: PeriodType;
}

/**
 * Number of capturing groups in a pattern. An alternation with the empty
 * pattern always matches, and the match array length reveals the group count.
 */
export function countCaptureGroups(regex: RegExp): number {
  const probe = new RegExp(`${regex.source}|`, regex.flags.replace(/[gy]/g, ''));
  const match = probe.exec('');
  return match ? match.length - 1 : 0;
}

/**
 * Exec a pattern against one line from position 0, whatever its flags.
 */
export function execLine(regex: RegExp, line: string): RegExpExecArray | null {
  regex.lastIndex = 0;
  const match = regex.exec(line);
  regex.lastIndex = 0;
  return match;
}

function compilePattern(profile: string, spec: PatternSpec): NamedPattern {
  try {
    return { name: spec.name, regex: new RegExp(spec.source, spec.flags ?? '') };
  } catch (error) {
    throw new ProfileConfigError(
      profile,
      `pattern ${spec.name} does not compile: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function compileRules(profile: string, specs: CleaningRuleSpec[]): CleaningRule[] {
  return specs.map((spec, i) => {
    try {
      return { pattern: new RegExp(spec.pattern, spec.flags ?? ''), replacement: spec.replacement };
    } catch (error) {
      throw new ProfileConfigError(
        profile,
        `name rule ${i} does not compile: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  });
}

function requireScannable(profile: string, pattern: NamedPattern): void {
  if (pattern.regex.sticky) {
    throw new ProfileConfigError(
      profile,
      `pattern ${pattern.name} is scanned across the report and cannot be sticky (y)`
    );
  }
}

function requireGroups(profile: string, pattern: NamedPattern, expected: number): void {
  const actual = countCaptureGroups(pattern.regex);
  if (actual !== expected) {
    throw new ProfileConfigError(
      profile,
      `pattern ${pattern.name} must have exactly ${expected} capturing groups, found ${actual}`
    );
  }
}

/**
 * Compile and validate a profile definition.
 *
 * @throws ProfileConfigError when a pattern does not compile, the delimiter
 * is sticky, or a field pattern has the wrong number of capturing groups
 */
export function compileProfile(definition: ReportProfileDefinition): CompiledProfile {
  const { name } = definition;

  const compiled: CompiledProfile = {
    name,
    description: definition.description,
    delimiter: compilePattern(name, definition.delimiter),
    headerLine: compilePattern(name, definition.headerLine),
    headerFields: compilePattern(name, definition.headerFields),
    detailLine: compilePattern(name, definition.detailLine),
    detailFields: compilePattern(name, definition.detailFields),
    nameRules: definition.nameRules
      ? compileRules(name, definition.nameRules)
      : [...DEFAULT_NAME_RULES],
    periodType: definition.periodType,
  };

  requireScannable(name, compiled.delimiter);
  requireGroups(name, compiled.headerFields, HEADER_FIELD_GROUPS);
  requireGroups(name, compiled.detailFields, DETAIL_FIELD_GROUPS);

  return compiled;
}
