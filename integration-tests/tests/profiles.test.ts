/**
 * Report Profile Tests
 *
 * Compilation, capture-group contract, JSON loading and the registry.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  compileProfile,
  countCaptureGroups,
  loadProfilesFromDirectory,
  getExtractor,
  getExtractorOrThrow,
  getRegisteredProfiles,
  hasExtractor,
  clearRegistry,
  registerBuiltInExtractors,
  sortRowsByPeriod,
  validateProfileDefinition,
  ProfileConfigError,
  UnknownProfileError,
  DEALER_FRANCHISE_PROFILE,
} from '@reportgrid/shared';
import type { ReportProfileDefinition } from '@reportgrid/shared';

const STORE_PROFILE: ReportProfileDefinition = {
  name: 'store_quarterly',
  description: 'Quarterly store sales listing',
  delimiter: { name: 'store_rule', source: '^=== *\\n', flags: 'm' },
  headerLine: { name: 'store_header_line', source: '^STORE ' },
  headerFields: { name: 'store_header_fields', source: '^STORE (S-\\d+) \\| (.*) \\| (\\S+@\\S+)$' },
  detailLine: { name: 'quarter_line', source: '^Q\\d-\\d{4} ' },
  detailFields: {
    name: 'quarter_fields',
    source: '^(Q\\d-\\d{4}) apples=(\\S+) pears=(\\S+) total=(\\S+)$',
  },
  nameRules: [{ pattern: '\\s+Inc$', replacement: '' }],
  periodType: 'text',
};

const STORE_REPORT =
  'STORE REPORT\n' +
  '===\n' +
  'STORE S-10 | Corner Shop Inc | corner@example.com\n' +
  'Q2-2023 apples=7 pears=1 total=8\n' +
  'Q1-2023 apples=5 pears=6 total=11\n' +
  '===\n' +
  'STORE S-11 | Kiosk | kiosk@example.com\n';

describe('countCaptureGroups', () => {
  it('should count capturing and named groups but not non-capturing ones', () => {
    expect(countCaptureGroups(/(a)(b)(?:c)(?<d>d)/)).toBe(3);
    expect(countCaptureGroups(/no groups/)).toBe(0);
    expect(countCaptureGroups(/(x)|(y)/g)).toBe(2);
  });
});

describe('compileProfile', () => {
  it('should compile the dealer franchise profile with default name rules', () => {
    const profile = compileProfile(DEALER_FRANCHISE_PROFILE);

    expect(profile.name).toBe('dealer_franchise');
    expect(profile.headerFields.regex.source).toBe(DEALER_FRANCHISE_PROFILE.headerFields.source);
    expect(profile.nameRules).toHaveLength(4);
    expect(profile.periodType).toBe('integer');
  });

  it('should reject a header field pattern without exactly 3 groups', () => {
    const definition: ReportProfileDefinition = {
      ...DEALER_FRANCHISE_PROFILE,
      name: 'two_groups',
      headerFields: { name: 'short_header', source: '^(D\\d+) (.*)$' },
    };

    expect(() => compileProfile(definition)).toThrow(ProfileConfigError);
    expect(() => compileProfile(definition)).toThrow(
      'Invalid report profile "two_groups": pattern short_header must have exactly 3 capturing groups, found 2'
    );
  });

  it('should reject a detail field pattern without exactly 4 groups', () => {
    const definition: ReportProfileDefinition = {
      ...DEALER_FRANCHISE_PROFILE,
      detailFields: { name: 'five_groups', source: '(a)(b)(c)(d)(e)' },
    };

    expect(() => compileProfile(definition)).toThrow(
      'pattern five_groups must have exactly 4 capturing groups, found 5'
    );
  });

  it('should reject a pattern that does not compile', () => {
    const definition: ReportProfileDefinition = {
      ...DEALER_FRANCHISE_PROFILE,
      delimiter: { name: 'broken', source: '(' },
    };

    expect(() => compileProfile(definition)).toThrow(ProfileConfigError);
  });

  it('should reject a sticky delimiter', () => {
    const definition: ReportProfileDefinition = {
      ...DEALER_FRANCHISE_PROFILE,
      delimiter: { name: 'sticky_delimiter', source: 'DEALER# \\**', flags: 'y' },
    };

    expect(() => compileProfile(definition)).toThrow(
      'Invalid report profile "dealer_franchise": pattern sticky_delimiter is scanned across the report and cannot be sticky (y)'
    );
  });

  it('should keep configured flags', () => {
    const profile = compileProfile(STORE_PROFILE);

    expect(profile.delimiter.regex.flags).toBe('m');
    expect(profile.nameRules).toHaveLength(1);
  });
});

describe('validateProfileDefinition', () => {
  it('should accept the built-in profile', () => {
    expect(validateProfileDefinition(DEALER_FRANCHISE_PROFILE).valid).toBe(true);
  });

  it('should list missing fields', () => {
    const result = validateProfileDefinition({ name: 'bad', description: 'missing patterns' });

    expect(result.valid).toBe(false);
    expect(result.errors).toContain("/: must have required property 'delimiter'");
  });

  it('should reject unknown period types', () => {
    const result = validateProfileDefinition({ ...DEALER_FRANCHISE_PROFILE, periodType: 'monthly' });

    expect(result.valid).toBe(false);
  });
});

describe('loadProfilesFromDirectory', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'reportgrid-profiles-'));
    fs.writeFileSync(path.join(dir, 'store.profile.json'), JSON.stringify(STORE_PROFILE));
    fs.writeFileSync(path.join(dir, 'bad.profile.json'), JSON.stringify({ name: 'bad', description: 'x' }));
    fs.writeFileSync(
      path.join(dir, 'broken.profile.json'),
      JSON.stringify({
        ...STORE_PROFILE,
        name: 'broken',
        headerFields: { name: 'two_groups', source: '^STORE (S-\\d+) (.*)$' },
      })
    );
    fs.writeFileSync(path.join(dir, 'notes.json'), JSON.stringify({ ignored: true }));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    clearRegistry();
    registerBuiltInExtractors();
  });

  it('should register valid profiles and report the rest', () => {
    const result = loadProfilesFromDirectory(dir);

    expect(result.loaded).toEqual(['store_quarterly']);
    expect(result.failed.map(f => f.file)).toEqual(['bad.profile.json', 'broken.profile.json']);
    expect(hasExtractor('store_quarterly')).toBe(true);
    expect(hasExtractor('broken')).toBe(false);
  });

  it('should extract with a loaded profile', () => {
    const extractor = getExtractorOrThrow('store_quarterly');
    const result = extractor.extract(STORE_REPORT);

    expect(result.rows.map(r => [r.entityId, r.entityName, r.entityContact, r.period, r.countC])).toEqual([
      ['S-10', 'Corner Shop', 'corner@example.com', 'Q2-2023', 8],
      ['S-10', 'Corner Shop', 'corner@example.com', 'Q1-2023', 11],
    ]);
    expect(sortRowsByPeriod(result.rows).map(r => r.period)).toEqual(['Q1-2023', 'Q2-2023']);
    expect(result.stats.segmentsExtracted).toBe(2);
    expect(result.diagnostics).toEqual([]);
  });
});

describe('Extractor registry', () => {
  afterEach(() => {
    clearRegistry();
    registerBuiltInExtractors();
  });

  it('should have the built-in profile registered', () => {
    expect(getRegisteredProfiles()).toContain('dealer_franchise');
    expect(getExtractor('dealer_franchise')?.periodType).toBe('integer');
  });

  it('should throw for an unknown profile', () => {
    expect(() => getExtractorOrThrow('nope')).toThrow(UnknownProfileError);
    expect(getExtractor('nope')).toBeUndefined();
  });

  it('should clear all extractors', () => {
    clearRegistry();

    expect(getRegisteredProfiles()).toEqual([]);
  });
});
