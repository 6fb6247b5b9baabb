/**
 * Period Summary and Delimited Output Tests
 */

import * as path from 'path';
import * as fs from 'fs';
import {
  dealerFranchiseExtractor,
  sortRowsByPeriod,
  summarizeByPeriod,
  topEntitiesForPeriod,
  comparePeriods,
  toDelimited,
} from '@reportgrid/shared';
import type { OutputRow } from '@reportgrid/shared';

describe('Period summaries over the sample report', () => {
  let rows: OutputRow[];

  beforeAll(() => {
    const report = fs.readFileSync(path.join(__dirname, '../fixtures/dealers_franchise_sample.txt'), 'utf-8');
    rows = dealerFranchiseExtractor.extract(report).rows;
  });

  it('should sort rows chronologically without reordering ties', () => {
    const sorted = sortRowsByPeriod(rows);

    expect(sorted.map(r => `${r.entityId}:${r.period}`)).toEqual([
      'D10001:2021',
      'D10002:2021',
      'D10001:2022',
      'D10002:2022',
      'D10005:2022',
    ]);
    expect(rows.map(r => r.period)).toEqual([2021, 2022, 2022, 2021, 2022]);
  });

  it('should total new, used and total units per year', () => {
    expect(summarizeByPeriod(rows)).toEqual([
      { period: 2021, countA: 1560, countB: 1289, countC: 2849, entities: 2 },
      { period: 2022, countA: 1607, countB: 1299, countC: 2906, entities: 3 },
    ]);
  });

  it('should rank dealers by total units for a year', () => {
    expect(topEntitiesForPeriod(rows, 2022).map(e => [e.entityId, e.countC])).toEqual([
      ['D10002', 2080],
      ['D10001', 797],
      ['D10005', 29],
    ]);
    expect(topEntitiesForPeriod(rows, 2022, 1).map(e => e.entityName)).toEqual(['GATEWAY AUTO GROUP']);
    expect(topEntitiesForPeriod(rows, 1999)).toEqual([]);
  });
});

describe('comparePeriods', () => {
  it('should order numbers before strings', () => {
    expect([2022, 'Q1', 2021, 'A'].sort(comparePeriods)).toEqual([2021, 2022, 'A', 'Q1']);
  });
});

describe('topEntitiesForPeriod', () => {
  const base: OutputRow = {
    kind: 'row',
    segmentIndex: 1,
    entityId: 'D2',
    entityName: 'SECOND',
    entityContact: '555-000-0002',
    period: 2021,
    countA: 1,
    countB: 1,
    countC: 2,
  };

  it('should sum an entity listed twice and break ties by id', () => {
    const rows: OutputRow[] = [
      base,
      { ...base, segmentIndex: 2, countC: 3 },
      { ...base, segmentIndex: 3, entityId: 'D1', entityName: 'FIRST', countC: 5 },
    ];

    expect(topEntitiesForPeriod(rows, 2021)).toEqual([
      { entityId: 'D1', entityName: 'FIRST', countA: 1, countB: 1, countC: 5 },
      { entityId: 'D2', entityName: 'SECOND', countA: 2, countB: 2, countC: 5 },
    ]);
  });
});

describe('toDelimited', () => {
  const rows: OutputRow[] = [
    {
      kind: 'row',
      segmentIndex: 1,
      entityId: 'D001',
      entityName: 'ACME MOTORS',
      entityContact: '555-111-2222',
      period: 2021,
      countA: 10,
      countB: 5,
      countC: 15,
    },
    {
      kind: 'row',
      segmentIndex: 2,
      entityId: 'D002',
      entityName: 'SMITH, JONES & "SONS"',
      entityContact: '555-333-4444',
      period: 2022,
      countA: 1,
      countB: 2,
      countC: 3,
    },
  ];

  it('should write a CSV table with quoted fields where needed', () => {
    expect(toDelimited(rows)).toBe(
      'entity_id,entity_name,entity_contact,period,count_a,count_b,count_c\n' +
        'D001,ACME MOTORS,555-111-2222,2021,10,5,15\n' +
        'D002,"SMITH, JONES & ""SONS""",555-333-4444,2022,1,2,3\n'
    );
  });

  it('should support other delimiters and column labels', () => {
    const output = toDelimited(rows.slice(0, 1), {
      delimiter: '\t',
      labels: { entityId: 'dealer_id', period: 'year', countA: 'new', countB: 'used', countC: 'total' },
    });

    expect(output).toBe(
      'dealer_id\tentity_name\tentity_contact\tyear\tnew\tused\ttotal\n' +
        'D001\tACME MOTORS\t555-111-2222\t2021\t10\t5\t15\n'
    );
  });

  it('should write only the header for no rows', () => {
    expect(toDelimited([])).toBe('entity_id,entity_name,entity_contact,period,count_a,count_b,count_c\n');
  });
});
