/**
 * Record Joiner
 */

import type { DetailRecord, HeaderRecord, OutputRow } from '../types';

/**
 * Flatten one header with its details: one row per detail, header fields
 * copied onto each. The name is passed in already cleaned.
 */
export function joinRecords(
  segmentIndex: number,
  header: HeaderRecord,
  entityName: string,
  details: readonly DetailRecord[]
): OutputRow[] {
  return details.map((detail): OutputRow => ({
    kind: 'row',
    segmentIndex,
    entityId: header.entityId,
    entityName,
    entityContact: header.contact,
    period: detail.period,
    countA: detail.countA,
    countB: detail.countB,
    countC: detail.countC,
  }));
}
