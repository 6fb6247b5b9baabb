/**
 * Period Summaries
 *
 * Downstream views over extracted rows. Extraction keeps rows in report
 * order; anything chronological is done here, explicitly.
 */

import type { OutputRow, Period } from '../types';

export interface PeriodSummary {
  period: Period;
  countA: number;
  countB: number;
  countC: number;
  entities: number;
}

export interface EntityTotal {
  entityId: string;
  entityName: string;
  countA: number;
  countB: number;
  countC: number;
}

/**
 * Numbers before strings, numbers ascending, strings by code unit.
 */
export function comparePeriods(a: Period, b: Period): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'number') return -1;
  if (typeof b === 'number') return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Stable chronological sort; returns a new array.
 */
export function sortRowsByPeriod(rows: readonly OutputRow[]): OutputRow[] {
  return [...rows].sort((a, b) => comparePeriods(a.period, b.period));
}

/**
 * Sum the three counts for each period across all entities.
 */
export function summarizeByPeriod(rows: readonly OutputRow[]): PeriodSummary[] {
  const byPeriod = new Map<Period, { summary: PeriodSummary; entityIds: Set<string> }>();

  for (const row of rows) {
    let entry = byPeriod.get(row.period);
    if (!entry) {
      entry = {
        summary: { period: row.period, countA: 0, countB: 0, countC: 0, entities: 0 },
        entityIds: new Set(),
      };
      byPeriod.set(row.period, entry);
    }
    entry.summary.countA += row.countA;
    entry.summary.countB += row.countB;
    entry.summary.countC += row.countC;
    entry.entityIds.add(row.entityId);
  }

  return Array.from(byPeriod.values())
    .map(({ summary, entityIds }) => ({ ...summary, entities: entityIds.size }))
    .sort((a, b) => comparePeriods(a.period, b.period));
}

/**
 * Entities ranked by countC within one period, highest first. Ties go to the
 * lower entity id. An entity listed twice for the same period is summed.
 */
export function topEntitiesForPeriod(
  rows: readonly OutputRow[],
  period: Period,
  limit: number = 10
): EntityTotal[] {
  const byEntity = new Map<string, EntityTotal>();

  for (const row of rows) {
    if (row.period !== period) continue;

    const existing = byEntity.get(row.entityId);
    if (!existing) {
      byEntity.set(row.entityId, {
        entityId: row.entityId,
        entityName: row.entityName,
        countA: row.countA,
        countB: row.countB,
        countC: row.countC,
      });
    } else {
      existing.countA += row.countA;
      existing.countB += row.countB;
      existing.countC += row.countC;
    }
  }

  return Array.from(byEntity.values())
    .sort((a, b) => b.countC - a.countC || (a.entityId < b.entityId ? -1 : a.entityId > b.entityId ? 1 : 0))
    .slice(0, limit);
}
