/**
 * Delimited Table Serialization
 *
 * Writes output rows as CSV (or any single-character delimited table).
 */

import type { OutputRow } from '../types';

export type RowColumn = Exclude<keyof OutputRow, 'kind' | 'segmentIndex'>;

export const ROW_COLUMNS: readonly RowColumn[] = [
  'entityId',
  'entityName',
  'entityContact',
  'period',
  'countA',
  'countB',
  'countC',
];

export const DEFAULT_COLUMN_LABELS: Record<RowColumn, string> = {
  entityId: 'entity_id',
  entityName: 'entity_name',
  entityContact: 'entity_contact',
  period: 'period',
  countA: 'count_a',
  countB: 'count_b',
  countC: 'count_c',
};

export interface DelimitedOptions {
  delimiter?: string;
  /** Header labels, e.g. `{ countA: 'new_units' }`; unset columns keep their default label. */
  labels?: Partial<Record<RowColumn, string>>;
}

function quoteField(value: string, delimiter: string): string {
  if (value.includes(delimiter) || /["\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Serialize rows with a header line. Every line, including the last, ends
 * with "\n".
 */
export function toDelimited(rows: readonly OutputRow[], options: DelimitedOptions = {}): string {
  const delimiter = options.delimiter ?? ',';
  const labels = { ...DEFAULT_COLUMN_LABELS, ...options.labels };

  const lines = [ROW_COLUMNS.map(column => quoteField(labels[column], delimiter)).join(delimiter)];
  for (const row of rows) {
    lines.push(ROW_COLUMNS.map(column => quoteField(String(row[column]), delimiter)).join(delimiter));
  }

  return `${lines.join('\n')}\n`;
}
