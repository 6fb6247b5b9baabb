/**
 * Dealer Franchise Report Patterns
 *
 * The state dealer franchise report is a flat text listing, one block per
 * dealership, separated by a `DEALER# ******` rule:
 *
 * DEALER# ******************
 *   D12345  SHOW ME MOTORS, LLC.            PHONE: 573-555-0100
 *   123 MAIN ST  JEFFERSON CITY MO 65101
 *   UNITS SOLD IN 2021   NEW:   410   USED:   388   TOTAL:   798
 *   UNITS SOLD IN 2022   NEW:   395   USED:   402   TOTAL:   797
 *
 * The detail line pattern only checks the line shape up to the year so a
 * garbled count is captured and reported instead of silently skipped.
 */

import type { ReportProfileDefinition } from '../profile';

const PHONE = '\\d{3}-\\d{3}-\\d{4}';

export const DEALER_DELIMITER = 'DEALER# \\**';

export const DEALER_HEADER_LINE = `^\\s*D\\d+.*PHONE: ${PHONE}`;

export const DEALER_HEADER_FIELDS = `^\\s*(D\\d+)\\s*(.*)\\s*PHONE: (${PHONE})`;

export const UNITS_SOLD_LINE = '^\\s*UNITS SOLD IN \\d{4}\\b';

export const UNITS_SOLD_FIELDS =
  '^\\s*UNITS SOLD IN (\\d{4})\\s+NEW:\\s*(\\S+)\\s+USED:\\s*(\\S+)\\s+TOTAL:\\s*(\\S+)\\s*$';

export const DEALER_FRANCHISE_PROFILE: ReportProfileDefinition = {
  name: 'dealer_franchise',
  description: 'State dealer franchise report - dealer identity and yearly new/used/total units sold',
  delimiter: { name: 'dealer_delimiter', source: DEALER_DELIMITER },
  headerLine: { name: 'dealer_header_line', source: DEALER_HEADER_LINE },
  headerFields: { name: 'dealer_header_fields', source: DEALER_HEADER_FIELDS },
  detailLine: { name: 'units_sold_line', source: UNITS_SOLD_LINE },
  detailFields: { name: 'units_sold_fields', source: UNITS_SOLD_FIELDS },
  periodType: 'integer',
};
