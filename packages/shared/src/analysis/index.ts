export {
  comparePeriods,
  sortRowsByPeriod,
  summarizeByPeriod,
  topEntitiesForPeriod,
  type PeriodSummary,
  type EntityTotal,
} from './periods';
export {
  toDelimited,
  ROW_COLUMNS,
  DEFAULT_COLUMN_LABELS,
  type RowColumn,
  type DelimitedOptions,
} from './delimited';
