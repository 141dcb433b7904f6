import { CHART_KINDS, type ChartKind, type ChartShape } from '../types.js';

export interface ChartDefinition {
  title: string;
  shape: ChartShape;
  /** Bar charts only. */
  labelRotation?: number;
  /** Thin x labels down to roughly this many (bar charts only). */
  maxXLabels?: number;
  /** Whether --max-diff limits the number of bars (most recent kept). */
  limitsKeys?: boolean;
}

export const CHARTS: Record<ChartKind, ChartDefinition> = {
  authors:            { title: 'Authors',                      shape: 'pie' },
  tickets_author:     { title: 'Tickets processed by author',  shape: 'pie' },
  commits_hour_day:   { title: 'Commits by hour of day',       shape: 'bar' },
  commits_hour_week:  { title: 'Commits by hour of week',      shape: 'dot' },
  commits_day:        { title: 'Commits by day',               shape: 'bar', labelRotation: 45, limitsKeys: true },
  commits_day_week:   { title: 'Commits by day of week',       shape: 'bar' },
  commits_month:      { title: 'Commits by month of year',     shape: 'bar' },
  commits_year:       { title: 'Commits by year',              shape: 'bar' },
  commits_year_month: { title: 'Commits by year/month',        shape: 'bar', labelRotation: 45, maxXLabels: 30 },
  commits_version:    { title: 'Commits by version',           shape: 'bar', labelRotation: 90 },
  files_type:         { title: 'Files by extension',           shape: 'pie' },
};

export const WEEKDAYS = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'] as const;

export const MONTHS = [
  'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun',
  'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec',
] as const;

export const HOURS: readonly string[] = Array.from({ length: 24 }, (_, h) => String(h).padStart(2, '0'));

export const NO_EXTENSION = '(no extension)';

export const DEFAULT_MAX_DIFF = 20;
export const DEFAULT_SORT_MAX = 0;

export const DEFAULT_ISSUES_REGEX =
  /(?:close|closes|closed|fix|fixes|fixed|resolve|resolves|resolved) *#([0-9]+)/;

export function isChartKind(value: string): value is ChartKind {
  return Object.hasOwn(CHARTS, value);
}

export const CHART_KINDS_SORTED: readonly ChartKind[] = [...CHART_KINDS].sort();
