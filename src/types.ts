// ─── Chart Catalog ────────────────────────────────────────────────────────────

export const CHART_KINDS = [
  'authors',
  'tickets_author',
  'commits_hour_day',
  'commits_hour_week',
  'commits_day',
  'commits_day_week',
  'commits_month',
  'commits_year',
  'commits_year_month',
  'commits_version',
  'files_type',
] as const;

export type ChartKind = typeof CHART_KINDS[number];

export type ChartShape = 'bar' | 'pie' | 'dot';

// ─── Requests ─────────────────────────────────────────────────────────────────

export interface ChartRequest {
  readonly kind: ChartKind;
  readonly title: string;
  readonly repository: string;
  /** File path (.svg, .png, .json) or "-" for SVG on stdout. */
  readonly output: string;
  readonly noMerges: boolean;
  readonly maxDiff: number;
  readonly sortMax: number;
  readonly issuesRegex: RegExp;
  /** Ordered tag names, only used by commits_version. */
  readonly tags: readonly string[];
  readonly summary: boolean;
}

// ─── Aggregation ──────────────────────────────────────────────────────────────

/** Category key → count. */
export type CategoryTable = Map<string, number>;

export interface BucketedTable {
  kind: ChartKind;
  table: CategoryTable;
  /** Fixed display order; when absent keys are sorted as strings. */
  order?: readonly string[];
}

export interface BucketOptions {
  issuesRegex?: RegExp;
  tags?: readonly string[];
}

export interface NormalizeSpec {
  sortMax: number;
  maxKeys: number;
  foldOthers: boolean;
}

export interface NormalizedTable {
  keys: string[];
  counts: Map<string, number>;
  /** Key of the folded bucket, e.g. "3 others", when entries were folded. */
  othersKey: string | null;
}

// ─── Rendering ────────────────────────────────────────────────────────────────

export interface ChartStyle {
  background: string;
  foreground: string;
  foregroundLight: string;
  gridColor: string;
  colors: readonly string[];
  labelFontSize: number;
  width: number;
  height: number;
}

export interface RenderOptions {
  title: string;
  output: string;
  style: ChartStyle;
}

export type RenderFormat = 'svg' | 'png' | 'json' | 'stdout';

export interface RenderResult {
  format: RenderFormat;
  /** Destination path, null when printed to stdout. */
  path: string | null;
  bytes: number;
}
