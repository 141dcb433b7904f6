import type { TopLevelSpec } from 'vega-lite';
import { CHARTS } from '../charts/catalog.js';
import type { ChartKind, ChartStyle, NormalizedTable } from '../types.js';
import { thinLabels } from './labels.js';

interface Row {
  index: number;
  key: string;
  label: string;
  value: number;
}

/**
 * Builds the Vega-Lite description of the chart for one normalized table.
 * Key order is carried explicitly (`sort: keys`) so calendar and
 * value-sorted orders survive Vega's own domain ordering.
 */
export function buildChartSpec(
  kind: ChartKind,
  table: NormalizedTable,
  title: string,
  style: ChartStyle
): TopLevelSpec {
  const rows: Row[] = table.keys.map((key, index) => ({
    index,
    key,
    label: key,
    value: table.counts.get(key) ?? 0,
  }));

  switch (CHARTS[kind].shape) {
    case 'pie': return pieSpec(rows, title, style);
    case 'dot': return dotSpec(rows, title, style);
    case 'bar': return barSpec(kind, rows, title, style);
  }
}

/** Legend label of a pie slice: "John Doe (278)". */
export function pieLabel(key: string, value: number): string {
  return `${key} (${value})`;
}

function barSpec(kind: ChartKind, rows: Row[], title: string, style: ChartStyle): TopLevelSpec {
  const { labelRotation = 0, maxXLabels = 0 } = CHARTS[kind];
  const keys = rows.map(r => r.key);
  const visible = thinLabels(keys, maxXLabels).filter(Boolean);
  const labelExpr = visible.length < keys.length
    ? `indexof(${JSON.stringify(visible)}, datum.value) >= 0 ? datum.value : ''`
    : undefined;

  return {
    title: { text: title, color: style.foreground },
    width: style.width,
    height: style.height,
    background: style.background,
    data: { values: rows },
    mark: { type: 'bar', color: style.colors[0] ?? 'steelblue' },
    encoding: {
      x: {
        field: 'key',
        type: 'ordinal',
        sort: keys,
        title: null,
        axis: { labelAngle: labelRotation, labelFontSize: style.labelFontSize, labelColor: style.foregroundLight, labelExpr },
      },
      y: {
        field: 'value',
        type: 'quantitative',
        title: null,
        axis: { labelFontSize: style.labelFontSize, labelColor: style.foregroundLight, gridColor: style.gridColor },
      },
    },
    config: { view: { stroke: null } },
  };
}

function pieSpec(rows: Row[], title: string, style: ChartStyle): TopLevelSpec {
  const labelled = rows.map(r => ({ ...r, label: pieLabel(r.key, r.value) }));

  return {
    title: { text: title, color: style.foreground },
    width: style.height,
    height: style.height,
    background: style.background,
    data: { values: labelled },
    mark: { type: 'arc' },
    encoding: {
      theta: { field: 'value', type: 'quantitative', stack: true },
      order: { field: 'index', type: 'quantitative' },
      color: {
        field: 'label',
        type: 'nominal',
        sort: labelled.map(r => r.label),
        scale: { range: [...style.colors] },
        legend: { title: null, labelFontSize: style.labelFontSize, labelColor: style.foreground, labelLimit: 0 },
      },
    },
    config: { view: { stroke: null } },
  };
}

function dotSpec(rows: Row[], title: string, style: ChartStyle): TopLevelSpec {
  // keys are "<weekday> <hour>", e.g. "Mon 18"
  const cells = rows.map(r => {
    const [weekday = '', hour = ''] = r.key.split(' ');
    return { ...r, weekday, hour };
  });
  const weekdays = [...new Set(cells.map(c => c.weekday))];
  const hours = [...new Set(cells.map(c => c.hour))].sort();
  const axis = { labelFontSize: style.labelFontSize, labelColor: style.foregroundLight };

  return {
    title: { text: title, color: style.foreground },
    width: style.width,
    height: Math.round(style.height / 2),
    background: style.background,
    data: { values: cells },
    mark: { type: 'circle', opacity: 0.8 },
    encoding: {
      x: { field: 'hour', type: 'ordinal', sort: hours, title: null, axis },
      y: { field: 'weekday', type: 'ordinal', sort: weekdays, title: null, axis },
      size: { field: 'value', type: 'quantitative', legend: null },
      color: { field: 'weekday', type: 'nominal', sort: weekdays, scale: { range: [...style.colors] }, legend: null },
    },
    config: { view: { stroke: null } },
  };
}
