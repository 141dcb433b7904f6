import { writeFileSync } from 'fs';
import { extname } from 'path';
import sharp from 'sharp';
import { parse, View } from 'vega';
import { compile, type TopLevelSpec } from 'vega-lite';
import type { ChartKind, NormalizedTable, RenderFormat, RenderOptions, RenderResult } from '../types.js';
import { buildChartSpec } from './chart-spec.js';

/** Output value meaning "print the SVG on standard output". */
export const STDOUT_OUTPUT = '-';

export function outputFormat(output: string): RenderFormat {
  if (output === STDOUT_OUTPUT) return 'stdout';
  switch (extname(output).toLowerCase()) {
    case '.png':  return 'png';
    case '.json': return 'json';
    default:      return 'svg';
  }
}

/** Compiles a Vega-Lite spec and renders it headless (no canvas needed). */
export async function renderSvg(spec: TopLevelSpec): Promise<string> {
  const view = new View(parse(compile(spec).spec), { renderer: 'none' });
  try {
    return await view.toSVG();
  } finally {
    view.finalize();
  }
}

/**
 * Renders the chart and writes it to `options.output`:
 * "-" prints SVG to stdout, *.png is rasterized with sharp, *.json dumps
 * the counted table, anything else is written as SVG.
 */
export async function render(
  kind: ChartKind,
  table: NormalizedTable,
  options: RenderOptions
): Promise<RenderResult> {
  const format = outputFormat(options.output);

  if (format === 'json') {
    const payload = JSON.stringify(tableToJson(kind, table, options.title), null, 2) + '\n';
    writeFileSync(options.output, payload, 'utf8');
    return { format, path: options.output, bytes: Buffer.byteLength(payload) };
  }

  const svg = await renderSvg(buildChartSpec(kind, table, options.title, options.style));

  switch (format) {
    case 'stdout':
      process.stdout.write(svg + '\n');
      return { format, path: null, bytes: Buffer.byteLength(svg) };
    case 'png': {
      const info = await sharp(Buffer.from(svg)).png().toFile(options.output);
      return { format, path: options.output, bytes: info.size };
    }
    case 'svg':
      writeFileSync(options.output, svg, 'utf8');
      return { format, path: options.output, bytes: Buffer.byteLength(svg) };
  }
}

export interface ChartJson {
  chart: ChartKind;
  title: string;
  entries: { key: string; count: number }[];
  others: string | null;
}

export function tableToJson(kind: ChartKind, table: NormalizedTable, title: string): ChartJson {
  return {
    chart: kind,
    title,
    entries: table.keys.map(key => ({ key, count: table.counts.get(key) ?? 0 })),
    others: table.othersKey,
  };
}
