import { CHARTS } from './charts/catalog.js';
import { collectRecords } from './git/collector.js';
import { runGit, type GitRunner } from './git/git-runner.js';
import { parseAndBucket } from './aggregation/bucketing.js';
import { normalize } from './aggregation/normalize.js';
import { render } from './render/renderer.js';
import { DEFAULT_STYLE } from './render/style.js';
import type { ChartRequest, ChartStyle, NormalizedTable, NormalizeSpec, RenderResult } from './types.js';

/** Progress hooks, driven by an ora spinner in the CLI. */
export interface ProgressReporter {
  step(message: string): void;
  info(message: string): void;
}

export interface PipelineDeps {
  git?: GitRunner;
  style?: ChartStyle;
  progress?: ProgressReporter;
  /** Receives the --summary table. */
  summary?: (table: NormalizedTable) => void;
  render?: typeof render;
}

export interface ChartOutcome {
  records: number;
  table: NormalizedTable;
  result: RenderResult;
}

const SILENT: ProgressReporter = { step: () => {}, info: () => {} };

/**
 * collect → bucket → normalize → render for one chart request.
 * Any error aborts before the output target is touched.
 */
export async function generateChart(request: ChartRequest, deps: PipelineDeps = {}): Promise<ChartOutcome> {
  const progress = deps.progress ?? SILENT;
  const definition = CHARTS[request.kind];

  progress.step(`Collecting records for ${request.kind}...`);
  const records = collectRecords(
    { kind: request.kind, repository: request.repository, noMerges: request.noMerges, tags: request.tags },
    deps.git ?? runGit
  );
  progress.info(`${records.length} record${records.length !== 1 ? 's' : ''} from ${request.repository}`);

  progress.step('Counting...');
  const bucketed = parseAndBucket(request.kind, records, {
    issuesRegex: request.issuesRegex,
    tags: request.tags,
  });
  const table = normalize(bucketed, normalizeSpecFor(request));

  if (request.summary) deps.summary?.(table);

  progress.step(`Rendering ${definition.shape} chart...`);
  const result = await (deps.render ?? render)(request.kind, table, {
    title: request.title,
    output: request.output,
    style: deps.style ?? DEFAULT_STYLE,
  });

  return { records: records.length, table, result };
}

/**
 * --max-diff folds pie charts into "others" and caps the number of days;
 * --sort-max only applies to bar charts.
 */
export function normalizeSpecFor({ kind, maxDiff, sortMax }: Pick<ChartRequest, 'kind' | 'maxDiff' | 'sortMax'>): NormalizeSpec {
  const definition = CHARTS[kind];
  switch (definition.shape) {
    case 'pie': return { sortMax: 0, maxKeys: maxDiff, foldOthers: true };
    case 'dot': return { sortMax: 0, maxKeys: 0, foldOthers: false };
    case 'bar': return { sortMax, maxKeys: definition.limitsKeys ? maxDiff : 0, foldOthers: false };
  }
}
