import type { Readable } from 'stream';
import { CHARTS, isChartKind } from '../charts/catalog.js';
import { ConfigError } from '../errors.js';
import { parseTagList } from '../aggregation/version.js';
import type { ChartRequest } from '../types.js';

/** Raw option values as commander hands them over. */
export interface CliOptions {
  title?: string;
  repo: string;
  /** false when --no-merges is given */
  merges: boolean;
  maxDiff: string;
  sortMax: string;
  issuesRegex: string;
  summary: boolean;
}

export function buildRequest(
  chart: string,
  output: string,
  opts: CliOptions,
  tags: readonly string[] = []
): ChartRequest {
  if (!isChartKind(chart)) {
    throw new ConfigError(`unknown chart "${chart}"`);
  }
  if (!output) {
    throw new ConfigError('missing output file');
  }

  return {
    kind:        chart,
    title:       opts.title ?? CHARTS[chart].title,
    repository:  opts.repo,
    output,
    noMerges:    !opts.merges,
    maxDiff:     parseLimit('--max-diff', opts.maxDiff),
    sortMax:     parseInteger('--sort-max', opts.sortMax),
    issuesRegex: compileRegex(opts.issuesRegex),
    tags,
    summary:     opts.summary,
  };
}

export function parseInteger(flag: string, value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigError(`${flag} expects an integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

function parseLimit(flag: string, value: string): number {
  const limit = parseInteger(flag, value);
  if (limit < 0) {
    throw new ConfigError(`${flag} expects a non-negative integer (0 = unlimited), got "${value}"`);
  }
  return limit;
}

function compileRegex(source: string): RegExp {
  try {
    return new RegExp(source);
  } catch (err) {
    throw new ConfigError(`invalid --issues-regex: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/** How long readTags waits for the first piped chunk. */
export const TAG_WAIT_MS = 1000;

/**
 * Reads tag names from stdin (e.g. piped `git tag`).
 * An interactive terminal yields no tags instead of waiting for input, and so
 * does a pipe that stays silent for `waitMs` (a parent holding stdin open).
 */
export function readTags(input: Readable & { isTTY?: boolean }, waitMs = TAG_WAIT_MS): Promise<string[]> {
  if (input.isTTY) return Promise.resolve([]);

  return new Promise<string[]>((resolve, reject) => {
    let data = '';

    const timer = setTimeout(() => {
      detach();
      input.destroy();
      resolve([]);
    }, waitMs);

    const onData = (chunk: Buffer | string) => {
      clearTimeout(timer);
      data += typeof chunk === 'string' ? chunk : chunk.toString('utf8');
    };
    const onEnd = () => {
      detach();
      resolve(parseTagList(data));
    };
    const onError = (err: Error) => {
      detach();
      reject(err);
    };
    const detach = () => {
      clearTimeout(timer);
      input.off('data', onData);
      input.off('end', onEnd);
      input.off('error', onError);
    };

    input.on('data', onData);
    input.once('end', onEnd);
    input.once('error', onError);
  });
}
