import { ConfigError } from '../errors.js';
import type { ChartKind } from '../types.js';
import { runGit, type GitRunner } from './git-runner.js';

export interface CollectOptions {
  kind: ChartKind;
  repository: string;
  noMerges?: boolean;
  tags?: readonly string[];
}

/** Separator between the tag and the commit hash in commits_version records. */
export const VERSION_FIELD_SEPARATOR = '\t';

/**
 * Queries git for the raw records a chart is built from.
 *
 * One record per line; the shape of a line depends on the kind
 * (see the format comments below). Throws CollectorError when git fails.
 */
export function collectRecords(options: CollectOptions, git: GitRunner = runGit): string[] {
  const { kind, repository: cwd } = options;
  const logOptions = ['--all', ...(options.noMerges ? ['--no-merges'] : [])];
  const log = (...args: string[]) => git(cwd, ['log', ...logOptions, ...args]);

  switch (kind) {
    case 'authors': {
      // "   278\tJohn Doe"
      // shortlog reads stdin unless a revision is given; --all counts as one
      return git(cwd, ['shortlog', '-sn', ...logOptions]);
    }
    case 'tickets_author':
      // "John Doe\trefs #1234: fix something"
      return log('--pretty=format:%aN%x09%s');
    case 'commits_hour_day':
      // "2013-03-15 18:27:55 +0100"
      return log('--date=iso', '--pretty=format:%ad');
    case 'commits_hour_week':
    case 'commits_day_week':
      // "Fri, 15 Mar 2013 18:27:55 +0100"
      return log('--date=rfc', '--pretty=format:%ad');
    case 'commits_day':
    case 'commits_month':
    case 'commits_year':
    case 'commits_year_month':
      // "2013-03-15"
      return log('--date=short', '--pretty=format:%ad');
    case 'commits_version':
      // "v0.3.0\t<hash>", one line per commit reachable from the tag but not the previous one
      return collectVersionRecords(cwd, options.tags ?? [], git);
    case 'files_type':
      // "path/to/file.c"
      return git(cwd, ['ls-tree', '-r', '--name-only', 'HEAD']);
  }
}

function collectVersionRecords(cwd: string, tags: readonly string[], git: GitRunner): string[] {
  if (tags.length === 0) {
    throw new ConfigError('chart commits_version needs the list of tags on standard input (e.g. "git tag | commit-charts ...")');
  }
  const records: string[] = [];
  let previous = '';
  for (const tag of tags) {
    const range = previous ? `${previous}..${tag}` : tag;
    for (const hash of git(cwd, ['log', range, '--pretty=format:%H'])) {
      records.push(`${tag}${VERSION_FIELD_SEPARATOR}${hash}`);
    }
    previous = tag;
  }
  return records;
}
