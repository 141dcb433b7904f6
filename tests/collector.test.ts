import { test } from 'node:test';
import assert from 'node:assert/strict';

import { collectRecords } from '../src/git/collector.js';
import { splitLines, type GitRunner } from '../src/git/git-runner.js';
import { CollectorError, ConfigError } from '../src/errors.js';

interface Call { cwd: string; args: string[] }

/** Records every git invocation and answers from a table keyed by the joined args. */
function fakeGit(answers: Record<string, string[]> = {}): { git: GitRunner; calls: Call[] } {
  const calls: Call[] = [];
  const git: GitRunner = (cwd, args) => {
    calls.push({ cwd, args: [...args] });
    return answers[args.join(' ')] ?? [];
  };
  return { git, calls };
}

test('date charts query git log with the matching date format', () => {
  const { git, calls } = fakeGit({ 'log --all --date=iso --pretty=format:%ad': ['2013-03-15 18:27:55 +0100'] });
  const lines = collectRecords({ kind: 'commits_hour_day', repository: '/repo' }, git);
  assert.deepEqual(lines, ['2013-03-15 18:27:55 +0100']);
  assert.deepEqual(calls, [{ cwd: '/repo', args: ['log', '--all', '--date=iso', '--pretty=format:%ad'] }]);
});

test('--no-merges is passed to every log query', () => {
  const { git, calls } = fakeGit();
  collectRecords({ kind: 'commits_day_week', repository: '.', noMerges: true }, git);
  collectRecords({ kind: 'authors', repository: '.', noMerges: true }, git);
  assert.deepEqual(calls.map(c => c.args), [
    ['log', '--all', '--no-merges', '--date=rfc', '--pretty=format:%ad'],
    ['shortlog', '-sn', '--all', '--no-merges'],
  ]);
});

test('short-date charts share the same query', () => {
  const { git, calls } = fakeGit();
  for (const kind of ['commits_day', 'commits_month', 'commits_year', 'commits_year_month'] as const) {
    collectRecords({ kind, repository: '.' }, git);
  }
  assert.equal(new Set(calls.map(c => c.args.join(' '))).size, 1);
  assert.deepEqual(calls[0]?.args, ['log', '--all', '--date=short', '--pretty=format:%ad']);
});

test('files_type lists the tree at HEAD', () => {
  const { git, calls } = fakeGit({ 'ls-tree -r --name-only HEAD': ['a.c', 'b.h'] });
  assert.deepEqual(collectRecords({ kind: 'files_type', repository: '.' }, git), ['a.c', 'b.h']);
  assert.deepEqual(calls[0]?.args, ['ls-tree', '-r', '--name-only', 'HEAD']);
});

test('commits_version queries each tag-to-tag range and tags every commit', () => {
  const { git, calls } = fakeGit({
    'log v0.1.0 --pretty=format:%H': ['h1', 'h2'],
    'log v0.1.0..v0.2.0 --pretty=format:%H': [],
    'log v0.2.0..v0.3.0 --pretty=format:%H': ['h3'],
  });
  const lines = collectRecords({ kind: 'commits_version', repository: '.', tags: ['v0.1.0', 'v0.2.0', 'v0.3.0'] }, git);
  assert.deepEqual(lines, ['v0.1.0\th1', 'v0.1.0\th2', 'v0.3.0\th3']);
  assert.equal(calls.length, 3);
});

test('commits_version without tags is a configuration error', () => {
  const { git, calls } = fakeGit();
  assert.throws(() => collectRecords({ kind: 'commits_version', repository: '.', tags: [] }, git), ConfigError);
  assert.equal(calls.length, 0);
});

test('a failing git run propagates as CollectorError', () => {
  const git: GitRunner = (_cwd, args) => {
    throw new CollectorError(['git', ...args].join(' '), 'fatal: not a git repository');
  };
  assert.throws(
    () => collectRecords({ kind: 'commits_year', repository: '/tmp/nowhere' }, git),
    (err: unknown) =>
      err instanceof CollectorError &&
      err.code === 'COLLECTOR_FAILED' &&
      err.message === 'git log --all --date=short --pretty=format:%ad failed: fatal: not a git repository'
  );
});

test('splitLines drops empty lines and carriage returns', () => {
  assert.deepEqual(splitLines('a\r\n\nb\n  \n'), ['a', 'b']);
});
