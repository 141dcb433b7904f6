import { test } from 'node:test';
import assert from 'node:assert/strict';

import { parseAndBucket } from '../src/aggregation/bucketing.js';
import { normalizeVersion, parseTagList } from '../src/aggregation/version.js';
import { HOURS, MONTHS, WEEKDAYS } from '../src/charts/catalog.js';
import { ParseError } from '../src/errors.js';

// ── Hours ──────────────────────────────────────────────────────────────────────

test('commits_hour_day counts ISO timestamps into 24 seeded hours', () => {
  const { table, order } = parseAndBucket('commits_hour_day', [
    '2013-03-15 18:27:55 +0100',
    '2013-03-15 18:40:00 +0100',
    '2013-03-15 09:00:00 +0100',
  ]);
  assert.equal(table.size, 24);
  assert.deepEqual([...table.keys()], HOURS);
  assert.deepEqual(order, HOURS);
  assert.equal(table.get('18'), 2);
  assert.equal(table.get('09'), 1);
  for (const [hour, count] of table) {
    if (hour !== '18' && hour !== '09') assert.equal(count, 0, `hour ${hour}`);
  }
});

test('commits_hour_day rejects a line without a time', () => {
  assert.throws(
    () => parseAndBucket('commits_hour_day', ['2013-03-15 18:00:00 +0100', '2013-03-15']),
    (err: unknown) => err instanceof ParseError && err.lineNumber === 2 && err.line === '2013-03-15'
  );
});

test('commits_hour_day rejects hour 24', () => {
  assert.throws(() => parseAndBucket('commits_hour_day', ['2013-03-15 24:00:00 +0100']), ParseError);
});

test('commits_hour_week fills a 7x24 matrix keyed by weekday and hour', () => {
  const { table, order } = parseAndBucket('commits_hour_week', [
    'Fri, 15 Mar 2013 18:27:55 +0100',
    'Fri, 22 Mar 2013 18:01:00 +0100',
    'Mon, 4 Mar 2013 07:12:00 +0100',
  ]);
  assert.equal(table.size, 7 * 24);
  assert.equal(order?.[0], 'Mon 00');
  assert.equal(order?.[167], 'Sun 23');
  assert.equal(table.get('Fri 18'), 2);
  assert.equal(table.get('Mon 07'), 1);
  assert.equal(table.get('Sun 12'), 0);
});

test('commits_hour_week rejects an unknown weekday', () => {
  assert.throws(
    () => parseAndBucket('commits_hour_week', ['Fry, 15 Mar 2013 18:27:55 +0100']),
    /unknown weekday "Fry"/
  );
});

// ── Calendar order ─────────────────────────────────────────────────────────────

test('commits_day_week keeps calendar order, not alphabetic order', () => {
  const { table, order } = parseAndBucket('commits_day_week', [
    'Sun, 17 Mar 2013 10:00:00 +0100',
    'Wed, 13 Mar 2013 10:00:00 +0100',
    'Wed, 20 Mar 2013 10:00:00 +0100',
  ]);
  assert.deepEqual(order, ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun']);
  assert.deepEqual([...table.keys()], [...WEEKDAYS]);
  assert.equal(table.get('Wed'), 2);
  assert.equal(table.get('Sun'), 1);
  assert.equal(table.get('Mon'), 0);
});

test('commits_month keeps calendar order with every month seeded', () => {
  const { table, order } = parseAndBucket('commits_month', ['2013-03-15', '2014-03-01', '2012-12-31']);
  assert.deepEqual(order, [...MONTHS]);
  assert.equal(table.size, 12);
  assert.equal(table.get('Mar'), 2);
  assert.equal(table.get('Dec'), 1);
  assert.equal(table.get('Jan'), 0);
});

test('commits_month rejects month 13', () => {
  assert.throws(() => parseAndBucket('commits_month', ['2013-13-01']), /month out of range/);
});

// ── Days and years ─────────────────────────────────────────────────────────────

test('commits_day counts each date', () => {
  const { table, order } = parseAndBucket('commits_day', ['2013-03-15', '2013-03-15', '2013-03-17']);
  assert.equal(order, undefined);
  assert.deepEqual([...table], [['2013-03-15', 2], ['2013-03-17', 1]]);
});

test('commits_day rejects a non-date line', () => {
  assert.throws(() => parseAndBucket('commits_day', ['15/03/2013']), /expected a YYYY-MM-DD date/);
});

test('commits_year counts by year', () => {
  const { table } = parseAndBucket('commits_year', ['2013-03-15', '2012-01-01', '2013-12-31']);
  assert.equal(table.get('2013'), 2);
  assert.equal(table.get('2012'), 1);
  assert.equal(table.size, 2);
});

test('commits_year_month fills every month between the first and the last', () => {
  const { table } = parseAndBucket('commits_year_month', [
    '2013-11-02',
    '2014-02-10',
    '2014-02-11',
    '2013-11-30',
  ]);
  const keys = [...table.keys()].sort();
  assert.deepEqual(keys, ['2013-11', '2013-12', '2014-01', '2014-02']);
  assert.equal(table.get('2013-11'), 2);
  assert.equal(table.get('2013-12'), 0);
  assert.equal(table.get('2014-01'), 0);
  assert.equal(table.get('2014-02'), 2);
});

test('commits_year_month leaves no gap over several years', () => {
  const { table } = parseAndBucket('commits_year_month', ['2010-06-01', '2013-03-01']);
  const keys = [...table.keys()].sort();
  // Jun 2010 .. Mar 2013 inclusive
  assert.equal(keys.length, 7 + 12 + 12 + 3);
  assert.equal(keys[0], '2010-06');
  assert.equal(keys[keys.length - 1], '2013-03');
  for (let i = 1; i < keys.length; i++) {
    const [py, pm] = (keys[i - 1] ?? '').split('-').map(Number);
    const [y, m] = (keys[i] ?? '').split('-').map(Number);
    assert.equal((y ?? 0) * 12 + (m ?? 0), (py ?? 0) * 12 + (pm ?? 0) + 1);
  }
});

test('commits_year_month of an empty history is empty', () => {
  assert.equal(parseAndBucket('commits_year_month', []).table.size, 0);
});

// ── Authors and tickets ────────────────────────────────────────────────────────

test('authors reads shortlog counts', () => {
  const { table } = parseAndBucket('authors', ['   278\tJohn Doe', '    12\tJane Roe', '     1\tA. N. Other']);
  assert.deepEqual([...table], [['John Doe', 278], ['Jane Roe', 12], ['A. N. Other', 1]]);
});

test('authors rejects a line without a count', () => {
  assert.throws(() => parseAndBucket('authors', ['John Doe']), ParseError);
  assert.throws(() => parseAndBucket('authors', ['  x\tJohn Doe']), ParseError);
});

test('tickets_author counts distinct tickets per author', () => {
  const { table } = parseAndBucket('tickets_author', [
    'Alice\tfix #12: crash on start',
    'Alice\tcloses #12 again',
    'Alice\tresolve #7',
    'Bob\tfixes #12',
    'Bob\trefactor parser',
    'Carol\tadd docs, fix typo',
  ]);
  assert.deepEqual([...table], [['Alice', 2], ['Bob', 1]]);
});

test('tickets_author uses the first group of a custom regex', () => {
  const { table } = parseAndBucket('tickets_author', [
    'Alice\tPROJ-10 do a thing',
    'Alice\tPROJ-11 do another',
    'Bob\tPROJ-10 follow-up',
  ], { issuesRegex: /PROJ-(\d+)/g });
  assert.equal(table.get('Alice'), 2);
  assert.equal(table.get('Bob'), 1);
});

test('tickets_author rejects a line without author separator', () => {
  assert.throws(() => parseAndBucket('tickets_author', ['fix #1']), /expected "<author>\\t<subject>"/);
});

// ── Versions ───────────────────────────────────────────────────────────────────

test('normalizeVersion keeps digits separated by dots', () => {
  assert.equal(normalizeVersion('v0.3.0'), '0.3.0');
  assert.equal(normalizeVersion('release-0-0-1'), '0.0.1');
  assert.equal(normalizeVersion('v1.2-rc3'), '1.2.3');
});

test('parseTagList drops blank lines', () => {
  assert.deepEqual(parseTagList('v0.1.0\n\n  v0.2.0 \nv0.3.0\n'), ['v0.1.0', 'v0.2.0', 'v0.3.0']);
});

test('commits_version counts commits per tag in tag order, zero for empty ranges', () => {
  const tags = ['release-0-0-1', 'v0.2.0', 'v0.3.0'];
  const { table, order } = parseAndBucket('commits_version', [
    'release-0-0-1\taaa',
    'release-0-0-1\tbbb',
    'v0.3.0\tccc',
  ], { tags });
  assert.deepEqual(order, ['0.0.1', '0.2.0', '0.3.0']);
  assert.deepEqual([...table], [['0.0.1', 2], ['0.2.0', 0], ['0.3.0', 1]]);
});

// ── Files ──────────────────────────────────────────────────────────────────────

test('files_type buckets by extension with a sentinel for none', () => {
  const { table } = parseAndBucket('files_type', [
    'src/main.c',
    'src/util.c',
    'include/util.h',
    'Makefile',
    'docs/.nojekyll',
    'archive.tar.gz',
  ]);
  assert.deepEqual([...table], [['.c', 2], ['.h', 1], ['(no extension)', 2], ['.gz', 1]]);
});
