import { posix } from 'path';
import dayjs from 'dayjs';
import { HOURS, MONTHS, NO_EXTENSION, WEEKDAYS, DEFAULT_ISSUES_REGEX } from '../charts/catalog.js';
import { VERSION_FIELD_SEPARATOR } from '../git/collector.js';
import { ParseError } from '../errors.js';
import type { BucketedTable, BucketOptions, CategoryTable, ChartKind } from '../types.js';
import { normalizeVersion } from './version.js';

/**
 * Turns the raw records of one chart into a category table.
 *
 * Calendar charts are pre-seeded with every bucket at zero so that empty
 * hours, weekdays and months still show up; commits_year_month is gap-filled
 * between the first and last month seen. Throws ParseError on the first
 * line that does not have the expected shape.
 */
export function parseAndBucket(
  kind: ChartKind,
  lines: readonly string[],
  options: BucketOptions = {}
): BucketedTable {
  switch (kind) {
    case 'authors':            return { kind, table: bucketAuthors(lines) };
    case 'tickets_author':     return { kind, table: bucketTickets(lines, options.issuesRegex ?? DEFAULT_ISSUES_REGEX) };
    case 'commits_hour_day':   return bucketHourOfDay(lines);
    case 'commits_hour_week':  return bucketHourOfWeek(lines);
    case 'commits_day':        return { kind, table: countBy(lines, (line, n) => parseShortDate(line, n).day) };
    case 'commits_day_week':   return bucketDayOfWeek(lines);
    case 'commits_month':      return bucketMonth(lines);
    case 'commits_year':       return { kind, table: countBy(lines, (line, n) => parseShortDate(line, n).year) };
    case 'commits_year_month': return { kind, table: bucketYearMonth(lines) };
    case 'commits_version':    return bucketVersions(lines, options.tags ?? []);
    case 'files_type':         return { kind, table: countBy(lines, fileExtension) };
  }
}

// ─── Per-kind rules ───────────────────────────────────────────────────────────

function bucketAuthors(lines: readonly string[]): CategoryTable {
  const table: CategoryTable = new Map();
  lines.forEach((line, i) => {
    const trimmed = line.trimStart();
    const tab = trimmed.indexOf('\t');
    const count = tab === -1 ? '' : trimmed.slice(0, tab).trim();
    const name = tab === -1 ? '' : trimmed.slice(tab + 1);
    if (!/^\d+$/.test(count) || !name) {
      throw new ParseError(i + 1, line, 'expected "<count>\\t<author>"');
    }
    increment(table, name, parseInt(count, 10));
  });
  return table;
}

function bucketTickets(lines: readonly string[], issuesRegex: RegExp): CategoryTable {
  // a global regex would make match() drop the capture groups
  const regex = new RegExp(issuesRegex.source, issuesRegex.flags.replace('g', ''));
  const ticketsByAuthor = new Map<string, Set<string>>();

  lines.forEach((line, i) => {
    const tab = line.indexOf('\t');
    if (tab <= 0) throw new ParseError(i + 1, line, 'expected "<author>\\t<subject>"');
    const author = line.slice(0, tab);
    const ticket = line.slice(tab + 1).match(regex)?.[1];
    if (ticket === undefined) return;

    let tickets = ticketsByAuthor.get(author);
    if (!tickets) {
      tickets = new Set<string>();
      ticketsByAuthor.set(author, tickets);
    }
    tickets.add(ticket);
  });

  const table: CategoryTable = new Map();
  for (const [author, tickets] of ticketsByAuthor) table.set(author, tickets.size);
  return table;
}

function bucketHourOfDay(lines: readonly string[]): BucketedTable {
  // "2013-03-15 18:27:55 +0100"
  const table = seeded(HOURS);
  lines.forEach((line, i) => {
    const fields = line.trim().split(/\s+/);
    if (fields.length !== 3) throw new ParseError(i + 1, line, 'expected an ISO date');
    increment(table, parseHour(fields[1] ?? '', line, i + 1));
  });
  return { kind: 'commits_hour_day', table, order: HOURS };
}

function bucketHourOfWeek(lines: readonly string[]): BucketedTable {
  const order = WEEKDAYS.flatMap(day => HOURS.map(hour => hourOfWeekKey(day, hour)));
  const table = seeded(order);
  lines.forEach((line, i) => {
    const { weekday, hour } = parseRfcDate(line, i + 1);
    increment(table, hourOfWeekKey(weekday, hour));
  });
  return { kind: 'commits_hour_week', table, order };
}

function bucketDayOfWeek(lines: readonly string[]): BucketedTable {
  const table = seeded(WEEKDAYS);
  lines.forEach((line, i) => increment(table, parseRfcDate(line, i + 1).weekday));
  return { kind: 'commits_day_week', table, order: WEEKDAYS };
}

function bucketMonth(lines: readonly string[]): BucketedTable {
  const table = seeded(MONTHS);
  lines.forEach((line, i) => {
    const { month } = parseShortDate(line, i + 1);
    const name = MONTHS[parseInt(month, 10) - 1];
    if (name === undefined) throw new ParseError(i + 1, line, 'month out of range');
    increment(table, name);
  });
  return { kind: 'commits_month', table, order: MONTHS };
}

function bucketYearMonth(lines: readonly string[]): CategoryTable {
  const table = countBy(lines, (line, n) => {
    const { year, month } = parseShortDate(line, n);
    if (month < '01' || month > '12') throw new ParseError(n, line, 'month out of range');
    return `${year}-${month}`;
  });
  if (table.size === 0) return table;

  const observed = [...table.keys()].sort();
  const last = dayjs(`${observed[observed.length - 1]}-01`);
  for (let month = dayjs(`${observed[0]}-01`); month.isBefore(last, 'month'); month = month.add(1, 'month')) {
    const key = month.format('YYYY-MM');
    if (!table.has(key)) table.set(key, 0);
  }
  return table;
}

function bucketVersions(lines: readonly string[], tags: readonly string[]): BucketedTable {
  const order = [...new Set(tags.map(normalizeVersion))];
  const table = seeded(order);
  lines.forEach((line, i) => {
    const sep = line.indexOf(VERSION_FIELD_SEPARATOR);
    if (sep <= 0) throw new ParseError(i + 1, line, 'expected "<tag>\\t<commit>"');
    const key = normalizeVersion(line.slice(0, sep));
    if (!table.has(key)) order.push(key);
    increment(table, key);
  });
  return { kind: 'commits_version', table, order };
}

function fileExtension(path: string): string {
  return posix.extname(path) || NO_EXTENSION;
}

// ─── Line parsing ─────────────────────────────────────────────────────────────

const WEEKDAY_NAMES = new Set<string>(WEEKDAYS);

interface ShortDate { day: string; year: string; month: string }

function parseShortDate(line: string, lineNumber: number): ShortDate {
  // "2013-03-15"
  const day = line.trim();
  const match = /^(\d{4})-(\d{2})-\d{2}$/.exec(day);
  if (!match) throw new ParseError(lineNumber, line, 'expected a YYYY-MM-DD date');
  return { day, year: match[1] ?? '', month: match[2] ?? '' };
}

function parseRfcDate(line: string, lineNumber: number): { weekday: string; hour: string } {
  // "Fri, 15 Mar 2013 18:27:55 +0100"
  const fields = line.trim().split(/\s+/);
  if (fields.length !== 6) throw new ParseError(lineNumber, line, 'expected an RFC 2822 date');
  const weekday = (fields[0] ?? '').replace(/,$/, '');
  if (!WEEKDAY_NAMES.has(weekday)) {
    throw new ParseError(lineNumber, line, `unknown weekday "${weekday}"`);
  }
  return { weekday, hour: parseHour(fields[4] ?? '', line, lineNumber) };
}

function parseHour(time: string, line: string, lineNumber: number): string {
  const hour = /^(\d{2}):\d{2}(?::\d{2})?$/.exec(time)?.[1];
  if (hour === undefined || !HOURS.includes(hour)) {
    throw new ParseError(lineNumber, line, `invalid time "${time}"`);
  }
  return hour;
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

export function hourOfWeekKey(weekday: string, hour: string): string {
  return `${weekday} ${hour}`;
}

function seeded(keys: readonly string[]): CategoryTable {
  return new Map(keys.map(key => [key, 0]));
}

function increment(table: CategoryTable, key: string, by = 1): void {
  table.set(key, (table.get(key) ?? 0) + by);
}

function countBy(lines: readonly string[], keyOf: (line: string, lineNumber: number) => string): CategoryTable {
  const table: CategoryTable = new Map();
  lines.forEach((line, i) => increment(table, keyOf(line, i + 1)));
  return table;
}
