#!/usr/bin/env node

import { Option, program } from 'commander';
import ora from 'ora';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

import { CHARTS, CHART_KINDS_SORTED, DEFAULT_ISSUES_REGEX, DEFAULT_MAX_DIFF, DEFAULT_SORT_MAX } from '../src/charts/catalog.js';
import { buildRequest, readTags, type CliOptions } from '../src/cli/options.js';
import { generateChart } from '../src/pipeline.js';
import { formatSummary } from '../src/reporters/terminal.js';
import { errorMessage } from '../src/errors.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg = JSON.parse(
  readFileSync(join(__dirname, '../../package.json'), 'utf8')
) as { version: string };

program
  .name('commit-charts')
  .description('Generate statistic charts (SVG or PNG) for a git repository.')
  .version(pkg.version, '-v, --version')
  .addArgument(
    program.createArgument('<chart>', 'Name of chart').choices(CHART_KINDS_SORTED)
  )
  .argument('<output>', 'Output file (.svg, .png or .json); "-" prints SVG on standard output')
  .option('-t, --title <title>',        'Override the default chart title')
  .option('-r, --repo <dir>',           'Directory with the git repository', '.')
  .option('-m, --no-merges',            'Do not count merge commits')
  .option('-d, --max-diff <n>',         'Max distinct entries before folding into "others" (authors, tickets_author, files_type); max number of days (commits_day); 0 = unlimited', String(DEFAULT_MAX_DIFF))
  .option('-s, --sort-max <n>',         'Sort bar charts by value and keep N entries; negative reverses the sort; 0 = no sort/max', String(DEFAULT_SORT_MAX))
  .option('-i, --issues-regex <regex>', 'Regex matching issues in commit subjects, first group is the issue id (tickets_author)', DEFAULT_ISSUES_REGEX.source)
  .addOption(new Option('--summary', 'Print the counted table on stderr').default(false))
  .addHelpText('after', '\nCharts:\n' + CHART_KINDS_SORTED.map(kind => `  ${kind.padEnd(20)} ${CHARTS[kind].title}`).join('\n') +
    '\n\ncommits_version reads the tags on standard input, e.g.: git tag | commit-charts commits_version out.svg' +
    '\n\nExit status: 0 = success, 1 = error.')
  .showHelpAfterError();

// ── Main ───────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  if (process.argv.length <= 2) {
    program.outputHelp();
    process.exit(1);
  }
  program.parse(process.argv);

  const [chart = '', output = ''] = program.args;
  const opts = program.opts<CliOptions>();

  const spinner = ora({ text: '', stream: process.stderr });

  try {
    const tags = chart === 'commits_version' ? await readTags(process.stdin) : [];
    const request = buildRequest(chart, output, opts, tags);

    spinner.start();
    const outcome = await generateChart(request, {
      progress: {
        step: message => { spinner.text = message; },
        info: message => { spinner.info(message); spinner.start(); },
      },
      summary: table => {
        spinner.stop();
        console.error(formatSummary(request.title, table));
        spinner.start();
      },
    });

    const { result } = outcome;
    if (result.path) {
      spinner.succeed(`${request.title}: ${outcome.table.keys.length} entries — ${result.format.toUpperCase()} written to ${result.path}`);
    } else {
      spinner.stop();
    }
  } catch (err) {
    spinner.fail(`Failed to generate chart "${chart}": ${errorMessage(err)}`);
    if (process.env.DEBUG) console.error(err);
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
