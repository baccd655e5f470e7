import chalk from 'chalk';
import Table from 'cli-table3';
import { highlight, supportsLanguage } from 'cli-highlight';
import { extname } from 'node:path';
import type { BatchReport, SyncTally, TargetError, TargetResult } from '../config/schema.js';

export type OutputFilter = 'all' | 'errors' | 'success';

/** Whether `run` should print a target, given --errors-only / --success-only. */
export function matchesFilter(result: TargetResult, filter: OutputFilter): boolean {
  if (filter === 'errors') return !result.succeeded;
  if (filter === 'success') return result.succeeded;
  return true;
}

export function formatSeconds(seconds: number): string {
  return `${seconds.toFixed(3)}s`;
}

export function formatError(error: TargetError): string {
  const code = error.code ? ` (${error.code})` : '';
  return `${error.kind}${code}: ${error.message}`;
}

/** Label/value pairs of the statistics block under the check table. */
export function statisticsRows(report: BatchReport): Array<[string, string]> {
  return [
    ['Command', report.description],
    ['Total Passing', String(report.counts.passing)],
    ['Total Failing', String(report.counts.failing)],
    ['Min Time', formatSeconds(report.timing.min)],
    ['Max Time', formatSeconds(report.timing.max)],
    ['Average Time', formatSeconds(report.timing.average)],
  ];
}

const LANGUAGE_ALIASES: Record<string, string> = {
  py: 'python', js: 'javascript', ts: 'typescript', rb: 'ruby', rs: 'rust',
  md: 'markdown', yml: 'yaml', sh: 'bash', h: 'c', hpp: 'cpp', cc: 'cpp',
};

/** Syntax-highlight file content by extension; plain text when colors are off or the language is unknown. */
export function highlightSource(content: string, filename: string): string {
  if (chalk.level === 0) return content;
  const ext = extname(filename).slice(1).toLowerCase();
  const language = LANGUAGE_ALIASES[ext] ?? ext;
  if (!language || !supportsLanguage(language)) return content;
  try {
    return highlight(content, { language, ignoreIllegals: true });
  } catch {
    return content;
  }
}

const BORDERLESS = {
  top: '', 'top-mid': '', 'top-left': '', 'top-right': '',
  bottom: '', 'bottom-mid': '', 'bottom-left': '', 'bottom-right': '',
  left: '  ', 'left-mid': '', mid: '', 'mid-mid': '',
  right: '', 'right-mid': '', middle: '  ',
};

const STATISTICS_LABELS: Record<string, (text: string) => string> = {
  'Command': chalk.blue,
  'Total Passing': chalk.green,
  'Total Failing': chalk.red,
};

function panelWidth(): number {
  const columns = process.stdout.columns ?? 100;
  return Math.max(40, Math.min(columns, 160) - 2);
}

/**
 * Renders batch results to the terminal: one panel per target for verbose
 * output, or a pass/fail table with a statistics block.
 */
export class ReportRenderer {
  private write: (text: string) => void;

  constructor(write: (text: string) => void = (text) => console.log(text)) {
    this.write = write;
  }

  /** One labelled panel holding a target's stderr + stdout. */
  renderTarget(result: TargetResult, title: string, subtitle?: string): void {
    const status = result.succeeded ? chalk.green('✓') : chalk.red('✗');
    const output = (result.stderr + result.stdout).trimEnd();
    const body: string[] = [];
    if (output) body.push(output);
    if (result.error) body.push(chalk.red(formatError(result.error)));
    else if (!result.succeeded && result.exitCode !== undefined) body.push(chalk.red(`exit code ${result.exitCode}`));
    if (body.length === 0) body.push(chalk.dim('(no output)'));

    const panel = new Table({
      head: [`${status} ${chalk.bold.white(title)}`],
      style: { head: [], border: [] },
      colWidths: [panelWidth()],
      wordWrap: true,
    });
    panel.push([body.join('\n')]);
    this.write(panel.toString());
    if (subtitle) this.write(chalk.dim(`  ${subtitle}`));
  }

  /** Pass/fail table in target order followed by the statistics block. */
  renderReport(report: BatchReport): void {
    const table = new Table({
      head: [chalk.dim('student'), chalk.dim('success'), chalk.dim('time')],
      colAligns: ['left', 'center', 'right'],
      style: { head: [], border: [] },
    });
    for (const r of report.results) {
      const color = r.succeeded ? chalk.green : chalk.red;
      table.push([color(r.identifier), r.succeeded ? chalk.green('✓') : chalk.red('✗'), formatSeconds(r.duration)]);
    }
    this.write(table.toString());

    const grid = new Table({ chars: BORDERLESS, colAligns: ['left', 'right'], style: { 'padding-left': 0, 'padding-right': 1 } });
    for (const [label, value] of statisticsRows(report)) {
      const style = STATISTICS_LABELS[label] ?? chalk.bold.white;
      grid.push([style(label), value]);
    }
    this.write(chalk.bold.white('\n  Statistics'));
    this.write(grid.toString() + '\n');
  }

  /** One line per target, used by checkout and update-file. */
  renderLine(result: TargetResult, label: string): void {
    if (result.succeeded) {
      this.write(`  ${chalk.green('✓')} ${chalk.white(label)} ${chalk.dim(result.stdout)}`);
    } else {
      const reason = result.error ? formatError(result.error) : `exit code ${result.exitCode ?? 'unknown'}`;
      this.write(`  ${chalk.red('✗')} ${chalk.white(label)} ${chalk.red(reason)}`);
    }
  }

  renderSyncTally(tally: SyncTally): void {
    const parts = [
      chalk.green(`${tally.cloned} new repositories`),
      `${tally.updated} updated`,
      `${tally.upToDate} already up to date`,
    ];
    if (tally.skipped > 0) parts.push(`${tally.skipped} already existed`);
    if (tally.failed > 0) parts.push(chalk.red(`${tally.failed} failed`));
    this.write(`\n${parts.join(', ')}.`);
  }
}
