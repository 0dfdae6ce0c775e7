import chalk from 'chalk';
import Table from 'cli-table3';
import type { SyncOutcome, SyncReport, SyncStatus } from '../core/results.js';

export interface ReportSection {
  title: string;
  lines: string[];
}

/** Plain-text status line for one finished repository. */
export function formatOutcome(path: string, outcome: SyncOutcome): string {
  switch (outcome.status) {
    case 'cloned': return `${path}: cloned`;
    case 'updated': return `${path}: updated`;
    case 'fetched': return `${path}: fetched (local changes)`;
    case 'offMain': return `${path}: on branch ${outcome.branch}, fetched`;
    case 'skipped': return `${path}: skipped (ignored org)`;
    case 'error': return `${path}: error (${outcome.kind}): ${outcome.message}`;
  }
}

/** Issue sections, each present only when it has entries. */
export function buildIssueSections(report: SyncReport): ReportSection[] {
  const sections: ReportSection[] = [];
  if (report.notOnMain.length > 0) {
    sections.push({
      title: 'Repositories not on master/main:',
      lines: report.notOnMain.map((e) => `- ${e.path} (${e.branch})`),
    });
  }
  if (report.errored.length > 0) {
    sections.push({
      title: 'Repositories with errors:',
      lines: report.errored.map((e) => `- ${e.path}`),
    });
  }
  if (report.orphans.length > 0) {
    sections.push({
      title: 'Orphaned directories:',
      lines: report.orphans.map((p) => `- ${p}`),
    });
  }
  return sections;
}

const SUMMARY_ORDER: Array<[SyncStatus, string]> = [
  ['cloned', 'Cloned'],
  ['updated', 'Updated'],
  ['fetched', 'Fetched (dirty)'],
  ['offMain', 'Off main'],
  ['skipped', 'Skipped'],
  ['error', 'Errors'],
];

/**
 * End-of-run output: outcome counts, then the issue report.
 */
export class Report {
  static renderOutcome(path: string, outcome: SyncOutcome): void {
    const line = `  ${formatOutcome(path, outcome)}`;
    if (outcome.status === 'error') console.log(chalk.red(line));
    else if (outcome.status === 'offMain' || outcome.status === 'fetched') console.log(chalk.yellow(line));
    else console.log(chalk.dim(line));
  }

  static renderSummary(counts: Record<SyncStatus, number>): void {
    const table = new Table({
      head: SUMMARY_ORDER.map(([, label]) => chalk.dim(label)),
      chars: {
        top: '', 'top-mid': '', 'top-left': '', 'top-right': '',
        bottom: '', 'bottom-mid': '', 'bottom-left': '', 'bottom-right': '',
        left: '  ', 'left-mid': '', mid: '', 'mid-mid': '',
        right: '', 'right-mid': '', middle: chalk.dim(' │ '),
      },
      style: { 'padding-left': 0, 'padding-right': 1 },
    });
    table.push(SUMMARY_ORDER.map(([status]) => {
      const n = counts[status];
      if (n === 0) return chalk.dim('0');
      return status === 'error' ? chalk.red(String(n)) : String(n);
    }));
    console.log('\n' + table.toString());
  }

  static renderIssues(report: SyncReport): void {
    const sections = buildIssueSections(report);
    if (sections.length === 0) {
      console.log(chalk.green('\n  ✓ No issues'));
      return;
    }
    for (const section of sections) {
      console.log(chalk.bold.yellow(`\n${section.title}`));
      for (const line of section.lines) console.log(line);
    }
  }

  static render(report: SyncReport): void {
    Report.renderSummary(report.counts);
    Report.renderIssues(report);
    console.log();
  }
}
