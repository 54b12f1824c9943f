import path from 'path';
import pc from 'picocolors';
import type { RunSummary, TaskResult } from '@constify/core';

export interface ScanEntry {
  /** Path relative to the scanned root */
  path: string;
  literals: number;
  malformed: number;
}

export interface ScanReport {
  root: string;
  files: ScanEntry[];
  warnings: string[];
}

const MAX_LISTED = 10;

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  renderRun(summary: RunSummary, root: string): void {
    if (this.isJson) {
      console.log(
        JSON.stringify(
          {
            runId: summary.runId,
            root,
            counts: summary.counts,
            durationMs: summary.durationMs,
            results: summary.results,
          },
          null,
          2,
        ),
      );
      return;
    }

    const rel = (p: string) => path.relative(root, p) || p;
    const { counts } = summary;

    if (counts.failed === 0) {
      console.log(`\n${pc.green('✅ Refactor finished.')}`);
    } else {
      console.log(`\n${pc.red('❌ Refactor finished with failures.')}`);
    }
    console.log(
      `  Written: ${counts.written}  Skipped: ${counts.skipped}  Failed: ${counts.failed}  (${(summary.durationMs / 1000).toFixed(1)}s)`,
    );

    const written = summary.results.filter(isWritten);
    if (written.length > 0) {
      console.log(pc.bold('\nWritten files:'));
      written.slice(0, MAX_LISTED).forEach((r) => {
        const target =
          r.receipt.outputPath === r.path ? '' : ` -> ${path.basename(r.receipt.outputPath)}`;
        console.log(`  - ${rel(r.path)}${target}`);
      });
      if (written.length > MAX_LISTED) {
        console.log(`  ... and ${written.length - MAX_LISTED} more.`);
      }
    }

    const warned = written.filter((r) => r.warnings.length > 0);
    if (warned.length > 0) {
      console.log(pc.bold('\nWarnings:'));
      for (const r of warned) {
        r.warnings.forEach((w) => console.log(`  - ${rel(r.path)}: ${pc.yellow(w)}`));
      }
    }

    const failed = summary.results.filter(isFailed);
    if (failed.length > 0) {
      console.log(pc.bold('\nFailed files:'));
      failed.forEach((r) => console.log(`  - ${rel(r.path)}: ${pc.red(r.reason)}`));
    }

    console.log(pc.gray(`\nRun ID: ${summary.runId}`));
  }

  /** One line per finished file while a run is in progress; silent in JSON mode. */
  renderProgress(done: number, total: number, result: TaskResult, root: string): void {
    if (this.isJson) return;
    const file = path.relative(root, result.path) || result.path;
    const counter = pc.gray(`[${done}/${total}]`);
    switch (result.outcome) {
      case 'written':
        console.log(`${counter} ${pc.green('Written')} ${file}`);
        break;
      case 'skipped':
        console.log(`${counter} Skipped ${file}`);
        break;
      case 'failed':
        console.log(`${counter} ${pc.red('Failed')} ${file}: ${result.reason}`);
        break;
    }
  }

  renderScan(report: ScanReport): void {
    if (this.isJson) {
      console.log(JSON.stringify(report, null, 2));
      return;
    }

    const eligible = report.files.filter((f) => f.literals > 0);
    console.log(
      `Found ${report.files.length} source files, ${eligible.length} with literals to refactor`,
    );
    for (const file of report.files) {
      const malformed = file.malformed > 0 ? pc.yellow(` (${file.malformed} malformed)`) : '';
      const count = String(file.literals).padStart(5);
      console.log(`  ${file.literals > 0 ? count : pc.gray(count)}  ${file.path}${malformed}`);
    }
    report.warnings.forEach((w) => console.log(pc.yellow(`  ${w}`)));
  }

  log(message: string): void {
    if (this.isJson) {
      // JSON mode should not have logs
    } else {
      console.log(pc.gray(message));
    }
  }
}

function isWritten(r: TaskResult): r is Extract<TaskResult, { outcome: 'written' }> {
  return r.outcome === 'written';
}

function isFailed(r: TaskResult): r is Extract<TaskResult, { outcome: 'failed' }> {
  return r.outcome === 'failed';
}
