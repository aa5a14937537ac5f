/**
 * Ingest Progress Reporter
 *
 * Shows progress for long-running ingestion. Supports three output modes:
 * - Interactive: an ora spinner with a running count
 * - JSON: NDJSON event stream for CI/CD integration
 * - Text: plain lines for non-TTY environments
 *
 * Spinner updates are throttled to 100ms to prevent flickering.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { ContentRecord } from '../../store/index.js';
import type { IngestOutcome, IngestReport } from '../../ingest/index.js';

export interface ProgressReporterOptions {
  /** Output as JSON events instead of human-readable text */
  json: boolean;
  /** Print one line per record */
  verbose: boolean;
  /** Whether stdout is a TTY (for spinner support) */
  isInteractive: boolean;
}

export type ProgressEventType = 'start' | 'progress' | 'warning' | 'complete';

/**
 * JSON event emitted in --json mode.
 */
export interface ProgressEvent {
  type: ProgressEventType;
  timestamp: string;
  data: Record<string, unknown>;
}

const OUTCOME_COLORS: Record<IngestOutcome, (text: string) => string> = {
  inserted: chalk.green,
  updated: chalk.cyan,
  skipped: chalk.dim,
  failed: chalk.red,
};

/**
 * Serializable form of a report (errors flattened to their messages).
 */
export function reportToJSON(report: IngestReport): Record<string, unknown> {
  return {
    total: report.total,
    inserted: report.inserted,
    updated: report.updated,
    skipped: report.skipped,
    failed: report.failed.map((f) => ({ index: f.index, id: f.id, error: f.error.message })),
    cancelled: report.cancelled,
    durationMs: report.durationMs,
  };
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${Math.round(seconds % 60)}s`;
}

/**
 * Usage:
 * ```typescript
 * const reporter = new ProgressReporter({ json: false, verbose: false, isInteractive: true });
 * reporter.start(records.length, file);
 * await pipeline.run(records, { onProgress: (n, total, record, outcome) => reporter.update(n, total, record, outcome) });
 * reporter.showSummary(report);
 * ```
 */
export class ProgressReporter {
  private spinner: Ora | null = null;
  private lastUpdateTime = 0;

  private static readonly UPDATE_THROTTLE_MS = 100;

  constructor(private readonly options: ProgressReporterOptions) {}

  start(total: number, source: string): void {
    if (this.options.json) {
      this.emitJson('start', { total, source });
      return;
    }

    const text = `Ingesting ${total.toLocaleString()} record${total === 1 ? '' : 's'} from ${source}`;
    if (this.options.isInteractive) {
      this.spinner = ora(text).start();
    } else {
      console.log(`${text}...`);
    }
  }

  update(processed: number, total: number, record: ContentRecord, outcome: IngestOutcome): void {
    if (this.options.verbose && !this.options.json) {
      const line = `  ${OUTCOME_COLORS[outcome](outcome.padEnd(8))} ${record.id}`;
      if (this.spinner) {
        this.spinner.clear();
        console.log(line);
        this.spinner.render();
      } else {
        console.log(line);
      }
    }

    // The last record always gets through the throttle
    const now = performance.now();
    if (processed < total && now - this.lastUpdateTime < ProgressReporter.UPDATE_THROTTLE_MS) {
      return;
    }
    this.lastUpdateTime = now;

    if (this.options.json) {
      this.emitJson('progress', { processed, total });
      return;
    }

    if (this.spinner) {
      const percentage = total > 0 ? Math.round((processed / total) * 100) : 100;
      this.spinner.text = `${processed}/${total} (${percentage}%) ${chalk.dim(record.id)}`;
    }
  }

  warn(message: string): void {
    if (this.options.json) {
      this.emitJson('warning', { message });
      return;
    }

    if (this.spinner) {
      this.spinner.clear();
      console.warn(chalk.yellow(`Warning: ${message}`));
      this.spinner.render();
    } else {
      console.warn(chalk.yellow(`Warning: ${message}`));
    }
  }

  /**
   * Stop the spinner and print the final counts.
   */
  showSummary(report: IngestReport): void {
    if (this.options.json) {
      this.emitJson('complete', { report: reportToJSON(report) });
      return;
    }

    const processed = report.inserted + report.updated + report.skipped + report.failed.length;
    if (this.spinner) {
      if (report.cancelled) {
        this.spinner.warn(`Cancelled after ${processed} of ${report.total} records`);
      } else if (report.failed.length > 0) {
        this.spinner.warn(`Processed ${processed} records with ${report.failed.length} failure(s)`);
      } else {
        this.spinner.succeed(`Processed ${processed} records`);
      }
      this.spinner = null;
    }

    console.log('');
    console.log(chalk.bold(report.cancelled ? 'Ingestion Cancelled' : 'Ingestion Complete'));
    console.log('');
    console.log(`  ${chalk.dim('Inserted:')}      ${report.inserted.toLocaleString()}`);
    console.log(`  ${chalk.dim('Updated:')}       ${report.updated.toLocaleString()}`);
    console.log(`  ${chalk.dim('Skipped:')}       ${report.skipped.toLocaleString()}`);
    console.log(`  ${chalk.dim('Failed:')}        ${report.failed.length.toLocaleString()}`);
    console.log(`  ${chalk.dim('Time elapsed:')}  ${formatDuration(report.durationMs)}`);

    if (report.failed.length > 0) {
      console.log('');
      const shown = report.failed.slice(0, 10);
      for (const failure of shown) {
        console.log(chalk.red(`  #${failure.index} ${failure.id}: ${failure.error.message}`));
      }
      if (report.failed.length > shown.length) {
        console.log(chalk.dim(`  ... and ${report.failed.length - shown.length} more`));
      }
    }
  }

  /** Stop the spinner without a summary (on a fatal error) */
  stop(): void {
    this.spinner?.stop();
    this.spinner = null;
  }

  private emitJson(type: ProgressEventType, data: Record<string, unknown>): void {
    const event: ProgressEvent = { type, timestamp: new Date().toISOString(), data };
    console.log(JSON.stringify(event));
  }
}
