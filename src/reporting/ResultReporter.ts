import * as fs from 'fs';
import * as path from 'path';
import { FailureReason, hasErrorCode } from '../errors';
import { DownloadScheduler } from '../scheduler/DownloadScheduler';
import { JobResult } from '../scheduler/types';
import { formatBytes } from '../utils/files';

export interface FailureEntry {
  jobId: string;
  course: string;
  displayName: string;
  reason: FailureReason;
  message: string;
}

export interface CourseSummary {
  courseName: string;
  downloaded: number;
  skipped: number;
  failed: number;
  bytesDownloaded: number;
}

export interface SyncSummary {
  downloaded: number;
  skipped: number;
  failed: number;
  bytesDownloaded: number;
  failures: FailureEntry[];
  byCourse: Record<string, CourseSummary>;
}

/**
 * Aggregates job results into the end-of-run summary and the run log
 */
export class ResultReporter {
  private results: JobResult[] = [];

  record(result: JobResult): void {
    this.results.push(result);
  }

  attach(scheduler: DownloadScheduler): () => void {
    const listener = (result: JobResult) => this.record(result);
    scheduler.on('result', listener);
    return () => {
      scheduler.off('result', listener);
    };
  }

  reset(): void {
    this.results = [];
  }

  getSummary(): SyncSummary {
    const summary: SyncSummary = {
      downloaded: 0,
      skipped: 0,
      failed: 0,
      bytesDownloaded: 0,
      failures: [],
      byCourse: {}
    };
    // Course ids are opaque and may collide with Object.prototype keys
    const byCourse = new Map<string, CourseSummary>();

    for (const { job, outcome } of this.results) {
      let course = byCourse.get(job.course.id);
      if (!course) {
        course = { courseName: job.course.name, downloaded: 0, skipped: 0, failed: 0, bytesDownloaded: 0 };
        byCourse.set(job.course.id, course);
      }

      switch (outcome.kind) {
        case 'downloaded':
          summary.downloaded++;
          summary.bytesDownloaded += outcome.bytes;
          course.downloaded++;
          course.bytesDownloaded += outcome.bytes;
          break;
        case 'skipped':
          summary.skipped++;
          course.skipped++;
          break;
        case 'failed':
          summary.failed++;
          course.failed++;
          summary.failures.push({
            jobId: job.id,
            course: job.course.name,
            displayName: job.displayName,
            reason: outcome.reason,
            message: outcome.message
          });
          break;
      }
    }

    summary.byCourse = Object.fromEntries(byCourse);
    return summary;
  }

  formatSummary(summary: SyncSummary = this.getSummary()): string {
    return `${summary.downloaded} downloaded, ${summary.skipped} skipped, ${summary.failed} failed`;
  }

  printSummary(): void {
    const summary = this.getSummary();
    console.log(`📊 ${this.formatSummary(summary)} (${formatBytes(summary.bytesDownloaded)} transferred)`);
    for (const failure of summary.failures) {
      console.error(`  ❌ ${failure.course}/${failure.displayName} [${failure.reason}]: ${failure.message}`);
    }
  }

  /**
   * One block of the run log: a dated header, the totals and every newly
   * downloaded file, sorted by course and name.
   */
  renderRunLog(now: Date = new Date()): string {
    const summary = this.getSummary();
    const downloads = this.results
      .flatMap(({ job, outcome }) => outcome.kind === 'downloaded'
        ? [{ label: `${job.course.name}/${job.displayName}`, bytes: outcome.bytes }]
        : [])
      .sort((a, b) => a.label.localeCompare(b.label));

    const lines = [
      `=== Sync run ${now.toISOString()} ===`,
      this.formatSummary(summary),
      ...downloads.map((entry) => `+ ${entry.label} (${formatBytes(entry.bytes)})`),
      ...summary.failures.map((failure) => `! ${failure.course}/${failure.displayName} [${failure.reason}]: ${failure.message}`)
    ];
    return lines.join('\n') + '\n';
  }

  /**
   * Write this run's block to the top of the run log, newest run first
   */
  async appendRunLog(logPath: string, now: Date = new Date()): Promise<void> {
    let previous = '';
    try {
      previous = await fs.promises.readFile(logPath, 'utf8');
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) {
        throw error;
      }
    }

    await fs.promises.mkdir(path.dirname(logPath), { recursive: true });
    const block = this.renderRunLog(now);
    await fs.promises.writeFile(logPath, previous ? `${block}\n${previous}` : block, 'utf8');
  }
}
