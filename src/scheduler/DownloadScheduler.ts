import { EventEmitter } from 'events';
import { ConfigError, isAbortError, toError, toFailureReason } from '../errors';
import { FingerprintEngine } from '../fingerprint/FingerprintEngine';
import { KnownFingerprintIndex } from '../fingerprints/KnownFingerprintIndex';
import { JobQueue } from './JobQueue';
import { LocalFileWriter } from './LocalFileWriter';
import { withRetry } from './retry';
import {
  ActiveJob,
  EnumerationSource,
  JobOutcome,
  JobResult,
  JobState,
  RemoteFileDescriptor,
  RetryNotice,
  SchedulerConfig,
  StateChange
} from './types';

export interface SchedulerDependencies {
  engine: FingerprintEngine;
  index: KnownFingerprintIndex;
  writer: LocalFileWriter;
}

interface RunContext {
  queue: JobQueue<RemoteFileDescriptor>;
  controller: AbortController;
  results: JobResult[];
}

/**
 * Runs jobs through fingerprint, dedup check and download on a fixed pool of
 * workers fed by a bounded queue.
 *
 * Events:
 * - `stateChange` (StateChange) on every job state transition
 * - `retry` (RetryNotice) before a network step is retried
 * - `result` (JobResult) once a claimed job reaches completed or failed
 */
export class DownloadScheduler extends EventEmitter {
  private engine: FingerprintEngine;
  private index: KnownFingerprintIndex;
  private writer: LocalFileWriter;
  private config: SchedulerConfig;
  private context: RunContext | null = null;
  private active = new Map<RemoteFileDescriptor, ActiveJob>();

  constructor(dependencies: SchedulerDependencies, config: SchedulerConfig) {
    super();
    const { workerCount, maxWorkers, queueCapacity } = config;
    if (!Number.isInteger(workerCount) || workerCount < 1 || workerCount > maxWorkers) {
      throw new ConfigError(`Worker count must be between 1 and ${maxWorkers}, got ${workerCount}`);
    }
    if (!Number.isInteger(queueCapacity) || queueCapacity < 1) {
      throw new ConfigError(`Queue capacity must be a positive integer, got ${queueCapacity}`);
    }

    this.engine = dependencies.engine;
    this.index = dependencies.index;
    this.writer = dependencies.writer;
    this.config = config;
  }

  get isRunning(): boolean {
    return this.context !== null;
  }

  /**
   * Process every job from `jobs` and resolve with one result per claimed job.
   * Rejects if the index cannot be opened or the enumeration itself fails.
   */
  async run(jobs: EnumerationSource): Promise<JobResult[]> {
    if (this.context) {
      throw new Error('A sync run is already in progress');
    }

    const context: RunContext = {
      queue: new JobQueue<RemoteFileDescriptor>(this.config.queueCapacity),
      controller: new AbortController(),
      results: []
    };
    this.context = context;

    try {
      await this.index.open();

      console.log(`Starting sync with ${this.config.workerCount} worker(s)`);
      const workers = Array.from({ length: this.config.workerCount }, (_, i) => this.work(i + 1, context));
      const [enumerationError] = await Promise.all([this.produce(jobs, context), Promise.all(workers)]);

      if (enumerationError) {
        throw enumerationError;
      }
      return context.results;
    } finally {
      this.context = null;
      this.active.clear();
    }
  }

  /**
   * Stop the current run. Buffered jobs are dropped without a result, jobs
   * in flight fail as cancelled unless their file is already in place.
   */
  cancel(): void {
    const context = this.context;
    if (!context || context.controller.signal.aborted) {
      return;
    }

    console.log('Cancelling sync run...');
    context.controller.abort();
    const dropped = context.queue.close({ discard: true });
    if (dropped.length > 0) {
      console.log(`Dropped ${dropped.length} queued job(s)`);
    }
  }

  getActiveJobs(): ActiveJob[] {
    return Array.from(this.active.values(), (entry) => ({ ...entry }));
  }

  /**
   * Feed the queue. Resolves with the enumeration error instead of rejecting,
   * so in-flight jobs can finish before `run` reports it.
   */
  private async produce(jobs: EnumerationSource, context: RunContext): Promise<Error | undefined> {
    const { queue, controller } = context;
    try {
      for await (const job of jobs) {
        if (controller.signal.aborted || !(await queue.push(job))) {
          break;
        }
      }
      return undefined;
    } catch (error) {
      console.error('Job enumeration failed:', error);
      return toError(error);
    } finally {
      queue.close({ discard: controller.signal.aborted });
    }
  }

  private async work(workerId: number, context: RunContext): Promise<void> {
    const { queue, controller, results } = context;

    while (!controller.signal.aborted) {
      const job = await queue.pop();
      if (!job) {
        return;
      }

      const result = await this.processJob(job, workerId, controller.signal);
      results.push(result);
      this.emit('result', result);
    }
  }

  private async processJob(job: RemoteFileDescriptor, workerId: number, signal: AbortSignal): Promise<JobResult> {
    const startedAt = new Date();
    const entry: ActiveJob = { job, state: 'pending', workerId, startedAt };
    this.active.set(job, entry);

    const finish = (outcome: JobOutcome): JobResult => ({
      job,
      outcome,
      workerId,
      durationMs: Date.now() - startedAt.getTime()
    });

    try {
      this.transition(entry, 'fingerprinting');
      const fingerprint = await withRetry(
        () => this.engine.fingerprint(job.source, job.extension, signal),
        this.config.retry,
        { signal, onRetry: (attempt, delayMs, error) => this.notifyRetry({ job, step: 'fingerprint', attempt, delayMs, error }) }
      );

      if (await this.index.contains(job.course.id, fingerprint)) {
        this.transition(entry, 'skipping');
        this.transition(entry, 'completed');
        return finish({ kind: 'skipped', fingerprint });
      }

      this.transition(entry, 'downloading');
      const written = await withRetry(
        async () => this.writer.write(job, await job.source.fetchFull(signal), signal),
        this.config.retry,
        { signal, onRetry: (attempt, delayMs, error) => this.notifyRetry({ job, step: 'download', attempt, delayMs, error }) }
      );

      // The file is in place; record it even if the run was cancelled meanwhile
      await this.index.insert(job.course.id, fingerprint, {
        displayName: job.displayName,
        localPath: written.localPath
      });
      this.transition(entry, 'completed');
      return finish({ kind: 'downloaded', fingerprint, localPath: written.localPath, bytes: written.bytes });
    } catch (error) {
      const reason = isAbortError(error) ? 'cancelled' : toFailureReason(error);
      const message = toError(error).message;
      if (reason !== 'cancelled') {
        console.error(`Failed to sync ${job.course.name}/${job.displayName} (${reason}): ${message}`);
      }
      this.transition(entry, 'failed');
      return finish({ kind: 'failed', reason, message });
    } finally {
      this.active.delete(job);
    }
  }

  private transition(entry: ActiveJob, to: JobState): void {
    const change: StateChange = { job: entry.job, from: entry.state, to, workerId: entry.workerId };
    entry.state = to;
    this.emit('stateChange', change);
  }

  private notifyRetry(notice: RetryNotice): void {
    console.warn(
      `Retrying ${notice.step} of ${notice.job.displayName} in ${notice.delayMs}ms ` +
      `(attempt ${notice.attempt} failed: ${notice.error.message})`
    );
    this.emit('retry', notice);
  }
}
