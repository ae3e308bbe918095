import { FailureReason } from '../errors';
import { Fingerprint } from '../fingerprint/types';
import { ByteRangeSource } from '../sources/types';

export interface Course {
  id: string;
  name: string;
}

/**
 * One candidate file. Immutable once created by `createJob`.
 */
export interface RemoteFileDescriptor {
  readonly id: string;
  readonly course: Course;
  readonly displayName: string;
  readonly extension: string;
  // Advisory only, as reported by the portal
  readonly declaredSize?: number;
  readonly source: ByteRangeSource;
}

export type JobState = 'pending' | 'fingerprinting' | 'skipping' | 'downloading' | 'completed' | 'failed';

export type JobOutcome =
  | { kind: 'downloaded'; fingerprint: Fingerprint; localPath: string; bytes: number }
  | { kind: 'skipped'; fingerprint: Fingerprint }
  | { kind: 'failed'; reason: FailureReason; message: string };

export interface JobResult {
  job: RemoteFileDescriptor;
  outcome: JobOutcome;
  workerId: number;
  durationMs: number;
}

export interface StateChange {
  job: RemoteFileDescriptor;
  from: JobState;
  to: JobState;
  workerId: number;
}

export type BackoffStrategy = 'fixed' | 'exponential';

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoff: BackoffStrategy;
}

export interface RetryNotice {
  job: RemoteFileDescriptor;
  step: 'fingerprint' | 'download';
  attempt: number;
  delayMs: number;
  error: Error;
}

export interface SchedulerConfig {
  workerCount: number;
  maxWorkers: number;
  queueCapacity: number;
  retry: RetryPolicy;
}

export type EnumerationSource = Iterable<RemoteFileDescriptor> | AsyncIterable<RemoteFileDescriptor>;

export interface ActiveJob {
  job: RemoteFileDescriptor;
  state: JobState;
  workerId: number;
  startedAt: Date;
}
