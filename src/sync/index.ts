/**
 * Public entry point: configuration, session and manifest helpers
 */

export * from './SyncSession';
export * from './signals';
export * from './manifest';
export { loadEnvironment, getSyncConfig } from '../config';
export type { SyncConfig } from '../config';
export type { SyncSummary, FailureEntry, CourseSummary } from '../reporting/ResultReporter';
export { createJob } from '../scheduler/jobs';
export type { JobInput } from '../scheduler/jobs';
export * from '../scheduler/types';
export * from '../errors';
export { HttpRangeSource } from '../sources/HttpRangeSource';
export { S3RangeSource } from '../sources/S3RangeSource';
export { LocalFileSource } from '../sources/LocalFileSource';
export type { ByteRangeSource } from '../sources/types';
