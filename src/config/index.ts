/**
 * Environment-driven configuration for sync runs
 */

import * as path from 'path';
import dotenv from 'dotenv';
import { ConfigError } from '../errors';
import { BackoffStrategy, RetryPolicy, SchedulerConfig } from '../scheduler/types';

export const DEFAULT_POLICY_FILE = path.resolve(__dirname, '../../config/extension-policy.json');

export interface SyncConfig {
  downloadDirectory: string;
  policyFile: string;
  indexDirectory: string;
  // Bytes per second shared by all downloads, null when unlimited
  downloadRate: number | null;
  runLogPath: string;
  scheduler: SchedulerConfig;
}

type Environment = Record<string, string | undefined>;

/**
 * Load `.env.local` (wins) and `.env` from the working directory into process.env
 */
export function loadEnvironment(directory: string = process.cwd()): void {
  dotenv.config({ path: path.join(directory, '.env.local'), override: true });
  dotenv.config({ path: path.join(directory, '.env') });
}

export function getSyncConfig(env: Environment = process.env): SyncConfig {
  const maxWorkers = readInteger(env, 'SYNC_MAX_WORKERS', 16, 1);
  const workerCount = readInteger(env, 'SYNC_WORKERS', Math.min(4, maxWorkers), 1);
  if (workerCount > maxWorkers) {
    throw new ConfigError(`SYNC_WORKERS (${workerCount}) exceeds SYNC_MAX_WORKERS (${maxWorkers})`);
  }

  const retry: RetryPolicy = {
    attempts: readInteger(env, 'SYNC_RETRY_ATTEMPTS', 3, 1),
    baseDelayMs: readInteger(env, 'SYNC_RETRY_DELAY_MS', 1000, 0),
    maxDelayMs: readInteger(env, 'SYNC_RETRY_MAX_DELAY_MS', 30000, 0),
    backoff: readBackoff(env)
  };

  return Object.freeze({
    downloadDirectory: path.resolve(env.SYNC_DOWNLOAD_DIR || './data/courses'),
    policyFile: env.SYNC_POLICY_FILE ? path.resolve(env.SYNC_POLICY_FILE) : DEFAULT_POLICY_FILE,
    indexDirectory: path.resolve(env.SYNC_INDEX_DIR || './data/index'),
    downloadRate: readDownloadRate(env),
    runLogPath: env.SYNC_RUN_LOG || './data/run-log.txt',
    scheduler: Object.freeze({
      workerCount,
      maxWorkers,
      queueCapacity: readInteger(env, 'SYNC_QUEUE_CAPACITY', workerCount * 2, 1),
      retry: Object.freeze(retry)
    })
  });
}

function readInteger(env: Environment, name: string, fallback: number, min: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

/**
 * SYNC_DOWNLOAD_RATE is given in MiB/s; empty or 0 means unlimited
 */
function readDownloadRate(env: Environment): number | null {
  const raw = env.SYNC_DOWNLOAD_RATE?.trim();
  if (!raw) {
    return null;
  }

  const mebibytes = Number(raw);
  if (!Number.isFinite(mebibytes) || mebibytes < 0) {
    throw new ConfigError(`SYNC_DOWNLOAD_RATE must be a number of MiB/s >= 0, got "${raw}"`);
  }
  return mebibytes === 0 ? null : Math.round(mebibytes * 1024 * 1024);
}

function readBackoff(env: Environment): BackoffStrategy {
  const raw = env.SYNC_RETRY_BACKOFF?.trim().toLowerCase() || 'exponential';
  if (raw !== 'fixed' && raw !== 'exponential') {
    throw new ConfigError(`SYNC_RETRY_BACKOFF must be "fixed" or "exponential", got "${raw}"`);
  }
  return raw;
}
