// Shared test doubles

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import { CancelledError, FetchError } from '../errors';
import { Fingerprint } from '../fingerprint/types';
import { FingerprintRecord, FingerprintRecordDetails, FingerprintStore } from '../fingerprints/types';
import { ByteRangeSource } from '../sources/types';

export interface MemorySourceOptions {
  // Number of leading fetchRange calls that fail with a FetchError
  failRanges?: number;
  // Number of leading fetchFull calls that fail with a FetchError
  failFull?: number;
  // fetchRange blocks until the signal aborts
  blockUntilAborted?: boolean;
}

/**
 * In-memory ByteRangeSource that records every call
 */
export class MemorySource implements ByteRangeSource {
  readonly content: Buffer;
  readonly rangeCalls: Array<{ offset: number; length: number }> = [];
  fullCalls = 0;
  private options: MemorySourceOptions;
  private rangeFailures = 0;
  private fullFailures = 0;

  constructor(content: Buffer | string, options: MemorySourceOptions = {}) {
    this.content = typeof content === 'string' ? Buffer.from(content) : content;
    this.options = options;
  }

  describe(): string {
    return `memory:${this.content.length}`;
  }

  async fetchRange(offset: number, length: number, signal?: AbortSignal): Promise<Buffer> {
    this.rangeCalls.push({ offset, length });

    if (this.options.blockUntilAborted) {
      await waitForAbort(signal);
      throw new CancelledError('Range request cancelled');
    }
    if (this.rangeFailures < (this.options.failRanges ?? 0)) {
      this.rangeFailures++;
      throw new FetchError('Connection reset', 503);
    }
    return Buffer.from(this.content.subarray(offset, offset + length));
  }

  async fetchFull(): Promise<Readable> {
    this.fullCalls++;
    if (this.fullFailures < (this.options.failFull ?? 0)) {
      this.fullFailures++;
      throw new FetchError('Connection reset', 503);
    }
    return Readable.from([Buffer.from(this.content)]);
  }
}

function waitForAbort(signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (!signal || signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

/**
 * FingerprintStore kept in a Map, for tests that do not need index files
 */
export class MemoryFingerprintStore implements FingerprintStore {
  readonly records = new Map<string, FingerprintRecord>();
  insertCalls = 0;
  initializeCalls = 0;
  closed = false;
  failInsertsWith?: Error;

  async initialize(): Promise<void> {
    this.initializeCalls++;
  }

  async loadCourse(courseId: string): Promise<Fingerprint[]> {
    return Array.from(this.records.values())
      .filter((record) => record.courseId === courseId)
      .map((record) => record.fingerprint);
  }

  async insert(courseId: string, fingerprint: Fingerprint, details: FingerprintRecordDetails = {}): Promise<boolean> {
    this.insertCalls++;
    if (this.failInsertsWith) {
      throw this.failInsertsWith;
    }
    const key = `${courseId}:${fingerprint}`;
    if (this.records.has(key)) {
      return false;
    }
    this.records.set(key, { courseId, fingerprint, recordedAt: new Date(), ...details });
    return true;
  }

  async listRecords(courseId: string): Promise<FingerprintRecord[]> {
    return Array.from(this.records.values()).filter((record) => record.courseId === courseId);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function createTempDir(prefix = 'course-sync-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeTempDir(directory: string): void {
  fs.rmSync(directory, { recursive: true, force: true });
}

export function silenceConsole(): void {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
}

export function bytes(length: number, seed = 0): Buffer {
  const buffer = Buffer.alloc(length);
  for (let i = 0; i < length; i++) {
    buffer[i] = (i * 31 + seed * 7) % 256;
  }
  return buffer;
}

/**
 * Poll `predicate` between event loop turns
 */
export async function waitFor(predicate: () => boolean, turns = 1000): Promise<void> {
  for (let i = 0; i < turns; i++) {
    if (predicate()) {
      return;
    }
    await new Promise((resolve) => setImmediate(resolve));
  }
  throw new Error('Condition not met in time');
}
