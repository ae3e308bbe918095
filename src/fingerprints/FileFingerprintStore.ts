import * as fs from 'fs';
import * as path from 'path';
import PQueue from 'p-queue';
import { hasErrorCode, StorageError } from '../errors';
import { Fingerprint } from '../fingerprint/types';
import { FingerprintRecord, FingerprintRecordDetails, FingerprintStore } from './types';

export const INDEX_FILE_SUFFIX = '.jsonl';

interface CourseRecords {
  records: Map<Fingerprint, FingerprintRecord>;
  appends: PQueue;
}

/**
 * Known fingerprints kept as one append-only JSON-lines file per course.
 *
 * Every insert appends a single line and fsyncs the file before it resolves.
 * A torn last line left by a crash is cut off the next time the course is
 * loaded, so later appends start on a fresh line.
 */
export class FileFingerprintStore implements FingerprintStore {
  private directory: string;
  private courses = new Map<string, Promise<CourseRecords>>();

  constructor(directory: string) {
    this.directory = directory;
  }

  async initialize(): Promise<void> {
    try {
      await fs.promises.mkdir(this.directory, { recursive: true });
    } catch (error) {
      throw storageError(`Cannot create index directory ${this.directory}`, error);
    }
  }

  courseFile(courseId: string): string {
    return path.join(this.directory, encodeURIComponent(courseId) + INDEX_FILE_SUFFIX);
  }

  async loadCourse(courseId: string): Promise<Fingerprint[]> {
    const { records } = await this.course(courseId);
    return Array.from(records.keys());
  }

  async insert(courseId: string, fingerprint: Fingerprint, details: FingerprintRecordDetails = {}): Promise<boolean> {
    const course = await this.course(courseId);

    return course.appends.add(async () => {
      if (course.records.has(fingerprint)) {
        return false;
      }
      const record: FingerprintRecord = { courseId, fingerprint, ...details, recordedAt: new Date() };
      await this.append(courseId, record);
      course.records.set(fingerprint, record);
      return true;
    });
  }

  async listRecords(courseId: string): Promise<FingerprintRecord[]> {
    const { records } = await this.course(courseId);
    return Array.from(records.values());
  }

  async close(): Promise<void> {
    const loaded = await Promise.allSettled(Array.from(this.courses.values()));
    await Promise.all(
      loaded.map((result) => (result.status === 'fulfilled' ? result.value.appends.onIdle() : undefined))
    );
    this.courses.clear();
  }

  private course(courseId: string): Promise<CourseRecords> {
    let loading = this.courses.get(courseId);
    if (!loading) {
      loading = this.readCourse(courseId).then((records) => ({
        records,
        appends: new PQueue({ concurrency: 1 })
      }));
      const pending = loading;
      pending.catch(() => {
        if (this.courses.get(courseId) === pending) {
          this.courses.delete(courseId);
        }
      });
      this.courses.set(courseId, pending);
    }
    return loading;
  }

  private async readCourse(courseId: string): Promise<Map<Fingerprint, FingerprintRecord>> {
    const file = this.courseFile(courseId);
    const records = new Map<Fingerprint, FingerprintRecord>();

    let content: Buffer;
    try {
      content = await fs.promises.readFile(file);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return records;
      }
      throw storageError(`Cannot read ${file}`, error);
    }

    const complete = content.lastIndexOf(0x0a) + 1;
    if (complete < content.length) {
      console.warn(`Dropping incomplete last entry of ${file}`);
      try {
        await fs.promises.truncate(file, complete);
      } catch (error) {
        throw storageError(`Cannot repair ${file}`, error);
      }
    }

    const lines = content.subarray(0, complete).toString('utf8').split('\n');
    lines.forEach((line, lineIndex) => {
      if (!line.trim()) return;
      const record = parseRecord(courseId, line);
      if (!record) {
        console.warn(`Ignoring unreadable entry on line ${lineIndex + 1} of ${file}`);
        return;
      }
      if (!records.has(record.fingerprint)) {
        records.set(record.fingerprint, record);
      }
    });
    return records;
  }

  private async append(courseId: string, record: FingerprintRecord): Promise<void> {
    const file = this.courseFile(courseId);
    const line = JSON.stringify({
      fingerprint: record.fingerprint,
      displayName: record.displayName,
      localPath: record.localPath,
      recordedAt: record.recordedAt.toISOString()
    }) + '\n';

    try {
      const handle = await fs.promises.open(file, 'a');
      try {
        await handle.appendFile(line, 'utf8');
        await handle.sync();
      } finally {
        await handle.close();
      }
    } catch (error) {
      throw storageError(`Cannot append to ${file}`, error);
    }
  }
}

function parseRecord(courseId: string, line: string): FingerprintRecord | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null) {
    return null;
  }

  const fingerprint: unknown = Reflect.get(parsed, 'fingerprint');
  const displayName: unknown = Reflect.get(parsed, 'displayName');
  const localPath: unknown = Reflect.get(parsed, 'localPath');
  const recordedAt: unknown = Reflect.get(parsed, 'recordedAt');
  if (typeof fingerprint !== 'string' || !fingerprint) {
    return null;
  }

  return {
    courseId,
    fingerprint,
    displayName: typeof displayName === 'string' ? displayName : undefined,
    localPath: typeof localPath === 'string' ? localPath : undefined,
    recordedAt: typeof recordedAt === 'string' ? new Date(recordedAt) : new Date(0)
  };
}

function storageError(message: string, error: unknown): StorageError {
  const cause = error instanceof Error ? error : undefined;
  const detail = typeof error === 'object' && error !== null ? Reflect.get(error, 'message') : error;
  return new StorageError(`${message}: ${String(detail)}`, cause);
}
