import PQueue from 'p-queue';
import { Fingerprint } from '../fingerprint/types';
import { FingerprintRecordDetails, FingerprintStore } from './types';

/**
 * Per-course set of fingerprints that were already downloaded or found on disk.
 *
 * Each course is loaded from the store once, on first use. Inserts for one
 * course go through a single-slot queue and are written to the store before
 * they become visible to `contains`, so a fingerprint is never known in memory
 * without being durable.
 */
export class KnownFingerprintIndex {
  private store: FingerprintStore;
  private courses = new Map<string, Promise<Set<Fingerprint>>>();
  private writeQueues = new Map<string, PQueue>();
  private pendingWrites = new Set<Promise<boolean>>();
  private opened: Promise<void> | null = null;

  constructor(store: FingerprintStore) {
    this.store = store;
  }

  async open(): Promise<void> {
    if (!this.opened) {
      this.opened = this.store.initialize().catch((error: unknown) => {
        this.opened = null;
        throw error;
      });
    }
    await this.opened;
  }

  async preload(courseIds: Iterable<string>): Promise<void> {
    await Promise.all(Array.from(courseIds, (courseId) => this.load(courseId)));
  }

  async contains(courseId: string, fingerprint: Fingerprint): Promise<boolean> {
    const known = await this.load(courseId);
    return known.has(fingerprint);
  }

  /**
   * Record a fingerprint. Idempotent: resolves to false if it was already known.
   */
  async insert(courseId: string, fingerprint: Fingerprint, details?: FingerprintRecordDetails): Promise<boolean> {
    const write = this.write(courseId, fingerprint, details);
    this.pendingWrites.add(write);
    try {
      return await write;
    } finally {
      this.pendingWrites.delete(write);
    }
  }

  async size(courseId: string): Promise<number> {
    return (await this.load(courseId)).size;
  }

  /**
   * Wait for pending writes, then release the store. A failed write has
   * already been reported to its caller.
   */
  async close(): Promise<void> {
    await Promise.allSettled(Array.from(this.pendingWrites));
    await this.store.close();
    this.courses.clear();
    this.writeQueues.clear();
    this.opened = null;
  }

  private async write(courseId: string, fingerprint: Fingerprint, details?: FingerprintRecordDetails): Promise<boolean> {
    const known = await this.load(courseId);

    return this.writeQueueFor(courseId).add(async () => {
      if (known.has(fingerprint)) {
        return false;
      }
      const inserted = await this.store.insert(courseId, fingerprint, details);
      known.add(fingerprint);
      return inserted;
    });
  }

  private load(courseId: string): Promise<Set<Fingerprint>> {
    let loading = this.courses.get(courseId);
    if (!loading) {
      loading = this.open()
        .then(() => this.store.loadCourse(courseId))
        .then((fingerprints) => new Set(fingerprints));
      const pending = loading;
      // A failed load is retried by the next caller instead of being cached
      pending.catch(() => {
        if (this.courses.get(courseId) === pending) {
          this.courses.delete(courseId);
        }
      });
      this.courses.set(courseId, pending);
    }
    return loading;
  }

  private writeQueueFor(courseId: string): PQueue {
    let queue = this.writeQueues.get(courseId);
    if (!queue) {
      queue = new PQueue({ concurrency: 1 });
      this.writeQueues.set(courseId, queue);
    }
    return queue;
  }
}
