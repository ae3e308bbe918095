import { Transform } from 'stream';
import { setTimeout as sleep } from 'timers/promises';
import { CancelledError } from '../errors';

/**
 * Bytes-per-second limit shared by every transfer of a run.
 *
 * Each chunk reserves the next free slot on a single timeline and waits for
 * it, so concurrent downloads split the rate between them instead of each
 * getting the full rate.
 */
export class DownloadThrottle {
  readonly bytesPerSecond: number;
  private nextSlot = 0;

  constructor(bytesPerSecond: number) {
    if (!Number.isFinite(bytesPerSecond) || bytesPerSecond <= 0) {
      throw new RangeError(`Download rate must be a positive number of bytes per second, got ${bytesPerSecond}`);
    }
    this.bytesPerSecond = bytesPerSecond;
  }

  async acquire(bytes: number, signal?: AbortSignal): Promise<void> {
    const now = Date.now();
    const start = Math.max(now, this.nextSlot);
    this.nextSlot = start + (bytes / this.bytesPerSecond) * 1000;

    if (start > now) {
      try {
        await sleep(start - now, undefined, { signal });
      } catch {
        throw new CancelledError('Throttled transfer cancelled');
      }
    }
  }

  /**
   * Pass-through stream stage that holds each chunk until its slot
   */
  createStage(signal?: AbortSignal): Transform {
    return new Transform({
      transform: (chunk: Buffer, _encoding, callback) => {
        this.acquire(chunk.length, signal).then(
          () => callback(null, chunk),
          (error: unknown) => callback(error instanceof Error ? error : new CancelledError())
        );
      }
    });
  }
}
