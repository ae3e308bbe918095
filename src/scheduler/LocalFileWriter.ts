import * as fs from 'fs';
import * as path from 'path';
import { Readable, Transform } from 'stream';
import { pipeline } from 'stream/promises';
import { CancelledError, FetchError, StorageError } from '../errors';
import { sanitizeName } from '../utils/files';
import { DownloadThrottle } from './DownloadThrottle';
import { RemoteFileDescriptor } from './types';

export const PARTIAL_SUFFIX = '.part';

export interface WrittenFile {
  localPath: string;
  bytes: number;
}

/**
 * Persists downloaded bodies below `<downloadDirectory>/<course>/`.
 *
 * Bytes go to `<name>.part`, which is fsync'ed and renamed once complete, so a
 * file under its final name is always whole. Names already on disk or
 * reserved by another in-flight download get a numeric suffix. An optional
 * throttle caps the combined rate of all writes.
 */
export class LocalFileWriter {
  private downloadDirectory: string;
  private throttle: DownloadThrottle | null;
  private reserved = new Set<string>();

  constructor(downloadDirectory: string, throttle: DownloadThrottle | null = null) {
    this.downloadDirectory = downloadDirectory;
    this.throttle = throttle;
  }

  courseDirectory(job: Pick<RemoteFileDescriptor, 'course'>): string {
    return path.join(this.downloadDirectory, sanitizeName(job.course.name || job.course.id));
  }

  async write(job: RemoteFileDescriptor, body: Readable, signal?: AbortSignal): Promise<WrittenFile> {
    const directory = this.courseDirectory(job);
    try {
      await fs.promises.mkdir(directory, { recursive: true });
    } catch (error) {
      body.destroy();
      throw this.storageError(`Cannot create ${directory}`, error);
    }

    const localPath = this.reservePath(directory, sanitizeName(job.displayName));
    const partialPath = localPath + PARTIAL_SUFFIX;

    try {
      const bytes = await this.transfer(body, partialPath, signal);
      await this.sync(partialPath);
      if (signal?.aborted) {
        throw new CancelledError(`Download of ${job.displayName} cancelled`);
      }
      try {
        await fs.promises.rename(partialPath, localPath);
      } catch (error) {
        throw this.storageError(`Cannot move ${partialPath} into place`, error);
      }
      return { localPath, bytes };
    } catch (error) {
      await fs.promises.rm(partialPath, { force: true });
      throw error;
    } finally {
      this.reserved.delete(localPath);
    }
  }

  private async transfer(body: Readable, partialPath: string, signal?: AbortSignal): Promise<number> {
    let bytes = 0;
    // pipeline destroys every stream with the first error, so remember which side failed first
    const failure: { side?: 'body' | 'file' } = {};
    const file = fs.createWriteStream(partialPath);
    body.once('error', () => {
      failure.side ??= 'body';
    });
    file.once('error', () => {
      failure.side ??= 'file';
    });

    const counter = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        bytes += chunk.length;
        callback(null, chunk);
      }
    });

    try {
      if (this.throttle) {
        await pipeline(body, this.throttle.createStage(signal), counter, file, { signal });
      } else {
        await pipeline(body, counter, file, { signal });
      }
      return bytes;
    } catch (error) {
      await waitForClose(file);
      if (signal?.aborted) {
        throw new CancelledError(`Download to ${path.basename(partialPath)} cancelled`);
      }
      if (failure.side === 'body') {
        const cause = error instanceof Error ? error : undefined;
        throw new FetchError(`Transfer failed: ${cause ? cause.message : String(error)}`, undefined, cause);
      }
      throw this.storageError(`Cannot write ${partialPath}`, error);
    }
  }

  private async sync(filePath: string): Promise<void> {
    try {
      const handle = await fs.promises.open(filePath, 'r+');
      try {
        await handle.sync();
      } finally {
        await handle.close();
      }
    } catch (error) {
      throw this.storageError(`Cannot flush ${filePath}`, error);
    }
  }

  private reservePath(directory: string, fileName: string): string {
    const extension = path.extname(fileName);
    const stem = fileName.slice(0, fileName.length - extension.length);

    for (let counter = 0; ; counter++) {
      const candidate = path.join(directory, counter === 0 ? fileName : `${stem}.${counter}${extension}`);
      if (!this.reserved.has(candidate) && !fs.existsSync(candidate)) {
        this.reserved.add(candidate);
        return candidate;
      }
    }
  }

  private storageError(message: string, error: unknown): StorageError {
    const cause = error instanceof Error ? error : undefined;
    return new StorageError(`${message}: ${cause ? cause.message : String(error)}`, cause);
  }
}

// A destroyed write stream may still be opening its file
function waitForClose(stream: fs.WriteStream): Promise<void> {
  if (stream.closed) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    stream.once('close', () => resolve());
  });
}
