import * as fs from 'fs';
import type { FileHandle } from 'fs/promises';
import { Readable } from 'stream';
import { CancelledError, StorageError } from '../errors';
import { ByteRangeSource } from './types';

/**
 * Reads ranges of a file that already exists on disk
 */
export class LocalFileSource implements ByteRangeSource {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  describe(): string {
    return this.filePath;
  }

  async fetchRange(offset: number, length: number, signal?: AbortSignal): Promise<Buffer> {
    if (signal?.aborted) {
      throw new CancelledError(`Reading ${this.filePath} cancelled`);
    }
    if (length <= 0) {
      return Buffer.alloc(0);
    }

    let handle: FileHandle | undefined;
    try {
      handle = await fs.promises.open(this.filePath, 'r');
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, offset);
      return buffer.subarray(0, bytesRead);
    } catch (error) {
      throw new StorageError(
        `Cannot read ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined
      );
    } finally {
      await handle?.close();
    }
  }

  async fetchFull(signal?: AbortSignal): Promise<Readable> {
    return fs.createReadStream(this.filePath, { signal });
  }
}
