import { Readable } from 'stream';

/**
 * Capability to read a remote (or local) resource by byte range.
 *
 * `fetchRange` may return fewer than `length` bytes when the resource ends
 * earlier, and an empty buffer when `offset` lies past its end.
 */
export interface ByteRangeSource {
  describe(): string;
  fetchRange(offset: number, length: number, signal?: AbortSignal): Promise<Buffer>;
  fetchFull(signal?: AbortSignal): Promise<Readable>;
}
