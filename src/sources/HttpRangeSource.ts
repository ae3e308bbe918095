import { Readable } from 'stream';
import { CancelledError, FetchError, isAbortError } from '../errors';
import { ByteRangeSource } from './types';

export interface HttpRangeSourceOptions {
  headers?: Record<string, string>;
}

type BodyStream = NonNullable<Response['body']>;

/**
 * Byte-range source backed by HTTP range requests
 */
export class HttpRangeSource implements ByteRangeSource {
  private url: string;
  private headers: Record<string, string>;

  constructor(url: string, options: HttpRangeSourceOptions = {}) {
    this.url = url;
    this.headers = options.headers ?? {};
  }

  describe(): string {
    return this.url;
  }

  async fetchRange(offset: number, length: number, signal?: AbortSignal): Promise<Buffer> {
    if (length <= 0) {
      return Buffer.alloc(0);
    }

    const response = await this.request(
      { ...this.headers, Range: `bytes=${offset}-${offset + length - 1}` },
      signal
    );

    if (response.status === 416) {
      await discardBody(response.body);
      return Buffer.alloc(0);
    }

    if (response.status === 206) {
      return this.readPrefix(response.body, length);
    }

    if (response.status === 200) {
      if (offset !== 0) {
        await discardBody(response.body);
        // The server ignores Range, so asking again cannot help
        throw new FetchError(`Server refused partial content for ${this.url}`, response.status, undefined, false);
      }
      return this.readPrefix(response.body, length);
    }

    await discardBody(response.body);
    throw new FetchError(`HTTP ${response.status} for ${this.url}`, response.status);
  }

  async fetchFull(signal?: AbortSignal): Promise<Readable> {
    const response = await this.request(this.headers, signal);

    if (!response.ok) {
      await discardBody(response.body);
      throw new FetchError(`HTTP ${response.status} for ${this.url}`, response.status);
    }

    const body = response.body;
    if (!body) {
      return Readable.from([]);
    }
    return Readable.from(iterateBody(body));
  }

  private async request(headers: Record<string, string>, signal?: AbortSignal): Promise<Response> {
    try {
      return await fetch(this.url, { headers, redirect: 'follow', signal });
    } catch (error) {
      if (signal?.aborted || isAbortError(error)) {
        throw new CancelledError(`Request to ${this.url} cancelled`);
      }
      const cause = error instanceof Error ? error : undefined;
      throw new FetchError(`Request to ${this.url} failed: ${cause ? cause.message : String(error)}`, undefined, cause);
    }
  }

  /**
   * Read at most `length` bytes, cancelling the rest of the body
   */
  private async readPrefix(body: BodyStream | null, length: number): Promise<Buffer> {
    if (!body) {
      return Buffer.alloc(0);
    }

    const chunks: Buffer[] = [];
    let received = 0;
    const reader = body.getReader();

    try {
      while (received < length) {
        const { done, value } = await reader.read();
        if (done) break;
        const chunk = Buffer.from(value);
        chunks.push(chunk);
        received += chunk.length;
      }
    } catch (error) {
      if (isAbortError(error)) {
        throw new CancelledError(`Request to ${this.url} cancelled`);
      }
      const cause = error instanceof Error ? error : undefined;
      throw new FetchError(`Reading ${this.url} failed: ${cause ? cause.message : String(error)}`, undefined, cause);
    }

    if (received >= length) {
      await reader.cancel().catch(() => undefined);
    }

    return Buffer.concat(chunks).subarray(0, length);
  }
}

async function* iterateBody(body: BodyStream): AsyncGenerator<Buffer> {
  const reader = body.getReader();
  while (true) {
    const { done, value } = await reader.read();
    if (done) return;
    yield Buffer.from(value);
  }
}

async function discardBody(body: BodyStream | null): Promise<void> {
  if (body) {
    await body.cancel().catch(() => undefined);
  }
}
