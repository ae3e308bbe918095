import { S3 } from 'aws-sdk';
import { Readable } from 'stream';
import { CancelledError, FetchError } from '../errors';
import { ByteRangeSource } from './types';

interface AwsErrorShape {
  code?: string;
  statusCode?: number;
  message?: string;
}

function readAwsError(error: unknown): AwsErrorShape {
  if (typeof error !== 'object' || error === null) {
    return { message: String(error) };
  }
  const code: unknown = Reflect.get(error, 'code');
  const statusCode: unknown = Reflect.get(error, 'statusCode');
  const message: unknown = Reflect.get(error, 'message');
  return {
    code: typeof code === 'string' ? code : undefined,
    statusCode: typeof statusCode === 'number' ? statusCode : undefined,
    message: typeof message === 'string' ? message : undefined
  };
}

/**
 * The part of an aws-sdk `S3.getObject` request this source relies on
 */
export interface ObjectRequest {
  promise(): Promise<S3.GetObjectOutput>;
  abort(): void;
  createReadStream(): Readable;
}

export interface ObjectReader {
  getObject(params: S3.GetObjectRequest): ObjectRequest;
}

/**
 * Byte-range source for objects stored in S3 (or an S3-compatible store)
 */
export class S3RangeSource implements ByteRangeSource {
  private s3: ObjectReader;
  private bucket: string;
  private key: string;

  constructor(s3: ObjectReader, bucket: string, key: string) {
    this.s3 = s3;
    this.bucket = bucket;
    this.key = key;
  }

  static createClient(options: S3.ClientConfiguration = {}): S3 {
    return new S3({ signatureVersion: 'v4', ...options });
  }

  /**
   * Parse an s3://bucket/key path
   */
  static fromPath(s3: ObjectReader, s3Path: string): S3RangeSource {
    const match = s3Path.match(/^s3:\/\/([^/]+)\/(.+)$/);
    if (!match) {
      throw new Error(`Invalid S3 path: ${s3Path}`);
    }
    return new S3RangeSource(s3, match[1], match[2]);
  }

  describe(): string {
    return `s3://${this.bucket}/${this.key}`;
  }

  async fetchRange(offset: number, length: number, signal?: AbortSignal): Promise<Buffer> {
    if (length <= 0) {
      return Buffer.alloc(0);
    }
    if (signal?.aborted) {
      throw new CancelledError(`Request for ${this.describe()} cancelled`);
    }

    const request = this.s3.getObject({
      Bucket: this.bucket,
      Key: this.key,
      Range: `bytes=${offset}-${offset + length - 1}`
    });
    const onAbort = () => request.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const result = await request.promise();
      const body = result.Body;
      if (body === undefined) {
        return Buffer.alloc(0);
      }
      const bytes = Buffer.isBuffer(body)
        ? body
        : typeof body === 'string'
          ? Buffer.from(body)
          : body instanceof Uint8Array
            ? Buffer.from(body)
            : await this.collect(body);
      return bytes.subarray(0, length);
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError(`Request for ${this.describe()} cancelled`);
      }
      if (error instanceof FetchError) {
        throw error;
      }
      const details = readAwsError(error);
      if (details.code === 'InvalidRange' || details.statusCode === 416) {
        return Buffer.alloc(0);
      }
      throw new FetchError(
        `S3 getObject failed for ${this.describe()}: ${details.message ?? details.code ?? 'unknown error'}`,
        details.statusCode,
        error instanceof Error ? error : undefined
      );
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  async fetchFull(signal?: AbortSignal): Promise<Readable> {
    if (signal?.aborted) {
      throw new CancelledError(`Request for ${this.describe()} cancelled`);
    }

    const request = this.s3.getObject({ Bucket: this.bucket, Key: this.key });
    const stream = request.createReadStream();
    const onAbort = () => request.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    stream.once('close', () => signal?.removeEventListener('abort', onAbort));
    return stream;
  }

  private async collect(body: S3.Body): Promise<Buffer> {
    if (!(body instanceof Readable)) {
      throw new FetchError(`S3 getObject returned an unexpected body type for ${this.describe()}`);
    }
    const chunks: Buffer[] = [];
    for await (const chunk of body) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks);
  }
}

