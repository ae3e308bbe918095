import { Readable } from 'stream';
import { HttpRangeSource } from '../HttpRangeSource';
import { CancelledError, FetchError } from '../../errors';

async function readAll(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

describe('HttpRangeSource', () => {
  const url = 'https://files.example.test/course/notes.pdf';
  let fetchMock: jest.SpyInstance;

  beforeEach(() => {
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  describe('fetchRange', () => {
    it('should send an inclusive Range header', async () => {
      fetchMock.mockResolvedValue(new Response(Buffer.from('0123'), { status: 206 }));
      const source = new HttpRangeSource(url, { headers: { Authorization: 'Bearer test-token' } });

      await source.fetchRange(128, 4);

      expect(fetchMock).toHaveBeenCalledTimes(1);
      const [calledUrl, init] = fetchMock.mock.calls[0];
      expect(calledUrl).toBe(url);
      expect(init.headers).toEqual({ Authorization: 'Bearer test-token', Range: 'bytes=128-131' });
    });

    it('should return the partial content body', async () => {
      fetchMock.mockResolvedValue(new Response(Buffer.from('abcd'), { status: 206 }));
      const source = new HttpRangeSource(url);

      const result = await source.fetchRange(10, 4);

      expect(result.toString()).toBe('abcd');
    });

    it('should truncate a full response to the requested prefix at offset zero', async () => {
      fetchMock.mockResolvedValue(new Response(Buffer.from('abcdefgh'), { status: 200 }));
      const source = new HttpRangeSource(url);

      const result = await source.fetchRange(0, 3);

      expect(result.toString()).toBe('abc');
    });

    it('should reject a full response for a non-zero offset', async () => {
      fetchMock.mockResolvedValue(new Response(Buffer.from('abcdefgh'), { status: 200 }));
      const source = new HttpRangeSource(url);

      await expect(source.fetchRange(4, 3)).rejects.toMatchObject({
        message: `Server refused partial content for ${url}`,
        status: 200,
        retryable: false
      });
    });

    it('should treat 416 as an empty range', async () => {
      fetchMock.mockResolvedValue(new Response(null, { status: 416 }));
      const source = new HttpRangeSource(url);

      const result = await source.fetchRange(5000, 100);

      expect(result.length).toBe(0);
    });

    it('should map error statuses to FetchError', async () => {
      fetchMock.mockResolvedValue(new Response('gone', { status: 404 }));
      const source = new HttpRangeSource(url);

      const error = await source.fetchRange(0, 10).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FetchError);
      expect(error).toMatchObject({ status: 404, message: `HTTP 404 for ${url}` });
    });

    it('should map network failures to FetchError', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));
      const source = new HttpRangeSource(url);

      await expect(source.fetchRange(0, 10)).rejects.toThrow(`Request to ${url} failed: fetch failed`);
    });

    it('should report an aborted request as cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      fetchMock.mockRejectedValue(new Error('This operation was aborted'));
      const source = new HttpRangeSource(url);

      await expect(source.fetchRange(0, 10, controller.signal)).rejects.toBeInstanceOf(CancelledError);
    });

    it('should not request anything for an empty range', async () => {
      const source = new HttpRangeSource(url);

      const result = await source.fetchRange(0, 0);

      expect(result.length).toBe(0);
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('fetchFull', () => {
    it('should stream the whole body', async () => {
      fetchMock.mockResolvedValue(new Response(Buffer.from('full file contents'), { status: 200 }));
      const source = new HttpRangeSource(url);

      const stream = await source.fetchFull();

      expect((await readAll(stream)).toString()).toBe('full file contents');
      const [, init] = fetchMock.mock.calls[0];
      expect(init.headers).toEqual({});
    });

    it('should reject unsuccessful responses', async () => {
      fetchMock.mockResolvedValue(new Response('nope', { status: 500 }));
      const source = new HttpRangeSource(url);

      await expect(source.fetchFull()).rejects.toMatchObject({ name: 'FetchError', status: 500 });
    });
  });

  it('should describe itself by URL', () => {
    expect(new HttpRangeSource(url).describe()).toBe(url);
  });
});
