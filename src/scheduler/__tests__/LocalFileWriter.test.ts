import * as fs from 'fs';
import * as path from 'path';
import { Readable } from 'stream';
import { LocalFileWriter } from '../LocalFileWriter';
import { DownloadThrottle } from '../DownloadThrottle';
import { createJob } from '../jobs';
import { CancelledError, FetchError, StorageError } from '../../errors';
import { MemorySource, createTempDir, removeTempDir } from '../../__tests__/helpers';

describe('LocalFileWriter', () => {
  let directory: string;
  let writer: LocalFileWriter;

  const job = (displayName: string, courseName = 'Linear Algebra') =>
    createJob({ course: { id: 'c1', name: courseName }, displayName, source: new MemorySource('') });

  const body = (text: string) => Readable.from([Buffer.from(text)]);

  beforeEach(() => {
    directory = createTempDir();
    writer = new LocalFileWriter(directory);
  });

  afterEach(() => {
    removeTempDir(directory);
  });

  it('should write the body under the sanitized course directory', async () => {
    const written = await writer.write(job('Week 1: Notes.pdf', 'Linear/Algebra'), body('hello pdf'));

    const expectedPath = path.join(directory, 'Linear-Algebra', 'Week 1_ Notes.pdf');
    expect(written).toEqual({ localPath: expectedPath, bytes: 9 });
    expect(fs.readFileSync(expectedPath, 'utf8')).toBe('hello pdf');
    expect(fs.readdirSync(path.dirname(expectedPath))).toEqual(['Week 1_ Notes.pdf']);
  });

  it('should not overwrite an existing file with the same name', async () => {
    const courseDirectory = writer.courseDirectory(job('a.pdf'));
    fs.mkdirSync(courseDirectory, { recursive: true });
    fs.writeFileSync(path.join(courseDirectory, 'a.pdf'), 'old');

    const written = await writer.write(job('a.pdf'), body('new'));

    expect(written.localPath).toBe(path.join(courseDirectory, 'a.1.pdf'));
    expect(fs.readFileSync(path.join(courseDirectory, 'a.pdf'), 'utf8')).toBe('old');
  });

  it('should give concurrent downloads of the same name distinct paths', async () => {
    const [first, second] = await Promise.all([
      writer.write(job('slides.pptx'), body('one')),
      writer.write(job('slides.pptx'), body('two'))
    ]);

    const courseDirectory = writer.courseDirectory(job('slides.pptx'));
    expect([first.localPath, second.localPath].sort()).toEqual([
      path.join(courseDirectory, 'slides.1.pptx'),
      path.join(courseDirectory, 'slides.pptx')
    ]);
  });

  it('should report a failing body as a fetch error and remove the partial file', async () => {
    async function* interrupted() {
      yield Buffer.from('partial');
      throw new Error('socket hang up');
    }

    const error = await writer.write(job('big.zip'), Readable.from(interrupted())).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ message: 'Transfer failed: socket hang up' });
    expect(fs.readdirSync(writer.courseDirectory(job('big.zip')))).toEqual([]);
  });

  it('should report an unwritable destination as a storage error', async () => {
    fs.writeFileSync(path.join(directory, 'Linear Algebra'), 'not a directory');

    await expect(writer.write(job('a.pdf'), body('data'))).rejects.toBeInstanceOf(StorageError);
  });

  it('should cancel without leaving files behind', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(writer.write(job('a.pdf'), body('data'), controller.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(fs.readdirSync(writer.courseDirectory(job('a.pdf')))).toEqual([]);
  });

  it('should hold transfers to the configured download rate', async () => {
    const throttled = new LocalFileWriter(directory, new DownloadThrottle(1000));
    const chunks = [0, 1, 2, 3].map((index) => Buffer.alloc(100, 97 + index));
    const started = Date.now();

    // 100-byte chunks at 1000 B/s: the last one starts 300 ms in
    const written = await throttled.write(job('paced.bin'), Readable.from(chunks));

    const elapsed = Date.now() - started;
    expect(written.bytes).toBe(400);
    expect(elapsed).toBeGreaterThanOrEqual(250);
    expect(elapsed).toBeLessThan(3000);
    expect(fs.readFileSync(written.localPath)).toEqual(Buffer.concat(chunks));
  });

  it('should fall back to the course id for unnamed courses', () => {
    const unnamed = createJob({ course: { id: 'c42', name: '' }, displayName: 'x.txt', source: new MemorySource('') });
    expect(writer.courseDirectory(unnamed)).toBe(path.join(directory, 'c42'));
  });
});
