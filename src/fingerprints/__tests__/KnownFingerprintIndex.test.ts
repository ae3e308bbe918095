import * as path from 'path';
import { KnownFingerprintIndex } from '../KnownFingerprintIndex';
import { FileFingerprintStore } from '../FileFingerprintStore';
import { StorageError } from '../../errors';
import { MemoryFingerprintStore, createTempDir, removeTempDir } from '../../__tests__/helpers';

describe('KnownFingerprintIndex', () => {
  let store: MemoryFingerprintStore;
  let index: KnownFingerprintIndex;

  beforeEach(() => {
    store = new MemoryFingerprintStore();
    index = new KnownFingerprintIndex(store);
  });

  it('should initialize the store once', async () => {
    await index.open();
    await index.open();
    expect(store.initializeCalls).toBe(1);
  });

  it('should load existing fingerprints per course', async () => {
    await store.insert('course-1', 'aaa');
    await store.insert('course-2', 'bbb');

    expect(await index.contains('course-1', 'aaa')).toBe(true);
    expect(await index.contains('course-1', 'bbb')).toBe(false);
    expect(await index.contains('course-2', 'bbb')).toBe(true);
  });

  it('should make inserts visible to contains', async () => {
    expect(await index.insert('course-1', 'aaa', { displayName: 'a.pdf' })).toBe(true);
    expect(await index.contains('course-1', 'aaa')).toBe(true);
    expect(await index.contains('course-2', 'aaa')).toBe(false);
  });

  it('should be idempotent', async () => {
    expect(await index.insert('course-1', 'aaa')).toBe(true);
    expect(await index.insert('course-1', 'aaa')).toBe(false);

    expect(await index.size('course-1')).toBe(1);
    expect(store.insertCalls).toBe(1);
  });

  it('should not lose concurrent inserts', async () => {
    const fingerprints = Array.from({ length: 50 }, (_, i) => `fp-${i % 25}`);

    const results = await Promise.all(fingerprints.map((fp) => index.insert('course-1', fp)));

    expect(results.filter(Boolean)).toHaveLength(25);
    expect(await index.size('course-1')).toBe(25);
    expect(await store.loadCourse('course-1')).toHaveLength(25);
  });

  it('should not remember a fingerprint whose write failed', async () => {
    store.failInsertsWith = new StorageError('disk I/O error');

    await expect(index.insert('course-1', 'aaa')).rejects.toBeInstanceOf(StorageError);
    expect(await index.contains('course-1', 'aaa')).toBe(false);
  });

  it('should retry a course load that failed', async () => {
    const loadCourse = jest.spyOn(store, 'loadCourse').mockRejectedValueOnce(new StorageError('index file is locked'));

    await expect(index.contains('course-1', 'aaa')).rejects.toThrow('index file is locked');
    expect(await index.contains('course-1', 'aaa')).toBe(false);
    expect(loadCourse).toHaveBeenCalledTimes(2);
  });

  it('should preload courses', async () => {
    const loadCourse = jest.spyOn(store, 'loadCourse');

    await index.preload(['course-1', 'course-2', 'course-1']);
    await index.contains('course-1', 'x');

    expect(loadCourse).toHaveBeenCalledTimes(2);
  });

  it('should close the store after pending writes', async () => {
    const write = index.insert('course-1', 'aaa');
    await index.close();

    expect(await write).toBe(true);
    expect(store.closed).toBe(true);
    expect(store.records.size).toBe(1);
  });
});

describe('KnownFingerprintIndex with index files', () => {
  let directory: string;

  beforeEach(() => {
    directory = createTempDir();
  });

  afterEach(() => {
    removeTempDir(directory);
    jest.restoreAllMocks();
  });

  const openIndex = (indexDirectory: string) => new KnownFingerprintIndex(new FileFingerprintStore(indexDirectory));

  it('should persist inserts across reopen', async () => {
    const indexDirectory = path.join(directory, 'index');

    const first = openIndex(indexDirectory);
    await first.insert('course-1', 'aaa', { displayName: 'a.pdf', localPath: '/tmp/a.pdf' });
    await first.close();

    const second = openIndex(indexDirectory);
    expect(await second.contains('course-1', 'aaa')).toBe(true);
    expect(await second.insert('course-1', 'aaa')).toBe(false);
    await second.close();
  });
});
