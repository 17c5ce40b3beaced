import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { FileStore } from '../infrastructure/repositories/FileStore.js';
import { FileSystemError } from '../domain/errors.js';
import { makeTempDir, removeDir } from '../../services/crawler/test/fixtures.js';

describe('FileStore', () => {
  let dir: string;
  let store: FileStore;

  beforeEach(async () => {
    dir = await makeTempDir('dochive-store');
    store = new FileStore(dir);
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('writes, reads and sizes files below its root', async () => {
    await store.write('babel/db.json', '{"index":"<h1>Babel</h1>"}');

    expect(await store.read('babel/db.json')).toBe('{"index":"<h1>Babel</h1>"}');
    expect(await store.exists('babel/db.json')).toBe(true);
    expect(await store.size('babel/db.json')).toBe(26);
    expect(await store.list('babel')).toEqual(['db.json']);
  });

  it('replaces previous content', async () => {
    await store.write('meta.json', 'first');
    await store.write('meta.json', 'second');

    expect(await store.read('meta.json')).toBe('second');
    expect(await store.list()).toEqual(['meta.json']);
  });

  it('lists a missing directory as empty', async () => {
    expect(await store.list('nothing-here')).toEqual([]);
    expect(await store.exists('nothing-here')).toBe(false);
  });

  it('deletes directory trees', async () => {
    await store.write('css/index.json', '{}');
    await store.delete('css');

    expect(await store.exists('css')).toBe(false);
  });

  it('refuses paths outside the root', async () => {
    await expect(store.read('../outside.txt')).rejects.toBeInstanceOf(FileSystemError);
    await expect(store.write('../../outside.txt', 'x')).rejects.toBeInstanceOf(FileSystemError);
  });

  it('reports missing files', async () => {
    await expect(store.read('missing.json')).rejects.toMatchObject({ errorCode: 'FILESYSTEM_ERROR' });
  });
});
