import fs from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTempDir } from '@/test/helpers/harness';
import { LocalStorageError } from './errors';
import { LocalMediaStore } from './media-store';

describe('LocalMediaStore', () => {
  let rootDir: string;
  let store: LocalMediaStore;

  beforeEach(() => {
    rootDir = createTempDir();
    store = new LocalMediaStore(path.join(rootDir, 'media'));
  });

  afterEach(() => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  });

  it('saves to deterministic paths', async () => {
    const videoPath = await store.save(new Uint8Array([1, 2, 3]), 'abc-123');
    const thumbPath = await store.save(new Uint8Array([9]), 'abc-123', 'thumbnail');

    expect(videoPath).toBe(path.join(rootDir, 'media', 'abc-123.mp4'));
    expect(thumbPath).toBe(path.join(rootDir, 'media', 'abc-123_thumb.jpg'));
    expect(fs.readFileSync(videoPath)).toEqual(Buffer.from([1, 2, 3]));
    expect(await store.exists('abc-123')).toBe(true);
    expect(await store.exists('abc-123', 'thumbnail')).toBe(true);
  });

  it('leaves no temp files behind', async () => {
    await store.save(new Uint8Array([1]), 'abc');
    expect(fs.readdirSync(store.directory)).toEqual(['abc.mp4']);
  });

  it('refuses to overwrite a committed file', async () => {
    await store.save(new Uint8Array([1]), 'abc');

    await expect(store.save(new Uint8Array([2]), 'abc')).rejects.toThrow(
      'Media file already exists; files are write-once'
    );
    expect(await store.readBytes('abc')).toEqual(Buffer.from([1]));
    expect(fs.readdirSync(store.directory)).toEqual(['abc.mp4']);
  });

  it('rejects ids that are not plain file names', () => {
    expect(() => store.pathFor('../escape')).toThrow(LocalStorageError);
    expect(() => store.pathFor('a/b')).toThrow(LocalStorageError);
  });

  it('removes both kinds and is idempotent', async () => {
    await store.save(new Uint8Array([1]), 'abc');
    await store.save(new Uint8Array([2]), 'abc', 'thumbnail');

    await store.remove('abc');
    await store.remove('abc');

    expect(await store.exists('abc')).toBe(false);
    expect(await store.exists('abc', 'thumbnail')).toBe(false);
  });

  it('reports exists=false before anything was written', async () => {
    expect(await store.exists('missing')).toBe(false);
  });

  it('passes the size and propagates callback errors', async () => {
    await store.save(new Uint8Array([1, 2]), 'abc');

    await expect(
      store.withFile('abc', 'video', async (_handle, size) => {
        expect(size).toBe(2);
        throw new Error('transfer broke');
      })
    ).rejects.toThrow('transfer broke');
  });

  it('raises LocalStorageError for a missing backing file', async () => {
    await expect(store.withFile('gone', 'video', async () => 0)).rejects.toThrow(
      'Backing video file is missing'
    );
  });

  it('sweeps temp files from interrupted writes', async () => {
    await store.save(new Uint8Array([1]), 'abc');
    fs.writeFileSync(path.join(store.directory, 'def.mp4.1234.tmp'), 'partial');

    expect(await store.sweepTempFiles()).toBe(1);
    expect(fs.readdirSync(store.directory)).toEqual(['abc.mp4']);
  });

  it('sweeps nothing when the directory does not exist yet', async () => {
    expect(await store.sweepTempFiles()).toBe(0);
  });
});
