import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { nodeThumbnailFileSystem } from './thumbnail-file-system';

describe('nodeThumbnailFileSystem', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'video-thumbnails-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe('ensureWritableDirectory', () => {
    it('creates missing parent directories', async () => {
      const directory = join(root, 'a', 'b');

      await nodeThumbnailFileSystem.ensureWritableDirectory(directory);

      expect(await readdir(join(root, 'a'))).toEqual(['b']);
    });

    it('accepts an existing directory', async () => {
      await expect(nodeThumbnailFileSystem.ensureWritableDirectory(root)).resolves.toBeUndefined();
    });
  });

  describe('listFiles', () => {
    it('returns [] for a missing directory', async () => {
      expect(await nodeThumbnailFileSystem.listFiles(join(root, 'missing'))).toEqual([]);
    });

    it('returns entry names', async () => {
      await nodeThumbnailFileSystem.writeFileAtomic(join(root, 'one.png'), new Uint8Array([1]));

      expect(await nodeThumbnailFileSystem.listFiles(root)).toEqual(['one.png']);
    });
  });

  describe('writeFileAtomic', () => {
    it('writes the data and leaves no temporary file behind', async () => {
      const path = join(root, 'thumb.jpg');

      await nodeThumbnailFileSystem.writeFileAtomic(path, new Uint8Array([0xff, 0xd8, 0xff]));

      expect(new Uint8Array(await readFile(path))).toEqual(new Uint8Array([0xff, 0xd8, 0xff]));
      expect(await readdir(root)).toEqual(['thumb.jpg']);
    });

    it('replaces an existing file', async () => {
      const path = join(root, 'thumb.jpg');

      await nodeThumbnailFileSystem.writeFileAtomic(path, new Uint8Array([1]));
      await nodeThumbnailFileSystem.writeFileAtomic(path, new Uint8Array([2, 3]));

      expect(new Uint8Array(await readFile(path))).toEqual(new Uint8Array([2, 3]));
    });

    it('rejects and cleans up when the directory does not exist', async () => {
      const path = join(root, 'missing', 'thumb.jpg');

      await expect(
        nodeThumbnailFileSystem.writeFileAtomic(path, new Uint8Array([1]))
      ).rejects.toThrow();
      expect(await readdir(root)).toEqual([]);
    });
  });
});
