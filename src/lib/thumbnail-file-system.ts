// pattern: Imperative Shell
import { randomBytes } from 'node:crypto';
import { access, chmod, constants, mkdir, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';

/**
 * The filesystem operations the thumbnail cache needs
 */
export interface ThumbnailFileSystem {
  /**
   * Create the directory if needed and make sure it is writable.
   * Rejects if it cannot be made writable.
   */
  ensureWritableDirectory(directory: string): Promise<void>;

  /** Names (not paths) of the entries in a directory; [] if it does not exist. */
  listFiles(directory: string): Promise<string[]>;

  /**
   * Write data so that readers never observe a partial file.
   * Replaces an existing file of the same name.
   */
  writeFileAtomic(path: string, data: Uint8Array): Promise<void>;
}

const DIRECTORY_MODE = 0o775;

function isNodeError(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

async function isWritable(directory: string): Promise<boolean> {
  try {
    await access(directory, constants.W_OK | constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * ThumbnailFileSystem backed by node:fs. Atomic writes go to a temporary file
 * in the target directory, which is then renamed over the destination.
 */
export const nodeThumbnailFileSystem: ThumbnailFileSystem = {
  async ensureWritableDirectory(directory) {
    await mkdir(directory, { recursive: true, mode: DIRECTORY_MODE });
    if (await isWritable(directory)) return;

    await chmod(directory, DIRECTORY_MODE);
    if (!(await isWritable(directory))) {
      throw new Error(`directory ${directory} is not writable`);
    }
  },

  async listFiles(directory) {
    try {
      return await readdir(directory);
    } catch (error) {
      if (isNodeError(error, 'ENOENT')) return [];
      throw error;
    }
  },

  async writeFileAtomic(path, data) {
    const tempPath = join(dirname(path), `.${randomBytes(6).toString('hex')}.tmp`);
    try {
      await writeFile(tempPath, data);
      await rename(tempPath, path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  },
};
