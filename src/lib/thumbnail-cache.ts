// pattern: Imperative Shell
// Local thumbnail cache.
//
// A thumbnail is stored as
//   <directory>/thumbnail_<sha1(token)>_<recorded|stream>_<sha1(id)>.<ext>
// where token is the media item's thumbnail reference ID. Re-saving an item
// with a new source mints a new token, so the old file is simply never looked
// up again; nothing here deletes files.

import { createHash } from 'node:crypto';
import { join } from 'node:path';
import type { Logger, VideoData } from '../types';
import type { ThumbnailUriResult } from '../api/video-api-client';
import { DEFAULT_HTTP_TIMEOUT_MS, fetchWithTimeout, readBytes } from '../api/http';
import { ConfigurationError, assertNonEmpty, toError } from './errors';
import { KeyedLock } from './keyed-lock';
import { determineThumbnailExtension } from './thumbnail-extension';
import { nodeThumbnailFileSystem } from './thumbnail-file-system';
import type { ThumbnailFileSystem } from './thumbnail-file-system';

const FILENAME_PREFIX = 'thumbnail';
const FILENAME_SEPARATOR = '_';
const RECORDED_IDENTIFIER = 'recorded';
const STREAM_IDENTIFIER = 'stream';
const DEFAULT_MAX_INDEX_ENTRIES = 1000;

/**
 * Remote lookups the cache needs; satisfied by VideoApiClient
 */
export interface ThumbnailUriSource {
  getChannelThumbnailUri(channelId: string): Promise<ThumbnailUriResult>;
  getVideoThumbnailUri(videoId: string): Promise<ThumbnailUriResult>;
}

export interface ThumbnailCacheOptions {
  /** Local directory holding cached thumbnails */
  directory: string;
  apiClient: ThumbnailUriSource;
  fileSystem?: ThumbnailFileSystem;
  /** Timeout for the thumbnail download and HEAD requests */
  timeoutMs?: number;
  /** Most paths kept in memory; older entries are found again by scanning */
  maxIndexEntries?: number;
  logger?: Logger;
}

function sha1(value: string): string {
  return createHash('sha1').update(value, 'utf8').digest('hex');
}

/**
 * Deterministic filename (without extension) for a cached thumbnail
 */
export function thumbnailBaseName(data: VideoData): string {
  return [
    FILENAME_PREFIX,
    sha1(data.thumbnailReferenceId),
    data.isRecorded ? RECORDED_IDENTIFIER : STREAM_IDENTIFIER,
    sha1(data.id),
  ].join(FILENAME_SEPARATOR);
}

/**
 * Check that the configured directory is usable as a local path.
 *
 * @throws ConfigurationError if it is empty, contains a NUL byte, or is a
 *   URL rather than a filesystem path
 */
export function validateThumbnailsDirectory(directory: string): string {
  if (directory.trim() === '') {
    throw new ConfigurationError('The thumbnails directory is empty.');
  }
  if (directory.includes('\0')) {
    throw new ConfigurationError('The thumbnails directory contains a NUL character.');
  }
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(directory)) {
    throw new ConfigurationError(`The thumbnails directory "${directory}" is not a local path.`);
  }
  return directory;
}

/**
 * Resolves thumbnails for videos and streams to local files, downloading on
 * first use. Concurrent requests for the same thumbnail share one download.
 *
 * Paths already resolved are kept in a bounded in-memory index; once it is
 * full the least recently used entry is dropped.
 */
export class ThumbnailCache {
  private readonly directory: string;
  private readonly apiClient: ThumbnailUriSource;
  private readonly fileSystem: ThumbnailFileSystem;
  private readonly timeoutMs: number;
  private readonly maxIndexEntries: number;
  private readonly logger: Logger;
  private readonly lock = new KeyedLock();
  /** base name -> local path of files known to exist */
  private readonly index = new Map<string, string>();

  constructor(options: ThumbnailCacheOptions) {
    this.directory = options.directory;
    this.apiClient = options.apiClient;
    this.fileSystem = options.fileSystem ?? nodeThumbnailFileSystem;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.maxIndexEntries = options.maxIndexEntries ?? DEFAULT_MAX_INDEX_ENTRIES;
    this.logger = options.logger ?? console;
  }

  /**
   * Get the local path of the thumbnail for a video or stream.
   *
   * Resolves to null when no thumbnail is available: the remote API has none,
   * the API or the download failed, or the response was unusable. Those
   * failures are logged, not thrown.
   *
   * @throws InvalidArgumentError if the ID or thumbnail reference ID is empty
   * @throws ConfigurationError if the thumbnails directory is invalid, cannot
   *   be read, or cannot be made writable
   */
  async getThumbnailUri(data: VideoData): Promise<string | null> {
    assertNonEmpty(data.id, 'id');
    assertNonEmpty(data.thumbnailReferenceId, 'thumbnailReferenceId');
    const directory = validateThumbnailsDirectory(this.directory);

    const baseName = thumbnailBaseName(data);
    return this.lock.run(baseName, async () => {
      const cached = await this.findCached(directory, baseName);
      if (cached) return cached;

      return this.download(directory, baseName, data);
    });
  }

  /**
   * Forget indexed paths, e.g. after files were removed from the directory
   */
  clearIndex(): void {
    this.index.clear();
  }

  private async findCached(directory: string, baseName: string): Promise<string | null> {
    const indexed = this.index.get(baseName);
    if (indexed) {
      this.remember(baseName, indexed);
      return indexed;
    }

    const prefix = `${baseName}.`;
    const names = (await this.listDirectory(directory))
      .filter((name) => name.startsWith(prefix) && !name.includes('.', prefix.length))
      .sort();
    const first = names[0];
    if (first === undefined) return null;

    const path = join(directory, first);
    this.remember(baseName, path);
    return path;
  }

  private remember(baseName: string, path: string): void {
    this.index.delete(baseName);
    this.index.set(baseName, path);
    if (this.index.size > this.maxIndexEntries) {
      const oldest = this.index.keys().next();
      if (!oldest.done) this.index.delete(oldest.value);
    }
  }

  private async listDirectory(directory: string): Promise<string[]> {
    try {
      return await this.fileSystem.listFiles(directory);
    } catch (error) {
      throw new ConfigurationError('Could not read the thumbnails directory.', {
        cause: toError(error),
      });
    }
  }

  private async download(
    directory: string,
    baseName: string,
    data: VideoData
  ): Promise<string | null> {
    const label = `${data.isRecorded ? 'video' : 'channel'} ${data.id}`;

    const lookup = data.isRecorded
      ? await this.apiClient.getVideoThumbnailUri(data.id)
      : await this.apiClient.getChannelThumbnailUri(data.id);
    if (!lookup.ok) {
      this.logger.warn(`[ThumbnailCache] thumbnail lookup for ${label} failed:`, lookup.error);
      return null;
    }
    const remoteUri = lookup.value;
    if (remoteUri === null) {
      this.logger.warn(`[ThumbnailCache] no remote thumbnail for ${label}`);
      return null;
    }

    const response = await fetchWithTimeout(remoteUri, { method: 'GET' }, this.timeoutMs);
    if (!response.ok) {
      this.logger.warn(`[ThumbnailCache] download of ${remoteUri} failed:`, response.error);
      return null;
    }
    if (response.value.status !== 200) {
      this.logger.warn(
        `[ThumbnailCache] download of ${remoteUri} returned status ${response.value.status}`
      );
      return null;
    }
    const bytes = await readBytes(response.value);
    if (!bytes.ok) {
      this.logger.warn(`[ThumbnailCache] download of ${remoteUri} failed:`, bytes.error);
      return null;
    }

    const extension = await determineThumbnailExtension(remoteUri, this.timeoutMs);
    const localPath = join(directory, `${baseName}.${extension}`);

    await this.prepareDirectory(directory);
    try {
      await this.fileSystem.writeFileAtomic(localPath, bytes.value);
    } catch (error) {
      this.logger.error(`[ThumbnailCache] could not write ${localPath}:`, error);
      return null;
    }
    this.remember(baseName, localPath);

    this.logger.log(`[ThumbnailCache] cached thumbnail for ${label} at ${localPath}`);
    return localPath;
  }

  private async prepareDirectory(directory: string): Promise<void> {
    try {
      await this.fileSystem.ensureWritableDirectory(directory);
    } catch (error) {
      throw new ConfigurationError('Could not prepare a writable thumbnails directory.', {
        cause: toError(error),
      });
    }
  }
}
