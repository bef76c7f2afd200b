// pattern: Imperative Shell
// Host-facing entry point for IBM Video media items. The host stores the field
// value string; everything that reads or writes it goes through here.

import type { EmbedReference, EmbedUrlParameters, Logger, Result } from '../types';
import { VideoApiClient } from '../api/video-api-client';
import type { VideoMediaConfig } from './config';
import { ConfigurationError } from './errors';
import { assembleEmbedUrl, isEmbedUrlValid, parseEmbedUrl } from './embed-url';
import { ThumbnailCache } from './thumbnail-cache';
import type { ThumbnailFileSystem } from './thumbnail-file-system';
import {
  describeVideoDataProblem,
  readVideoData,
  reviseVideoData,
  serializeVideoData,
} from './video-data';

export const INVALID_EMBED_URL_MESSAGE = 'Embed URL is not in the required format.';

/**
 * What a view needs to render the player iframe
 */
export type VideoPlayer = EmbedReference & {
  readonly embedUrl: string;
};

export type ThumbnailResolver = Pick<ThumbnailCache, 'getThumbnailUri'>;

export interface VideoMediaSourceOptions {
  thumbnails: ThumbnailResolver;
  defaultThumbnailUri: string;
  logger?: Logger;
}

export class VideoMediaSource {
  private readonly thumbnails: ThumbnailResolver;
  private readonly defaultThumbnailUri: string;
  private readonly logger: Logger;

  constructor(options: VideoMediaSourceOptions) {
    this.thumbnails = options.thumbnails;
    this.defaultThumbnailUri = options.defaultThumbnailUri;
    this.logger = options.logger ?? console;
  }

  /**
   * Wire up the API client and thumbnail cache from configuration
   */
  static fromConfig(
    config: VideoMediaConfig,
    overrides: { fileSystem?: ThumbnailFileSystem; logger?: Logger } = {}
  ): VideoMediaSource {
    const logger = overrides.logger ?? console;
    const apiClient = new VideoApiClient({
      baseUrl: config.apiBaseUrl,
      timeoutMs: config.httpTimeoutMs,
    });
    const thumbnails = new ThumbnailCache({
      directory: config.thumbnailsDirectory,
      apiClient,
      fileSystem: overrides.fileSystem,
      timeoutMs: config.httpTimeoutMs,
      logger,
    });
    return new VideoMediaSource({
      thumbnails,
      defaultThumbnailUri: config.defaultThumbnailUri,
      logger,
    });
  }

  /**
   * Thumbnail for a media item. Falls back to the default thumbnail when the
   * field value is empty or corrupt, no thumbnail can be fetched, or the
   * thumbnails directory is misconfigured.
   */
  async getThumbnailUri(fieldValue: string | null): Promise<string> {
    const data = readVideoData(fieldValue);
    if (!data.ok) {
      return this.defaultThumbnailUri;
    }

    try {
      return (await this.thumbnails.getThumbnailUri(data.value)) ?? this.defaultThumbnailUri;
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.logger.error(`[VideoMediaSource] thumbnails disabled: ${error.message}`);
        return this.defaultThumbnailUri;
      }
      throw error;
    }
  }

  /**
   * Turn a submitted embed URL into the field value to store.
   * Resubmitting the same video or channel keeps the previous thumbnail
   * reference ID; anything else mints a new one.
   */
  submitEmbedUrl(embedUrl: string, previousFieldValue: string | null): Result<string, string> {
    const trimmed = embedUrl.trim();
    if (!isEmbedUrlValid(trimmed)) {
      return { ok: false, error: INVALID_EMBED_URL_MESSAGE };
    }

    const ref = parseEmbedUrl(trimmed);
    const previous = readVideoData(previousFieldValue);
    const data = reviseVideoData(ref, previous.ok ? previous.value : null);

    return { ok: true, value: serializeVideoData(data, data.thumbnailReferenceId) };
  }

  /**
   * Embed URL to prefill an edit form with, or null if the value is unusable
   */
  getEditableEmbedUrl(fieldValue: string | null): string | null {
    const data = readVideoData(fieldValue);
    return data.ok ? assembleEmbedUrl(data.value, 'https://') : null;
  }

  /**
   * Player view model using a protocol-relative embed URL, or null if the
   * field value is unusable
   */
  buildPlayer(fieldValue: string | null, parameters: EmbedUrlParameters): VideoPlayer | null {
    const data = readVideoData(fieldValue);
    if (!data.ok) return null;

    const { id, isRecorded } = data.value;
    return { id, isRecorded, embedUrl: assembleEmbedUrl({ id, isRecorded }, '//', parameters) };
  }

  /**
   * User-facing validation messages for a stored field value.
   * An empty value is valid.
   */
  validateFieldValue(fieldValue: string | null): string[] {
    const data = readVideoData(fieldValue);
    return data.ok ? [] : describeVideoDataProblem(data.error);
  }
}
