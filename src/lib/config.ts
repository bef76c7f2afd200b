// pattern: Imperative Shell
// Reads configuration from the environment once; the result is passed to
// constructors explicitly.

import { DEFAULT_API_BASE_URL } from '../api/video-api-client';
import { DEFAULT_HTTP_TIMEOUT_MS } from '../api/http';
import { ConfigurationError } from './errors';

export type VideoMediaConfig = {
  readonly thumbnailsDirectory: string;
  readonly apiBaseUrl: string;
  readonly httpTimeoutMs: number;
  /** Returned when a media item has no usable thumbnail */
  readonly defaultThumbnailUri: string;
};

export const DEFAULT_THUMBNAILS_DIRECTORY = './data/video-thumbnails';
export const DEFAULT_THUMBNAIL_URI = 'no-thumbnail.png';

type Env = Readonly<Record<string, string | undefined>>;

function readTimeout(raw: string | undefined): number {
  if (raw === undefined || raw === '') return DEFAULT_HTTP_TIMEOUT_MS;

  const timeout = Number(raw);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new ConfigurationError(`VIDEO_HTTP_TIMEOUT_MS must be a positive integer, got "${raw}"`);
  }
  return timeout;
}

function readApiBaseUrl(raw: string | undefined): string {
  if (raw === undefined || raw === '') return DEFAULT_API_BASE_URL;

  let url: URL;
  try {
    url = new URL(raw);
  } catch (error) {
    throw new ConfigurationError(`VIDEO_API_BASE_URL is not a URL: "${raw}"`, { cause: error });
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new ConfigurationError(`VIDEO_API_BASE_URL must use http or https, got "${raw}"`);
  }
  return raw;
}

/**
 * Build the configuration from environment variables.
 * The thumbnails directory is checked later, by the thumbnail cache, so that a
 * bad directory only disables thumbnails.
 *
 * @throws ConfigurationError for an invalid timeout or API base URL
 */
export function loadConfig(env: Env = process.env): VideoMediaConfig {
  return {
    thumbnailsDirectory: env['VIDEO_THUMBNAILS_DIR'] ?? DEFAULT_THUMBNAILS_DIRECTORY,
    apiBaseUrl: readApiBaseUrl(env['VIDEO_API_BASE_URL']),
    httpTimeoutMs: readTimeout(env['VIDEO_HTTP_TIMEOUT_MS']),
    defaultThumbnailUri: env['VIDEO_DEFAULT_THUMBNAIL'] || DEFAULT_THUMBNAIL_URI,
  };
}
