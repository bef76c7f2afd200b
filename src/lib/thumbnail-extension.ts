// pattern: Imperative Shell
// Picks the file extension for a downloaded thumbnail: the remote URL's path
// suffix, else the Content-Type of a HEAD request, else a fixed fallback.

import { posix } from 'node:path';
import { DEFAULT_HTTP_TIMEOUT_MS, fetchWithTimeout } from '../api/http';

export const FALLBACK_THUMBNAIL_EXTENSION = 'unknown';

const EXTENSION_PATTERN = /^[a-z0-9]+$/;

const MIME_EXTENSIONS: Readonly<Record<string, string>> = {
  'image/jpeg': 'jpg',
  'image/pjpeg': 'jpg',
  'image/png': 'png',
  'image/gif': 'gif',
  'image/webp': 'webp',
  'image/avif': 'avif',
  'image/bmp': 'bmp',
  'image/svg+xml': 'svg',
  'image/tiff': 'tif',
  'image/x-icon': 'ico',
  'image/vnd.microsoft.icon': 'ico',
  'image/heic': 'heic',
};

/**
 * Extension from the last path segment of a URL, lowercased, or null
 */
export function extensionFromUrl(uri: string): string | null {
  let pathname: string;
  try {
    pathname = new URL(uri).pathname;
  } catch {
    return null;
  }

  const extension = posix.extname(pathname).slice(1).toLowerCase();
  return EXTENSION_PATTERN.test(extension) ? extension : null;
}

/**
 * Extension for a Content-Type header value, or null if the type is unknown
 */
export function extensionFromContentType(contentType: string | null): string | null {
  if (!contentType) return null;

  const mimeType = contentType.split(';')[0]?.trim().toLowerCase() ?? '';
  return MIME_EXTENSIONS[mimeType] ?? null;
}

/**
 * Determine the extension to store a remote thumbnail under.
 * A failed HEAD request is not an error; it only means the fallback is used.
 */
export async function determineThumbnailExtension(
  uri: string,
  timeoutMs: number = DEFAULT_HTTP_TIMEOUT_MS
): Promise<string> {
  const fromUrl = extensionFromUrl(uri);
  if (fromUrl) return fromUrl;

  const head = await fetchWithTimeout(uri, { method: 'HEAD' }, timeoutMs);
  if (head.ok && head.value.ok) {
    const fromType = extensionFromContentType(head.value.headers.get('content-type'));
    if (fromType) return fromType;
  }

  return FALLBACK_THUMBNAIL_EXTENSION;
}
