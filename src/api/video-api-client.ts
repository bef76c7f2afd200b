import type { Result, VideoOrChannelId } from '../types';
import { BadUpstreamResponseError, assertNonEmpty } from '../lib/errors';
import type { VideoApiError } from '../lib/errors';
import { rawUrlEncode } from '../lib/embed-url';
import { DEFAULT_HTTP_TIMEOUT_MS, fetchWithTimeout, readText } from './http';

export const DEFAULT_API_BASE_URL = 'https://api.video.ibm.com';

export interface VideoApiClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

export type ThumbnailUriResult = Result<string | null, VideoApiError>;

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** null, {} and [] all mean "no thumbnail configured". */
function isEmptyThumbnailValue(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (Array.isArray(value)) return value.length === 0;
  return isJsonObject(value) && Object.keys(value).length === 0;
}

function badResponse(
  message: string,
  status?: number,
  cause?: unknown
): { ok: false; error: BadUpstreamResponseError } {
  return { ok: false, error: new BadUpstreamResponseError(message, { status, cause }) };
}

const SIZE_KEY_PATTERN = /^(\d+)x(\d+)$/;

/**
 * Pick the URI whose "<width>x<height>" key has the largest pixel area.
 * Keys that are not sizes are skipped; the first URI seen is the fallback.
 * Empty URIs are ignored entirely.
 */
export function selectLargestThumbnail(
  thumbnails: Readonly<Record<string, string>>
): string | null {
  let selected: string | null = null;
  let maxPixels = 0;

  for (const [size, uri] of Object.entries(thumbnails)) {
    if (uri === '') continue;
    if (selected === null) {
      selected = uri;
    }
    const match = SIZE_KEY_PATTERN.exec(size);
    if (!match) continue;

    const pixels = Number(match[1]) * Number(match[2]);
    if (pixels > maxPixels) {
      maxPixels = pixels;
      selected = uri;
    }
  }

  return selected;
}

/**
 * Client for the read-only IBM Video REST API thumbnail lookups.
 * Failures are returned, not logged; callers decide how loud to be.
 */
export class VideoApiClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: VideoApiClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  }

  /**
   * Get the URI of a channel's largest thumbnail.
   * Resolves to null when the channel has no picture.
   */
  async getChannelThumbnailUri(channelId: VideoOrChannelId): Promise<ThumbnailUriResult> {
    assertNonEmpty(channelId, 'channelId');

    const envelope = await this.fetchEnvelope(
      `${this.baseUrl}/channels/${rawUrlEncode(channelId)}.json`,
      'channel'
    );
    if (!envelope.ok) return envelope;

    const pictures = envelope.value['picture'];
    if (isEmptyThumbnailValue(pictures)) {
      return { ok: true, value: null };
    }
    const uris = this.toUriMap(pictures, 'picture');
    if (!uris.ok) return uris;

    return { ok: true, value: selectLargestThumbnail(uris.value) };
  }

  /**
   * Get the URI of a recorded video's default thumbnail.
   * Resolves to null when the video has no default thumbnail.
   */
  async getVideoThumbnailUri(videoId: VideoOrChannelId): Promise<ThumbnailUriResult> {
    assertNonEmpty(videoId, 'videoId');

    const envelope = await this.fetchEnvelope(
      `${this.baseUrl}/videos/${rawUrlEncode(videoId)}.json`,
      'video'
    );
    if (!envelope.ok) return envelope;

    const thumbnails = envelope.value['thumbnail'];
    if (isEmptyThumbnailValue(thumbnails)) {
      return { ok: true, value: null };
    }
    const uris = this.toUriMap(thumbnails, 'thumbnail');
    if (!uris.ok) return uris;

    const defaultUri = uris.value['default'];
    return { ok: true, value: defaultUri === undefined || defaultUri === '' ? null : defaultUri };
  }

  /**
   * GET a JSON document and return the object under its root envelope key
   */
  private async fetchEnvelope(
    url: string,
    envelopeKey: 'channel' | 'video'
  ): Promise<Result<JsonObject, VideoApiError>> {
    const response = await fetchWithTimeout(
      url,
      { method: 'GET', headers: { Accept: 'application/json' } },
      this.timeoutMs
    );
    if (!response.ok) return response;

    const { status } = response.value;
    if (status !== 200) {
      return badResponse(`expected status 200 from ${url}, got ${status}`, status);
    }

    const body = await readText(response.value);
    if (!body.ok) return body;

    let data: unknown;
    try {
      data = JSON.parse(body.value);
    } catch (error) {
      return badResponse(`response from ${url} is not JSON`, status, error);
    }
    if (!isJsonObject(data)) {
      return badResponse(`response from ${url} is not a JSON object`, status);
    }

    if (!Object.prototype.hasOwnProperty.call(data, envelopeKey)) {
      return badResponse(`response from ${url} has no root "${envelopeKey}" key`, status);
    }
    const envelope = data[envelopeKey];
    if (!isJsonObject(envelope)) {
      return badResponse(`"${envelopeKey}" in response from ${url} is not an object`, status);
    }

    return { ok: true, value: envelope };
  }

  /**
   * Check that a thumbnail element maps labels to URI strings
   */
  private toUriMap(
    value: unknown,
    key: 'picture' | 'thumbnail'
  ): Result<Record<string, string>, BadUpstreamResponseError> {
    if (!isJsonObject(value)) {
      return badResponse(`"${key}" is not a map of URIs`);
    }

    const uris: Record<string, string> = {};
    for (const [label, uri] of Object.entries(value)) {
      if (typeof uri !== 'string') {
        return badResponse(`"${key}.${label}" is not a URI string`);
      }
      uris[label] = uri;
    }
    return { ok: true, value: uris };
  }
}
