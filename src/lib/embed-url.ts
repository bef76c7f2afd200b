// pattern: Functional Core
// IBM Video embed URL grammar:
//   [scheme] video.ibm.com/embed/ [recorded/] <id> [?query] [#fragment]
// isEmbedUrlValid() and parseEmbedUrl() both run EMBED_URL_PATTERN, so they
// cannot disagree about what an embed URL is.

import type { EmbedReference, EmbedUrlParameters, EmbedUrlScheme } from '../types';
import { InvalidArgumentError, InvalidFormatError, assertNonEmpty } from './errors';
import { serializeEmbedUrlParameters } from './embed-url-parameters';

export const EMBED_URL_SCHEMES: readonly EmbedUrlScheme[] = ['https://', 'http://', '//', ''];

const EMBED_HOST_AND_PATH = 'video.ibm.com/embed/';
const RECORDED_PATH_PART = 'recorded/';

// RFC 3986 path segment characters (no "/"), plus percent escapes
const PATH_SEGMENT_CHARACTER = "[a-z0-9\\-._~!$&'()*+,;=:@]|%[0-9a-f]{2}";
// RFC 3986 sections 3.4 and 3.5: query and fragment also allow "/" and "?"
const QUERY_OR_FRAGMENT_CHARACTER = "[a-z0-9\\-._~!$&'()*+,;=:@/?]|%[0-9a-f]{2}";

/**
 * Anchored, case-insensitive embed URL pattern.
 * Groups: 1 scheme, 2 "recorded/", 3 encoded ID, 4 query, 5 fragment.
 */
export const EMBED_URL_PATTERN = new RegExp(
  '^(https://|http://|//)?video\\.ibm\\.com/embed/(recorded/)?' +
    `((?:${PATH_SEGMENT_CHARACTER})+)` +
    `(?:\\?((?:${QUERY_OR_FRAGMENT_CHARACTER})*))?` +
    `(?:#((?:${QUERY_OR_FRAGMENT_CHARACTER})*))?$`,
  'i'
);

/**
 * Tell whether the whole string is an embed URL.
 */
export function isEmbedUrlValid(embedUrl: string): boolean {
  return EMBED_URL_PATTERN.test(embedUrl);
}

/**
 * Extract the video/channel ID and the recorded flag from an embed URL.
 * The query string and fragment are discarded.
 *
 * @throws InvalidFormatError if the URL does not match the embed URL grammar
 *   or its ID contains an undecodable escape sequence
 */
export function parseEmbedUrl(embedUrl: string): EmbedReference {
  if (embedUrl === '') {
    throw new InvalidFormatError('embed URL is empty');
  }
  if (!embedUrl.toLowerCase().includes(EMBED_HOST_AND_PATH)) {
    throw new InvalidFormatError(`embed URL does not contain "${EMBED_HOST_AND_PATH}"`);
  }

  const match = EMBED_URL_PATTERN.exec(embedUrl);
  const encodedId = match?.[3];
  if (!match || !encodedId) {
    throw new InvalidFormatError('embed URL is not in the required format');
  }

  let id: string;
  try {
    id = decodeURIComponent(encodedId);
  } catch (error) {
    throw new InvalidFormatError('embed URL ID contains an invalid escape sequence', {
      cause: error,
    });
  }

  return { id, isRecorded: match[2] !== undefined };
}

/**
 * Percent-encode everything except unreserved characters (A-Z a-z 0-9 - _ . ~).
 * Spaces become %20.
 */
export function rawUrlEncode(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

/**
 * Build the embed URL for a reference.
 *
 * @param scheme - Prefix such as "https://" or "//"; may be empty
 * @param params - Player parameters for the query string, or null for none
 * @throws InvalidArgumentError if the ID is empty or cannot be encoded
 */
export function assembleEmbedUrl(
  ref: EmbedReference,
  scheme: EmbedUrlScheme,
  params: EmbedUrlParameters | null = null
): string {
  assertNonEmpty(ref.id, 'id');

  let encodedId: string;
  try {
    encodedId = rawUrlEncode(ref.id);
  } catch (error) {
    // encodeURIComponent rejects lone surrogates
    throw new InvalidArgumentError('id is not a well-formed string', { cause: error });
  }

  const base = ref.isRecorded ? EMBED_HOST_AND_PATH + RECORDED_PATH_PART : EMBED_HOST_AND_PATH;
  const url = scheme + base + encodedId;

  return params === null ? url : `${url}?${serializeEmbedUrlParameters(params)}`;
}

export function isEmbedUrlScheme(value: string): value is EmbedUrlScheme {
  return (EMBED_URL_SCHEMES as readonly string[]).includes(value);
}
