// pattern: Functional Core
// Persisted field value: a JSON object with exactly the keys
// id, is_recorded and thumbnail_reference_id.
//
// Reading happens in two stages. tryParseVideoData() only checks that the
// value is a JSON object with the right key set; validateVideoData() then
// checks each field, so one bad field yields a message about that field.

import { randomBytes } from 'node:crypto';
import type {
  EmbedReference,
  RawVideoData,
  Result,
  ThumbnailReferenceId,
  VideoData,
  VideoDataKey,
  VideoDataParseError,
} from '../types';
import { assertNonEmpty } from './errors';

export const VIDEO_DATA_KEYS = {
  id: 'id',
  isRecorded: 'is_recorded',
  thumbnailReferenceId: 'thumbnail_reference_id',
} as const satisfies Record<string, VideoDataKey>;

const EXPECTED_KEYS: readonly VideoDataKey[] = Object.values(VIDEO_DATA_KEYS);

const THUMBNAIL_REFERENCE_ID_BYTES = 8;

export const VIDEO_DATA_MESSAGES = {
  badJson: 'The string provided is not valid JSON.',
  invalidKeySet: 'The JSON provided has an incorrect set of root-level keys.',
  invalidId: 'The video or channel ID is not a non-empty string.',
  invalidRecordedFlag: 'The "is recorded" flag is not a boolean.',
  invalidThumbnailReferenceId: 'The thumbnail reference ID is not a non-empty string.',
} as const;

export type VideoDataProblem =
  | { readonly kind: 'empty' }
  | { readonly kind: 'parse'; readonly error: VideoDataParseError }
  | { readonly kind: 'invalid'; readonly messages: readonly string[] };

/**
 * Mint a fresh thumbnail reference ID: base64 of eight random bytes.
 */
export function generateThumbnailReferenceId(): ThumbnailReferenceId {
  return randomBytes(THUMBNAIL_REFERENCE_ID_BYTES).toString('base64');
}

/**
 * Serialize a reference and its thumbnail reference ID into a field value.
 * A new thumbnail reference ID is minted when none is given.
 *
 * @throws InvalidArgumentError if the ID or a supplied thumbnail reference ID is empty
 */
export function serializeVideoData(
  ref: EmbedReference,
  thumbnailReferenceId?: ThumbnailReferenceId
): string {
  assertNonEmpty(ref.id, 'id');
  if (thumbnailReferenceId !== undefined) {
    assertNonEmpty(thumbnailReferenceId, 'thumbnailReferenceId');
  }

  return JSON.stringify({
    [VIDEO_DATA_KEYS.id]: ref.id,
    [VIDEO_DATA_KEYS.isRecorded]: ref.isRecorded,
    [VIDEO_DATA_KEYS.thumbnailReferenceId]: thumbnailReferenceId ?? generateThumbnailReferenceId(),
  });
}

/**
 * Structural parse of a field value. Values are returned unvalidated.
 */
export function tryParseVideoData(raw: string): Result<RawVideoData, VideoDataParseError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { ok: false, error: 'bad-json' };
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return { ok: false, error: 'bad-json' };
  }

  const record = parsed as Record<string, unknown>;
  const keys = Object.keys(record);
  if (keys.length !== EXPECTED_KEYS.length || !EXPECTED_KEYS.every((key) => keys.includes(key))) {
    return { ok: false, error: 'invalid-key-set' };
  }

  return {
    ok: true,
    value: {
      id: record[VIDEO_DATA_KEYS.id],
      is_recorded: record[VIDEO_DATA_KEYS.isRecorded],
      thumbnail_reference_id: record[VIDEO_DATA_KEYS.thumbnailReferenceId],
    },
  };
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value !== '';
}

/**
 * Semantic validation of a structurally parsed field value.
 * Reports one message per invalid field.
 */
export function validateVideoData(raw: RawVideoData): Result<VideoData, string[]> {
  const id = raw.id;
  const isRecorded = raw.is_recorded;
  const thumbnailReferenceId = raw.thumbnail_reference_id;

  if (
    isNonEmptyString(id) &&
    typeof isRecorded === 'boolean' &&
    isNonEmptyString(thumbnailReferenceId)
  ) {
    return { ok: true, value: { id, isRecorded, thumbnailReferenceId } };
  }

  const errors: string[] = [];
  if (!isNonEmptyString(id)) {
    errors.push(VIDEO_DATA_MESSAGES.invalidId);
  }
  if (typeof isRecorded !== 'boolean') {
    errors.push(VIDEO_DATA_MESSAGES.invalidRecordedFlag);
  }
  if (!isNonEmptyString(thumbnailReferenceId)) {
    errors.push(VIDEO_DATA_MESSAGES.invalidThumbnailReferenceId);
  }
  return { ok: false, error: errors };
}

/**
 * Parse and validate a field value in one step.
 */
export function readVideoData(
  value: string | null | undefined
): Result<VideoData, VideoDataProblem> {
  if (value === null || value === undefined || value === '') {
    return { ok: false, error: { kind: 'empty' } };
  }

  const parsed = tryParseVideoData(value);
  if (!parsed.ok) {
    return { ok: false, error: { kind: 'parse', error: parsed.error } };
  }

  const validated = validateVideoData(parsed.value);
  if (!validated.ok) {
    return { ok: false, error: { kind: 'invalid', messages: validated.error } };
  }

  return validated;
}

/**
 * User-facing messages describing why a field value cannot be used.
 * Empty values produce no messages.
 */
export function describeVideoDataProblem(problem: VideoDataProblem): string[] {
  switch (problem.kind) {
    case 'empty':
      return [];
    case 'parse':
      return [
        problem.error === 'bad-json'
          ? VIDEO_DATA_MESSAGES.badJson
          : VIDEO_DATA_MESSAGES.invalidKeySet,
      ];
    case 'invalid':
      return [...problem.messages];
  }
}

/**
 * Build the video data to store after the user (re)submits a reference.
 *
 * The previous thumbnail reference ID is kept when the same video or channel is
 * submitted again, so its cached thumbnail stays valid. A different reference,
 * or no previous data, gets a fresh ID, which forces a new thumbnail download.
 *
 * Re-saving the same URL therefore never refreshes a stale thumbnail. To force
 * one, save a different reference first, or mint a token with
 * generateThumbnailReferenceId() and pass it to serializeVideoData().
 */
export function reviseVideoData(ref: EmbedReference, previous: VideoData | null): VideoData {
  assertNonEmpty(ref.id, 'id');

  const unchanged =
    previous !== null && previous.id === ref.id && previous.isRecorded === ref.isRecorded;

  return {
    id: ref.id,
    isRecorded: ref.isRecorded,
    thumbnailReferenceId: unchanged
      ? previous.thumbnailReferenceId
      : generateThumbnailReferenceId(),
  };
}
