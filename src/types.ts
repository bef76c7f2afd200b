// IBM Video embed and thumbnail type definitions

/**
 * Video ID (recorded video) or channel ID (live stream)
 */
export type VideoOrChannelId = string;

/**
 * Opaque random token minted per saved media item; keys the local thumbnail cache
 */
export type ThumbnailReferenceId = string;

/**
 * Scheme prefix of an embed URL. The empty string yields a scheme-less URL.
 */
export type EmbedUrlScheme = 'https://' | 'http://' | '//' | '';

/**
 * Canonical identity of an embeddable video or stream
 */
export interface EmbedReference {
  readonly id: VideoOrChannelId;
  /** true: `id` is a video ID; false: `id` is a channel ID */
  readonly isRecorded: boolean;
}

export type DefaultQuality = 'low' | 'medium' | 'high' | 'unspecified';

export type WMode = 'direct' | 'opaque' | 'transparent' | 'window' | 'unspecified';

/**
 * Player configuration serialized into the embed URL query string
 */
export interface EmbedUrlParameters {
  readonly defaultQuality: DefaultQuality;
  readonly displayControls: boolean;
  /** Integer in [0, 100] */
  readonly initialVolume: number;
  readonly showTitle: boolean;
  readonly useAutoplay: boolean;
  readonly useHtml5Ui: boolean;
  readonly wMode: WMode;
}

/**
 * Validated contents of a persisted field value
 */
export interface VideoData extends EmbedReference {
  readonly thumbnailReferenceId: ThumbnailReferenceId;
}

/**
 * Persisted JSON property names
 */
export type VideoDataKey = 'id' | 'is_recorded' | 'thumbnail_reference_id';

/**
 * Field value that parsed with the right key set; values are not yet validated
 */
export type RawVideoData = Readonly<Record<VideoDataKey, unknown>>;

export type VideoDataParseError = 'bad-json' | 'invalid-key-set';

/**
 * Minimal logging surface; defaults to console
 */
export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

/**
 * Result type for operations that can fail
 */
export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };
