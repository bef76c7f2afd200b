export {
  EMBED_URL_PATTERN,
  EMBED_URL_SCHEMES,
  assembleEmbedUrl,
  isEmbedUrlScheme,
  isEmbedUrlValid,
  parseEmbedUrl,
  rawUrlEncode,
} from './embed-url';
export {
  DEFAULT_EMBED_URL_PARAMETERS,
  DEFAULT_QUALITIES,
  WMODES,
  createEmbedUrlParameters,
  isDefaultQuality,
  isInitialVolume,
  isWMode,
  serializeEmbedUrlParameters,
  validatePlayerSettings,
} from './embed-url-parameters';
export {
  VIDEO_DATA_KEYS,
  VIDEO_DATA_MESSAGES,
  describeVideoDataProblem,
  generateThumbnailReferenceId,
  readVideoData,
  reviseVideoData,
  serializeVideoData,
  tryParseVideoData,
  validateVideoData,
} from './video-data';
export type { VideoDataProblem } from './video-data';
export {
  BadUpstreamResponseError,
  ConfigurationError,
  InvalidArgumentError,
  InvalidFormatError,
  TransportError,
} from './errors';
export type { VideoApiError, VideoMediaErrorKind } from './errors';
export { KeyedLock } from './keyed-lock';
export {
  FALLBACK_THUMBNAIL_EXTENSION,
  determineThumbnailExtension,
  extensionFromContentType,
  extensionFromUrl,
} from './thumbnail-extension';
export { nodeThumbnailFileSystem } from './thumbnail-file-system';
export type { ThumbnailFileSystem } from './thumbnail-file-system';
export { ThumbnailCache, thumbnailBaseName, validateThumbnailsDirectory } from './thumbnail-cache';
export type { ThumbnailCacheOptions, ThumbnailUriSource } from './thumbnail-cache';
export { loadConfig, DEFAULT_THUMBNAIL_URI, DEFAULT_THUMBNAILS_DIRECTORY } from './config';
export type { VideoMediaConfig } from './config';
export { VideoMediaSource, INVALID_EMBED_URL_MESSAGE } from './video-media-source';
export type {
  ThumbnailResolver,
  VideoMediaSourceOptions,
  VideoPlayer,
} from './video-media-source';
