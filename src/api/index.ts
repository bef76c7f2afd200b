// Barrel export for API module
export { VideoApiClient, DEFAULT_API_BASE_URL, selectLargestThumbnail } from './video-api-client';
export type { VideoApiClientOptions, ThumbnailUriResult } from './video-api-client';
export { fetchWithTimeout, readBytes, readText, DEFAULT_HTTP_TIMEOUT_MS } from './http';
