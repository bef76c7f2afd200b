import { describe, it, expect } from 'vitest';
import { loadConfig } from './config';
import { ConfigurationError } from './errors';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      thumbnailsDirectory: './data/video-thumbnails',
      apiBaseUrl: 'https://api.video.ibm.com',
      httpTimeoutMs: 10_000,
      defaultThumbnailUri: 'no-thumbnail.png',
    });
  });

  it('reads every variable', () => {
    expect(
      loadConfig({
        VIDEO_THUMBNAILS_DIR: '/var/cache/thumbs',
        VIDEO_API_BASE_URL: 'http://localhost:8080',
        VIDEO_HTTP_TIMEOUT_MS: '2500',
        VIDEO_DEFAULT_THUMBNAIL: '/static/video.svg',
      })
    ).toEqual({
      thumbnailsDirectory: '/var/cache/thumbs',
      apiBaseUrl: 'http://localhost:8080',
      httpTimeoutMs: 2500,
      defaultThumbnailUri: '/static/video.svg',
    });
  });

  it('keeps an empty thumbnails directory for the cache to reject', () => {
    expect(loadConfig({ VIDEO_THUMBNAILS_DIR: '' }).thumbnailsDirectory).toBe('');
  });

  it.each(['0', '-5', '1.5', 'soon'])('rejects timeout %j', (value) => {
    expect(() => loadConfig({ VIDEO_HTTP_TIMEOUT_MS: value })).toThrow(ConfigurationError);
  });

  it('rejects an API base URL that is not http or https', () => {
    expect(() => loadConfig({ VIDEO_API_BASE_URL: 'ftp://api.test' })).toThrow(
      'VIDEO_API_BASE_URL must use http or https, got "ftp://api.test"'
    );
  });

  it('rejects an API base URL that does not parse', () => {
    expect(() => loadConfig({ VIDEO_API_BASE_URL: 'api.test' })).toThrow(ConfigurationError);
  });
});
