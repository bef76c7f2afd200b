// pattern: Functional Core
import { describe, it, expect } from 'vitest';
import {
  DEFAULT_EMBED_URL_PARAMETERS,
  createEmbedUrlParameters,
  isInitialVolume,
  serializeEmbedUrlParameters,
  validatePlayerSettings,
} from './embed-url-parameters';
import { InvalidArgumentError } from './errors';

describe('embed-url-parameters', () => {
  describe('createEmbedUrlParameters', () => {
    it('returns the defaults when nothing is overridden', () => {
      expect(createEmbedUrlParameters()).toEqual(DEFAULT_EMBED_URL_PARAMETERS);
    });

    it('applies overrides', () => {
      const params = createEmbedUrlParameters({ useAutoplay: true, defaultQuality: 'low' });
      expect(params.useAutoplay).toBe(true);
      expect(params.defaultQuality).toBe('low');
      expect(params.initialVolume).toBe(50);
    });

    it.each([-1, 101, 1.5, Number.NaN])('rejects initial volume %s', (initialVolume) => {
      expect(() => createEmbedUrlParameters({ initialVolume })).toThrow(InvalidArgumentError);
    });
  });

  describe('isInitialVolume', () => {
    it('accepts the inclusive bounds', () => {
      expect(isInitialVolume(0)).toBe(true);
      expect(isInitialVolume(100)).toBe(true);
      expect(isInitialVolume('50')).toBe(false);
    });
  });

  describe('serializeEmbedUrlParameters', () => {
    it('serializes the defaults, leaving out unspecified quality and wMode', () => {
      expect(serializeEmbedUrlParameters(DEFAULT_EMBED_URL_PARAMETERS)).toBe(
        'initialVolume=50&showTitle=true&useAutoplay=false&useHtml5Ui=1&displayControls=true'
      );
    });

    it('serializes every parameter in a fixed order', () => {
      const params = createEmbedUrlParameters({
        initialVolume: 0,
        showTitle: false,
        useAutoplay: true,
        useHtml5Ui: false,
        defaultQuality: 'high',
        wMode: 'transparent',
        displayControls: false,
      });

      expect(serializeEmbedUrlParameters(params)).toBe(
        'initialVolume=0&showTitle=false&useAutoplay=true&useHtml5Ui=0' +
          '&defaultQuality=high&wMode=transparent&displayControls=false'
      );
    });
  });

  describe('validatePlayerSettings', () => {
    it('fills missing settings with defaults', () => {
      expect(validatePlayerSettings({})).toEqual({
        ok: true,
        value: DEFAULT_EMBED_URL_PARAMETERS,
      });
    });

    it('ignores unrecognized keys', () => {
      const result = validatePlayerSettings({ useAutoplay: true, skin: 'dark' });
      expect(result).toEqual({
        ok: true,
        value: { ...DEFAULT_EMBED_URL_PARAMETERS, useAutoplay: true },
      });
    });

    it('reports one message per invalid setting', () => {
      const result = validatePlayerSettings({
        showTitle: 'yes',
        initialVolume: '50',
        wMode: 'bogus',
        defaultQuality: 'medium',
      });

      expect(result).toEqual({
        ok: false,
        error: [
          'The "wMode" value is neither "direct", "opaque", "transparent", "window", nor "unspecified".',
          'The initial volume is not an integer between 0-100 (inclusive).',
          'The "show title" value is not a boolean.',
        ],
      });
    });

    it.each([null, 'high', 42, []])('rejects %j as not an object', (raw) => {
      expect(validatePlayerSettings(raw)).toEqual({
        ok: false,
        error: ['The player settings are not an object.'],
      });
    });
  });
});
