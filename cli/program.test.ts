import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';
import { runCli } from './program';
import type { CliDeps } from './program';
import { VideoMediaSource } from '../src/lib/video-media-source';

const FIELD_VALUE = '{"id":"123","is_recorded":true,"thumbnail_reference_id":"test-token"}';

describe('video-media CLI', () => {
  let out: Mock<[string], void>;
  let err: Mock<[string], void>;
  let createSource: Mock<[], VideoMediaSource>;
  let deps: CliDeps;

  beforeEach(() => {
    out = vi.fn<[string], void>();
    err = vi.fn<[string], void>();
    createSource = vi.fn<[], VideoMediaSource>(
      () =>
        new VideoMediaSource({
          thumbnails: { getThumbnailUri: async () => '/thumbs/a.jpg' },
          defaultThumbnailUri: 'no-thumbnail.png',
        })
    );
    deps = { out, err, createSource };
  });

  describe('parse', () => {
    it('prints the reference and a new field value', async () => {
      expect(await runCli(['parse', 'https://video.ibm.com/embed/recorded/123?a=1'], deps)).toBe(0);

      expect(out).toHaveBeenCalledTimes(1);
      const printed: unknown = JSON.parse(out.mock.calls[0]?.[0] ?? '');
      expect(printed).toEqual({
        id: '123',
        isRecorded: true,
        fieldValue: expect.stringContaining('{"id":"123","is_recorded":true,'),
      });
    });

    it('fails for a URL that is not an embed URL', async () => {
      expect(await runCli(['parse', 'https://example.com/123'], deps)).toBe(1);

      expect(err).toHaveBeenCalledWith('error: Embed URL is not in the required format.');
      expect(out).not.toHaveBeenCalled();
    });
  });

  describe('embed', () => {
    it('prints an https embed URL with default parameters', async () => {
      expect(await runCli(['embed', FIELD_VALUE], deps)).toBe(0);

      expect(out).toHaveBeenCalledWith(
        'https://video.ibm.com/embed/recorded/123' +
          '?initialVolume=50&showTitle=true&useAutoplay=false&useHtml5Ui=1&displayControls=true'
      );
    });

    it('applies player options', async () => {
      const argv = [
        'embed',
        FIELD_VALUE,
        '--scheme',
        'relative',
        '--autoplay',
        '--volume',
        '20',
        '--quality',
        'high',
        '--wmode',
        'opaque',
        '--no-title',
        '--no-controls',
        '--flash-ui',
      ];

      expect(await runCli(argv, deps)).toBe(0);

      expect(out).toHaveBeenCalledWith(
        '//video.ibm.com/embed/recorded/123' +
          '?initialVolume=20&showTitle=false&useAutoplay=true&useHtml5Ui=0' +
          '&defaultQuality=high&wMode=opaque&displayControls=false'
      );
    });

    it('omits parameters on request', async () => {
      expect(await runCli(['embed', FIELD_VALUE, '--no-params', '--scheme', 'none'], deps)).toBe(0);

      expect(out).toHaveBeenCalledWith('video.ibm.com/embed/recorded/123');
    });

    it('rejects a volume out of range', async () => {
      expect(await runCli(['embed', FIELD_VALUE, '--volume', '200'], deps)).toBe(1);

      expect(out).not.toHaveBeenCalled();
      expect(err).toHaveBeenCalledTimes(1);
    });

    it('reports an unusable field value', async () => {
      expect(await runCli(['embed', '{"id":"123"}'], deps)).toBe(1);

      expect(err).toHaveBeenCalledWith(
        'error: The JSON provided has an incorrect set of root-level keys.'
      );
    });

    it('reports an empty field value', async () => {
      expect(await runCli(['embed', ''], deps)).toBe(1);

      expect(err).toHaveBeenCalledWith('error: The field value is empty.');
    });
  });

  describe('thumbnail', () => {
    it('prints the local thumbnail path', async () => {
      expect(await runCli(['thumbnail', FIELD_VALUE], deps)).toBe(0);

      expect(out).toHaveBeenCalledWith('/thumbs/a.jpg');
    });

    it('does not touch the cache for an invalid field value', async () => {
      expect(await runCli(['thumbnail', 'not json'], deps)).toBe(1);

      expect(createSource).not.toHaveBeenCalled();
      expect(err).toHaveBeenCalledWith('error: The string provided is not valid JSON.');
    });
  });

  it('fails for an unknown command', async () => {
    expect(await runCli(['frobnicate'], deps)).toBe(1);
    expect(err).toHaveBeenCalled();
  });
});
