// pattern: Imperative Shell
// Command-line surface: parse embed URLs, build player URLs from stored field
// values, and resolve cached thumbnails.

import {
  Command,
  CommanderError,
  InvalidArgumentError as InvalidOptionArgumentError,
  Option,
} from 'commander';
import type { EmbedUrlScheme } from '../src/types';
import {
  DEFAULT_QUALITIES,
  WMODES,
  createEmbedUrlParameters,
  isDefaultQuality,
  isInitialVolume,
  isWMode,
} from '../src/lib/embed-url-parameters';
import { assembleEmbedUrl, isEmbedUrlValid, parseEmbedUrl } from '../src/lib/embed-url';
import { toError } from '../src/lib/errors';
import { describeVideoDataProblem, readVideoData, serializeVideoData } from '../src/lib/video-data';
import { INVALID_EMBED_URL_MESSAGE } from '../src/lib/video-media-source';
import type { VideoMediaSource } from '../src/lib/video-media-source';

export type CliDeps = {
  readonly out: (line: string) => void;
  readonly err: (line: string) => void;
  /** Called only by commands that need the network or the cache directory */
  readonly createSource: () => VideoMediaSource;
};

type EmbedOptions = {
  scheme: string;
  params: boolean;
  autoplay?: boolean;
  volume?: number;
  quality?: string;
  wmode?: string;
  title: boolean;
  controls: boolean;
  flashUi?: boolean;
};

const SCHEMES: Readonly<Record<string, EmbedUrlScheme>> = {
  https: 'https://',
  http: 'http://',
  relative: '//',
  none: '',
};

class CliFailure extends Error {
  constructor(readonly lines: readonly string[]) {
    super(lines.join('\n'));
  }
}

function parseVolume(value: string): number {
  const volume = Number(value);
  if (!isInitialVolume(volume)) {
    throw new InvalidOptionArgumentError('Must be an integer between 0 and 100.');
  }
  return volume;
}

function requireVideoData(fieldValue: string) {
  const data = readVideoData(fieldValue);
  if (!data.ok) {
    const messages = describeVideoDataProblem(data.error);
    throw new CliFailure(messages.length > 0 ? messages : ['The field value is empty.']);
  }
  return data.value;
}

export function createProgram(deps: CliDeps): Command {
  const program = new Command();

  program
    .name('video-media')
    .description('IBM Video embed URLs and thumbnails')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.out(text.trimEnd()),
      writeErr: (text) => deps.err(text.trimEnd()),
    });

  program
    .command('parse')
    .description('parse an embed URL and print a new field value for it')
    .argument('<embed-url>', 'IBM Video embed URL')
    .action((embedUrl: string) => {
      if (!isEmbedUrlValid(embedUrl)) {
        throw new CliFailure([INVALID_EMBED_URL_MESSAGE]);
      }
      const ref = parseEmbedUrl(embedUrl);
      deps.out(
        JSON.stringify(
          { id: ref.id, isRecorded: ref.isRecorded, fieldValue: serializeVideoData(ref) },
          null,
          2
        )
      );
    });

  program
    .command('embed')
    .description('print the player embed URL for a stored field value')
    .argument('<field-value>', 'stored JSON field value')
    .addOption(
      new Option('--scheme <scheme>', 'URL scheme').choices(Object.keys(SCHEMES)).default('https')
    )
    .option('--no-params', 'omit the player parameters')
    .option('--autoplay', 'start playback automatically')
    .option('--volume <volume>', 'initial volume (0-100)', parseVolume)
    .addOption(new Option('--quality <quality>', 'default quality').choices(DEFAULT_QUALITIES))
    .addOption(new Option('--wmode <wmode>', 'window mode').choices(WMODES))
    .option('--no-title', 'hide the video title')
    .option('--no-controls', 'hide the playback controls')
    .option('--flash-ui', 'use the legacy player UI instead of HTML5')
    .action((fieldValue: string, options: EmbedOptions) => {
      const data = requireVideoData(fieldValue);
      const scheme = SCHEMES[options.scheme] ?? 'https://';
      const params = options.params
        ? createEmbedUrlParameters({
            useAutoplay: options.autoplay ?? false,
            initialVolume: options.volume ?? 50,
            defaultQuality: isDefaultQuality(options.quality) ? options.quality : 'unspecified',
            wMode: isWMode(options.wmode) ? options.wmode : 'unspecified',
            showTitle: options.title,
            displayControls: options.controls,
            useHtml5Ui: !options.flashUi,
          })
        : null;
      deps.out(assembleEmbedUrl(data, scheme, params));
    });

  program
    .command('thumbnail')
    .description('resolve the local thumbnail for a stored field value')
    .argument('<field-value>', 'stored JSON field value')
    .action(async (fieldValue: string) => {
      requireVideoData(fieldValue);
      const source = deps.createSource();
      deps.out(await source.getThumbnailUri(fieldValue));
    });

  return program;
}

/**
 * Run the CLI and return the process exit code
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  const program = createProgram(deps);

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof CliFailure) {
      for (const line of error.lines) deps.err(`error: ${line}`);
      return 1;
    }
    deps.err(`error: ${toError(error).message}`);
    return 1;
  }
}
