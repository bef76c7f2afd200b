// pattern: Functional Core
import type { DefaultQuality, EmbedUrlParameters, Result, WMode } from '../types';
import { InvalidArgumentError } from './errors';

export const DEFAULT_QUALITIES: readonly DefaultQuality[] = ['low', 'medium', 'high', 'unspecified'];

export const WMODES: readonly WMode[] = ['direct', 'opaque', 'transparent', 'window', 'unspecified'];

/**
 * Player defaults used when a setting is not configured.
 */
export const DEFAULT_EMBED_URL_PARAMETERS: EmbedUrlParameters = {
  defaultQuality: 'unspecified',
  displayControls: true,
  initialVolume: 50,
  showTitle: true,
  useAutoplay: false,
  useHtml5Ui: true,
  wMode: 'unspecified',
};

export function isDefaultQuality(value: unknown): value is DefaultQuality {
  return typeof value === 'string' && (DEFAULT_QUALITIES as readonly string[]).includes(value);
}

export function isWMode(value: unknown): value is WMode {
  return typeof value === 'string' && (WMODES as readonly string[]).includes(value);
}

export function isInitialVolume(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 100;
}

/**
 * Build a parameter set from the defaults and the given overrides.
 * Throws InvalidArgumentError if a value is outside its allowed set.
 */
export function createEmbedUrlParameters(
  overrides: Partial<EmbedUrlParameters> = {}
): EmbedUrlParameters {
  const params = { ...DEFAULT_EMBED_URL_PARAMETERS, ...overrides };

  if (!isInitialVolume(params.initialVolume)) {
    throw new InvalidArgumentError(
      `initialVolume must be an integer between 0 and 100, got ${params.initialVolume}`
    );
  }
  if (!isDefaultQuality(params.defaultQuality)) {
    throw new InvalidArgumentError(`unknown defaultQuality "${params.defaultQuality}"`);
  }
  if (!isWMode(params.wMode)) {
    throw new InvalidArgumentError(`unknown wMode "${params.wMode}"`);
  }

  return params;
}

const trueFalse = (value: boolean): string => (value ? 'true' : 'false');

/**
 * Serialize parameters into an embed URL query string (without the leading "?").
 *
 * useHtml5Ui is written as 1/0 rather than true/false; the player only
 * recognizes that form. Unspecified quality and wMode are left out.
 */
export function serializeEmbedUrlParameters(params: EmbedUrlParameters): string {
  const query = new URLSearchParams({
    initialVolume: String(params.initialVolume),
    showTitle: trueFalse(params.showTitle),
    useAutoplay: trueFalse(params.useAutoplay),
    useHtml5Ui: params.useHtml5Ui ? '1' : '0',
  });

  if (params.defaultQuality !== 'unspecified') {
    query.set('defaultQuality', params.defaultQuality);
  }
  if (params.wMode !== 'unspecified') {
    query.set('wMode', params.wMode);
  }
  query.set('displayControls', trueFalse(params.displayControls));

  return query.toString();
}

const SETTING_MESSAGES = {
  notObject: 'The player settings are not an object.',
  defaultQuality: 'The "defaultQuality" value is neither "low", "medium", "high", nor "unspecified".',
  displayControls: 'The "display controls" value is not a boolean.',
  initialVolume: 'The initial volume is not an integer between 0-100 (inclusive).',
  showTitle: 'The "show title" value is not a boolean.',
  useAutoplay: 'The "use autoplay" value is not a boolean.',
  useHtml5Ui: 'The "use HTML5 UI" value is not a boolean.',
  wMode: 'The "wMode" value is neither "direct", "opaque", "transparent", "window", nor "unspecified".',
} as const;

type BooleanSetting = 'displayControls' | 'showTitle' | 'useAutoplay' | 'useHtml5Ui';

const BOOLEAN_SETTINGS: readonly BooleanSetting[] = [
  'displayControls',
  'showTitle',
  'useAutoplay',
  'useHtml5Ui',
];

/**
 * Validate untyped player settings (e.g. stored display configuration).
 * Missing settings take their default; every invalid setting reports its own
 * message. Unrecognized keys are ignored.
 */
export function validatePlayerSettings(raw: unknown): Result<EmbedUrlParameters, string[]> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return { ok: false, error: [SETTING_MESSAGES.notObject] };
  }

  const settings = raw as Record<string, unknown>;
  const errors: string[] = [];
  const has = (key: keyof EmbedUrlParameters): boolean =>
    Object.prototype.hasOwnProperty.call(settings, key);

  let defaultQuality = DEFAULT_EMBED_URL_PARAMETERS.defaultQuality;
  if (has('defaultQuality')) {
    const value = settings['defaultQuality'];
    if (isDefaultQuality(value)) {
      defaultQuality = value;
    } else {
      errors.push(SETTING_MESSAGES.defaultQuality);
    }
  }

  let wMode = DEFAULT_EMBED_URL_PARAMETERS.wMode;
  if (has('wMode')) {
    const value = settings['wMode'];
    if (isWMode(value)) {
      wMode = value;
    } else {
      errors.push(SETTING_MESSAGES.wMode);
    }
  }

  let initialVolume = DEFAULT_EMBED_URL_PARAMETERS.initialVolume;
  if (has('initialVolume')) {
    const value = settings['initialVolume'];
    if (isInitialVolume(value)) {
      initialVolume = value;
    } else {
      errors.push(SETTING_MESSAGES.initialVolume);
    }
  }

  const flags: Record<BooleanSetting, boolean> = {
    displayControls: DEFAULT_EMBED_URL_PARAMETERS.displayControls,
    showTitle: DEFAULT_EMBED_URL_PARAMETERS.showTitle,
    useAutoplay: DEFAULT_EMBED_URL_PARAMETERS.useAutoplay,
    useHtml5Ui: DEFAULT_EMBED_URL_PARAMETERS.useHtml5Ui,
  };
  for (const key of BOOLEAN_SETTINGS) {
    if (!has(key)) continue;
    const value = settings[key];
    if (typeof value === 'boolean') {
      flags[key] = value;
    } else {
      errors.push(SETTING_MESSAGES[key]);
    }
  }

  if (errors.length > 0) {
    return { ok: false, error: errors };
  }

  return { ok: true, value: { defaultQuality, initialVolume, wMode, ...flags } };
}
