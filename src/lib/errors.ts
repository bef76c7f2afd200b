// pattern: Functional Core
// Error taxonomy shared by the codecs, the API client and the thumbnail cache.

export type VideoMediaErrorKind =
  | 'invalid-argument'
  | 'invalid-format'
  | 'transport'
  | 'bad-upstream-response'
  | 'configuration';

abstract class VideoMediaError extends Error {
  abstract readonly kind: VideoMediaErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A caller-supplied precondition was violated (empty ID, empty token). */
export class InvalidArgumentError extends VideoMediaError {
  readonly kind = 'invalid-argument';
}

/** Input is well-formed text but not an embed URL. */
export class InvalidFormatError extends VideoMediaError {
  readonly kind = 'invalid-format';
}

/** Network-level failure: DNS, TLS, reset, timeout, interrupted body. */
export class TransportError extends VideoMediaError {
  readonly kind = 'transport';
}

/** The remote API answered with an unexpected status or body shape. */
export class BadUpstreamResponseError extends VideoMediaError {
  readonly kind = 'bad-upstream-response';
  readonly status: number | undefined;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

/** Missing or unusable configuration, such as the thumbnails directory. */
export class ConfigurationError extends VideoMediaError {
  readonly kind = 'configuration';
}

export type VideoApiError = TransportError | BadUpstreamResponseError;

/**
 * Throw InvalidArgumentError if the value is an empty string.
 */
export function assertNonEmpty(value: string, name: string): void {
  if (value === '') {
    throw new InvalidArgumentError(`${name} must not be empty`);
  }
}

/**
 * Normalize anything thrown into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
