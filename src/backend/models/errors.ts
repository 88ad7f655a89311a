export type MediaLibraryErrorKind =
  | 'not_found'
  | 'invariant_violation'
  | 'unsupported_feature'
  | 'provider_unavailable';

/**
 * Base class for every error the library core raises on purpose.
 */
export class MediaLibraryError extends Error {
  constructor(
    readonly kind: MediaLibraryErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Requested item, or a dependency such as a provider handle, does not exist. */
export class MediaNotFoundError extends MediaLibraryError {
  constructor(message: string) {
    super('not_found', message);
  }
}

/** A write would break a library invariant; nothing has been mutated. */
export class InvariantViolationError extends MediaLibraryError {
  constructor(message: string) {
    super('invariant_violation', message);
  }
}

/** Provider lacks an optional feature and no local fallback exists. */
export class UnsupportedFeatureError extends MediaLibraryError {
  constructor(message: string) {
    super('unsupported_feature', message);
  }
}

/** Network, timeout or rate-limit failure reported by a provider call. */
export class ProviderUnavailableError extends MediaLibraryError {
  constructor(message: string, cause?: unknown) {
    super('provider_unavailable', message, { cause });
  }
}

export function isMediaNotFound(error: unknown): error is MediaNotFoundError {
  return error instanceof MediaNotFoundError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
