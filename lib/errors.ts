export type SurblErrorKind =
  | 'config'
  | 'io'
  | 'not-loaded'
  | 'malformed-input'
  | 'invalid-input'
  | 'transient-network';

export class SurblError extends Error {
  readonly kind: SurblErrorKind;

  constructor(message: string, kind: SurblErrorKind, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.kind = kind;
  }
}

/** Cache directory missing and cannot be created. */
export class ConfigError extends SurblError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'config', options);
  }
}

/** A TLD table could be loaded neither from the remote source nor from its cache file. */
export class IOError extends SurblError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'io', options);
  }
}

export class NotLoadedError extends SurblError {
  readonly level: 2 | 3;

  constructor(level: 2 | 3) {
    super(`TLD table for level ${level} is not loaded; call load() first`, 'not-loaded');
    this.level = level;
  }
}

/** Raised for IPv6 literals, which have no SURBL query form. */
export class MalformedInputError extends SurblError {
  readonly hostname: string;

  constructor(hostname: string, message = 'Unsupported IPv6') {
    super(`${message}: ${hostname}`, 'malformed-input');
    this.hostname = hostname;
  }
}

/** Hostname with fewer than two labels. Callers see "not listed". */
export class InvalidInputError extends SurblError {
  readonly hostname: string;

  constructor(hostname: string) {
    super(`Not a qualified hostname: ${hostname}`, 'invalid-input');
    this.hostname = hostname;
  }
}

/** Remote TLD fetch failed. Recovered by falling back to the cached table. */
export class TransientNetworkError extends SurblError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, options?: { status?: number; cause?: unknown }) {
    super(
      options?.status !== undefined
        ? `TLD fetch failed with HTTP ${options.status}: ${url}`
        : `TLD fetch failed: ${url}`,
      'transient-network',
      options,
    );
    this.url = url;
    this.status = options?.status;
  }
}
