/**
 * Error taxonomy for the library client.
 *
 * Every error carries a primary `kind` plus the set of kinds it also
 * satisfies. An HTTP 401 is an authentication failure and an API failure at
 * the same time; callers test for either with `satisfies()` or the `is*`
 * predicates instead of relying on class ancestry.
 *
 * @module errors
 */

// ---------------------------------------------------------------------------
// Kinds
// ---------------------------------------------------------------------------

export type MarketplaceErrorKind =
  | 'authentication'
  | 'not_found'
  | 'api'
  | 'network'
  | 'manifest'
  | 'file_missing'
  | 'outcome_state'
  | 'configuration'
  | 'validation';

/** Logical endpoint names used in error messages and logs */
export type EndpointName = 'library-search' | 'asset-formats' | 'download-info' | 'manifest';

export interface MarketplaceErrorOptions {
  /** Additional kinds this error satisfies besides its primary kind */
  alsoSatisfies?: MarketplaceErrorKind[];
  statusCode?: number;
  endpoint?: EndpointName;
  cause?: unknown;
}

// ---------------------------------------------------------------------------
// Base class
// ---------------------------------------------------------------------------

export class MarketplaceError extends Error {
  public readonly kind: MarketplaceErrorKind;
  public readonly kinds: ReadonlySet<MarketplaceErrorKind>;
  public readonly statusCode?: number;
  public readonly endpoint?: EndpointName;

  constructor(kind: MarketplaceErrorKind, message: string, options?: MarketplaceErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'MarketplaceError';
    this.kind = kind;
    this.kinds = new Set<MarketplaceErrorKind>([kind, ...(options?.alsoSatisfies ?? [])]);
    this.statusCode = options?.statusCode;
    this.endpoint = options?.endpoint;
  }

  satisfies(kind: MarketplaceErrorKind): boolean {
    return this.kinds.has(kind);
  }
}

// ---------------------------------------------------------------------------
// Concrete errors
// ---------------------------------------------------------------------------

/** HTTP 401/403 from any endpoint */
export class AuthenticationError extends MarketplaceError {
  constructor(message: string, options?: Omit<MarketplaceErrorOptions, 'alsoSatisfies'>) {
    super('authentication', message, { ...options, alsoSatisfies: ['api'] });
    this.name = 'AuthenticationError';
  }
}

/** HTTP 404, or a lookup that found no matching entry */
export class NotFoundError extends MarketplaceError {
  constructor(message: string, options?: Omit<MarketplaceErrorOptions, 'alsoSatisfies'>) {
    // Only HTTP-derived not-found errors are API errors as well
    super('not_found', message, {
      ...options,
      alsoSatisfies: options?.statusCode !== undefined ? ['api'] : [],
    });
    this.name = 'NotFoundError';
  }
}

/** Any other non-2xx status, or a payload the client cannot use */
export class APIError extends MarketplaceError {
  constructor(message: string, options?: Omit<MarketplaceErrorOptions, 'alsoSatisfies'>) {
    super('api', message, options);
    this.name = 'APIError';
  }
}

/** Connection failure, timeout, or other transport-level exception */
export class NetworkError extends MarketplaceError {
  constructor(message: string, options?: Omit<MarketplaceErrorOptions, 'alsoSatisfies'>) {
    super('network', message, options);
    this.name = 'NetworkError';
  }
}

/** Malformed manifest bytes or a schema-validation failure */
export class ManifestError extends MarketplaceError {
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], cause?: unknown) {
    super('manifest', message, { cause });
    this.name = 'ManifestError';
    this.issues = issues;
  }
}

/** A manifest file recorded by a download outcome is no longer on disk */
export class ManifestFileMissingError extends MarketplaceError {
  public readonly filePath: string;

  constructor(filePath: string) {
    super('file_missing', `Manifest file not found: ${filePath}`, { alsoSatisfies: ['not_found'] });
    this.name = 'ManifestFileMissingError';
    this.filePath = filePath;
  }
}

/** `load()` called on a failed download outcome */
export class OutcomeStateError extends MarketplaceError {
  constructor(message: string) {
    super('outcome_state', message);
    this.name = 'OutcomeStateError';
  }
}

/** Endpoint templates or client configuration cannot be used */
export class ConfigurationError extends MarketplaceError {
  constructor(message: string) {
    super('configuration', message);
    this.name = 'ConfigurationError';
  }
}

/** Input rejected before any I/O happened (unsafe path, bad URL, oversize payload) */
export class ValidationError extends MarketplaceError {
  constructor(message: string) {
    super('validation', message);
    this.name = 'ValidationError';
  }
}

// ---------------------------------------------------------------------------
// Predicates
// ---------------------------------------------------------------------------

export function isMarketplaceError(err: unknown): err is MarketplaceError {
  return err instanceof MarketplaceError;
}

export function isAuthenticationError(err: unknown): err is MarketplaceError {
  return isMarketplaceError(err) && err.satisfies('authentication');
}

export function isNotFoundError(err: unknown): err is MarketplaceError {
  return isMarketplaceError(err) && err.satisfies('not_found');
}

export function isApiError(err: unknown): err is MarketplaceError {
  return isMarketplaceError(err) && err.satisfies('api');
}

export function isNetworkError(err: unknown): err is MarketplaceError {
  return isMarketplaceError(err) && err.satisfies('network');
}

export function isManifestError(err: unknown): err is MarketplaceError {
  return isMarketplaceError(err) && err.satisfies('manifest');
}

// ---------------------------------------------------------------------------
// Redaction
// ---------------------------------------------------------------------------

const QUERY_STRING = /(https?:\/\/[^\s?#'"]+)\?[^\s'"]*/g;
const SECRET_HEADER = /\b(cookie|set-cookie|authorization)\s*[:=]\s*[^\n]*/gi;

/**
 * Strip URL query strings and header-like secrets from a message.
 */
export function redact(message: string): string {
  return message.replace(QUERY_STRING, '$1?[redacted]').replace(SECRET_HEADER, '$1: [redacted]');
}

/**
 * Build a credential-free, human-readable description of any thrown value.
 *
 * Library errors are built from status codes and endpoint names only, so
 * their message is used as-is. File-system errors keep their errno message.
 * Anything else is reduced to its error name.
 */
export function describeError(err: unknown): string {
  if (isMarketplaceError(err)) {
    return redact(err.message);
  }
  if (err instanceof Error) {
    if ('code' in err && typeof err.code === 'string') {
      return redact(err.message);
    }
    return err.name === 'Error' ? 'unexpected error' : err.name;
  }
  return 'unexpected error';
}
