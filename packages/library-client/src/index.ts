/**
 * Asset marketplace library client.
 *
 * @module @asset-library/client
 */

export { LibraryClient } from './client.js';
export type { LibraryClientOptions } from './client.js';

export { buildClientConfig, validateClientConfig, DEFAULT_CLIENT_CONFIG } from './config.js';
export type { ClientConfig } from './config.js';

export {
  MarketplaceError,
  AuthenticationError,
  NotFoundError,
  APIError,
  NetworkError,
  ManifestError,
  ManifestFileMissingError,
  OutcomeStateError,
  ConfigurationError,
  ValidationError,
  isMarketplaceError,
  isAuthenticationError,
  isNotFoundError,
  isApiError,
  isNetworkError,
  isManifestError,
  redact,
  describeError,
} from './errors.js';
export type { MarketplaceErrorKind, MarketplaceErrorOptions, EndpointName } from './errors.js';

export * from './transport/index.js';
export * from './http/index.js';
export * from './library/index.js';
export * from './resolver/index.js';
export * from './manifest/index.js';
export * from './download/index.js';
