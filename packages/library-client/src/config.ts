/**
 * Client configuration builder.
 *
 * All values can be set programmatically. Environment variables are only
 * consulted when the caller passes an env object explicitly; the client
 * itself never reads `process.env`.
 */

export interface ClientConfig {
  /** Fixed delay applied before every request, in milliseconds */
  requestDelayMs: number;

  /** Sort order sent to library search */
  defaultSortBy: string;

  /** Asset format code whose file is used to resolve manifests */
  formatCode: string;

  /** Platform query parameter for download info (omitted when empty) */
  platform: string;

  /** Validate manifests against the manifest schema when parsing */
  validateManifests: boolean;

  /** Maximum library pages fetched per walk (safety limit) */
  maxPages: number;

  /** Output directories must resolve inside this root when set */
  outputRoot?: string;

  /** Reject manifests larger than this many bytes when set */
  maxManifestBytes?: number;
}

/** Default configuration values */
export const DEFAULT_CLIENT_CONFIG: ClientConfig = {
  requestDelayMs: 1_500,
  defaultSortBy: '-createdAt',
  formatCode: 'unreal-engine',
  platform: 'Mac',
  validateManifests: false,
  maxPages: 1_000,
};

type Env = Record<string, string | undefined>;

function getEnvNumber(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined) return undefined;
  const parsed = Number(raw);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function getEnvBoolean(env: Env, key: string): boolean | undefined {
  const raw = env[key];
  if (raw === undefined) return undefined;
  return raw.toLowerCase() === 'true' || raw === '1';
}

/**
 * Build a client config from defaults, an optional env object and overrides
 * (highest precedence).
 *
 * Environment variables (only when `env` is given):
 * - LIBRARY_REQUEST_DELAY_MS: Delay before every request (default: 1500)
 * - LIBRARY_SORT_BY: Library sort order (default: -createdAt)
 * - LIBRARY_FORMAT_CODE: Target asset format (default: unreal-engine)
 * - LIBRARY_PLATFORM: Download platform (default: Mac)
 * - LIBRARY_VALIDATE_MANIFESTS: true|1 to enable schema validation
 * - LIBRARY_MAX_PAGES: Pagination safety limit (default: 1000)
 * - LIBRARY_OUTPUT_ROOT: Root directory downloads must stay inside
 * - LIBRARY_MAX_MANIFEST_BYTES: Manifest size limit
 */
export function buildClientConfig(overrides?: Partial<ClientConfig>, env?: Env): ClientConfig {
  const source: Env = env ?? {};

  return {
    requestDelayMs:
      overrides?.requestDelayMs ??
      getEnvNumber(source, 'LIBRARY_REQUEST_DELAY_MS') ??
      DEFAULT_CLIENT_CONFIG.requestDelayMs,
    defaultSortBy:
      overrides?.defaultSortBy ?? source['LIBRARY_SORT_BY'] ?? DEFAULT_CLIENT_CONFIG.defaultSortBy,
    formatCode:
      overrides?.formatCode ?? source['LIBRARY_FORMAT_CODE'] ?? DEFAULT_CLIENT_CONFIG.formatCode,
    platform: overrides?.platform ?? source['LIBRARY_PLATFORM'] ?? DEFAULT_CLIENT_CONFIG.platform,
    validateManifests:
      overrides?.validateManifests ??
      getEnvBoolean(source, 'LIBRARY_VALIDATE_MANIFESTS') ??
      DEFAULT_CLIENT_CONFIG.validateManifests,
    maxPages:
      overrides?.maxPages ?? getEnvNumber(source, 'LIBRARY_MAX_PAGES') ?? DEFAULT_CLIENT_CONFIG.maxPages,
    outputRoot: overrides?.outputRoot ?? source['LIBRARY_OUTPUT_ROOT'],
    maxManifestBytes:
      overrides?.maxManifestBytes ?? getEnvNumber(source, 'LIBRARY_MAX_MANIFEST_BYTES'),
  };
}

/**
 * Validate a client configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateClientConfig(config: ClientConfig): string[] {
  const errors: string[] = [];

  if (!Number.isFinite(config.requestDelayMs) || config.requestDelayMs < 0) {
    errors.push('requestDelayMs must be a non-negative number');
  }

  if (config.requestDelayMs > 60_000) {
    errors.push('requestDelayMs must not exceed 60000 (1 minute)');
  }

  if (!config.defaultSortBy) {
    errors.push('defaultSortBy is required');
  }

  if (!config.formatCode) {
    errors.push('formatCode is required');
  }

  if (!Number.isInteger(config.maxPages) || config.maxPages < 1) {
    errors.push('maxPages must be an integer of at least 1');
  }

  if (config.outputRoot !== undefined && config.outputRoot.length === 0) {
    errors.push('outputRoot must not be empty when set');
  }

  if (
    config.maxManifestBytes !== undefined &&
    (!Number.isInteger(config.maxManifestBytes) || config.maxManifestBytes < 1)
  ) {
    errors.push('maxManifestBytes must be a positive integer when set');
  }

  return errors;
}
