/**
 * Endpoint template rendering and validation.
 */

import { ConfigurationError } from '../errors.js';
import type { EndpointTemplates } from './types.js';

const PLACEHOLDER = /\{([a-z_]+)\}/g;

/**
 * Substitute `{name}` placeholders with URI-encoded values and resolve the
 * result against `baseUrl` when the template is relative.
 *
 * Throws ConfigurationError for a placeholder without a value, or a
 * relative template without a base URL.
 */
export function renderEndpoint(
  template: string,
  values: Record<string, string> = {},
  baseUrl?: string,
): string {
  const rendered = template.replace(PLACEHOLDER, (_match, name: string) => {
    const value = values[name];
    if (value === undefined) {
      throw new ConfigurationError(`Endpoint template is missing a value for {${name}}`);
    }
    return encodeURIComponent(value);
  });

  if (isAbsoluteUrl(rendered)) {
    return rendered;
  }

  if (!baseUrl) {
    throw new ConfigurationError('Relative endpoint template requires a baseUrl');
  }

  try {
    return new URL(rendered, baseUrl).toString();
  } catch {
    throw new ConfigurationError('Endpoint template does not resolve to a valid URL');
  }
}

/**
 * Validate endpoint templates.
 * Returns an array of error messages (empty = valid).
 */
export function validateEndpoints(endpoints: EndpointTemplates): string[] {
  const errors: string[] = [];

  if (endpoints.baseUrl !== undefined && !isAbsoluteUrl(endpoints.baseUrl)) {
    errors.push('baseUrl must be an absolute http(s) URL');
  }

  const checks: Array<[keyof Omit<EndpointTemplates, 'baseUrl'>, string[]]> = [
    ['librarySearch', []],
    ['assetFormats', ['asset_uid']],
    ['downloadInfo', ['asset_uid', 'file_uid']],
  ];

  for (const [key, required] of checks) {
    const template = endpoints[key];
    if (!template) {
      errors.push(`${key} is required`);
      continue;
    }
    for (const name of required) {
      if (!template.includes(`{${name}}`)) {
        errors.push(`${key} must contain {${name}}`);
      }
    }
    if (!isAbsoluteUrl(template) && !endpoints.baseUrl) {
      errors.push(`${key} is relative but no baseUrl is configured`);
    }
  }

  return errors;
}

export function isAbsoluteUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'https:' || url.protocol === 'http:';
  } catch {
    return false;
  }
}

/**
 * Origins of the base URL and of every absolute template. Only these
 * origins receive session credentials.
 */
export function endpointOrigins(endpoints: EndpointTemplates): Set<string> {
  const origins = new Set<string>();
  const candidates = [
    endpoints.baseUrl,
    endpoints.librarySearch,
    endpoints.assetFormats,
    endpoints.downloadInfo,
  ];

  for (const value of candidates) {
    if (value && isAbsoluteUrl(value)) {
      origins.add(new URL(value).origin);
    }
  }
  return origins;
}
