/**
 * Shared request path for every remote call.
 *
 * Applies pacing, issues the GET through the transport session and maps
 * the outcome onto the error taxonomy. Messages name the endpoint and the
 * status code only; URLs, headers and cookies never reach an error.
 *
 * @module api-requester
 */

import type { Logger } from 'pino';
import {
  APIError,
  AuthenticationError,
  NetworkError,
  NotFoundError,
} from '../errors.js';
import type { EndpointName, MarketplaceError } from '../errors.js';
import type {
  HttpResponse,
  HttpSession,
  QueryParams,
  SessionRequestOptions,
} from '../transport/types.js';
import type { RequestPacer } from './pacer.js';

export class ApiRequester {
  private readonly session: HttpSession;
  private readonly pacer: RequestPacer;
  private readonly logger: Logger;

  constructor(session: HttpSession, pacer: RequestPacer, logger: Logger) {
    this.session = session;
    this.pacer = pacer;
    this.logger = logger.child({ component: 'api-requester' });
  }

  /**
   * GET a JSON document.
   */
  async getJson(endpoint: EndpointName, url: string, params?: QueryParams): Promise<unknown> {
    const response = await this.send(endpoint, url, { params });
    try {
      return await response.json();
    } catch (err) {
      throw new APIError(`${endpoint} returned a body that is not valid JSON`, {
        endpoint,
        statusCode: response.status,
        cause: err,
      });
    }
  }

  /**
   * GET a raw byte payload. Pass `credentials: false` for hosts outside the
   * marketplace API.
   */
  async getBytes(
    endpoint: EndpointName,
    url: string,
    options?: SessionRequestOptions,
  ): Promise<Uint8Array> {
    const response = await this.send(endpoint, url, options);
    try {
      return new Uint8Array(await response.arrayBuffer());
    } catch (err) {
      throw new NetworkError(`${endpoint} body could not be read: ${networkCause(err)}`, {
        endpoint,
        cause: err,
      });
    }
  }

  private async send(
    endpoint: EndpointName,
    url: string,
    options?: SessionRequestOptions,
  ): Promise<HttpResponse> {
    await this.pacer.wait();

    let response: HttpResponse;
    try {
      response = await this.session.get(url, options);
    } catch (err) {
      const cause = networkCause(err);
      this.logger.warn({ endpoint, cause }, 'Request failed before a response was received');
      throw new NetworkError(`${endpoint} request failed: ${cause}`, { endpoint, cause: err });
    }

    this.logger.debug({ endpoint, status: response.status }, 'Response received');

    if (response.ok) {
      return response;
    }

    // Unread bodies keep the pooled connection busy
    await this.discardBody(endpoint, response);
    throw errorForStatus(endpoint, response.status);
  }

  private async discardBody(endpoint: EndpointName, response: HttpResponse): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (err) {
      this.logger.debug({ endpoint, cause: networkCause(err) }, 'Could not cancel response body');
    }
  }
}

/**
 * Map a non-2xx status onto the error taxonomy.
 */
export function errorForStatus(endpoint: EndpointName, status: number): MarketplaceError {
  if (status === 401 || status === 403) {
    return new AuthenticationError(
      `Authentication failed on ${endpoint} (HTTP ${status}); cookies may have expired`,
      { endpoint, statusCode: status },
    );
  }

  if (status === 404) {
    return new NotFoundError(`${endpoint} resource not found (HTTP 404)`, {
      endpoint,
      statusCode: status,
    });
  }

  return new APIError(`${endpoint} returned HTTP ${status}`, { endpoint, statusCode: status });
}

/**
 * Reduce a transport exception to a generic cause: an errno/undici code when
 * one is present anywhere in the cause chain, otherwise a fixed label.
 */
export function networkCause(err: unknown): string {
  let current: unknown = err;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if ('code' in current && typeof current.code === 'string') {
      return current.code;
    }
    if (current.name === 'TimeoutError' || current.name === 'AbortError') {
      return 'timeout';
    }
    current = current.cause;
  }
  return 'connection error';
}
