/**
 * Cookie-based transport provider.
 *
 * Every request carries an identifying User-Agent. Credentialed requests
 * also carry a fixed cookie jar and any extra headers the caller supplies;
 * requests made with `credentials: false` carry neither. All configuration
 * is explicit; nothing is read from the environment.
 */

import type { Dispatcher } from 'undici';
import { UndiciSession } from './session.js';
import type { EndpointTemplates, TransportProvider, TransportTimeouts } from './types.js';
import { DEFAULT_TIMEOUTS, DEFAULT_USER_AGENT } from './types.js';

export interface CookieTransportOptions {
  /** Cookie name -> value */
  cookies: Record<string, string>;

  endpoints: EndpointTemplates;

  /** Default: asset-library-client/<version> */
  userAgent?: string;

  /** Additional headers merged after User-Agent and Cookie; treated as credentials */
  headers?: Record<string, string>;

  /** Default: true */
  verifySsl?: boolean;

  /** Default: 5s connect, 30s read */
  timeouts?: Partial<TransportTimeouts>;

  /** Dispatcher override passed through to the session (testing, proxies) */
  dispatcher?: Dispatcher;
}

export class CookieTransportProvider implements TransportProvider {
  private readonly cookies: Record<string, string>;
  private readonly endpoints: EndpointTemplates;
  private readonly userAgent: string;
  private readonly headers: Record<string, string>;
  private readonly verifySsl: boolean;
  private readonly timeouts: TransportTimeouts;
  private readonly dispatcher?: Dispatcher;

  constructor(options: CookieTransportOptions) {
    this.cookies = { ...options.cookies };
    this.endpoints = { ...options.endpoints };
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.headers = { ...(options.headers ?? {}) };
    this.verifySsl = options.verifySsl ?? true;
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...options.timeouts };
    this.dispatcher = options.dispatcher;
  }

  getSession(): UndiciSession {
    const credentialHeaders: Record<string, string> = {};

    const cookieHeader = serializeCookies(this.cookies);
    if (cookieHeader) {
      credentialHeaders['Cookie'] = cookieHeader;
    }

    return new UndiciSession({
      headers: { 'User-Agent': this.userAgent },
      credentialHeaders: { ...credentialHeaders, ...this.headers },
      verifySsl: this.verifySsl,
      timeouts: this.timeouts,
      dispatcher: this.dispatcher,
    });
  }

  getEndpoints(): EndpointTemplates {
    return { ...this.endpoints };
  }
}

/**
 * Serialize a cookie map into a `Cookie` header value.
 */
export function serializeCookies(cookies: Record<string, string>): string {
  return Object.entries(cookies)
    .filter(([name]) => name.length > 0)
    .map(([name, value]) => `${name}=${value}`)
    .join('; ');
}
