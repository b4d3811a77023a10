/**
 * undici-backed HTTP session.
 *
 * One `Agent` per session keeps connections pooled across the sequential
 * requests of a pagination walk or a download batch. The session is not
 * synchronised; share it only between operations driven from one caller.
 */

import { Agent, fetch } from 'undici';
import type { Dispatcher } from 'undici';
import type { HttpResponse, HttpSession, SessionRequestOptions, TransportTimeouts } from './types.js';

export interface UndiciSessionOptions {
  /** Headers sent with every request */
  headers: Record<string, string>;

  /** Cookie and auth headers, left off requests made with `credentials: false` */
  credentialHeaders?: Record<string, string>;

  /** Verify TLS certificates */
  verifySsl: boolean;

  timeouts: TransportTimeouts;

  /** Use this dispatcher instead of creating an Agent (e.g. undici MockAgent) */
  dispatcher?: Dispatcher;
}

export class UndiciSession implements HttpSession {
  /** Headers of a credentialed request */
  readonly defaultHeaders: Readonly<Record<string, string>>;

  /** Headers of a request made with `credentials: false` */
  readonly anonymousHeaders: Readonly<Record<string, string>>;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private closed = false;

  constructor(options: UndiciSessionOptions) {
    this.anonymousHeaders = Object.freeze({ ...options.headers });
    this.defaultHeaders = Object.freeze({ ...options.headers, ...options.credentialHeaders });

    if (options.dispatcher) {
      this.dispatcher = options.dispatcher;
      this.ownsDispatcher = false;
    } else {
      this.dispatcher = new Agent({
        connect: {
          rejectUnauthorized: options.verifySsl,
          timeout: options.timeouts.connectMs,
        },
        headersTimeout: options.timeouts.readMs,
        bodyTimeout: options.timeouts.readMs,
      });
      this.ownsDispatcher = true;
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async get(url: string, options?: SessionRequestOptions): Promise<HttpResponse> {
    if (this.closed) {
      throw new Error('Session is closed');
    }

    const target = new URL(url);
    for (const [key, value] of Object.entries(options?.params ?? {})) {
      if (value !== undefined) {
        target.searchParams.set(key, value);
      }
    }

    const headers = options?.credentials === false ? this.anonymousHeaders : this.defaultHeaders;

    return fetch(target, {
      method: 'GET',
      headers: { ...headers },
      dispatcher: this.dispatcher,
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}
