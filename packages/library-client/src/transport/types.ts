/**
 * Types for the pluggable transport layer.
 *
 * A transport provider supplies an authenticated HTTP session and the
 * endpoint URL templates of the remote library service. Swapping the
 * provider swaps the authentication scheme; nothing else in the client
 * knows how requests are authenticated.
 */

/** Endpoint URL templates for the three remote operations */
export interface EndpointTemplates {
  /** Base URL used to resolve relative templates */
  baseUrl?: string;

  /** Library search endpoint (absolute or base-relative) */
  librarySearch: string;

  /** Asset formats endpoint, contains `{asset_uid}` */
  assetFormats: string;

  /** Download info endpoint, contains `{asset_uid}` and `{file_uid}` */
  downloadInfo: string;
}

/** Query parameters appended to a request URL */
export type QueryParams = Record<string, string | undefined>;

export interface SessionRequestOptions {
  params?: QueryParams;

  /** Send cookies and caller-supplied headers (default: true) */
  credentials?: boolean;
}

/**
 * The slice of a fetch `Response` the client reads.
 * undici's `Response` satisfies it, and so do hand-built test doubles.
 */
export interface HttpResponse {
  readonly status: number;
  readonly ok: boolean;
  readonly headers: { get(name: string): string | null };
  /** Unread body stream; cancelled when the client discards a response */
  readonly body?: { cancel(): Promise<void> } | null;
  json(): Promise<unknown>;
  arrayBuffer(): Promise<ArrayBuffer>;
}

/** A reusable, connection-pooled HTTP session */
export interface HttpSession {
  get(url: string, options?: SessionRequestOptions): Promise<HttpResponse>;
  close(): Promise<void>;
}

/** Supplier of an authenticated session and endpoint templates */
export interface TransportProvider {
  getSession(): HttpSession;
  getEndpoints(): EndpointTemplates;
}

/** Connect and read timeouts, in milliseconds */
export interface TransportTimeouts {
  connectMs: number;
  readMs: number;
}

export const DEFAULT_TIMEOUTS: TransportTimeouts = {
  connectMs: 5_000,
  readMs: 30_000,
};

export const DEFAULT_USER_AGENT = 'asset-library-client/0.1.0';
