import { vi } from 'vitest';
import type { Logger } from 'pino';
import { RequestPacer } from '../http/pacer.js';
import type { Asset } from '../library/types.js';
import type { DownloadOutcome, ManifestDownloadFailure, ManifestDownloadSuccess } from '../download/outcome.js';
import type {
  EndpointTemplates,
  HttpResponse,
  HttpSession,
  QueryParams,
  SessionRequestOptions,
  TransportProvider,
} from '../transport/types.js';

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

export function createMockLogger(): Logger {
  return {
    child: () => createMockLogger(),
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

// ---------------------------------------------------------------------------
// Endpoints
// ---------------------------------------------------------------------------

export const TEST_ENDPOINTS: EndpointTemplates = {
  baseUrl: 'https://marketplace.test',
  librarySearch: '/library/search',
  assetFormats: '/library/{asset_uid}/formats',
  downloadInfo: '/library/{asset_uid}/files/{file_uid}/download-info',
};

export const SEARCH_URL = 'https://marketplace.test/library/search';

export function formatsUrl(assetUid: string): string {
  return `https://marketplace.test/library/${assetUid}/formats`;
}

export function downloadInfoUrl(assetUid: string, fileUid: string): string {
  return `https://marketplace.test/library/${assetUid}/files/${fileUid}/download-info`;
}

export function manifestUrl(assetUid: string): string {
  return `https://cdn.test/manifests/${assetUid}.json?Signature=test-signature`;
}

// ---------------------------------------------------------------------------
// Fake HTTP session
// ---------------------------------------------------------------------------

export interface FakeRoute {
  status?: number;
  /** JSON body */
  body?: unknown;
  /** Raw text body, returned as-is (use for invalid JSON) */
  text?: string;
  /** Raw byte body */
  bytes?: Uint8Array;
  /** Throw instead of responding */
  error?: Error;
  /** Called when the client cancels the body */
  onCancel?: () => Promise<void>;
}

export type RouteHandler = FakeRoute | ((params: QueryParams) => FakeRoute);

export interface RecordedCall {
  url: string;
  params: QueryParams;
  credentials?: boolean;
}

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const copy = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(copy).set(bytes);
  return copy;
}

export function fakeResponse(route: FakeRoute): HttpResponse {
  const status = route.status ?? 200;
  const encoded =
    route.bytes ?? new TextEncoder().encode(route.text ?? JSON.stringify(route.body ?? null));

  return {
    status,
    ok: status >= 200 && status < 300,
    headers: { get: () => null },
    body: { cancel: route.onCancel ?? (() => Promise.resolve()) },
    json: async () => (route.text !== undefined ? JSON.parse(route.text) : route.body),
    arrayBuffer: async () => toArrayBuffer(encoded),
  };
}

/**
 * In-process session keyed by exact URL. Unknown URLs answer 404.
 */
export class FakeSession implements HttpSession {
  readonly calls: RecordedCall[] = [];
  closeCount = 0;
  private readonly routes = new Map<string, RouteHandler>();

  constructor(routes: Record<string, RouteHandler> = {}) {
    for (const [url, handler] of Object.entries(routes)) {
      this.routes.set(url, handler);
    }
  }

  route(url: string, handler: RouteHandler): this {
    this.routes.set(url, handler);
    return this;
  }

  async get(url: string, options?: SessionRequestOptions): Promise<HttpResponse> {
    const params: QueryParams = { ...(options?.params ?? {}) };
    this.calls.push({ url, params, credentials: options?.credentials });

    const handler = this.routes.get(url);
    const route: FakeRoute =
      handler === undefined ? { status: 404 } : typeof handler === 'function' ? handler(params) : handler;

    if (route.error) {
      throw route.error;
    }
    return fakeResponse(route);
  }

  async close(): Promise<void> {
    this.closeCount++;
  }

  urls(): string[] {
    return this.calls.map((call) => call.url);
  }
}

export class FakeTransport implements TransportProvider {
  readonly session: FakeSession;
  private readonly endpoints: EndpointTemplates;

  constructor(session: FakeSession, endpoints: EndpointTemplates = TEST_ENDPOINTS) {
    this.session = session;
    this.endpoints = endpoints;
  }

  getSession(): FakeSession {
    return this.session;
  }

  getEndpoints(): EndpointTemplates {
    return { ...this.endpoints };
  }
}

// ---------------------------------------------------------------------------
// Marketplace fixtures
// ---------------------------------------------------------------------------

/**
 * Register formats, download info and manifest routes for one asset.
 */
export function addDownloadableAsset(
  session: FakeSession,
  assetUid: string,
  manifest: Uint8Array = manifestBytes(),
): void {
  const fileUid = `${assetUid}-file`;
  session.route(formatsUrl(assetUid), {
    body: [{ type: 'unreal-engine', files: [{ uid: fileUid }] }],
  });
  session.route(downloadInfoUrl(assetUid, fileUid), {
    body: { downloadInfo: [{ type: 'manifest', downloadUrl: manifestUrl(assetUid) }] },
  });
  session.route(manifestUrl(assetUid), { bytes: manifest });
}

export function makeAsset(uid: string, title = ''): Asset {
  return {
    uid,
    title,
    status: 'ACTIVE',
    grantedLicenses: [],
    raw: { uid, title },
  };
}

export function manifestDocument(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    ManifestFileVersion: '000000000021',
    AppID: '1',
    AppNameString: 'RockPack',
    BuildVersionString: '1.0.0-test',
    FileManifestList: [
      {
        Filename: 'Content/Rock.uasset',
        FileHash: '0a1b2c',
        FileChunkParts: [{ Guid: 'chunk-1', Offset: 0, Size: 10 }],
      },
    ],
    ...overrides,
  };
}

export function manifestBytes(overrides: Record<string, unknown> = {}): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(manifestDocument(overrides)));
}

// ---------------------------------------------------------------------------
// Pacing and outcomes
// ---------------------------------------------------------------------------

/** Records requested sleeps instead of waiting */
export class CountingPacer extends RequestPacer {
  readonly sleeps: number[] = [];

  protected override sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    return Promise.resolve();
  }
}

export function expectSuccess(outcome: DownloadOutcome | undefined): ManifestDownloadSuccess {
  if (!outcome || !outcome.success) {
    throw new Error(`expected a successful outcome, got: ${outcome ? outcome.error : 'nothing'}`);
  }
  return outcome;
}

export function expectFailure(outcome: DownloadOutcome | undefined): ManifestDownloadFailure {
  if (!outcome || outcome.success) {
    throw new Error('expected a failed outcome');
  }
  return outcome;
}
