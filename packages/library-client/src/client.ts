/**
 * Library API client.
 *
 * Ties a transport provider to the pagination walker, asset resolver and
 * download orchestrator, all sharing one session and one request pacer.
 *
 * @example
 * ```ts
 * const transport = new CookieTransportProvider({
 *   cookies: { session: '...' },
 *   endpoints: {
 *     baseUrl: 'https://marketplace.example.com',
 *     librarySearch: '/library/search',
 *     assetFormats: '/library/{asset_uid}/formats',
 *     downloadInfo: '/library/{asset_uid}/files/{file_uid}/download-info',
 *   },
 * });
 * const client = new LibraryClient({ transport, logger: pino() });
 *
 * const library = await client.getLibrary();
 * const outcomes = await client.downloadManifests(library.assets.slice(0, 5), './manifests');
 * for (const outcome of outcomes) {
 *   if (outcome.success) {
 *     const manifest = await outcome.load();
 *     console.log(manifest.appName, manifest.files.length);
 *   }
 * }
 * await client.close();
 * ```
 *
 * @module client
 */

import { pino } from 'pino';
import type { Logger } from 'pino';
import { buildClientConfig, validateClientConfig } from './config.js';
import type { ClientConfig } from './config.js';
import { ConfigurationError, NotFoundError } from './errors.js';
import { DownloadOrchestrator } from './download/orchestrator.js';
import type { DownloadOutcome } from './download/outcome.js';
import type { ProgressObserver } from './download/types.js';
import { ApiRequester } from './http/api-requester.js';
import { RequestPacer } from './http/pacer.js';
import { CursorWalker } from './library/cursor-walker.js';
import type { Library } from './library/library.js';
import type { Asset, LibraryPage } from './library/types.js';
import { JsonManifestCodec } from './manifest/codec.js';
import type { ManifestCodec } from './manifest/types.js';
import { AssetResolver } from './resolver/asset-resolver.js';
import type { AssetFormatEntry, ResolvedManifest } from './resolver/types.js';
import { endpointOrigins, validateEndpoints } from './transport/endpoints.js';
import type { HttpSession, TransportProvider } from './transport/types.js';

export interface LibraryClientOptions {
  transport: TransportProvider;

  /** Default: JsonManifestCodec, validating when `config.validateManifests` is set */
  manifestCodec?: ManifestCodec;

  config?: Partial<ClientConfig>;

  /** Default: a silent pino logger */
  logger?: Logger;

  /** Replace the fixed-delay pacer built from `config.requestDelayMs` */
  pacer?: RequestPacer;
}

export class LibraryClient {
  private readonly config: ClientConfig;
  private readonly logger: Logger;
  private readonly session: HttpSession;
  private readonly walker: CursorWalker;
  private readonly resolver: AssetResolver;
  private readonly orchestrator: DownloadOrchestrator;
  private closed = false;

  constructor(options: LibraryClientOptions) {
    const config = buildClientConfig(options.config);
    const errors = validateClientConfig(config);
    if (errors.length > 0) {
      throw new ConfigurationError(`Invalid client config: ${errors.join('; ')}`);
    }

    this.config = config;
    const logger = options.logger ?? pino({ level: 'silent' });
    this.logger = logger.child({ component: 'library-client' });

    this.session = options.transport.getSession();
    const endpoints = options.transport.getEndpoints();

    const endpointProblems = validateEndpoints(endpoints);
    if (endpointProblems.length > 0) {
      this.logger.warn({ problems: endpointProblems }, 'Endpoint templates look misconfigured');
    }

    const pacer = options.pacer ?? new RequestPacer(config.requestDelayMs);
    const requester = new ApiRequester(this.session, pacer, logger);
    const codec = options.manifestCodec ?? new JsonManifestCodec({ validate: config.validateManifests });

    this.walker = new CursorWalker(requester, endpoints, { maxPages: config.maxPages }, logger);
    this.resolver = new AssetResolver(
      requester,
      endpoints,
      { formatCode: config.formatCode, platform: config.platform },
      logger,
    );
    this.orchestrator = new DownloadOrchestrator(
      this.resolver,
      requester,
      codec,
      {
        outputRoot: config.outputRoot,
        maxManifestBytes: config.maxManifestBytes,
        credentialOrigins: endpointOrigins(endpoints),
      },
      logger,
    );
  }

  /** Effective configuration */
  get configuration(): Readonly<ClientConfig> {
    return this.config;
  }

  // -------------------------------------------------------------------------
  // Library
  // -------------------------------------------------------------------------

  /**
   * Lazily yield raw library pages. Each call starts a fresh walk.
   */
  getLibraryPages(sortBy: string = this.config.defaultSortBy): AsyncGenerator<LibraryPage, void, undefined> {
    return this.walker.walk(sortBy);
  }

  /**
   * Fetch the complete library. Any request failure rejects the whole call.
   */
  getLibrary(sortBy: string = this.config.defaultSortBy): Promise<Library> {
    return this.walker.collect(sortBy);
  }

  /**
   * Find one asset by uid. The service has no single-asset endpoint, so
   * this walks the whole library.
   */
  async getAsset(assetUid: string): Promise<Asset> {
    const library = await this.getLibrary();
    const asset = library.findByUid(assetUid);
    if (!asset) {
      throw new NotFoundError(`Asset not found in library: ${assetUid}`);
    }
    return asset;
  }

  // -------------------------------------------------------------------------
  // Resolution
  // -------------------------------------------------------------------------

  listFormats(assetUid: string): Promise<AssetFormatEntry[]> {
    return this.resolver.listFormats(assetUid);
  }

  resolveManifest(assetUid: string): Promise<ResolvedManifest> {
    return this.resolver.resolve(assetUid);
  }

  // -------------------------------------------------------------------------
  // Downloads
  // -------------------------------------------------------------------------

  downloadManifest(
    asset: Asset,
    outputDir: string,
    observer?: ProgressObserver,
  ): Promise<DownloadOutcome> {
    return this.orchestrator.downloadManifest(asset, outputDir, observer);
  }

  downloadManifests(
    assets: readonly Asset[],
    outputDir: string,
    observer?: ProgressObserver,
  ): Promise<DownloadOutcome[]> {
    return this.orchestrator.downloadManifests(assets, outputDir, observer);
  }

  /**
   * Release the session's pooled connections. Safe to call twice.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.session.close();
    this.logger.debug('Client closed');
  }
}
