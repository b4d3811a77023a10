/**
 * DownloadOrchestrator - drives manifest retrieval for one or many assets.
 *
 * Per asset: resolve the manifest URL, fetch the bytes, write them to a
 * path-safe destination. A failure in any phase ends that asset with a
 * failure outcome and the batch moves on; nothing is retried here.
 *
 * Batches run strictly sequentially and the outcome list is positionally
 * aligned with the input list. Manifest URLs outside the API's own origins
 * are fetched without session credentials.
 */

import type { Logger } from 'pino';
import { describeError, ValidationError } from '../errors.js';
import type { ApiRequester } from '../http/api-requester.js';
import type { Asset } from '../library/types.js';
import type { ManifestCodec } from '../manifest/types.js';
import type { AssetResolver } from '../resolver/asset-resolver.js';
import type { ResolvedManifest } from '../resolver/types.js';
import { manifestFilename, resolveInside, safeCreateDirectory, writeFileAtomic } from './file-utils.js';
import { ManifestDownloadFailure, ManifestDownloadSuccess } from './outcome.js';
import type { DownloadOutcome } from './outcome.js';
import type {
  DownloadOrchestratorOptions,
  DownloadState,
  FailurePhase,
  ProgressObserver,
} from './types.js';

export class DownloadOrchestrator {
  private readonly resolver: AssetResolver;
  private readonly requester: ApiRequester;
  private readonly codec: ManifestCodec;
  private readonly options: DownloadOrchestratorOptions;
  private readonly logger: Logger;

  /** Written file path -> owning asset uid, for this orchestrator's lifetime */
  private readonly writtenBy = new Map<string, string>();

  constructor(
    resolver: AssetResolver,
    requester: ApiRequester,
    codec: ManifestCodec,
    options: DownloadOrchestratorOptions,
    logger: Logger,
  ) {
    this.resolver = resolver;
    this.requester = requester;
    this.codec = codec;
    this.options = options;
    this.logger = logger.child({ component: 'download-orchestrator' });
  }

  /**
   * Download the manifest of a single asset into `outputDir`.
   *
   * Per-asset errors become a failure outcome. Errors thrown by `observer`
   * propagate to the caller.
   */
  async downloadManifest(
    asset: Asset,
    outputDir: string,
    observer?: ProgressObserver,
  ): Promise<DownloadOutcome> {
    this.transition(asset, 'resolving');
    observer?.(asset, 'resolving');

    let location: ResolvedManifest;
    try {
      location = await this.resolver.resolve(asset.uid);
    } catch (err) {
      return this.fail(asset, 'resolution', err, observer);
    }

    this.transition(asset, 'fetching');
    observer?.(asset, 'downloading');

    let bytes: Uint8Array;
    try {
      bytes = await this.requester.getBytes('manifest', location.url, {
        credentials: this.sendsCredentials(location.url),
      });
    } catch (err) {
      return this.fail(asset, 'fetch', err, observer);
    }

    this.transition(asset, 'writing');

    let filePath: string;
    try {
      filePath = await this.write(asset, outputDir, bytes);
    } catch (err) {
      return this.fail(asset, 'write', err, observer);
    }

    this.transition(asset, 'succeeded');
    this.logger.info(
      { assetUid: asset.uid, filePath, size: bytes.byteLength },
      'Manifest downloaded',
    );

    const outcome = new ManifestDownloadSuccess(asset.uid, filePath, bytes.byteLength, this.codec);
    observer?.(asset, 'completed');
    return outcome;
  }

  /**
   * Download manifests for `assets` in input order. The result has exactly
   * one outcome per input asset, at the same index.
   */
  async downloadManifests(
    assets: readonly Asset[],
    outputDir: string,
    observer?: ProgressObserver,
  ): Promise<DownloadOutcome[]> {
    const outcomes: DownloadOutcome[] = [];

    for (const asset of assets) {
      outcomes.push(await this.downloadManifest(asset, outputDir, observer));
    }

    const succeeded = outcomes.filter((outcome) => outcome.success).length;
    this.logger.info(
      { requested: assets.length, succeeded, failed: assets.length - succeeded },
      'Manifest batch complete',
    );

    return outcomes;
  }

  private async write(asset: Asset, outputDir: string, bytes: Uint8Array): Promise<string> {
    const limit = this.options.maxManifestBytes;
    if (limit !== undefined && bytes.byteLength > limit) {
      throw new ValidationError(
        `manifest is ${bytes.byteLength} bytes, over the ${limit} byte limit`,
      );
    }

    const dir = await safeCreateDirectory(outputDir, this.options.outputRoot);
    let filePath = resolveInside(dir, manifestFilename(asset.title, asset.uid));

    // Same sanitized title as an asset written earlier: keep both files
    const owner = this.writtenBy.get(filePath);
    if (owner !== undefined && owner !== asset.uid) {
      filePath = resolveInside(dir, manifestFilename(asset.title, asset.uid, true));
    }

    await writeFileAtomic(filePath, bytes);
    this.writtenBy.set(filePath, asset.uid);
    return filePath;
  }

  private sendsCredentials(url: string): boolean {
    const origins = this.options.credentialOrigins;
    return origins !== undefined && origins.has(new URL(url).origin);
  }

  private fail(
    asset: Asset,
    phase: FailurePhase,
    err: unknown,
    observer?: ProgressObserver,
  ): DownloadOutcome {
    const reason = `${phase}: ${describeError(err)}`;

    this.transition(asset, 'failed');
    this.logger.warn({ assetUid: asset.uid, phase, reason }, 'Manifest download failed');

    const outcome = new ManifestDownloadFailure(asset.uid, reason);
    observer?.(asset, 'failed');
    return outcome;
  }

  private transition(asset: Asset, state: DownloadState): void {
    this.logger.debug({ assetUid: asset.uid, state }, 'Download state changed');
  }
}
