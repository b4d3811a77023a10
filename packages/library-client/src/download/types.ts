/**
 * Types for the manifest download pipeline.
 */

import type { Asset } from '../library/types.js';

/** Per-asset pipeline states */
export type DownloadState =
  | 'pending'
  | 'resolving'
  | 'fetching'
  | 'writing'
  | 'succeeded'
  | 'failed';

/** Pipeline phase a failure is attributed to; prefixes the failure reason */
export type FailurePhase = 'resolution' | 'fetch' | 'write';

/** Transitions reported to a progress observer */
export type ProgressStage = 'resolving' | 'downloading' | 'completed' | 'failed';

/**
 * Called synchronously at each major transition. Exceptions thrown by the
 * observer are not caught and end the batch.
 */
export type ProgressObserver = (asset: Asset, stage: ProgressStage) => void;

export interface DownloadOrchestratorOptions {
  /** Output directories must resolve inside this root when set */
  outputRoot?: string;

  /** Reject manifests larger than this many bytes when set */
  maxManifestBytes?: number;

  /**
   * Origins that may receive session credentials on the manifest fetch.
   * Manifests hosted anywhere else are fetched anonymously.
   */
  credentialOrigins?: ReadonlySet<string>;
}
