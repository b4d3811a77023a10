export { DownloadOrchestrator } from './orchestrator.js';
export { ManifestDownloadSuccess, ManifestDownloadFailure } from './outcome.js';
export type { DownloadOutcome } from './outcome.js';
export {
  sanitizeFilename,
  truncateUtf8,
  manifestFilename,
  MAX_FILENAME_BYTES,
  safeCreateDirectory,
  resolveInside,
  writeFileAtomic,
  isWithin,
} from './file-utils.js';
export type {
  DownloadState,
  FailurePhase,
  ProgressStage,
  ProgressObserver,
  DownloadOrchestratorOptions,
} from './types.js';
