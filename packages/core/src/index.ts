export {
  StorageError,
  NotFoundError,
  CorruptRecordError,
  ParentNotFoundError,
  ManagerClosedError,
  WorkerStateError,
  errorMessage,
} from './errors.js';
export { ConsoleLogger, createLogger, silentLogger, isLogLevel, LOG_LEVELS } from './logger.js';
export { TypedEvents } from './events.js';

export { VersionStore } from './versions/version-store.js';
export { KeyedLock } from './versions/keyed-lock.js';
export { PROVENANCES, ARTIFACT_KINDS, isProvenance } from './versions/types.js';

export { Workspace, sourceStem } from './render/workspace.js';
export { locateArtifact, expectedArtifactPath } from './render/artifact-locator.js';
export { detectEntryPoint, findSceneClasses, DEFAULT_ENTRY_POINT } from './render/entry-point.js';
export { parseRenderError, stripAnsi } from './render/error-parser.js';
export { truncateOutput, stderrTail, parseProgress, type TruncateOptions } from './render/output.js';
export {
  QUALITY_PRESETS,
  QUALITY_SETTINGS,
  OUTPUT_FORMATS,
  DEFAULT_RENDERER,
  DEFAULT_TIMEOUT_SECONDS,
  MAX_TIMEOUT_SECONDS,
  RenderConfigSchema,
  resolveRenderConfig,
  resolveQuality,
  qualityDirectory,
  buildRendererArgs,
} from './render/render-config.js';
export { RenderWorker } from './render/render-worker.js';
export { RenderJobManager } from './render/render-job-manager.js';

export type { Logger, LogLevel, LoggerOptions } from './logger.js';
export type { Unsubscribe } from './events.js';
export type { VersionStoreOptions } from './versions/version-store.js';
export type {
  Project,
  Version,
  Provenance,
  ArtifactKind,
  CreateVersionInput,
  ProjectPatch,
  VersionStoreEvents,
} from './versions/types.js';
export type { SourceHandle } from './render/workspace.js';
export type { ParsedRenderError } from './render/error-parser.js';
export type {
  QualityPreset,
  OutputFormat,
  RenderConfig,
  RenderConfigInput,
  RendererCommand,
} from './render/render-config.js';
export type {
  RenderOutcome,
  RenderFailure,
  RenderWorkerState,
  RenderWorkerOptions,
  RenderJobSpec,
  SpawnFunction,
} from './render/render-worker.js';
export type {
  RenderRequest,
  RenderJobHandle,
  RenderJobEvents,
  RenderJobManagerOptions,
} from './render/render-job-manager.js';
