/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  createFileContext,
  runWithContextAsync,
  type FileContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export {
  loadConfig,
  deriveDirectories,
  DEFAULT_SUPPORTED_EXTENSIONS,
  type Config,
  type ConfigOverrides,
  type ErrorBucketLayout,
  type WorkingDirectories,
} from './config';

// Types
export * from './types';

// Errors
export {
  PipelineError,
  LockTimeoutError,
  FileVanishedError,
  UnreadableImageError,
  OcrEngineError,
  FilingError,
  StartupPreconditionError,
  errorCode,
  errorMessage,
  errorStderr,
  type ExtractError,
  type GateError,
  type PipelineErrorKind,
} from './errors';

// Retry
export { retry, sleep, type RetryOptions, type RetryResult } from './retry';

// Metrics
export {
  register,
  filesProcessedCounter,
  fileProcessingDurationHistogram,
  readinessRetriesCounter,
  decodeRetriesCounter,
  ocrDurationHistogram,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export { validateConfig, type ValidationResult } from './schemas';

// OCR
export {
  TesseractEngine,
  resolveTesseract,
  type OcrEngine,
  type TesseractLocation,
  type TesseractEngineOptions,
  type ResolveTesseractOptions,
} from './ocr/tesseract';
export { decodeImage, type DecodedImage, type ImageDecoder } from './ocr/image';

// Intake pipeline
export {
  createPipeline,
  ensureWorkingDirectories,
  type PipelineDependencies,
  ClassificationPipeline,
  type IntakeHandler,
  DirectoryWatcher,
  type WatchFn,
  type WatchSubscription,
  Filer,
  moveFile,
  linkIntoPlace,
  randomSuffix,
  ensureDirectory,
  type PlaceFn,
  FileReadinessGate,
  probeFileReady,
  type ReadinessProbe,
  TextExtractor,
  parsePoToken,
  classifyText,
  PO_TOKEN_PATTERN,
} from './intake';
