/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables. The three
 * working directories are derived from a single root by fixed naming.
 */

import path from 'path';
import { StartupPreconditionError } from './errors';

export type ErrorBucketLayout = 'nested' | 'sibling';

export const INTAKE_DIRECTORY_NAME = 'waves';
export const FINISHED_DIRECTORY_NAME = 'wavesfinished';
export const NESTED_ERROR_DIRECTORY_NAME = 'UncapturedPO';
export const SIBLING_ERROR_DIRECTORY_NAME = 'waveserrors';

/**
 * Every format here must be decodable by sharp; it has no BMP reader
 */
export const DEFAULT_SUPPORTED_EXTENSIONS = [
  '.png',
  '.jpg',
  '.jpeg',
  '.tif',
  '.tiff',
  '.gif',
  '.webp',
];

export interface Config {
  // Directories
  rootDirectory: string;
  intakeDirectory: string;
  finishedDirectory: string;
  errorDirectory: string;
  errorBucketLayout: ErrorBucketLayout;

  // Readiness Gate
  settleDelayMs: number;
  readinessAttempts: number;
  readinessBackoffMs: number;

  // Text Extraction
  decodeAttempts: number;
  decodeDelayMs: number;
  supportedExtensions: string[];

  // Filing
  filingRetryDelayMs: number;

  // OCR Engine
  tesseractCmd?: string;
  tessdataPath?: string;
  ocrLanguage: string;
  ocrTimeoutMs: number;

  // Metrics
  metricsPort?: number;
}

/**
 * Values that take precedence over the environment (command-line flags, tests)
 */
export type ConfigOverrides = Partial<
  Pick<
    Config,
    | 'rootDirectory'
    | 'errorBucketLayout'
    | 'settleDelayMs'
    | 'readinessAttempts'
    | 'readinessBackoffMs'
    | 'decodeAttempts'
    | 'decodeDelayMs'
    | 'supportedExtensions'
    | 'filingRetryDelayMs'
    | 'tesseractCmd'
    | 'tessdataPath'
    | 'ocrLanguage'
    | 'ocrTimeoutMs'
    | 'metricsPort'
  >
>;

export interface WorkingDirectories {
  intakeDirectory: string;
  finishedDirectory: string;
  errorDirectory: string;
}

/**
 * Derive intake, finished and error directories from the root.
 *
 * `nested` places the error bucket inside the finished bucket,
 * `sibling` places it next to it.
 */
export function deriveDirectories(
  rootDirectory: string,
  layout: ErrorBucketLayout
): WorkingDirectories {
  const finishedDirectory = path.join(rootDirectory, FINISHED_DIRECTORY_NAME);

  return {
    intakeDirectory: path.join(rootDirectory, INTAKE_DIRECTORY_NAME),
    finishedDirectory,
    errorDirectory:
      layout === 'nested'
        ? path.join(finishedDirectory, NESTED_ERROR_DIRECTORY_NAME)
        : path.join(rootDirectory, SIBLING_ERROR_DIRECTORY_NAME),
  };
}

function defaultRootDirectory(): string {
  return path.join(path.parse(process.cwd()).root, 'renamescans');
}

function parseLayout(value: string | undefined): ErrorBucketLayout {
  if (!value) return 'nested';
  if (value === 'nested' || value === 'sibling') return value;
  throw new StartupPreconditionError(
    `Invalid ERROR_BUCKET_LAYOUT '${value}', expected 'nested' or 'sibling'`
  );
}

function parseExtensions(value: string | undefined): string[] {
  if (!value) return DEFAULT_SUPPORTED_EXTENSIONS;

  return value
    .split(',')
    .map((ext) => ext.trim().toLowerCase())
    .filter((ext) => ext.length > 0)
    .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`));
}

/**
 * Build configuration from environment variables, with overrides applied last
 *
 * @throws StartupPreconditionError on an unknown error bucket layout
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): Config {
  const rootDirectory = path.resolve(
    overrides.rootDirectory || env.SCAN_ROOT_DIRECTORY || defaultRootDirectory()
  );
  const errorBucketLayout = overrides.errorBucketLayout || parseLayout(env.ERROR_BUCKET_LAYOUT);
  const metricsPort = overrides.metricsPort ?? (env.METRICS_PORT ? parseInt(env.METRICS_PORT, 10) : undefined);

  return {
    // Directories
    rootDirectory,
    ...deriveDirectories(rootDirectory, errorBucketLayout),
    errorBucketLayout,

    // Readiness Gate
    settleDelayMs: overrides.settleDelayMs ?? parseInt(env.SETTLE_DELAY_MS || '3000', 10),
    readinessAttempts: overrides.readinessAttempts ?? parseInt(env.READINESS_ATTEMPTS || '30', 10),
    readinessBackoffMs:
      overrides.readinessBackoffMs ?? parseInt(env.READINESS_BACKOFF_MS || '2000', 10),

    // Text Extraction
    decodeAttempts: overrides.decodeAttempts ?? parseInt(env.DECODE_ATTEMPTS || '5', 10),
    decodeDelayMs: overrides.decodeDelayMs ?? parseInt(env.DECODE_DELAY_MS || '1000', 10),
    supportedExtensions: overrides.supportedExtensions || parseExtensions(env.SUPPORTED_EXTENSIONS),

    // Filing
    filingRetryDelayMs:
      overrides.filingRetryDelayMs ?? parseInt(env.FILING_RETRY_DELAY_MS || '1000', 10),

    // OCR Engine
    tesseractCmd: overrides.tesseractCmd || env.TESSERACT_CMD || undefined,
    tessdataPath: overrides.tessdataPath || env.TESSDATA_PREFIX || undefined,
    ocrLanguage: overrides.ocrLanguage || env.OCR_LANGUAGE || 'eng',
    ocrTimeoutMs: overrides.ocrTimeoutMs ?? parseInt(env.OCR_TIMEOUT_MS || '60000', 10),

    // Metrics
    metricsPort,
  };
}
