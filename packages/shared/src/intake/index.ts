/**
 * Intake Pipeline Assembly
 */

import type { Config } from '../config';
import type { OcrEngine } from '../ocr/tesseract';
import type { ImageDecoder } from '../ocr/image';
import { Filer, ensureDirectory } from './filer';
import { ClassificationPipeline } from './pipeline';
import { FileReadinessGate, type ReadinessProbe } from './readiness-gate';
import { TextExtractor } from './text-extractor';

export interface PipelineDependencies {
  engine: OcrEngine;
  decoder?: ImageDecoder;
  probe?: ReadinessProbe;
}

type PipelineConfig = Pick<
  Config,
  | 'finishedDirectory'
  | 'errorDirectory'
  | 'settleDelayMs'
  | 'readinessAttempts'
  | 'readinessBackoffMs'
  | 'decodeAttempts'
  | 'decodeDelayMs'
  | 'filingRetryDelayMs'
  | 'supportedExtensions'
>;

/**
 * Wire gate, extractor and filer from configuration
 */
export function createPipeline(
  config: PipelineConfig,
  dependencies: PipelineDependencies
): ClassificationPipeline {
  return new ClassificationPipeline({
    gate: new FileReadinessGate({
      settleDelayMs: config.settleDelayMs,
      attempts: config.readinessAttempts,
      backoffMs: config.readinessBackoffMs,
      probe: dependencies.probe,
    }),
    extractor: new TextExtractor({
      engine: dependencies.engine,
      decoder: dependencies.decoder,
      decodeAttempts: config.decodeAttempts,
      decodeDelayMs: config.decodeDelayMs,
    }),
    filer: new Filer({
      finishedDirectory: config.finishedDirectory,
      errorDirectory: config.errorDirectory,
      retryDelayMs: config.filingRetryDelayMs,
    }),
    supportedExtensions: config.supportedExtensions,
  });
}

/**
 * Create root, intake, finished and error directories
 */
export async function ensureWorkingDirectories(
  config: Pick<Config, 'rootDirectory' | 'intakeDirectory' | 'finishedDirectory' | 'errorDirectory'>
): Promise<void> {
  for (const directory of [
    config.rootDirectory,
    config.intakeDirectory,
    config.finishedDirectory,
    config.errorDirectory,
  ]) {
    await ensureDirectory(directory);
  }
}

export { ClassificationPipeline, type IntakeHandler } from './pipeline';
export { DirectoryWatcher, type WatchFn, type WatchSubscription } from './watcher';
export {
  Filer,
  moveFile,
  linkIntoPlace,
  randomSuffix,
  ensureDirectory,
  type PlaceFn,
} from './filer';
export { FileReadinessGate, probeFileReady, type ReadinessProbe } from './readiness-gate';
export { TextExtractor } from './text-extractor';
export { parsePoToken, classifyText, PO_TOKEN_PATTERN } from './po-token';
