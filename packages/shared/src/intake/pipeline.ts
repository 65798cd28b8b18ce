/**
 * Classification Pipeline
 *
 * Runs one intake file through gate -> extractor -> parser -> filer.
 * Every per-file failure ends here as a logged ProcessingResult.
 */

import path from 'path';
import { logger } from '../logger';
import { createFileContext, runWithContextAsync } from '../context';
import { FilingError } from '../errors';
import { filesProcessedCounter, fileProcessingDurationHistogram } from '../metrics';
import type {
  ErrorBucketReason,
  IntakeEvent,
  ProcessingResult,
} from '../types';
import type { Filer } from './filer';
import { classifyText } from './po-token';
import type { FileReadinessGate } from './readiness-gate';
import type { TextExtractor } from './text-extractor';

/**
 * Consumer of file creation events
 */
export interface IntakeHandler {
  onFileCreated(event: IntakeEvent): Promise<void>;
}

type StageOutcome = Pick<ProcessingResult, 'status' | 'destination' | 'token' | 'reason'>;

export interface ClassificationPipelineOptions {
  gate: FileReadinessGate;
  extractor: TextExtractor;
  filer: Filer;
  /** Lowercase, with leading dot */
  supportedExtensions: string[];
}

export class ClassificationPipeline implements IntakeHandler {
  private readonly supportedExtensions: Set<string>;

  constructor(private readonly options: ClassificationPipelineOptions) {
    this.supportedExtensions = new Set(options.supportedExtensions);
  }

  async onFileCreated(event: IntakeEvent): Promise<void> {
    await this.process(event);
  }

  /**
   * Process a single file. Never rejects.
   */
  async process(event: IntakeEvent): Promise<ProcessingResult> {
    const context = createFileContext(event.filePath);

    return runWithContextAsync(context, async () => {
      const startTime = Date.now();

      logger.info('New file detected', { detectedAt: event.detectedAt.toISOString() });

      let outcome: StageOutcome;
      try {
        outcome = await this.classify(event.filePath);
      } catch (error) {
        if (error instanceof FilingError) {
          logger.error('Filing failed, file left in intake', error, {
            destinationDirectory: error.destinationDirectory,
          });
        } else {
          logger.error('Unexpected error while processing file, leaving it in place', error);
        }
        outcome = { status: 'failed' };
      }

      const durationMs = Date.now() - startTime;
      filesProcessedCounter.inc({ outcome: outcome.status });
      fileProcessingDurationHistogram.observe({ outcome: outcome.status }, durationMs / 1000);

      return {
        ...outcome,
        filePath: event.filePath,
        correlationId: context.correlationId,
        durationMs,
      };
    });
  }

  isSupported(filePath: string): boolean {
    return this.supportedExtensions.has(path.extname(filePath).toLowerCase());
  }

  private async classify(filePath: string): Promise<StageOutcome> {
    const { gate, extractor, filer } = this.options;

    if (!this.isSupported(filePath)) {
      logger.warn('Unsupported file format detected', { extension: path.extname(filePath) });
      return { status: 'ignored' };
    }

    // Detected -> Gated
    const ready = await gate.waitUntilReady(filePath);
    if (!ready.ok) {
      switch (ready.error.kind) {
        case 'Vanished':
          logger.warn('File disappeared before it became ready, nothing to process');
          break;
        case 'LockTimeout':
          logger.warn('File never became accessible, leaving it in intake', {
            attempts: ready.error.attempts,
          });
          break;
      }
      return { status: 'skipped' };
    }

    // Gated -> Extracted
    const extracted = await extractor.extract(filePath);
    if (!extracted.ok) {
      const reason: ErrorBucketReason =
        extracted.error.kind === 'Unreadable' ? 'unreadable' : 'engine_failure';
      logger.error('Text extraction failed, routing to error bucket', extracted.error, { reason });
      return this.fileAsError(filePath, reason);
    }

    // Extracted -> Parsed -> Filed
    const classification = classifyText(extracted.value);
    switch (classification.kind) {
      case 'classified': {
        const { token } = classification;
        logger.info('Extracted PO number', { token });

        const destination = await filer.fileClassified(filePath, token);
        logger.info('File renamed and moved to finished directory', {
          token,
          destination,
          fileName: path.basename(destination),
        });
        return { status: 'filed', destination, token };
      }
      case 'unclassified':
        logger.warn('PO number could not be extracted');
        return this.fileAsError(filePath, 'no_token');
    }
  }

  private async fileAsError(filePath: string, reason: ErrorBucketReason): Promise<StageOutcome> {
    const destination = await this.options.filer.fileUnclassified(filePath);
    logger.warn('File moved to error directory', { reason, destination });
    return { status: 'errored', destination, reason };
  }
}
