/**
 * Text Extractor
 *
 * Decodes the image with a bounded retry, then runs the OCR engine once.
 * Decode failures and engine failures are returned, never thrown.
 */

import { logger } from '../logger';
import {
  OcrEngineError,
  UnreadableImageError,
  errorMessage,
  type ExtractError,
} from '../errors';
import { decodeRetriesCounter } from '../metrics';
import { decodeImage, type ImageDecoder } from '../ocr/image';
import type { OcrEngine } from '../ocr/tesseract';
import { retry } from '../retry';
import type { Result } from '../types';

export interface TextExtractorOptions {
  engine: OcrEngine;
  decodeAttempts: number;
  decodeDelayMs: number;
  decoder?: ImageDecoder;
}

export class TextExtractor {
  private readonly engine: OcrEngine;
  private readonly decoder: ImageDecoder;

  constructor(private readonly options: TextExtractorOptions) {
    this.engine = options.engine;
    this.decoder = options.decoder ?? decodeImage;
  }

  async extract(filePath: string): Promise<Result<string, ExtractError>> {
    const { decodeAttempts, decodeDelayMs } = this.options;

    const decoded = await retry({
      attempts: decodeAttempts,
      delayMs: decodeDelayMs,
      probe: () => this.decoder(filePath),
      onRetry: (attempt, error) => {
        decodeRetriesCounter.inc();
        logger.info(`Image is locked or unreadable. Retrying (${attempt}/${decodeAttempts})`, {
          reason: errorMessage(error),
        });
      },
    });

    if (!decoded.ok) {
      logger.error('Max decode retries reached', decoded.error, { attempts: decoded.attempts });
      return {
        ok: false,
        error: new UnreadableImageError(filePath, decoded.attempts, { cause: decoded.error }),
      };
    }

    logger.debug('Image decoded', { ...decoded.value, attempts: decoded.attempts });

    try {
      const text = await this.engine.recognize(filePath);
      logger.debug('OCR raw output', { text });
      return { ok: true, value: text };
    } catch (error) {
      return {
        ok: false,
        error:
          error instanceof OcrEngineError
            ? error
            : new OcrEngineError(`OCR engine failed: ${errorMessage(error)}`, { cause: error }),
      };
    }
  }
}
