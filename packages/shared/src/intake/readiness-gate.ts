/**
 * File Readiness Gate
 *
 * A newly created file is ready once it is non-empty and can be opened for
 * append, which fails while the producing process holds it exclusively.
 * A file that is gone is not waited for.
 */

import fs from 'fs';
import { logger } from '../logger';
import {
  FileVanishedError,
  LockTimeoutError,
  errorCode,
  errorMessage,
  type GateError,
} from '../errors';
import { readinessRetriesCounter } from '../metrics';
import { retry, sleep } from '../retry';
import type { Result } from '../types';

/**
 * Resolves when the file is ready, rejects otherwise
 */
export type ReadinessProbe = (filePath: string) => Promise<void>;

export async function probeFileReady(filePath: string): Promise<void> {
  const stats = await fs.promises.stat(filePath);

  if (!stats.isFile()) {
    throw new Error(`Not a regular file: ${filePath}`);
  }
  if (stats.size === 0) {
    throw new Error(`File is still empty: ${filePath}`);
  }

  const handle = await fs.promises.open(filePath, 'a');
  await handle.close();
}

export interface FileReadinessGateOptions {
  /** Pause before the first probe */
  settleDelayMs: number;
  attempts: number;
  backoffMs: number;
  probe?: ReadinessProbe;
}

export class FileReadinessGate {
  private readonly probe: ReadinessProbe;

  constructor(private readonly options: FileReadinessGateOptions) {
    this.probe = options.probe ?? probeFileReady;
  }

  async waitUntilReady(filePath: string): Promise<Result<void, GateError>> {
    const { settleDelayMs, attempts, backoffMs } = this.options;

    await sleep(settleDelayMs);

    const result = await retry({
      attempts,
      delayMs: backoffMs,
      probe: () => this.probe(filePath),
      shouldRetry: (error) => errorCode(error) !== 'ENOENT',
      onRetry: (attempt, error) => {
        readinessRetriesCounter.inc();
        logger.info('Waiting for file access', {
          attempt,
          maxAttempts: attempts,
          reason: errorMessage(error),
        });
      },
    });

    if (!result.ok && errorCode(result.error) === 'ENOENT') {
      return { ok: false, error: new FileVanishedError(filePath, { cause: result.error }) };
    }
    if (!result.ok) {
      return {
        ok: false,
        error: new LockTimeoutError(filePath, result.attempts, { cause: result.error }),
      };
    }

    logger.debug('File ready', { attempts: result.attempts });
    return { ok: true, value: undefined };
  }
}
