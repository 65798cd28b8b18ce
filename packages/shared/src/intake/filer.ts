/**
 * Filer
 *
 * Moves a file out of intake into the finished or error bucket. The source
 * is only removed once the file is in place at its destination, and an
 * existing destination is never overwritten.
 */

import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../logger';
import { FilingError, errorCode, errorMessage } from '../errors';
import { retry } from '../retry';
import type { PoToken } from '../types';

const MAX_NAME_ATTEMPTS = 5;

/** Filing is attempted once more before the file is left in intake */
const FILING_ATTEMPTS = 2;

/**
 * Put `source` at `destination`, failing with EEXIST when it is taken
 */
export type PlaceFn = (source: string, destination: string) => Promise<void>;

/** Errors on which hard-linking is unavailable and a copy is used instead */
const COPY_FALLBACK_CODES = new Set(['EXDEV', 'EPERM', 'ENOTSUP', 'EOPNOTSUPP']);

/**
 * Six lowercase hex characters. Only there to keep repeated PO numbers apart.
 */
export function randomSuffix(): string {
  return uuidv4().replace(/-/g, '').slice(0, 6);
}

/**
 * Create a directory and its parents. A directory that already exists,
 * including one created concurrently, is success.
 */
export async function ensureDirectory(directory: string): Promise<void> {
  const created = await fs.promises.mkdir(directory, { recursive: true });
  if (created) {
    logger.info('Created directory', { directory });
  }
}

/**
 * Hard-link into place, then drop the intake name. Unlike rename, link never
 * replaces an existing destination.
 */
export async function linkIntoPlace(source: string, destination: string): Promise<void> {
  await fs.promises.link(source, destination);

  try {
    await fs.promises.unlink(source);
  } catch (error) {
    await fs.promises.rm(destination, { force: true });
    throw error;
  }
}

async function copyAcrossDevices(source: string, destination: string): Promise<void> {
  try {
    await fs.promises.copyFile(source, destination, fs.constants.COPYFILE_EXCL);

    const [sourceStats, destinationStats] = await Promise.all([
      fs.promises.stat(source),
      fs.promises.stat(destination),
    ]);
    if (sourceStats.size !== destinationStats.size) {
      throw new Error(
        `Copied size ${destinationStats.size} does not match source size ${sourceStats.size}`
      );
    }

    await fs.promises.unlink(source);
  } catch (error) {
    // EEXIST means the destination belongs to someone else
    if (errorCode(error) !== 'EEXIST') {
      await fs.promises.rm(destination, { force: true });
    }
    throw error;
  }
}

/**
 * Link within a volume; copy, verify, then delete across volumes or where
 * the filesystem has no hard links. Rejects with EEXIST on a taken name.
 */
export async function moveFile(
  source: string,
  destination: string,
  place: PlaceFn = linkIntoPlace
): Promise<void> {
  try {
    await place(source, destination);
  } catch (error) {
    const code = errorCode(error);
    if (code === undefined || !COPY_FALLBACK_CODES.has(code)) throw error;

    logger.debug('Hard link unavailable, copying instead', { source, destination, code });
    await copyAcrossDevices(source, destination);
  }
}

export interface FilerOptions {
  finishedDirectory: string;
  errorDirectory: string;
  /** Delay before the single retry of a failed move */
  retryDelayMs: number;
  suffix?: () => string;
  place?: PlaceFn;
}

export class Filer {
  private readonly suffix: () => string;
  private readonly place: PlaceFn;

  constructor(private readonly options: FilerOptions) {
    this.suffix = options.suffix ?? randomSuffix;
    this.place = options.place ?? linkIntoPlace;
  }

  /**
   * Move into the finished bucket as `{token}_{suffix}{ext}`.
   *
   * @returns The destination path
   * @throws FilingError when the move failed twice
   */
  async fileClassified(sourcePath: string, token: PoToken): Promise<string> {
    const extension = path.extname(sourcePath);

    return this.moveWithRetry(
      sourcePath,
      this.options.finishedDirectory,
      () => `${token}_${this.suffix()}${extension}`
    );
  }

  /**
   * Move into the error bucket under the original name, or
   * `{stem}_{suffix}{ext}` when that name is taken.
   *
   * @returns The destination path
   * @throws FilingError when the move failed twice
   */
  async fileUnclassified(sourcePath: string): Promise<string> {
    const basename = path.basename(sourcePath);
    const extension = path.extname(basename);
    const stem = path.basename(basename, extension);

    return this.moveWithRetry(sourcePath, this.options.errorDirectory, (attempt) =>
      attempt === 0 ? basename : `${stem}_${this.suffix()}${extension}`
    );
  }

  private async moveWithRetry(
    sourcePath: string,
    directory: string,
    nameFor: (attempt: number) => string
  ): Promise<string> {
    const result = await retry({
      attempts: FILING_ATTEMPTS,
      delayMs: this.options.retryDelayMs,
      probe: () => this.moveInto(sourcePath, directory, nameFor),
      onRetry: (attempt, error) => {
        logger.warn('Filing failed, retrying once', {
          attempt,
          destinationDirectory: directory,
          reason: errorMessage(error),
        });
      },
    });

    if (!result.ok) {
      throw new FilingError(sourcePath, directory, { cause: result.error });
    }
    return result.value;
  }

  private async moveInto(
    sourcePath: string,
    directory: string,
    nameFor: (attempt: number) => string
  ): Promise<string> {
    await ensureDirectory(directory);

    for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
      const destination = path.join(directory, nameFor(attempt));

      try {
        await moveFile(sourcePath, destination, this.place);
        return destination;
      } catch (error) {
        if (errorCode(error) !== 'EEXIST') throw error;
        logger.debug('Destination name taken', { destination });
      }
    }

    throw new Error(`No free destination name in ${directory} after ${MAX_NAME_ATTEMPTS} attempts`);
  }
}
