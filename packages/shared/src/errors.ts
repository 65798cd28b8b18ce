/**
 * Pipeline Error Types
 *
 * Every failure a single file can hit is one of these kinds. Only
 * StartupPrecondition is fatal to the process.
 */

export type PipelineErrorKind =
  | 'LockTimeout'
  | 'Vanished'
  | 'Unreadable'
  | 'EngineFailure'
  | 'FilesystemFailure'
  | 'StartupPrecondition';

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The file never became non-empty and openable for append
 */
export class LockTimeoutError extends PipelineError {
  readonly kind = 'LockTimeout' as const;

  constructor(
    readonly filePath: string,
    readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(`File not ready after ${attempts} attempts: ${filePath}`, options);
  }
}

/**
 * The file was removed from intake before it became ready
 */
export class FileVanishedError extends PipelineError {
  readonly kind = 'Vanished' as const;

  constructor(
    readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(`File disappeared before it became ready: ${filePath}`, options);
  }
}

export type GateError = LockTimeoutError | FileVanishedError;

/**
 * The image could not be opened and decoded within the retry bound
 */
export class UnreadableImageError extends PipelineError {
  readonly kind = 'Unreadable' as const;

  constructor(
    readonly filePath: string,
    readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(`Image unreadable after ${attempts} attempts: ${filePath}`, options);
  }
}

export class OcrEngineError extends PipelineError {
  readonly kind = 'EngineFailure' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Move or mkdir failed for a reason other than "already exists"
 */
export class FilingError extends PipelineError {
  readonly kind = 'FilesystemFailure' as const;

  constructor(
    readonly sourcePath: string,
    readonly destinationDirectory: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to move ${sourcePath} into ${destinationDirectory}`, options);
  }
}

export class StartupPreconditionError extends PipelineError {
  readonly kind = 'StartupPrecondition' as const;
}

export type ExtractError = UnreadableImageError | OcrEngineError;

/**
 * Errors thrown by Node core can come from another realm (a vm context, a
 * test sandbox), where `instanceof Error` is false. Check the shape instead.
 */
function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

/**
 * Read the errno code from a filesystem error, if it carries one
 */
export function errorCode(error: unknown): string | undefined {
  if (isObject(error) && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  if (isObject(error) && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Captured standard error of a failed child process, trimmed
 */
export function errorStderr(error: unknown): string {
  if (isObject(error) && 'stderr' in error && error.stderr != null) {
    return String(error.stderr).trim();
  }
  return '';
}
