/**
 * Shared TypeScript Types
 *
 * Types for the scan intake pipeline.
 */

// ============================================================================
// Results
// ============================================================================

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

// ============================================================================
// Intake
// ============================================================================

/**
 * A file creation observed in the intake directory. Consumed once.
 */
export interface IntakeEvent {
  filePath: string;
  detectedAt: Date;
}

/**
 * A Purchase Order identifier such as `PO904821` or `APO1023`
 */
export type PoToken = string;

export type ClassificationOutcome =
  | { kind: 'classified'; token: PoToken }
  | { kind: 'unclassified' };

// ============================================================================
// Processing Results
// ============================================================================

/**
 * - filed: token found, moved to the finished bucket
 * - errored: moved to the error bucket (no token, or unreadable)
 * - skipped: never became ready, left in intake
 * - ignored: unsupported extension, left in intake
 * - failed: filing failed, left in intake
 */
export type ProcessingStatus = 'filed' | 'errored' | 'skipped' | 'ignored' | 'failed';

export type ErrorBucketReason = 'no_token' | 'unreadable' | 'engine_failure';

export interface ProcessingResult {
  status: ProcessingStatus;
  filePath: string;
  correlationId: string;
  durationMs: number;
  destination?: string;
  token?: PoToken;
  reason?: ErrorBucketReason;
}
