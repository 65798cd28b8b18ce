/**
 * AsyncLocalStorage Context Management
 *
 * Carries a correlation ID and the intake file path across every stage
 * that handles a single scanned file.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface FileContext {
  correlationId: string;
  filePath?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<FileContext>();

/**
 * Get the current file context
 */
export function getContext(): FileContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Get the correlation ID from the current context, or generate a new one
 */
export function getCorrelationId(): string {
  const context = getContext();
  return context?.correlationId || ulid();
}

/**
 * Create a fresh context for a newly detected file
 */
export function createFileContext(filePath: string): FileContext {
  return { correlationId: ulid(), filePath };
}

/**
 * Run an async function within a new AsyncLocalStorage context
 */
export async function runWithContextAsync<T>(
  context: FileContext,
  fn: () => Promise<T>
): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}
