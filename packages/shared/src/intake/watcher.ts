/**
 * Directory Watcher
 *
 * Subscribes to one directory (non-recursive) and hands each newly created
 * regular file to an IntakeHandler, one at a time, in observation order.
 */

import fs from 'fs';
import path from 'path';
import { logger } from '../logger';
import { errorCode } from '../errors';
import type { IntakeEvent } from '../types';
import type { IntakeHandler } from './pipeline';

/**
 * The part of fs.FSWatcher the watcher relies on
 */
export interface WatchSubscription {
  close(): void;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export type WatchFn = (
  directory: string,
  listener: (eventType: string, filename: string | null) => void
) => WatchSubscription;

const defaultWatch: WatchFn = (directory, listener) =>
  fs.watch(directory, { persistent: true, recursive: false }, listener);

export interface DirectoryWatcherOptions {
  directory: string;
  handler: IntakeHandler;
  watch?: WatchFn;
}

export class DirectoryWatcher {
  private fsWatcher: WatchSubscription | null = null;
  private readonly pending = new Set<string>();
  private queue: Promise<void> = Promise.resolve();
  private stopping = false;

  constructor(private readonly options: DirectoryWatcherOptions) {}

  get isRunning(): boolean {
    return this.fsWatcher !== null;
  }

  start(): void {
    if (this.fsWatcher) return;

    const { directory } = this.options;
    const watch = this.options.watch ?? defaultWatch;

    this.stopping = false;
    this.fsWatcher = watch(directory, (eventType, filename) => {
      if (eventType === 'rename' && filename) {
        this.onNotification(path.join(directory, filename));
      }
    });
    this.fsWatcher.on('error', (error) => {
      logger.error('Directory watcher error', error, { directory });
    });

    logger.info('Monitoring directory', { directory });
  }

  /**
   * Queue a file for handling. Returns false when the path is already
   * queued or in flight, or the watcher is stopping.
   */
  enqueue(event: IntakeEvent): boolean {
    if (this.stopping || this.pending.has(event.filePath)) return false;

    this.pending.add(event.filePath);
    this.queue = this.queue.then(() => this.dispatch(event));
    return true;
  }

  /**
   * Resolves once every queued file has been handled
   */
  idle(): Promise<void> {
    return this.queue;
  }

  /**
   * Unsubscribe, let the in-flight file finish, and drop anything still queued
   */
  async stop(): Promise<void> {
    this.stopping = true;
    this.fsWatcher?.close();
    this.fsWatcher = null;

    await this.queue;
    logger.info('Stopped directory monitoring', { directory: this.options.directory });
  }

  private onNotification(filePath: string): void {
    const detectedAt = new Date();

    // rename fires for arrivals and departures alike; only arrivals still exist
    let stats: fs.Stats;
    try {
      stats = fs.statSync(filePath);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        logger.warn('Could not stat new entry', { filePath, code: errorCode(error) });
      }
      return;
    }

    if (!stats.isFile()) {
      logger.debug('Ignoring non-file entry', { filePath });
      return;
    }

    this.enqueue({ filePath, detectedAt });
  }

  private async dispatch(event: IntakeEvent): Promise<void> {
    try {
      if (this.stopping) {
        logger.info('Shutting down, leaving queued file in intake', { filePath: event.filePath });
        return;
      }
      await this.options.handler.onFileCreated(event);
    } catch (error) {
      logger.error('Handler failed, continuing to monitor', error, { filePath: event.filePath });
    } finally {
      this.pending.delete(event.filePath);
    }
  }
}
