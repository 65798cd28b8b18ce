/**
 * Directory Watcher Tests
 */

import fs from 'fs';
import path from 'path';
import {
  DirectoryWatcher,
  type IntakeEvent,
  type IntakeHandler,
  type WatchFn,
} from '@poscan/shared';
import { captureLogs, makeTempDir, removeDir, sleep, waitFor } from './helpers';

class RecordingHandler implements IntakeHandler {
  readonly events: IntakeEvent[] = [];
  readonly timeline: string[] = [];

  constructor(
    private readonly delayMs: number = 0,
    private readonly failFor: Set<string> = new Set()
  ) {}

  async onFileCreated(event: IntakeEvent): Promise<void> {
    const name = path.basename(event.filePath);
    this.events.push(event);
    this.timeline.push(`start:${name}`);
    await sleep(this.delayMs);
    this.timeline.push(`end:${name}`);
    if (this.failFor.has(name)) {
      throw new Error(`cannot handle ${name}`);
    }
  }
}

function event(filePath: string): IntakeEvent {
  return { filePath, detectedAt: new Date() };
}

describe('DirectoryWatcher', () => {
  let dir: string;
  let logs: ReturnType<typeof captureLogs>;

  beforeEach(async () => {
    dir = await makeTempDir();
    logs = captureLogs();
  });

  afterEach(async () => {
    logs.restore();
    await removeDir(dir);
  });

  describe('dispatch', () => {
    it('should handle files one at a time in arrival order', async () => {
      const handler = new RecordingHandler(10);
      const watcher = new DirectoryWatcher({ directory: dir, handler });

      watcher.enqueue(event(path.join(dir, 'a.png')));
      watcher.enqueue(event(path.join(dir, 'b.png')));
      watcher.enqueue(event(path.join(dir, 'c.png')));
      await watcher.idle();

      expect(handler.timeline).toEqual([
        'start:a.png',
        'end:a.png',
        'start:b.png',
        'end:b.png',
        'start:c.png',
        'end:c.png',
      ]);
    });

    it('should keep going after a handler throws', async () => {
      const handler = new RecordingHandler(0, new Set(['bad.png']));
      const watcher = new DirectoryWatcher({ directory: dir, handler });

      watcher.enqueue(event(path.join(dir, 'bad.png')));
      watcher.enqueue(event(path.join(dir, 'good.png')));
      await watcher.idle();

      expect(handler.events.map((e) => path.basename(e.filePath))).toEqual(['bad.png', 'good.png']);

      const failure = logs.entries.find((e) => e.message === 'Handler failed, continuing to monitor');
      expect(failure?.level).toBe('ERROR');
    });

    it('should not queue a path that is already queued or in flight', async () => {
      const handler = new RecordingHandler(10);
      const watcher = new DirectoryWatcher({ directory: dir, handler });
      const filePath = path.join(dir, 'a.png');

      expect(watcher.enqueue(event(filePath))).toBe(true);
      expect(watcher.enqueue(event(filePath))).toBe(false);
      await watcher.idle();

      expect(handler.events).toHaveLength(1);
      expect(watcher.enqueue(event(filePath))).toBe(true);
      await watcher.idle();
      expect(handler.events).toHaveLength(2);
    });

    it('should finish the in-flight file and drop queued ones on stop', async () => {
      const handler = new RecordingHandler(30);
      const watcher = new DirectoryWatcher({ directory: dir, handler });

      watcher.enqueue(event(path.join(dir, 'a.png')));
      watcher.enqueue(event(path.join(dir, 'b.png')));
      await sleep(5);
      await watcher.stop();

      expect(handler.timeline).toEqual(['start:a.png', 'end:a.png']);
      expect(watcher.enqueue(event(path.join(dir, 'c.png')))).toBe(false);
    });
  });

  describe('notifications', () => {
    let emit: (eventType: string, filename: string | null) => void;
    let close: jest.Mock;
    let watch: WatchFn;

    beforeEach(() => {
      emit = () => undefined;
      close = jest.fn();
      watch = (_directory, listener) => {
        emit = listener;
        return { close, on: jest.fn() };
      };
    });

    it('should dispatch a rename notification for a file that exists', async () => {
      const handler = new RecordingHandler();
      const watcher = new DirectoryWatcher({ directory: dir, handler, watch });
      await fs.promises.writeFile(path.join(dir, 'scan.png'), 'bytes');

      watcher.start();
      emit('rename', 'scan.png');
      await watcher.idle();

      expect(handler.events).toHaveLength(1);
      expect(handler.events[0].filePath).toBe(path.join(dir, 'scan.png'));
      expect(handler.events[0].detectedAt).toBeInstanceOf(Date);
    });

    it('should ignore departures, directories and change notifications', async () => {
      const handler = new RecordingHandler();
      const watcher = new DirectoryWatcher({ directory: dir, handler, watch });
      await fs.promises.mkdir(path.join(dir, 'nested'));
      await fs.promises.writeFile(path.join(dir, 'scan.png'), 'bytes');

      watcher.start();
      emit('rename', 'gone.png');
      emit('rename', 'nested');
      emit('change', 'scan.png');
      emit('rename', null);
      await watcher.idle();

      expect(handler.events).toHaveLength(0);
    });

    it('should unsubscribe on stop', async () => {
      const watcher = new DirectoryWatcher({ directory: dir, handler: new RecordingHandler(), watch });

      watcher.start();
      expect(watcher.isRunning).toBe(true);
      await watcher.stop();

      expect(close).toHaveBeenCalledTimes(1);
      expect(watcher.isRunning).toBe(false);
    });
  });

  describe('filesystem events', () => {
    it('should pick up a file created in the watched directory', async () => {
      const handler = new RecordingHandler();
      const watcher = new DirectoryWatcher({ directory: dir, handler });

      watcher.start();
      try {
        await fs.promises.writeFile(path.join(dir, 'arrived.png'), 'bytes');
        await waitFor(() => handler.events.length > 0);
      } finally {
        await watcher.stop();
      }

      expect(handler.events[0].filePath).toBe(path.join(dir, 'arrived.png'));
    });
  });
});
