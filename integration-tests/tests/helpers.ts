/**
 * Test Helpers
 *
 * Temp directories, generated images, a scripted OCR engine and log capture.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import type { OcrEngine } from '@poscan/shared';

export async function makeTempDir(prefix: string = 'poscan-'): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

/**
 * Write a small blank PNG and return its bytes
 */
export async function writePng(filePath: string, width: number = 24, height: number = 12): Promise<Buffer> {
  const buffer = await sharp({
    create: { width, height, channels: 3, background: { r: 255, g: 255, b: 255 } },
  })
    .png()
    .toBuffer();
  await fs.promises.writeFile(filePath, buffer);
  return buffer;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Poll until the predicate holds
 */
export async function waitFor(
  predicate: () => boolean,
  maxWaitMs: number = 5000,
  intervalMs: number = 20
): Promise<void> {
  const startTime = Date.now();

  while (Date.now() - startTime < maxWaitMs) {
    if (predicate()) return;
    await sleep(intervalMs);
  }

  throw new Error(`Condition not met within ${maxWaitMs}ms`);
}

/**
 * OCR engine returning scripted text per image basename
 */
export class FakeOcrEngine implements OcrEngine {
  readonly calls: string[] = [];

  constructor(private readonly textFor: (basename: string) => string) {}

  async recognize(imagePath: string): Promise<string> {
    this.calls.push(imagePath);
    return this.textFor(path.basename(imagePath));
  }
}

export interface CapturedLog {
  level: string;
  message: string;
  [key: string]: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseEntry(line: unknown): CapturedLog | null {
  if (typeof line !== 'string') return null;

  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return null;
  }

  if (isRecord(value) && typeof value.level === 'string' && typeof value.message === 'string') {
    return { ...value, level: value.level, message: value.message };
  }
  return null;
}

/**
 * Swallow console output and keep the structured log entries
 */
export function captureLogs(): { entries: CapturedLog[]; restore: () => void } {
  const entries: CapturedLog[] = [];
  const record = (line?: unknown) => {
    const entry = parseEntry(line);
    if (entry) entries.push(entry);
  };

  const spies = [
    jest.spyOn(console, 'log').mockImplementation(record),
    jest.spyOn(console, 'warn').mockImplementation(record),
    jest.spyOn(console, 'error').mockImplementation(record),
    jest.spyOn(console, 'debug').mockImplementation(record),
  ];

  return {
    entries,
    restore: () => spies.forEach((spy) => spy.mockRestore()),
  };
}
