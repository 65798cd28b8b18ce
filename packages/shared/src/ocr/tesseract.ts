/**
 * Tesseract OCR Engine
 *
 * Locates the tesseract binary and its language data at startup, then runs
 * it once per image through execFile.
 */

import fs from 'fs';
import path from 'path';
import { execFile } from 'child_process';
import { promisify } from 'util';
import { logger } from '../logger';
import { OcrEngineError, StartupPreconditionError, errorCode, errorStderr } from '../errors';
import { ocrDurationHistogram } from '../metrics';

const execFileAsync = promisify(execFile);

/**
 * Opaque image-to-text collaborator. May throw.
 */
export interface OcrEngine {
  recognize(imagePath: string): Promise<string>;
}

export interface TesseractLocation {
  binaryPath: string;
  tessdataPath: string;
}

export interface ResolveTesseractOptions {
  /** Explicit binary location; when given, no discovery is attempted */
  tesseractCmd?: string;
  /** Explicit tessdata directory */
  tessdataPath?: string;
  /** Languages that must have a .traineddata file, e.g. `eng` or `eng+deu` */
  language: string;
  /** PATH used for discovery */
  searchPath?: string;
}

const BINARY_NAMES = process.platform === 'win32' ? ['tesseract.exe'] : ['tesseract'];

const WELL_KNOWN_BINARIES = [
  '/usr/bin/tesseract',
  '/usr/local/bin/tesseract',
  '/opt/homebrew/bin/tesseract',
  'C:\\Program Files\\Tesseract-OCR\\tesseract.exe',
];

const WELL_KNOWN_TESSDATA = [
  '/usr/share/tesseract-ocr/5/tessdata',
  '/usr/share/tesseract-ocr/4.00/tessdata',
  '/usr/share/tessdata',
  '/usr/local/share/tessdata',
  '/opt/homebrew/share/tessdata',
];

function isExecutableFile(candidate: string): boolean {
  try {
    if (!fs.statSync(candidate).isFile()) return false;
    fs.accessSync(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function isDirectory(candidate: string): boolean {
  try {
    return fs.statSync(candidate).isDirectory();
  } catch {
    return false;
  }
}

function findBinary(searchPath: string): string | undefined {
  const pathCandidates = searchPath
    .split(path.delimiter)
    .filter((dir) => dir.length > 0)
    .flatMap((dir) => BINARY_NAMES.map((name) => path.join(dir, name)));

  return [...pathCandidates, ...WELL_KNOWN_BINARIES].find(isExecutableFile);
}

function findTessdata(binaryPath: string): string | undefined {
  const binaryDir = path.dirname(binaryPath);
  const candidates = [
    path.join(binaryDir, 'tessdata'),
    path.join(binaryDir, '..', 'share', 'tessdata'),
    ...WELL_KNOWN_TESSDATA,
  ];

  return candidates.find(isDirectory);
}

/**
 * Resolve the tesseract binary and tessdata directory.
 *
 * @throws StartupPreconditionError when either is missing, or when a requested
 *   language has no traineddata file
 */
export function resolveTesseract(options: ResolveTesseractOptions): TesseractLocation {
  const { tesseractCmd, tessdataPath, language } = options;

  let binaryPath: string | undefined;
  if (tesseractCmd) {
    binaryPath = isExecutableFile(tesseractCmd) ? path.resolve(tesseractCmd) : undefined;
    if (!binaryPath) {
      throw new StartupPreconditionError(
        `Tesseract executable not found at configured path: ${tesseractCmd}`
      );
    }
  } else {
    binaryPath = findBinary(options.searchPath ?? process.env.PATH ?? '');
    if (!binaryPath) {
      throw new StartupPreconditionError(
        'Tesseract executable not found. Install tesseract-ocr or set TESSERACT_CMD.'
      );
    }
  }

  const dataDir = tessdataPath ? path.resolve(tessdataPath) : findTessdata(binaryPath);
  if (!dataDir || !isDirectory(dataDir)) {
    throw new StartupPreconditionError(
      `'tessdata' directory not found${tessdataPath ? ` at: ${tessdataPath}` : ''}. Set TESSDATA_PREFIX.`
    );
  }

  for (const lang of language.split('+')) {
    const trainedData = path.join(dataDir, `${lang}.traineddata`);
    if (!fs.existsSync(trainedData)) {
      throw new StartupPreconditionError(`Language data not found: ${trainedData}`);
    }
  }

  logger.info('Tesseract located', { binaryPath, tessdataPath: dataDir });

  return { binaryPath, tessdataPath: dataDir };
}

export interface TesseractEngineOptions extends TesseractLocation {
  language: string;
  timeoutMs: number;
}

export class TesseractEngine implements OcrEngine {
  constructor(private readonly options: TesseractEngineOptions) {}

  async recognize(imagePath: string): Promise<string> {
    const { binaryPath, tessdataPath, language, timeoutMs } = this.options;
    const args = [imagePath, 'stdout', '--tessdata-dir', tessdataPath, '-l', language];
    const endTimer = ocrDurationHistogram.startTimer();

    try {
      const { stdout } = await execFileAsync(binaryPath, args, {
        timeout: timeoutMs,
        maxBuffer: 1024 * 1024 * 20,
        windowsHide: true,
      });
      endTimer({ status: 'success' });
      return stdout;
    } catch (error) {
      endTimer({ status: 'error' });

      if (errorCode(error) === 'ENOENT') {
        throw new OcrEngineError(`Tesseract binary not found at "${binaryPath}"`, { cause: error });
      }
      const stderr = errorStderr(error);
      throw new OcrEngineError(
        stderr ? `Tesseract OCR failed: ${stderr}` : 'Tesseract OCR failed to process the image',
        { cause: error }
      );
    }
  }
}
