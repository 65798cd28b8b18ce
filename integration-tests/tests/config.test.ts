/**
 * Configuration Tests
 */

import path from 'path';
import {
  loadConfig,
  deriveDirectories,
  validateConfig,
  DEFAULT_SUPPORTED_EXTENSIONS,
} from '@poscan/shared';

describe('deriveDirectories', () => {
  it('should nest the error bucket under the finished bucket', () => {
    expect(deriveDirectories('/scans', 'nested')).toEqual({
      intakeDirectory: path.join('/scans', 'waves'),
      finishedDirectory: path.join('/scans', 'wavesfinished'),
      errorDirectory: path.join('/scans', 'wavesfinished', 'UncapturedPO'),
    });
  });

  it('should place the error bucket beside the finished bucket', () => {
    expect(deriveDirectories('/scans', 'sibling').errorDirectory).toBe(
      path.join('/scans', 'waveserrors')
    );
  });
});

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({});

    expect(config.rootDirectory).toBe(path.join(path.parse(process.cwd()).root, 'renamescans'));
    expect(config.errorBucketLayout).toBe('nested');
    expect(config.settleDelayMs).toBe(3000);
    expect(config.readinessAttempts).toBe(30);
    expect(config.readinessBackoffMs).toBe(2000);
    expect(config.decodeAttempts).toBe(5);
    expect(config.decodeDelayMs).toBe(1000);
    expect(config.filingRetryDelayMs).toBe(1000);
    expect(config.ocrLanguage).toBe('eng');
    expect(config.ocrTimeoutMs).toBe(60000);
    expect(config.supportedExtensions).toEqual(DEFAULT_SUPPORTED_EXTENSIONS);
    expect(config.supportedExtensions).not.toContain('.bmp');
    expect(config.tesseractCmd).toBeUndefined();
    expect(config.tessdataPath).toBeUndefined();
    expect(config.metricsPort).toBeUndefined();
  });

  it('should read environment variables', () => {
    const config = loadConfig({
      SCAN_ROOT_DIRECTORY: '/srv/scans',
      ERROR_BUCKET_LAYOUT: 'sibling',
      SUPPORTED_EXTENSIONS: 'png, TIFF,.jpg',
      METRICS_PORT: '9464',
      TESSERACT_CMD: '/opt/tesseract/bin/tesseract',
      TESSDATA_PREFIX: '/opt/tesseract/tessdata',
      READINESS_ATTEMPTS: '10',
    });

    expect(config.rootDirectory).toBe(path.resolve('/srv/scans'));
    expect(config.errorDirectory).toBe(path.join(path.resolve('/srv/scans'), 'waveserrors'));
    expect(config.supportedExtensions).toEqual(['.png', '.tiff', '.jpg']);
    expect(config.metricsPort).toBe(9464);
    expect(config.tesseractCmd).toBe('/opt/tesseract/bin/tesseract');
    expect(config.tessdataPath).toBe('/opt/tesseract/tessdata');
    expect(config.readinessAttempts).toBe(10);
  });

  it('should reject an unknown error bucket layout', () => {
    expect(() => loadConfig({ ERROR_BUCKET_LAYOUT: 'siblings' })).toThrow(
      "Invalid ERROR_BUCKET_LAYOUT 'siblings', expected 'nested' or 'sibling'"
    );
  });

  it('should let overrides win over the environment', () => {
    const config = loadConfig(
      { SCAN_ROOT_DIRECTORY: '/srv/scans', ERROR_BUCKET_LAYOUT: 'sibling', SETTLE_DELAY_MS: '500' },
      { rootDirectory: '/data/renamescans', errorBucketLayout: 'nested', settleDelayMs: 0 }
    );

    expect(config.rootDirectory).toBe(path.resolve('/data/renamescans'));
    expect(config.errorDirectory).toBe(
      path.join(path.resolve('/data/renamescans'), 'wavesfinished', 'UncapturedPO')
    );
    expect(config.settleDelayMs).toBe(0);
  });
});

describe('validateConfig', () => {
  it('should accept the defaults', () => {
    expect(validateConfig(loadConfig({}))).toEqual({ valid: true });
  });

  it('should reject a non-numeric attempt count', () => {
    const result = validateConfig(loadConfig({ READINESS_ATTEMPTS: 'many' }));

    expect(result.valid).toBe(false);
    expect(result.errors).toContain('/readinessAttempts: must be integer');
  });

  it('should reject a zero decode attempt count', () => {
    const result = validateConfig(loadConfig({ DECODE_ATTEMPTS: '0' }));

    expect(result.valid).toBe(false);
    expect(result.errors).toContain('/decodeAttempts: must be >= 1');
  });

  it('should reject an out-of-range metrics port', () => {
    const result = validateConfig(loadConfig({ METRICS_PORT: '70000' }));

    expect(result.errors).toContain('/metricsPort: must be <= 65535');
  });
});
