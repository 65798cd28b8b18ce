/**
 * Command-line Argument Tests
 */

import { parseCliArguments } from '../../services/intake-watcher/src/lib/args';

describe('parseCliArguments', () => {
  it('should return no overrides without flags', () => {
    expect(parseCliArguments([])).toEqual({ help: false, overrides: {} });
  });

  it('should map flags to configuration overrides', () => {
    const result = parseCliArguments([
      '--root-directory',
      '/srv/renamescans',
      '--tesseract-path',
      '/opt/tesseract/tesseract',
      '--tessdata-path',
      '/opt/tesseract/tessdata',
      '--error-layout',
      'sibling',
    ]);

    expect(result.overrides).toEqual({
      rootDirectory: '/srv/renamescans',
      tesseractCmd: '/opt/tesseract/tesseract',
      tessdataPath: '/opt/tesseract/tessdata',
      errorBucketLayout: 'sibling',
    });
  });

  it('should accept the underscore spelling of the root directory flag', () => {
    expect(parseCliArguments(['--root_directory', 'D:\\renamescans']).overrides).toEqual({
      rootDirectory: 'D:\\renamescans',
    });
  });

  it('should recognise help', () => {
    expect(parseCliArguments(['-h']).help).toBe(true);
  });

  it('should reject an unknown error layout', () => {
    expect(() => parseCliArguments(['--error-layout', 'flat'])).toThrow(
      "Invalid --error-layout 'flat', expected 'nested' or 'sibling'"
    );
  });

  it('should reject unknown flags', () => {
    expect(() => parseCliArguments(['--watch-everything'])).toThrow();
  });
});
