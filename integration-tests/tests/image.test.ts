/**
 * Image Decoding Tests
 */

import fs from 'fs';
import path from 'path';
import sharp from 'sharp';
import { DEFAULT_SUPPORTED_EXTENSIONS, decodeImage } from '@poscan/shared';
import { makeTempDir, removeDir } from './helpers';

describe('decodeImage', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it.each(DEFAULT_SUPPORTED_EXTENSIONS)('should decode a generated %s image', async (extension) => {
    const imagePath = path.join(dir, `scan${extension}`);
    // sharp picks the output format from the extension
    await sharp({
      create: { width: 16, height: 8, channels: 3, background: { r: 255, g: 255, b: 255 } },
    }).toFile(imagePath);

    const decoded = await decodeImage(imagePath);

    expect(decoded.width).toBe(16);
    expect(decoded.height).toBe(8);
  });

  it('should reject a truncated image', async () => {
    const imagePath = path.join(dir, 'partial.png');
    const full = await sharp({
      create: { width: 16, height: 8, channels: 3, background: { r: 0, g: 0, b: 0 } },
    })
      .png()
      .toBuffer();
    await fs.promises.writeFile(imagePath, full.subarray(0, 20));

    await expect(decodeImage(imagePath)).rejects.toThrow();
  });
});
