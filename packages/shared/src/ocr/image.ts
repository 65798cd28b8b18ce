/**
 * Image Decoding
 *
 * Opens and fully decodes an image with sharp so truncated or still-locked
 * files fail here instead of inside the OCR engine.
 */

import sharp from 'sharp';

// libvips keeps decoded inputs cached by path; a cached handle would outlive the move
sharp.cache(false);

export interface DecodedImage {
  width: number;
  height: number;
  channels: number;
}

export type ImageDecoder = (filePath: string) => Promise<DecodedImage>;

/**
 * Decode every pixel of the image at `filePath`
 */
export async function decodeImage(filePath: string): Promise<DecodedImage> {
  const { info } = await sharp(filePath).raw().toBuffer({ resolveWithObject: true });

  return {
    width: info.width,
    height: info.height,
    channels: info.channels,
  };
}
