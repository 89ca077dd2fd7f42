import sharp from 'sharp';

import type { SpriteImage } from '../../types/index.js';

/**
 * Decode PNG bytes into an RGBA8 sprite with nearest-neighbour sampling.
 *
 * sharp decodes on the libuv thread pool, so concurrent sprite loads do not
 * block the event loop.
 */
export async function decodeSprite(plaintext: Buffer): Promise<SpriteImage> {
  const image = sharp(plaintext);
  const metadata = await image.metadata();

  if (metadata.format !== 'png') {
    throw new Error(`Expected PNG image data, got ${metadata.format ?? 'an unknown format'}`);
  }

  const { data, info } = await image
    .toColourspace('srgb')
    .ensureAlpha()
    .raw({ depth: 'uchar' })
    .toBuffer({ resolveWithObject: true });

  if (info.channels !== 4) {
    throw new Error(`Expected 4 channels after conversion, got ${info.channels}`);
  }

  return {
    width: info.width,
    height: info.height,
    format: 'rgba8unorm-srgb',
    data,
    // Pixel-art sprites must not be smoothed when scaled
    sampler: 'nearest'
  };
}

/**
 * Set the number of libvips threads used per image. Leaves the default when
 * `threads` is undefined.
 */
export function configureImageDecoding(threads?: number): number {
  return threads === undefined ? sharp.concurrency() : sharp.concurrency(threads);
}
