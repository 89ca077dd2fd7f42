/**
 * Test Image Generator
 *
 * Provides utilities for generating small sprite images for loader tests.
 * Uses Sharp to create images in various formats.
 */

import sharp from 'sharp';

export interface TestImageOptions {
  width?: number;
  height?: number;
  format?: 'jpeg' | 'png' | 'webp';
  color?: { r: number; g: number; b: number };
  /** Include an alpha channel with this opacity (0-1) */
  alpha?: number;
}

/**
 * Create a solid-colour test image
 *
 * @param options - Image generation options
 * @returns Image buffer
 */
export async function createTestImage(options: TestImageOptions = {}): Promise<Buffer> {
  const {
    width = 4,
    height = 4,
    format = 'png',
    color = { r: 120, g: 180, b: 220 },
    alpha
  } = options;

  const pipeline = sharp({
    create: {
      width,
      height,
      channels: alpha === undefined ? 3 : 4,
      background: alpha === undefined ? color : { ...color, alpha }
    }
  });

  // Convert to requested format
  switch (format) {
    case 'jpeg':
      return pipeline.jpeg({ quality: 90 }).toBuffer();
    case 'webp':
      return pipeline.webp({ lossless: true }).toBuffer();
    case 'png':
    default:
      return pipeline.png({ compressionLevel: 6 }).toBuffer();
  }
}

/**
 * Create a solid color PNG sprite
 */
export async function createSolidSprite(
  color: { r: number; g: number; b: number } = { r: 255, g: 0, b: 0 },
  width = 3,
  height = 2
): Promise<Buffer> {
  return createTestImage({ width, height, format: 'png', color });
}
