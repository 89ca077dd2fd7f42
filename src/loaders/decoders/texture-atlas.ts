import { SerializableTextureAtlasSchema } from '../../lib/validation.js';
import type { AtlasRect, UInt2 } from '../../types/index.js';

/**
 * Layout of sub-textures inside one atlas image. Indices are assigned in
 * insertion order.
 */
export class TextureAtlasLayout {
  readonly size: UInt2;
  private readonly rects: AtlasRect[] = [];

  constructor(size: UInt2) {
    this.size = { x: size.x, y: size.y };
  }

  /** Append a rectangle and return its index */
  addTexture(rect: AtlasRect): number {
    this.rects.push({ min: { ...rect.min }, max: { ...rect.max } });
    return this.rects.length - 1;
  }

  get textures(): readonly AtlasRect[] {
    return this.rects;
  }

  get length(): number {
    return this.rects.length;
  }
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode `.atlas` JSON: `{ size: {x, y}, textures: [{ min: {x, y}, max: {x, y} }] }`
 */
export function decodeTextureAtlas(plaintext: Buffer): TextureAtlasLayout {
  const serializable = SerializableTextureAtlasSchema.parse(JSON.parse(utf8.decode(plaintext)));

  const layout = new TextureAtlasLayout(serializable.size);
  for (const rect of serializable.textures) {
    layout.addTexture(rect);
  }
  return layout;
}
