/**
 * Loaders module - decrypting asset loaders and their plain counterparts
 */

import { assetProtection, env } from '../config/index.js';
import type { Logger } from '../lib/logger.js';
import type {
  AudioSource,
  Configuration,
  ProtectionMode,
  SpriteImage,
  TexelAsset
} from '../types/index.js';
import { configureImageDecoding, decodeSprite } from './decoders/sprite.js';
import { decodeConfiguration, decodeSound, decodeTexel } from './decoders/raw.js';
import { decodeTextureAtlas, type TextureAtlasLayout } from './decoders/texture-atlas.js';
import { PipelineLoader } from './pipeline.js';
import { AssetLoaderRegistry } from './registry.js';

export interface AssetLoaderSet {
  sprite: PipelineLoader<SpriteImage>;
  textureAtlas: PipelineLoader<TextureAtlasLayout>;
  sound: PipelineLoader<AudioSource>;
  texel: PipelineLoader<TexelAsset>;
  configuration: PipelineLoader<Configuration>;
}

export interface AssetLoaderOptions {
  /** Default: ASSET_PROTECTION */
  protection?: ProtectionMode;
  /** libvips threads per image decode. Default: IMAGE_DECODE_THREADS */
  imageDecodeThreads?: number;
  logger?: Logger;
}

/**
 * Build the loader for each asset kind. `protection` only applies to the
 * kinds the packager seals (sprite, atlas, sound); texel and configuration
 * files are always shipped plain.
 */
export function createAssetLoaders(options: AssetLoaderOptions = {}): AssetLoaderSet {
  const protection = options.protection ?? assetProtection();
  const { logger } = options;

  configureImageDecoding(options.imageDecodeThreads ?? env.IMAGE_DECODE_THREADS);

  return {
    sprite: new PipelineLoader({
      name: 'sprite',
      extensions: ['sprite'],
      decode: decodeSprite,
      protection,
      logger
    }),
    textureAtlas: new PipelineLoader({
      name: 'texture-atlas',
      extensions: ['atlas'],
      decode: decodeTextureAtlas,
      protection,
      logger
    }),
    sound: new PipelineLoader({
      name: 'sound',
      extensions: ['sound'],
      decode: decodeSound,
      protection,
      logger
    }),
    texel: new PipelineLoader({
      name: 'texel',
      extensions: ['tex'],
      decode: decodeTexel,
      protection: 'plain',
      logger
    }),
    configuration: new PipelineLoader({
      name: 'configuration',
      extensions: ['json'],
      decode: decodeConfiguration,
      protection: 'plain',
      logger
    })
  };
}

/**
 * Registry with every loader from `createAssetLoaders` registered
 */
export function createAssetLoaderRegistry(options: AssetLoaderOptions = {}): AssetLoaderRegistry {
  const registry = new AssetLoaderRegistry();
  for (const loader of Object.values(createAssetLoaders(options))) {
    registry.register(loader);
  }
  return registry;
}

export { PipelineLoader, readAll, type AssetDecoder, type PipelineLoaderOptions } from './pipeline.js';
export {
  AssetLoaderRegistry,
  extensionCandidates,
  loadAsset,
  settleLoad
} from './registry.js';
export { TextureAtlasLayout, decodeTextureAtlas } from './decoders/texture-atlas.js';
export { decodeSprite, configureImageDecoding } from './decoders/sprite.js';
export { decodeSound, decodeTexel, decodeConfiguration } from './decoders/raw.js';
