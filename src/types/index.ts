// Core type definitions for asset packaging and loading

import type { AssetLoadError, AssetNotFoundError } from '../lib/errors.js';

/**
 * Whether protected asset kinds are sealed at build time and opened at load
 * time, or shipped and read as plain files.
 */
export type ProtectionMode = 'protected' | 'plain';

/**
 * Packaging rules for one directory. Names are relative to the directory.
 */
export interface HierarchyNode {
  /** Copied verbatim */
  files: readonly string[];
  /** Sealed with the asset key */
  targetFiles: readonly string[];
  /** Nested directories, keyed by name */
  directories: Readonly<Record<string, HierarchyNode>>;
}

export interface HierarchySummary {
  files: number;
  targetFiles: number;
  directories: number;
}

// Asset loading contract

/** Opaque readable byte stream (a Node `Readable` satisfies this). */
export type AssetByteStream = AsyncIterable<Uint8Array>;

export interface LoadContext {
  /** Path of the asset being loaded, as requested by the caller */
  readonly assetPath: string;
}

export interface AssetLoader<T> {
  readonly name: string;
  /** Extensions claimed by this loader, without the leading dot */
  readonly extensions: readonly string[];
  load(stream: AssetByteStream, context: LoadContext): Promise<T>;
}

/** Where byte streams come from (a directory, an archive, the network) */
export interface AssetSource {
  open(path: string): Promise<AssetByteStream>;
}

export type LoadOutcome<T> =
  | { ok: true; path: string; asset: T }
  | { ok: false; path: string; error: AssetLoadError | AssetNotFoundError };

// Decoded assets

export interface UInt2 {
  x: number;
  y: number;
}

export interface AtlasRect {
  min: UInt2;
  max: UInt2;
}

export type SamplerMode = 'nearest' | 'linear';

export interface SpriteImage {
  width: number;
  height: number;
  format: 'rgba8unorm-srgb';
  /** Tightly packed RGBA, 8 bits per channel, row-major */
  data: Buffer;
  sampler: SamplerMode;
}

export interface AudioSource {
  /** Container-complete audio bytes (ogg, wav, ...) */
  bytes: Buffer;
}

export interface TexelAsset {
  data: Buffer;
}

export interface Configuration {
  serverUrl: string;
}
