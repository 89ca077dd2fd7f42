/**
 * asset-shield: build-time asset sealing and runtime decrypting loaders.
 */

export * from './crypto/index.js';
export * from './hierarchy/index.js';
export * from './packager/index.js';
export * from './loaders/index.js';
export * from './storage/index.js';
export * from './lib/errors.js';
export type * from './types/index.js';
