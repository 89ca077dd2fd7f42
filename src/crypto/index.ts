/**
 * Crypto module - asset key reconstruction and AES-256-GCM blob sealing
 */

export {
  // Types
  type SealedBlob,
  // Wire format
  NONCE_LENGTH,
  TAG_LENGTH,
  MIN_BLOB_LENGTH,
  // Core encryption functions
  encryptBlob,
  decryptBlob,
  parseBlob,
  serializeBlob,
  // High-level asset API
  sealAsset,
  openAsset,
} from './codec.js';

export { reconstructKey, withAssetKey, zeroizeKey } from './key.js';
export { KEY_LENGTH, type KeyMaterial } from './key-material.js';
