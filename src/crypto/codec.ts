/**
 * Asset Blob Codec
 *
 * AES-256-GCM sealing of asset payloads. A sealed blob is laid out as:
 *
 *   nonce (12 bytes) | ciphertext (plaintext length) | auth tag (16 bytes)
 *
 * There is no header, version byte or magic number. A fresh random nonce is
 * drawn for every encryption, so no nonce state has to survive between builds.
 */

import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';

import { KEY_LENGTH } from './key-material.js';
import { withAssetKey } from './key.js';
import { CryptoError } from '../lib/errors.js';

// AES-256-GCM parameters
const ALGORITHM = 'aes-256-gcm';
export const NONCE_LENGTH = 12; // 96 bits (recommended for GCM)
export const TAG_LENGTH = 16;
export const MIN_BLOB_LENGTH = NONCE_LENGTH + TAG_LENGTH;

/**
 * The three parts of a sealed blob
 */
export interface SealedBlob {
  nonce: Buffer;
  ciphertext: Buffer;
  authTag: Buffer;
}

function assertKeyLength(key: Uint8Array): void {
  if (key.length !== KEY_LENGTH) {
    throw new RangeError(`Asset key must be ${KEY_LENGTH} bytes, got ${key.length}.`);
  }
}

/**
 * Encrypt a payload and return `nonce || ciphertext || tag`.
 *
 * Throws only when the cipher cannot be constructed (bad key length), which is
 * an environment defect rather than a data problem.
 */
export function encryptBlob(plaintext: Uint8Array, key: Uint8Array): Buffer {
  assertKeyLength(key);

  const nonce = randomBytes(NONCE_LENGTH);
  const cipher = createCipheriv(ALGORITHM, key, nonce, { authTagLength: TAG_LENGTH });

  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  const authTag = cipher.getAuthTag();

  return serializeBlob({ nonce, ciphertext, authTag });
}

/**
 * Decrypt a blob produced by `encryptBlob`.
 *
 * @throws CryptoError `malformed` when the blob cannot hold a nonce and a tag,
 *   `authentication-failed` when the tag does not verify
 */
export function decryptBlob(blob: Uint8Array, key: Uint8Array): Buffer {
  assertKeyLength(key);

  const { nonce, ciphertext, authTag } = parseBlob(blob);

  const decipher = createDecipheriv(ALGORITHM, key, nonce, { authTagLength: TAG_LENGTH });
  decipher.setAuthTag(authTag);

  const plaintext = decipher.update(ciphertext);
  try {
    return Buffer.concat([plaintext, decipher.final()]);
  } catch (error) {
    plaintext.fill(0);
    throw new CryptoError(
      'authentication-failed',
      'Authentication tag mismatch: the asset is corrupted, tampered with, or sealed under another key.',
      { cause: error }
    );
  }
}

/**
 * Split a blob into its parts. The returned buffers share memory with `blob`.
 */
export function parseBlob(blob: Uint8Array): SealedBlob {
  if (blob.length < MIN_BLOB_LENGTH) {
    throw new CryptoError(
      'malformed',
      `Encrypted blob too short: expected at least ${MIN_BLOB_LENGTH} bytes, got ${blob.length}.`
    );
  }

  const buffer = Buffer.from(blob.buffer, blob.byteOffset, blob.byteLength);
  const tagOffset = buffer.length - TAG_LENGTH;

  return {
    nonce: buffer.subarray(0, NONCE_LENGTH),
    ciphertext: buffer.subarray(NONCE_LENGTH, tagOffset),
    authTag: buffer.subarray(tagOffset)
  };
}

/**
 * Join the parts of a sealed blob into the on-disk layout
 */
export function serializeBlob(sealed: SealedBlob): Buffer {
  return Buffer.concat([sealed.nonce, sealed.ciphertext, sealed.authTag]);
}

/**
 * High-level API: seal an asset payload under the embedded asset key
 */
export function sealAsset(plaintext: Uint8Array): Buffer {
  return withAssetKey(key => encryptBlob(plaintext, key));
}

/**
 * High-level API: open an asset blob sealed by `sealAsset`
 */
export function openAsset(blob: Uint8Array): Buffer {
  return withAssetKey(key => decryptBlob(blob, key));
}
