import { KEY_LENGTH, MASK, OBFUSCATED_KEY } from './key-material.js';

if (OBFUSCATED_KEY.length !== KEY_LENGTH || MASK.length !== KEY_LENGTH) {
  throw new Error(`Embedded key material must be ${KEY_LENGTH} bytes`);
}

/**
 * Reconstruct the asset key from the embedded constants.
 *
 * Returns a fresh buffer on every call. Callers own it and should zeroize it
 * once done; prefer `withAssetKey()`, which does that for you.
 */
export function reconstructKey(): Buffer {
  const key = Buffer.alloc(KEY_LENGTH);
  for (let i = 0; i < KEY_LENGTH; i++) {
    key[i] = OBFUSCATED_KEY[i] ^ MASK[i];
  }
  return key;
}

/**
 * Securely zero out a key in memory
 * This helps prevent key material from lingering in memory
 */
export function zeroizeKey(key: Buffer): void {
  if (key && key.length > 0) {
    key.fill(0);
  }
}

/**
 * Run `fn` with a freshly reconstructed key and wipe the key afterwards.
 * `fn` must not retain the buffer.
 */
export function withAssetKey<T>(fn: (key: Buffer) => T): T {
  const key = reconstructKey();
  try {
    return fn(key);
  } finally {
    zeroizeKey(key);
  }
}
