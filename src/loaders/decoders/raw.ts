import { ConfigurationSchema } from '../../lib/validation.js';
import type { AudioSource, Configuration, TexelAsset } from '../../types/index.js';

/** Audio is already container-complete; hand the bytes over unchanged. */
export function decodeSound(plaintext: Buffer): AudioSource {
  return { bytes: plaintext };
}

export function decodeTexel(plaintext: Buffer): TexelAsset {
  return { data: plaintext };
}

export function decodeConfiguration(plaintext: Buffer): Configuration {
  return ConfigurationSchema.parse(JSON.parse(plaintext.toString('utf-8')));
}
