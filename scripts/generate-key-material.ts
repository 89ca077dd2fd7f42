#!/usr/bin/env tsx
/**
 * Generate a fresh key/mask pair for src/crypto/key-material.ts
 *
 * Both halves are random; the asset key is their XOR. Paste the output over the
 * existing constants, then rebuild the packaged assets and the client together.
 */

import { randomBytes } from 'node:crypto';

import { KEY_LENGTH } from '../src/crypto/key-material.js';

function formatTuple(name: string, bytes: Buffer): string {
  const rows: string[] = [];
  for (let offset = 0; offset < bytes.length; offset += 8) {
    const row = [...bytes.subarray(offset, offset + 8)]
      .map(byte => `0x${byte.toString(16).padStart(2, '0')}`)
      .join(', ');
    rows.push(`  ${row}`);
  }
  return `export const ${name} = Object.freeze([\n${rows.join(',\n')}\n] as const) satisfies KeyMaterial;`;
}

const obfuscatedKey = randomBytes(KEY_LENGTH);
const mask = randomBytes(KEY_LENGTH);

process.stdout.write(`${formatTuple('OBFUSCATED_KEY', obfuscatedKey)}\n\n${formatTuple('MASK', mask)}\n`);

obfuscatedKey.fill(0);
mask.fill(0);
