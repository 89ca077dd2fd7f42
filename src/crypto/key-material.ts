/**
 * Embedded key material.
 *
 * Neither constant is the asset key. The key only exists as the byte-wise XOR of
 * the two, computed by `reconstructKey()` at the point of use. Rotating the key
 * means replacing both tuples (see `scripts/generate-key-material.ts`) and
 * rebuilding the packaged assets together with the client that loads them.
 */

export const KEY_LENGTH = 32;

type Tuple<T, N extends number, R extends T[] = []> = R['length'] extends N
  ? R
  : Tuple<T, N, [...R, T]>;

/** Exactly 32 byte values; a shorter or longer literal fails to compile. */
export type KeyMaterial = Readonly<Tuple<number, typeof KEY_LENGTH>>;

export const OBFUSCATED_KEY = Object.freeze([
  0x3f, 0xfc, 0xdf, 0x79, 0x72, 0xe4, 0x02, 0x51,
  0x19, 0xf9, 0x99, 0x6e, 0xec, 0xb9, 0xec, 0x73,
  0x9c, 0x6f, 0x6c, 0x8c, 0x8f, 0x35, 0xc6, 0xc7,
  0x48, 0x6b, 0xb8, 0x67, 0x62, 0x08, 0xb1, 0xa7
] as const) satisfies KeyMaterial;

export const MASK = Object.freeze([
  0xe7, 0x09, 0x24, 0x4b, 0x92, 0x9e, 0x80, 0x5e,
  0xac, 0xc9, 0xe4, 0x8e, 0x30, 0x34, 0x25, 0xe7,
  0x48, 0xb2, 0x60, 0x98, 0xbb, 0xe6, 0x67, 0x00,
  0x6e, 0x90, 0x03, 0xe1, 0x77, 0xbf, 0xe9, 0x98
] as const) satisfies KeyMaterial;
