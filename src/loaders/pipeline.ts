/**
 * Shared load pipeline for every asset kind:
 * read the whole stream, open the sealed blob (protected mode only), decode.
 *
 * Each step maps its failures to its own error class so callers can tell a
 * missing or unreadable stream, a tampered blob and bad content apart.
 */

import { openAsset } from '../crypto/codec.js';
import {
  AssetCryptoError,
  AssetDecodeError,
  AssetReadError,
  CryptoError
} from '../lib/errors.js';
import { logger as rootLogger, type Logger } from '../lib/logger.js';
import type {
  AssetByteStream,
  AssetLoader,
  LoadContext,
  ProtectionMode
} from '../types/index.js';

export type AssetDecoder<T> = (plaintext: Buffer, context: LoadContext) => T | Promise<T>;

export interface PipelineLoaderOptions<T> {
  name: string;
  extensions: readonly string[];
  decode: AssetDecoder<T>;
  protection: ProtectionMode;
  logger?: Logger;
}

/**
 * Read a byte stream to the end. Assets are bounded in size, so there is no
 * streaming decode.
 */
export async function readAll(stream: AssetByteStream): Promise<Buffer> {
  const chunks: Uint8Array[] = [];
  for await (const chunk of stream) {
    chunks.push(chunk);
  }
  return Buffer.concat(chunks);
}

export class PipelineLoader<T> implements AssetLoader<T> {
  readonly name: string;
  readonly extensions: readonly string[];
  readonly protection: ProtectionMode;
  private readonly decode: AssetDecoder<T>;
  private readonly log: Logger;

  constructor(options: PipelineLoaderOptions<T>) {
    this.name = options.name;
    this.extensions = Object.freeze([...options.extensions]);
    this.protection = options.protection;
    this.decode = options.decode;
    this.log = (options.logger ?? rootLogger).child({ loader: options.name });
  }

  async load(stream: AssetByteStream, context: LoadContext): Promise<T> {
    this.log.info({ assetPath: context.assetPath }, 'asset load');

    let bytes: Buffer;
    try {
      bytes = await readAll(stream);
    } catch (error) {
      throw new AssetReadError(context.assetPath, error);
    }

    const plaintext = this.protection === 'protected' ? this.open(bytes, context) : bytes;

    try {
      return await this.decode(plaintext, context);
    } catch (error) {
      throw new AssetDecodeError(context.assetPath, error);
    }
  }

  private open(bytes: Buffer, context: LoadContext): Buffer {
    try {
      return openAsset(bytes);
    } catch (error) {
      if (error instanceof CryptoError) {
        this.log.warn(
          { assetPath: context.assetPath, reason: error.reason },
          'Rejected protected asset'
        );
        throw new AssetCryptoError(context.assetPath, error);
      }
      throw error;
    }
  }
}
