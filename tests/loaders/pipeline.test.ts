import { describe, it, expect } from 'vitest';

import { sealAsset } from '../../src/crypto/codec.js';
import {
  AssetCryptoError,
  AssetDecodeError,
  AssetReadError
} from '../../src/lib/errors.js';
import { createAssetLoaders, PipelineLoader, readAll } from '../../src/loaders/index.js';
import { catchAsync, failingStream, streamOf } from '../helpers/streams.js';

const ATLAS_JSON = JSON.stringify({
  size: { x: 64, y: 32 },
  textures: [
    { min: { x: 0, y: 0 }, max: { x: 16, y: 32 } },
    { min: { x: 16, y: 0 }, max: { x: 32, y: 32 } }
  ]
});

describe('readAll', () => {
  it('should concatenate every chunk in order', async () => {
    const bytes = await readAll(
      streamOf(Buffer.from('ab'), new Uint8Array([0x63]), Buffer.from('de'))
    );
    expect(bytes.toString('utf-8')).toBe('abcde');
  });

  it('should return an empty buffer for an empty stream', async () => {
    expect((await readAll(streamOf())).length).toBe(0);
  });
});

describe('Protected loaders', () => {
  const loaders = createAssetLoaders({ protection: 'protected' });

  it('should load a sealed sound unchanged', async () => {
    const audio = Buffer.from('OggS fake audio payload', 'utf-8');

    const source = await loaders.sound.load(streamOf(sealAsset(audio)), {
      assetPath: 'sounds/start.sound'
    });

    expect(source.bytes.equals(audio)).toBe(true);
  });

  it('should accept a sealed blob split across chunks', async () => {
    const blob = sealAsset(Buffer.from('chunked', 'utf-8'));

    const source = await loaders.sound.load(
      streamOf(blob.subarray(0, 5), blob.subarray(5, 30), blob.subarray(30)),
      { assetPath: 'a.sound' }
    );

    expect(source.bytes.toString('utf-8')).toBe('chunked');
  });

  it('should load a sealed texture atlas with rectangles in order', async () => {
    const layout = await loaders.textureAtlas.load(
      streamOf(sealAsset(Buffer.from(ATLAS_JSON, 'utf-8'))),
      { assetPath: 'fonts/ImgFont_Number.atlas' }
    );

    expect(layout.size).toEqual({ x: 64, y: 32 });
    expect(layout.length).toBe(2);
    expect(layout.textures[0]).toEqual({ min: { x: 0, y: 0 }, max: { x: 16, y: 32 } });
    expect(layout.textures[1]).toEqual({ min: { x: 16, y: 0 }, max: { x: 32, y: 32 } });
  });

  it('should report a flipped tag byte as an authentication failure', async () => {
    const blob = sealAsset(Buffer.from(ATLAS_JSON, 'utf-8'));
    blob[blob.length - 1] ^= 0x01;

    const error = await catchAsync(() =>
      loaders.textureAtlas.load(streamOf(blob), { assetPath: 'fonts/a.atlas' })
    );

    expect(error).toBeInstanceOf(AssetCryptoError);
    expect(error).toMatchObject({ reason: 'authentication-failed', assetPath: 'fonts/a.atlas' });
  });

  it('should report a blob shorter than nonce and tag as malformed', async () => {
    const error = await catchAsync(() =>
      loaders.sound.load(streamOf(Buffer.alloc(10)), { assetPath: 'a.sound' })
    );

    expect(error).toBeInstanceOf(AssetCryptoError);
    expect(error).toMatchObject({
      reason: 'malformed',
      message:
        'Failed to decrypt asset "a.sound": Encrypted blob too short: expected at least 28 bytes, got 10.'
    });
  });

  it('should refuse a plain file in protected mode', async () => {
    const error = await catchAsync(() =>
      loaders.textureAtlas.load(streamOf(Buffer.from(ATLAS_JSON, 'utf-8')), {
        assetPath: 'fonts/a.atlas'
      })
    );

    expect(error).toBeInstanceOf(AssetCryptoError);
    expect(error).toMatchObject({ reason: 'authentication-failed' });
  });

  it('should report authentic but invalid atlas JSON as a decode error', async () => {
    const error = await catchAsync(() =>
      loaders.textureAtlas.load(streamOf(sealAsset(Buffer.from('{"size":', 'utf-8'))), {
        assetPath: 'fonts/a.atlas'
      })
    );

    expect(error).toBeInstanceOf(AssetDecodeError);
    expect(error).not.toBeInstanceOf(AssetCryptoError);
  });

  it('should reject atlas coordinates outside the u32 range', async () => {
    const json = JSON.stringify({
      size: { x: 8, y: 8 },
      textures: [{ min: { x: -1, y: 0 }, max: { x: 4, y: 4 } }]
    });

    const error = await catchAsync(() =>
      loaders.textureAtlas.load(streamOf(sealAsset(Buffer.from(json, 'utf-8'))), {
        assetPath: 'a.atlas'
      })
    );

    expect(error).toBeInstanceOf(AssetDecodeError);
  });

  it('should map a stream failure to a read error', async () => {
    const error = await catchAsync(() =>
      loaders.sound.load(failingStream(new Error('disk gone'), Buffer.from('partial')), {
        assetPath: 'a.sound'
      })
    );

    expect(error).toBeInstanceOf(AssetReadError);
    expect(error).toMatchObject({
      assetPath: 'a.sound',
      message: 'Failed to load asset "a.sound": disk gone'
    });
  });

  it('should never decrypt texel and configuration files', async () => {
    const texel = await loaders.texel.load(streamOf(Buffer.from([1, 2, 3])), {
      assetPath: 'world.tex'
    });
    const config = await loaders.configuration.load(
      streamOf(Buffer.from('{"server_url":"http://localhost:8080"}', 'utf-8')),
      { assetPath: 'config.json' }
    );

    expect([...texel.data]).toEqual([1, 2, 3]);
    expect(config).toEqual({ serverUrl: 'http://localhost:8080' });
    expect(loaders.texel.protection).toBe('plain');
    expect(loaders.configuration.protection).toBe('plain');
  });

  it('should reject a configuration without a valid server_url', async () => {
    const error = await catchAsync(() =>
      loaders.configuration.load(streamOf(Buffer.from('{"server_url":"nowhere"}', 'utf-8')), {
        assetPath: 'config.json'
      })
    );

    expect(error).toBeInstanceOf(AssetDecodeError);
  });
});

describe('createAssetLoaders', () => {
  it('should take the protection mode from the environment by default', () => {
    const loaders = createAssetLoaders();

    expect(loaders.sprite.protection).toBe('protected');
    expect(loaders.textureAtlas.protection).toBe('protected');
    expect(loaders.sound.protection).toBe('protected');
    expect(loaders.texel.protection).toBe('plain');
  });
});

describe('Plain loaders', () => {
  const loaders = createAssetLoaders({ protection: 'plain' });

  it('should read atlas JSON directly', async () => {
    const layout = await loaders.textureAtlas.load(streamOf(Buffer.from(ATLAS_JSON, 'utf-8')), {
      assetPath: 'fonts/a.atlas'
    });

    expect(layout.length).toBe(2);
  });

  it('should hand sound bytes over untouched', async () => {
    const bytes = Buffer.from('RIFF fake wav', 'utf-8');

    const source = await loaders.sound.load(streamOf(bytes), { assetPath: 'a.sound' });

    expect(source.bytes.equals(bytes)).toBe(true);
  });

  it('should treat a sealed blob as content', async () => {
    const error = await catchAsync(() =>
      loaders.textureAtlas.load(streamOf(sealAsset(Buffer.from(ATLAS_JSON, 'utf-8'))), {
        assetPath: 'a.atlas'
      })
    );

    expect(error).toBeInstanceOf(AssetDecodeError);
  });
});

describe('PipelineLoader', () => {
  it('should pass the load context to the decoder', async () => {
    const loader = new PipelineLoader({
      name: 'echo-path',
      extensions: ['echo'],
      protection: 'plain',
      decode: (plaintext, context) => `${context.assetPath}:${plaintext.toString('utf-8')}`
    });

    await expect(loader.load(streamOf(Buffer.from('hi')), { assetPath: 'x.echo' })).resolves.toBe(
      'x.echo:hi'
    );
  });

  it('should copy the extension list', () => {
    const extensions = ['a', 'b'];
    const loader = new PipelineLoader({
      name: 'copy',
      extensions,
      protection: 'plain',
      decode: plaintext => plaintext
    });
    extensions.push('c');

    expect(loader.extensions).toEqual(['a', 'b']);
  });
});
