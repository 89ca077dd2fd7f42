/**
 * Extension-based loader dispatch.
 *
 * Loads never reject: every call settles to a `LoadOutcome`, and a failure in
 * one load has no effect on the others. Nothing is cached or retried.
 */

import {
  AssetDecodeError,
  AssetLoadError,
  AssetNotFoundError,
  AssetReadError,
  UnsupportedAssetError
} from '../lib/errors.js';
import type {
  AssetByteStream,
  AssetLoader,
  AssetSource,
  LoadOutcome
} from '../types/index.js';

/**
 * Candidate extensions for a path, longest first:
 * `fonts/Number.font.atlas?v=2` → `font.atlas`, `atlas`
 */
export function extensionCandidates(path: string): string[] {
  const clean = path.replace(/[?#].*$/, '');
  const basename = clean.slice(clean.search(/[^\\/]*$/));
  const parts = basename.split('.');

  const candidates: string[] = [];
  for (let i = 1; i < parts.length; i++) {
    const extension = parts.slice(i).join('.');
    if (extension.length > 0) {
      candidates.push(extension);
    }
  }
  return candidates;
}

/**
 * Run one loader against one stream and settle the result
 */
export async function settleLoad<T>(
  loader: AssetLoader<T>,
  path: string,
  stream: AssetByteStream
): Promise<LoadOutcome<T>> {
  try {
    const asset = await loader.load(stream, { assetPath: path });
    return { ok: true, path, asset };
  } catch (error) {
    return {
      ok: false,
      path,
      error: error instanceof AssetLoadError ? error : new AssetDecodeError(path, error)
    };
  }
}

/**
 * Open `path` from `source` and load it with a specific loader
 */
export async function loadAsset<T>(
  loader: AssetLoader<T>,
  source: AssetSource,
  path: string
): Promise<LoadOutcome<T>> {
  let stream: AssetByteStream;
  try {
    stream = await source.open(path);
  } catch (error) {
    return {
      ok: false,
      path,
      error: error instanceof AssetNotFoundError ? error : new AssetReadError(path, error)
    };
  }
  return settleLoad(loader, path, stream);
}

export class AssetLoaderRegistry {
  private readonly byExtension = new Map<string, AssetLoader<unknown>>();

  /**
   * Register a loader for all of its extensions
   *
   * @throws Error when an extension is already claimed by another loader
   */
  register(loader: AssetLoader<unknown>): this {
    for (const extension of loader.extensions) {
      const existing = this.byExtension.get(extension);
      if (existing) {
        throw new Error(
          `Extension "${extension}" is already handled by loader "${existing.name}"`
        );
      }
    }
    for (const extension of loader.extensions) {
      this.byExtension.set(extension, loader);
    }
    return this;
  }

  loaderFor(path: string): AssetLoader<unknown> | undefined {
    for (const extension of extensionCandidates(path)) {
      const loader = this.byExtension.get(extension);
      if (loader) {
        return loader;
      }
    }
    return undefined;
  }

  /** Extensions currently claimed, sorted */
  get extensions(): string[] {
    return [...this.byExtension.keys()].sort();
  }

  async load(path: string, stream: AssetByteStream): Promise<LoadOutcome<unknown>> {
    const loader = this.loaderFor(path);
    if (!loader) {
      return { ok: false, path, error: new UnsupportedAssetError(path) };
    }
    return settleLoad(loader, path, stream);
  }

  async loadFrom(source: AssetSource, path: string): Promise<LoadOutcome<unknown>> {
    const loader = this.loaderFor(path);
    if (!loader) {
      return { ok: false, path, error: new UnsupportedAssetError(path) };
    }
    return loadAsset(loader, source, path);
  }

  /**
   * Load every path concurrently. Outcomes keep the order of `paths`.
   */
  async loadAll(source: AssetSource, paths: readonly string[]): Promise<LoadOutcome<unknown>[]> {
    return Promise.all(paths.map(path => this.loadFrom(source, path)));
  }
}
