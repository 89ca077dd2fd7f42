/**
 * Directory-backed asset source
 *
 * Serves byte streams for asset paths relative to a base directory, e.g. the
 * packager's output tree:
 * target/assets/
 * ├── fonts/ImgFont_Number.sprite   (sealed)
 * ├── fonts/ImgFont_Number.atlas    (sealed)
 * └── config.json                   (plain)
 */

import { constants, createReadStream } from 'node:fs';
import { access } from 'node:fs/promises';
import { isAbsolute, join, relative, resolve, sep } from 'node:path';

import { AssetNotFoundError } from '../lib/errors.js';
import type { AssetByteStream, AssetSource } from '../types/index.js';

/**
 * Configuration for a file asset source
 */
export interface FileSourceConfig {
  /** Directory asset paths are resolved against */
  basePath: string;
}

const DEFAULT_ASSET_PATH = join(process.cwd(), 'target', 'assets');

export class FileAssetSource implements AssetSource {
  private config: FileSourceConfig;

  constructor(config?: Partial<FileSourceConfig>) {
    this.config = {
      basePath: resolve(config?.basePath ?? DEFAULT_ASSET_PATH)
    };
  }

  get basePath(): string {
    return this.config.basePath;
  }

  /**
   * Absolute path for an asset path, or null when it escapes the base directory.
   * Query strings and fragments (cache busters) are ignored.
   */
  public resolvePath(path: string): string | null {
    const clean = path.replace(/[?#].*$/, '');
    const fullPath = resolve(this.config.basePath, clean);
    const rel = relative(this.config.basePath, fullPath);

    if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      return null;
    }
    return fullPath;
  }

  /**
   * Check if an asset file exists
   */
  public async exists(path: string): Promise<boolean> {
    const fullPath = this.resolvePath(path);
    if (!fullPath) {
      return false;
    }
    try {
      await access(fullPath, constants.R_OK);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Open an asset for reading
   *
   * @throws AssetNotFoundError when the file is absent or outside the base directory
   */
  public async open(path: string): Promise<AssetByteStream> {
    const fullPath = this.resolvePath(path);
    if (!fullPath || !(await this.exists(path))) {
      throw new AssetNotFoundError(path);
    }
    return createReadStream(fullPath);
  }
}
