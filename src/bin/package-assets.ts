#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { mkdir, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { assetProtection, env } from '../config/index.js';
import { loadHierarchy, summarizeHierarchy } from '../hierarchy/descriptor.js';
import { AssetShieldError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { packageAssets, type PackageReport } from '../packager/packager.js';
import type { ProtectionMode } from '../types/index.js';

async function assertDirectory(path: string, label: string): Promise<void> {
  const isDirectory = await stat(path).then(
    stats => stats.isDirectory(),
    () => false
  );
  if (!isDirectory) {
    throw new AssetShieldError(`${label} directory does not exist! (PATH:${path})`);
  }
}

export interface PackagerRunOptions {
  sourceDir?: string;
  targetDir?: string;
  outputDirName?: string;
  hierarchyFile?: string;
  protection?: ProtectionMode;
}

/**
 * Pre-build step: package ASSET_SOURCE_DIR into ASSET_TARGET_DIR/ASSET_OUTPUT_DIR_NAME.
 * Options override the environment.
 */
export async function runPackager(options: PackagerRunOptions = {}): Promise<PackageReport> {
  const sourceRoot = resolve(options.sourceDir ?? env.ASSET_SOURCE_DIR);
  const targetRoot = resolve(options.targetDir ?? env.ASSET_TARGET_DIR);
  const destRoot = join(targetRoot, options.outputDirName ?? env.ASSET_OUTPUT_DIR_NAME);
  const protection = options.protection ?? assetProtection();

  await assertDirectory(sourceRoot, 'Asset');
  await assertDirectory(targetRoot, 'Target');
  await mkdir(destRoot, { recursive: true });

  const hierarchy = await loadHierarchy(resolve(options.hierarchyFile ?? env.ASSET_HIERARCHY_FILE));
  logger.info(
    {
      sourceRoot,
      destRoot,
      protection,
      ...summarizeHierarchy(hierarchy)
    },
    'Packaging assets'
  );

  return packageAssets(sourceRoot, destRoot, hierarchy, {
    protection,
    concurrency: env.PACKAGER_CONCURRENCY
  });
}

/**
 * Whether `moduleUrl` is the script node was started with. npm links `bin`
 * entries through a symlink, so the script path is resolved first.
 */
export function isMainModule(moduleUrl: string, scriptPath: string | undefined): boolean {
  if (scriptPath === undefined) {
    return false;
  }
  let realPath: string;
  try {
    realPath = realpathSync(scriptPath);
  } catch {
    return false;
  }
  return moduleUrl === pathToFileURL(realPath).href;
}

if (isMainModule(import.meta.url, process.argv[1])) {
  runPackager().catch((error: unknown) => {
    logger.fatal(
      {
        error: error instanceof Error ? error.message : String(error),
        path: error instanceof Error && 'path' in error ? error.path : undefined
      },
      'Asset packaging failed'
    );
    process.exitCode = 1;
  });
}
