/**
 * Build-Time Asset Packager
 *
 * Mirrors a source asset tree into a destination tree following a hierarchy
 * descriptor:
 * 1. Verifies every referenced file and directory before writing anything
 * 2. Copies plain files in walk order
 * 3. Dispatches one sealing task per target file (bounded by a TaskPool)
 * 4. Waits for every task to settle, then fails if any of them failed
 *
 * The walk itself is sequential, so a destination directory always exists
 * before tasks that write into it are dispatched.
 */

import { randomBytes } from 'node:crypto';
import { copyFile, mkdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { sealAsset } from '../crypto/codec.js';
import { PackagingError, type PackagingFailure } from '../lib/errors.js';
import { logger as rootLogger, type Logger } from '../lib/logger.js';
import { TaskPool } from '../lib/task-pool.js';
import type { HierarchyNode, ProtectionMode } from '../types/index.js';

export const DEFAULT_PACKAGER_CONCURRENCY = 16;

export interface PackageOptions {
  /** `plain` copies target files verbatim instead of sealing them. Default: protected */
  protection?: ProtectionMode;
  /** Maximum sealing tasks in flight; 0 = unbounded. Default: 16 */
  concurrency?: number;
  logger?: Logger;
}

export interface PackageReport {
  /** Destination paths copied verbatim */
  copied: string[];
  /** Destination paths written as sealed blobs */
  encrypted: string[];
  /** Destination directories created (or already present) */
  directories: string[];
  durationMs: number;
}

interface WalkState {
  protection: ProtectionMode;
  pool: TaskPool;
  units: Array<Promise<void>>;
  failures: PackagingFailure[];
  report: PackageReport;
  log: Logger;
}

/**
 * Package `sourceRoot` into `destRoot` according to `hierarchy`.
 *
 * @throws PackagingError naming the offending path. Nothing is written when a
 *   referenced source entry is missing.
 */
export async function packageAssets(
  sourceRoot: string,
  destRoot: string,
  hierarchy: HierarchyNode,
  options: PackageOptions = {}
): Promise<PackageReport> {
  const startedAt = Date.now();
  const log = (options.logger ?? rootLogger).child({ component: 'packager' });
  const protection = options.protection ?? 'protected';

  await verifySourceTree(sourceRoot, hierarchy);

  const state: WalkState = {
    protection,
    pool: new TaskPool(options.concurrency ?? DEFAULT_PACKAGER_CONCURRENCY),
    units: [],
    failures: [],
    report: { copied: [], encrypted: [], directories: [], durationMs: 0 },
    log
  };

  let walkError: unknown;
  try {
    await mkdir(destRoot, { recursive: true });
    await walk(sourceRoot, destRoot, hierarchy, state);
  } catch (error) {
    walkError = error;
  }

  // Join every dispatched task before reporting anything
  await Promise.all(state.units);

  if (walkError !== undefined) {
    throw toPackagingError(walkError, destRoot);
  }

  const [firstFailure] = state.failures;
  if (firstFailure) {
    log.error({ failures: state.failures.map(({ reason, path }) => ({ reason, path })) }, 'Sealing failed');
    throw new PackagingError(firstFailure, state.failures);
  }

  state.report.durationMs = Date.now() - startedAt;
  log.info(
    {
      copied: state.report.copied.length,
      encrypted: state.report.encrypted.length,
      directories: state.report.directories.length,
      durationMs: state.report.durationMs,
      protection
    },
    'packaging completed'
  );

  return state.report;
}

/**
 * Check that every name in the descriptor exists with the right kind
 */
export async function verifySourceTree(sourceRoot: string, node: HierarchyNode): Promise<void> {
  for (const name of [...node.files, ...node.targetFiles]) {
    const path = join(sourceRoot, name);
    if (!(await isFile(path))) {
      throw new PackagingError({ reason: 'missing-file', path });
    }
  }

  for (const [name, child] of Object.entries(node.directories)) {
    const path = join(sourceRoot, name);
    if (!(await isDirectory(path))) {
      throw new PackagingError({ reason: 'missing-directory', path });
    }
    await verifySourceTree(path, child);
  }
}

async function walk(src: string, dst: string, node: HierarchyNode, state: WalkState): Promise<void> {
  for (const name of node.files) {
    await copyPlain(join(src, name), join(dst, name), state);
  }

  for (const name of node.targetFiles) {
    const from = join(src, name);
    const to = join(dst, name);

    if (state.protection === 'plain') {
      await copyPlain(from, to, state);
      continue;
    }

    const unit = state.pool.run(() => sealFile(from, to)).then(
      () => {
        state.report.encrypted.push(to);
        state.log.debug({ from, to }, 'asset packaged');
      },
      (error: unknown) => {
        const failure = toPackagingError(error, from);
        state.failures.push({ reason: failure.reason, path: failure.path, cause: failure.cause });
      }
    );
    state.units.push(unit);
  }

  for (const [name, child] of Object.entries(node.directories)) {
    const childDst = join(dst, name);
    try {
      await mkdir(childDst, { recursive: true });
    } catch (error) {
      throw new PackagingError({ reason: 'io', path: childDst, cause: error });
    }
    state.report.directories.push(childDst);

    await walk(join(src, name), childDst, child, state);
  }
}

async function copyPlain(from: string, to: string, state: WalkState): Promise<void> {
  try {
    await copyFile(from, to);
  } catch (error) {
    throw new PackagingError({ reason: 'io', path: to, cause: error });
  }
  state.report.copied.push(to);
}

/**
 * One sealing task: read, seal, write. Shares nothing with other tasks.
 */
async function sealFile(from: string, to: string): Promise<void> {
  let plaintext: Buffer;
  try {
    plaintext = await readFile(from);
  } catch (error) {
    throw new PackagingError({ reason: 'io', path: from, cause: error });
  }

  let blob: Buffer;
  try {
    blob = sealAsset(plaintext);
  } catch (error) {
    throw new PackagingError({ reason: 'crypto', path: from, cause: error });
  } finally {
    plaintext.fill(0);
  }

  try {
    await writeFileAtomic(to, blob);
  } catch (error) {
    throw new PackagingError({ reason: 'io', path: to, cause: error });
  }
}

/**
 * Write to a temporary sibling, then rename over the destination
 */
async function writeFileAtomic(path: string, data: Buffer): Promise<void> {
  const tempPath = `${path}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`;
  try {
    await writeFile(tempPath, data);
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

function toPackagingError(error: unknown, path: string): PackagingError {
  return error instanceof PackagingError
    ? error
    : new PackagingError({ reason: 'io', path, cause: error });
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}
