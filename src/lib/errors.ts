/**
 * Typed error classes for packaging and asset loading.
 *
 * Build-time failures (`HierarchyParseError`, `PackagingError`) abort the build.
 * Load-time failures derive from `AssetLoadError` and keep the crypto, read and
 * decode cases apart so callers can tell a tampered file from a malformed one.
 */

/** Base class for all asset-shield errors. */
export class AssetShieldError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AssetShieldError';
  }
}

/** The hierarchy descriptor is not valid JSON or does not match the expected shape. */
export class HierarchyParseError extends AssetShieldError {
  constructor(
    public readonly issues: string[],
    options?: { cause?: unknown }
  ) {
    super(`Invalid asset hierarchy descriptor:\n${issues.join('\n')}`, options);
    this.name = 'HierarchyParseError';
  }
}

export type PackagingFailureReason = 'missing-file' | 'missing-directory' | 'io' | 'crypto';

export interface PackagingFailure {
  reason: PackagingFailureReason;
  path: string;
  cause?: unknown;
}

/** Fatal build failure. `path` names the first offending file or directory. */
export class PackagingError extends AssetShieldError {
  public readonly reason: PackagingFailureReason;
  public readonly path: string;
  public readonly failures: readonly PackagingFailure[];

  constructor(failure: PackagingFailure, failures: readonly PackagingFailure[] = [failure]) {
    super(`${describePackagingFailure(failure.reason)} (PATH:${failure.path})`, {
      cause: failure.cause
    });
    this.name = 'PackagingError';
    this.reason = failure.reason;
    this.path = failure.path;
    this.failures = failures;
  }
}

function describePackagingFailure(reason: PackagingFailureReason): string {
  switch (reason) {
    case 'missing-file':
      return 'Could not find asset file!';
    case 'missing-directory':
      return 'Could not find asset directory!';
    case 'crypto':
      return 'Failed to encrypt asset file!';
    case 'io':
      return 'Failed to write asset output!';
  }
}

export type CryptoFailureReason = 'malformed' | 'authentication-failed';

/** Blob too short to hold a nonce and tag, or the tag did not verify. */
export class CryptoError extends AssetShieldError {
  constructor(
    public readonly reason: CryptoFailureReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CryptoError';
  }
}

/** The requested asset does not exist in the asset source. */
export class AssetNotFoundError extends AssetShieldError {
  constructor(public readonly path: string) {
    super(`Asset not found: ${path}`);
    this.name = 'AssetNotFoundError';
  }
}

/** Base class for failures surfaced by an asset loader. */
export abstract class AssetLoadError extends AssetShieldError {
  constructor(
    public readonly assetPath: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AssetLoadError';
  }
}

/** The byte stream could not be read. */
export class AssetReadError extends AssetLoadError {
  constructor(assetPath: string, cause: unknown) {
    super(assetPath, `Failed to load asset "${assetPath}": ${errorMessage(cause)}`, { cause });
    this.name = 'AssetReadError';
  }
}

/** The blob is malformed, corrupted, or was tampered with. */
export class AssetCryptoError extends AssetLoadError {
  public readonly reason: CryptoFailureReason;

  constructor(assetPath: string, cause: CryptoError) {
    super(assetPath, `Failed to decrypt asset "${assetPath}": ${cause.message}`, { cause });
    this.name = 'AssetCryptoError';
    this.reason = cause.reason;
  }
}

/** The plaintext was obtained but is not valid content for the loader's format. */
export class AssetDecodeError extends AssetLoadError {
  constructor(assetPath: string, cause: unknown) {
    super(assetPath, `Failed to decode asset "${assetPath}": ${errorMessage(cause)}`, { cause });
    this.name = 'AssetDecodeError';
  }
}

/** No registered loader claims the asset's extension. */
export class UnsupportedAssetError extends AssetLoadError {
  constructor(assetPath: string) {
    super(assetPath, `No loader registered for asset "${assetPath}"`);
    this.name = 'UnsupportedAssetError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
