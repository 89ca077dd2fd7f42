export {
  packageAssets,
  verifySourceTree,
  DEFAULT_PACKAGER_CONCURRENCY,
  type PackageOptions,
  type PackageReport,
} from './packager.js';
