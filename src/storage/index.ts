/**
 * Storage module - byte sources for asset loading
 */

export { FileAssetSource, type FileSourceConfig } from './file-source.js';
