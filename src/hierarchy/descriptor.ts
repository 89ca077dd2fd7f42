/**
 * Asset Hierarchy Descriptor
 *
 * The descriptor is a JSON tree that mirrors the asset source directory:
 *
 * {
 *   "files": ["config.json"],
 *   "target_files": ["logo.sprite"],
 *   "directories": {
 *     "fonts": { "target_files": ["ImgFont_Number.sprite", "ImgFont_Number.atlas"] }
 *   }
 * }
 *
 * Every field is optional and defaults to empty; unknown fields are ignored.
 */

import { readFile } from 'node:fs/promises';

import { HierarchyParseError, errorMessage } from '../lib/errors.js';
import { HierarchyDescriptorSchema, formatIssues } from '../lib/validation.js';
import type { HierarchyNode, HierarchySummary } from '../types/index.js';

/**
 * Parse descriptor text into an immutable hierarchy tree
 */
export function parseHierarchy(text: string): HierarchyNode {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new HierarchyParseError([`(root): ${errorMessage(error)}`], { cause: error });
  }

  const result = HierarchyDescriptorSchema.safeParse(json);
  if (!result.success) {
    throw new HierarchyParseError(formatIssues(result.error), { cause: result.error });
  }

  return freezeHierarchy(result.data);
}

/**
 * Read and parse a descriptor file
 */
export async function loadHierarchy(path: string): Promise<HierarchyNode> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new HierarchyParseError([`${path}: ${errorMessage(error)}`], { cause: error });
  }
  return parseHierarchy(text);
}

/**
 * Count every entry in the tree
 */
export function summarizeHierarchy(node: HierarchyNode): HierarchySummary {
  const summary: HierarchySummary = {
    files: node.files.length,
    targetFiles: node.targetFiles.length,
    directories: 0
  };

  for (const child of Object.values(node.directories)) {
    const nested = summarizeHierarchy(child);
    summary.files += nested.files;
    summary.targetFiles += nested.targetFiles;
    summary.directories += nested.directories + 1;
  }

  return summary;
}

function freezeHierarchy(node: HierarchyNode): HierarchyNode {
  for (const child of Object.values(node.directories)) {
    freezeHierarchy(child);
  }
  Object.freeze(node.files);
  Object.freeze(node.targetFiles);
  Object.freeze(node.directories);
  return Object.freeze(node);
}
