import { isAbsolute } from 'node:path';
import { z } from 'zod';

import type { Configuration, HierarchyNode } from '../types/index.js';

/**
 * Validation schemas for the descriptor and for decoded asset payloads
 */

// Names that clash with Object.prototype members when used as record keys
const RESERVED_NAMES = new Set(['__proto__', 'constructor', 'prototype']);

/**
 * A single file or directory name inside its parent directory
 */
export const AssetNameSchema = z
  .string()
  .min(1, 'Name must not be empty')
  .refine(name => !/[\\/]/.test(name) && !isAbsolute(name), {
    message: 'Name must not contain a path separator'
  })
  .refine(name => name !== '.' && name !== '..', {
    message: 'Name must not be "." or ".."'
  })
  .refine(name => !RESERVED_NAMES.has(name), {
    message: 'Name is reserved'
  });

/** Wire shape of a descriptor node, before defaults are applied */
export interface HierarchyDescriptorInput {
  files?: string[];
  target_files?: string[];
  directories?: Record<string, HierarchyDescriptorInput>;
}

function unique(names: string[]): string[] {
  return [...new Set(names)];
}

export const HierarchyDescriptorSchema: z.ZodType<
  HierarchyNode,
  z.ZodTypeDef,
  HierarchyDescriptorInput
> = z.lazy(() =>
  z
    .object({
      files: z.array(AssetNameSchema).default([]),
      target_files: z.array(AssetNameSchema).default([]),
      directories: z.record(AssetNameSchema, HierarchyDescriptorSchema).default({})
    })
    .superRefine((node, ctx) => {
      const plain = new Set(node.files);
      node.target_files.forEach((name, index) => {
        if (plain.has(name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['target_files', index],
            message: `"${name}" is listed in both files and target_files`
          });
        }
      });
    })
    .transform(node => ({
      files: unique(node.files),
      targetFiles: unique(node.target_files),
      directories: node.directories
    }))
);

const UInt32Schema = z.number().int().min(0).max(0xffffffff);

export const UInt2Schema = z.object({
  x: UInt32Schema,
  y: UInt32Schema
});

export const AtlasRectSchema = z.object({
  min: UInt2Schema,
  max: UInt2Schema
});

/**
 * Serializable structure of a `.atlas` file
 */
export const SerializableTextureAtlasSchema = z.object({
  /** Total size of the atlas image */
  size: UInt2Schema,
  /** Sub-rectangles, in insertion order */
  textures: z.array(AtlasRectSchema)
});

export type SerializableTextureAtlas = z.infer<typeof SerializableTextureAtlasSchema>;

export const ConfigurationSchema: z.ZodType<Configuration, z.ZodTypeDef, unknown> = z
  .object({
    server_url: z.string().url('server_url must be a valid URL')
  })
  .transform(value => ({ serverUrl: value.server_url }));

/**
 * Flatten a ZodError into `path: message` lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}
