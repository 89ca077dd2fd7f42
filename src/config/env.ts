import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv();

const logLevels = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent'
] as const;

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(logLevels).default('info'),
  ASSET_SOURCE_DIR: z
    .string()
    .min(1, 'ASSET_SOURCE_DIR must not be empty')
    .default('assets'),
  ASSET_TARGET_DIR: z
    .string()
    .min(1, 'ASSET_TARGET_DIR must not be empty')
    .default('target'),
  ASSET_OUTPUT_DIR_NAME: z
    .string()
    .min(1)
    .refine(value => !/[\\/]/.test(value) && value !== '..' && value !== '.', {
      message: 'ASSET_OUTPUT_DIR_NAME must be a single directory name'
    })
    .default('assets'),
  ASSET_HIERARCHY_FILE: z.string().min(1).default('assets.json'),
  ASSET_PROTECTION: z.enum(['protected', 'plain']).default('protected'),
  PACKAGER_CONCURRENCY: z
    .string()
    .default('16')
    .transform(value => Number(value))
    .pipe(
      z
        .number()
        .int()
        .min(0)
        .max(1024)
        .describe('PACKAGER_CONCURRENCY must be within 0-1024 (0 = unbounded)')
    ),
  IMAGE_DECODE_THREADS: z
    .string()
    .optional()
    .transform(value => (value === undefined || value === '' ? undefined : Number(value)))
    .pipe(
      z
        .number()
        .int()
        .min(1)
        .max(256)
        .optional()
        .describe('IMAGE_DECODE_THREADS must be within 1-256')
    )
});

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  const formatted = parseResult.error.flatten();
  const errors = Object.entries(formatted.fieldErrors)
    .map(([field, messages]) => `${field}: ${messages?.join(', ')}`)
    .join('\n');

  throw new Error(`Environment validation failed:\n${errors}`);
}

const data = parseResult.data;

export const env = {
  ...data,
  isDevelopment: data.NODE_ENV === 'development',
  isProduction: data.NODE_ENV === 'production',
  isTest: data.NODE_ENV === 'test'
};

export type AppEnvironment = typeof env;
