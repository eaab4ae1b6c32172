import type { LogLevel } from '@ocrean/logger';
import type { SpacingCorrectorConfig } from '@ocrean/text-processor';

import { LOG_LEVELS } from '@ocrean/logger';
import { SPACING_CORRECTOR, TEXT_PROCESSOR } from '@ocrean/text-processor';
import { resolve } from 'node:path';
import { z } from 'zod';

import { SettingsError } from './errors/service-errors';

export const STORAGE_BACKENDS = ['local', 's3'] as const;

export type StorageBackend = (typeof STORAGE_BACKENDS)[number];

const DEFAULT_S3_REGION = 'eu-west-3';

const booleanFlagSchema = z
  .string()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0']))
  .transform((value) => value === 'true' || value === '1');

const localeSchema = z.string().refine(
  (value) => {
    try {
      return Intl.getCanonicalLocales(value).length === 1;
    } catch {
      return false;
    }
  },
  { message: 'Invalid locale tag' },
);

/**
 * Environment variables read by the service
 */
export const settingsSchema = z
  .object({
    OCREAN_STORAGE_BACKEND: z
      .string()
      .toLowerCase()
      .pipe(z.enum(STORAGE_BACKENDS))
      .default('local'),
    OCREAN_DATA_DIR: z.string().default('data'),
    OCREAN_S3_BUCKET: z.string().optional(),
    OCREAN_S3_REGION: z.string().default(DEFAULT_S3_REGION),
    OCREAN_AWS_PROFILE: z.string().optional(),
    OCREAN_LOG_LEVEL: z
      .string()
      .toLowerCase()
      .pipe(z.enum(LOG_LEVELS))
      .default('info'),
    OCREAN_SENTENCE_LOCALE: localeSchema.default(TEXT_PROCESSOR.DEFAULT_LOCALE),
    OCREAN_SPACING_ENABLED: booleanFlagSchema.default('false'),
    OCREAN_SPACING_COMMAND: z.string().optional(),
    OCREAN_SPACING_ARGS: z.string().optional(),
    OCREAN_SPACING_TIMEOUT_MS: z.coerce
      .number()
      .int()
      .positive()
      .default(SPACING_CORRECTOR.DEFAULT_TIMEOUT_MS),
  })
  .refine(
    (values) =>
      values.OCREAN_STORAGE_BACKEND !== 's3' || !!values.OCREAN_S3_BUCKET?.trim(),
    {
      message: 'S3 bucket name is required when using the s3 storage backend',
      path: ['OCREAN_S3_BUCKET'],
    },
  );

export interface S3Settings {
  /** Required when the storage backend is `s3` */
  bucket: string | undefined;

  region: string;

  /** Named profile from the shared AWS config; default credential chain when unset */
  profile: string | undefined;
}

export interface Settings {
  storageBackend: StorageBackend;

  /** Absolute path of the local storage root */
  dataDir: string;

  s3: S3Settings;

  logLevel: LogLevel;

  /** Locale passed to the sentence boundary provider */
  sentenceLocale: string;

  spacing: SpacingCorrectorConfig;
}

/**
 * Reads and validates settings from environment variables.
 * Empty variables count as unset.
 *
 * @param env - Environment (default: process.env)
 * @param cwd - Base for a relative OCREAN_DATA_DIR (default: process.cwd())
 * @throws SettingsError listing every invalid variable
 */
export function loadSettings(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd(),
): Settings {
  const provided = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const result = settingsSchema.safeParse(provided);
  if (!result.success) {
    throw new SettingsError(
      result.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    );
  }

  const values = result.data;

  return {
    storageBackend: values.OCREAN_STORAGE_BACKEND,
    dataDir: resolve(cwd, values.OCREAN_DATA_DIR),
    s3: {
      bucket: values.OCREAN_S3_BUCKET?.trim() || undefined,
      region: values.OCREAN_S3_REGION,
      profile: values.OCREAN_AWS_PROFILE?.trim() || undefined,
    },
    logLevel: values.OCREAN_LOG_LEVEL,
    sentenceLocale: values.OCREAN_SENTENCE_LOCALE,
    spacing: {
      enabled: values.OCREAN_SPACING_ENABLED,
      command: values.OCREAN_SPACING_COMMAND?.trim() || undefined,
      args: values.OCREAN_SPACING_ARGS?.trim()
        ? values.OCREAN_SPACING_ARGS.trim().split(/\s+/)
        : undefined,
      timeoutMs: values.OCREAN_SPACING_TIMEOUT_MS,
    },
  };
}
