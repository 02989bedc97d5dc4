/**
 * Process configuration for the extraction pipeline
 *
 * Environment switches (which optional passes run, which diagnostics are
 * stored) and per-company overrides. Per-document options live in
 * `shared/schema/pipeline-config.ts`.
 */

import { z } from 'zod';
import * as dotenv from 'dotenv';
import { PipelineError } from '@shared/errors';
import type { ClientBucket } from '@shared/constants';

// Load environment variables from .env file
dotenv.config();

const FLAG_TRUE = new Set(['1', 'true', 'yes', 'on']);

/**
 * "1"/"true"/"yes"/"on" switch with a default for when the variable is unset.
 */
const envFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === '' ? fallback : FLAG_TRUE.has(value.trim().toLowerCase())));

const optionalText = z
  .string()
  .optional()
  .transform((value) => value?.trim() ?? '');

// Environment schema
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  // Per-company overrides
  COMPANY_NAME_RABBIT: optionalText,
  COMPANY_NAME_SHD: optionalText,
  COMPANY_NAME_TOPONE: optionalText,
  GL_CODE_RABBIT: optionalText,
  GL_CODE_SHD: optionalText,
  GL_CODE_TOPONE: optionalText,

  // Optional passes
  ENHANCE_ENABLED: envFlag(false),
  ENHANCE_FILL_MISSING: envFlag(true),
  REPAIR_PASS_ENABLED: envFlag(false),

  // Diagnostics stored on each row
  STORE_CLASSIFIER_META: envFlag(true),
  STORE_WHT_META: envFlag(true),
  STORE_WALLET_META: envFlag(true),
  STORE_VENDOR_META: envFlag(true),
  STORE_COLLABORATOR_ERRORS: envFlag(true),
});

export type EnvInput = Partial<Record<keyof z.input<typeof envSchema>, string>>;

export interface Config {
  NODE_ENV: 'development' | 'production' | 'test';
  LOG_LEVEL: 'error' | 'warn' | 'info' | 'debug';
  IS_DEVELOPMENT: boolean;
  IS_PRODUCTION: boolean;

  companyNames: Record<ClientBucket, string>;
  glCodes: Record<ClientBucket, string>;

  passes: {
    enhance: boolean;
    /** Enhancement merges only into empty fields when true, overwrites otherwise */
    enhanceFillMissing: boolean;
    repair: boolean;
  };

  diagnostics: {
    classifier: boolean;
    wht: boolean;
    wallet: boolean;
    vendor: boolean;
    collaboratorErrors: boolean;
  };
}

/**
 * Build a typed configuration from an environment map.
 *
 * @throws PipelineError (INVALID_CONFIGURATION) when a variable has an unknown value
 */
export function loadConfig(source: NodeJS.ProcessEnv | EnvInput = process.env): Config {
  const envResult = envSchema.safeParse(source);

  if (!envResult.success) {
    const issues = envResult.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw PipelineError.invalidConfiguration(`Invalid environment configuration: ${issues.join('; ')}`, { issues });
  }

  const env = envResult.data;

  return {
    NODE_ENV: env.NODE_ENV,
    LOG_LEVEL: env.LOG_LEVEL,
    IS_DEVELOPMENT: env.NODE_ENV === 'development',
    IS_PRODUCTION: env.NODE_ENV === 'production',

    companyNames: {
      RABBIT: env.COMPANY_NAME_RABBIT,
      SHD: env.COMPANY_NAME_SHD,
      TOPONE: env.COMPANY_NAME_TOPONE,
    },
    glCodes: {
      RABBIT: env.GL_CODE_RABBIT,
      SHD: env.GL_CODE_SHD,
      TOPONE: env.GL_CODE_TOPONE,
    },

    passes: {
      enhance: env.ENHANCE_ENABLED,
      enhanceFillMissing: env.ENHANCE_FILL_MISSING,
      repair: env.REPAIR_PASS_ENABLED,
    },

    diagnostics: {
      classifier: env.STORE_CLASSIFIER_META,
      wht: env.STORE_WHT_META,
      wallet: env.STORE_WALLET_META,
      vendor: env.STORE_VENDOR_META,
      collaboratorErrors: env.STORE_COLLABORATOR_ERRORS,
    },
  };
}

// Export process configuration
export const config: Config = loadConfig();
