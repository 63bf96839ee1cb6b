// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import { ConfigurationError } from './errors.js';

// ---------------------------------------------------------------------------
// Budget config
// ---------------------------------------------------------------------------

/**
 * Zod schema for the monthly budget.
 *
 * Limits are STATIC: loaded once at startup and constant for the process
 * lifetime. There is no hot reload.
 */
export const QuotaConfigSchema = z.object({
  /** Hard cap on external calls per calendar month. */
  maxRequestsPerMonth: z.number().int().positive(),
  /** Hard cap on accrued cost per calendar month. */
  maxCostPerMonth: z.number().positive(),
  /** Cost charged per request when the caller supplies no estimate. */
  costPerRequest: z.number().nonnegative(),
  /** SQLite file path, or `:memory:`. */
  storageLocation: z.string().min(1).default('usage.db'),
  /** Percent used at which the status becomes `warning`. */
  warningThreshold: z.number().positive().max(100).default(80),
  /** Percent used at which the status becomes `critical`. */
  criticalThreshold: z.number().positive().max(100).default(95),
  /** Append a `denied` log entry whenever the guard refuses a reservation. */
  recordDenials: z.boolean().default(true),
}).refine(
  (config) => config.warningThreshold <= config.criticalThreshold,
  { message: 'warningThreshold must not exceed criticalThreshold', path: ['warningThreshold'] },
);

export type QuotaConfig = z.infer<typeof QuotaConfigSchema>;
export type QuotaConfigInput = z.input<typeof QuotaConfigSchema>;

/**
 * Parse and validate a QuotaConfig, throwing ConfigurationError on failure.
 */
export function parseQuotaConfig(raw: unknown): QuotaConfig {
  const result = QuotaConfigSchema.safeParse(raw);
  if (!result.success) {
    const messages = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new ConfigurationError(messages);
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

export const DEFAULT_MAX_REQUESTS_PER_MONTH = 20_000;
export const DEFAULT_MAX_COST_PER_MONTH = 180;
export const DEFAULT_COST_PER_REQUEST = 0.009;

const QuotaEnvSchema = z.object({
  QUOTA_MAX_REQUESTS_PER_MONTH: z.coerce.number().default(DEFAULT_MAX_REQUESTS_PER_MONTH),
  QUOTA_MAX_COST_PER_MONTH: z.coerce.number().default(DEFAULT_MAX_COST_PER_MONTH),
  QUOTA_COST_PER_REQUEST: z.coerce.number().default(DEFAULT_COST_PER_REQUEST),
  QUOTA_STORAGE_LOCATION: z.string().min(1).default('usage.db'),
});

/**
 * Build a QuotaConfig from `QUOTA_*` environment variables.
 *
 * Unset variables fall back to the defaults above; set but malformed values
 * raise ConfigurationError.
 */
export function loadQuotaConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): QuotaConfig {
  const result = QuotaEnvSchema.safeParse({
    QUOTA_MAX_REQUESTS_PER_MONTH: blankToUndefined(env['QUOTA_MAX_REQUESTS_PER_MONTH']),
    QUOTA_MAX_COST_PER_MONTH: blankToUndefined(env['QUOTA_MAX_COST_PER_MONTH']),
    QUOTA_COST_PER_REQUEST: blankToUndefined(env['QUOTA_COST_PER_REQUEST']),
    QUOTA_STORAGE_LOCATION: blankToUndefined(env['QUOTA_STORAGE_LOCATION']),
  });
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  return parseQuotaConfig({
    maxRequestsPerMonth: result.data.QUOTA_MAX_REQUESTS_PER_MONTH,
    maxCostPerMonth: result.data.QUOTA_MAX_COST_PER_MONTH,
    costPerRequest: result.data.QUOTA_COST_PER_REQUEST,
    storageLocation: result.data.QUOTA_STORAGE_LOCATION,
  });
}

function blankToUndefined(value: string | undefined): string | undefined {
  if (value === undefined || value.trim().length === 0) return undefined;
  return value;
}
