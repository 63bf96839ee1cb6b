// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import { loadQuotaConfigFromEnv, parseQuotaConfig } from '../src/config.js';
import { ConfigurationError, QuotaError } from '../src/errors.js';

describe('parseQuotaConfig', () => {
  it('applies defaults for optional fields', () => {
    const config = parseQuotaConfig({
      maxRequestsPerMonth: 20_000,
      maxCostPerMonth: 180,
      costPerRequest: 0.009,
    });
    expect(config).toEqual({
      maxRequestsPerMonth: 20_000,
      maxCostPerMonth: 180,
      costPerRequest: 0.009,
      storageLocation: 'usage.db',
      warningThreshold: 80,
      criticalThreshold: 95,
      recordDenials: true,
    });
  });

  it('accepts a zero cost per request', () => {
    const config = parseQuotaConfig({ maxRequestsPerMonth: 5, maxCostPerMonth: 1, costPerRequest: 0 });
    expect(config.costPerRequest).toBe(0);
  });

  it('throws ConfigurationError for a non-positive request limit', () => {
    expect(() =>
      parseQuotaConfig({ maxRequestsPerMonth: 0, maxCostPerMonth: 1, costPerRequest: 0.01 }),
    ).toThrow(ConfigurationError);
  });

  it('throws ConfigurationError for a fractional request limit', () => {
    expect(() =>
      parseQuotaConfig({ maxRequestsPerMonth: 1.5, maxCostPerMonth: 1, costPerRequest: 0.01 }),
    ).toThrow(ConfigurationError);
  });

  it('reports each issue as "path: message" with code INVALID_CONFIG', () => {
    try {
      parseQuotaConfig({ maxRequestsPerMonth: -1, maxCostPerMonth: 1, costPerRequest: 0.01 });
      expect.unreachable('parseQuotaConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toBeInstanceOf(QuotaError);
      if (!(error instanceof ConfigurationError)) return;
      expect(error.code).toBe('INVALID_CONFIG');
      expect(error.details).toHaveLength(1);
      expect(error.details[0]).toMatch(/^maxRequestsPerMonth: /);
    }
  });

  it('rejects a warning threshold above the critical threshold', () => {
    try {
      parseQuotaConfig({
        maxRequestsPerMonth: 10,
        maxCostPerMonth: 1,
        costPerRequest: 0.01,
        warningThreshold: 96,
        criticalThreshold: 90,
      });
      expect.unreachable('parseQuotaConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (!(error instanceof ConfigurationError)) return;
      expect(error.details).toEqual([
        'warningThreshold: warningThreshold must not exceed criticalThreshold',
      ]);
    }
  });

  it('rejects a missing cost limit', () => {
    expect(() => parseQuotaConfig({ maxRequestsPerMonth: 10, costPerRequest: 0.01 })).toThrow(
      ConfigurationError,
    );
  });
});

describe('loadQuotaConfigFromEnv', () => {
  it('falls back to defaults when nothing is set', () => {
    const config = loadQuotaConfigFromEnv({});
    expect(config.maxRequestsPerMonth).toBe(20_000);
    expect(config.maxCostPerMonth).toBe(180);
    expect(config.costPerRequest).toBe(0.009);
    expect(config.storageLocation).toBe('usage.db');
  });

  it('coerces numeric strings', () => {
    const config = loadQuotaConfigFromEnv({
      QUOTA_MAX_REQUESTS_PER_MONTH: '500',
      QUOTA_MAX_COST_PER_MONTH: '12.5',
      QUOTA_COST_PER_REQUEST: '0.02',
      QUOTA_STORAGE_LOCATION: ':memory:',
    });
    expect(config.maxRequestsPerMonth).toBe(500);
    expect(config.maxCostPerMonth).toBe(12.5);
    expect(config.costPerRequest).toBe(0.02);
    expect(config.storageLocation).toBe(':memory:');
  });

  it('treats blank values as unset', () => {
    const config = loadQuotaConfigFromEnv({ QUOTA_MAX_REQUESTS_PER_MONTH: '   ' });
    expect(config.maxRequestsPerMonth).toBe(20_000);
  });

  it('throws ConfigurationError for a non-numeric value', () => {
    expect(() => loadQuotaConfigFromEnv({ QUOTA_MAX_COST_PER_MONTH: 'lots' })).toThrow(
      ConfigurationError,
    );
  });

  it('throws ConfigurationError for a negative limit', () => {
    expect(() => loadQuotaConfigFromEnv({ QUOTA_MAX_REQUESTS_PER_MONTH: '-5' })).toThrow(
      ConfigurationError,
    );
  });
});
