// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect, vi } from 'vitest';
import { ZodError } from 'zod';
import { parseQuotaConfig } from '../src/config.js';
import { MonthlyQuota } from '../src/quota.js';
import { LogSequence, alertFor, buildSnapshot, statusLevelFor } from '../src/reporter.js';
import { MemoryQuotaStorage } from '../src/storage/memory.js';
import type { AggregateRecord } from '../src/types.js';

// ── Helpers ───────────────────────────────────────────────────────────────────

function aggregate(overrides: Partial<AggregateRecord> = {}): AggregateRecord {
  return {
    year: 2024,
    month: 1,
    requestCount: 0,
    costMicros: 0,
    state: 'active',
    createdAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

const thresholds = { warningThreshold: 80, criticalThreshold: 95 };

// ── Pure helpers ──────────────────────────────────────────────────────────────

describe('statusLevelFor', () => {
  it('maps percentages to tiers at the configured thresholds', () => {
    expect(statusLevelFor(0, thresholds)).toBe('ok');
    expect(statusLevelFor(79.99, thresholds)).toBe('ok');
    expect(statusLevelFor(80, thresholds)).toBe('warning');
    expect(statusLevelFor(94.9, thresholds)).toBe('warning');
    expect(statusLevelFor(95, thresholds)).toBe('critical');
    expect(statusLevelFor(100, thresholds)).toBe('exceeded');
    expect(statusLevelFor(150, thresholds)).toBe('exceeded');
  });

  it('honours custom thresholds', () => {
    expect(statusLevelFor(50, { warningThreshold: 50, criticalThreshold: 75 })).toBe('warning');
    expect(statusLevelFor(75, { warningThreshold: 50, criticalThreshold: 75 })).toBe('critical');
  });
});

describe('buildSnapshot', () => {
  const config = parseQuotaConfig({ maxRequestsPerMonth: 200, maxCostPerMonth: 10, costPerRequest: 0.05 });

  it('takes the higher of the request and cost ratios', () => {
    const snapshot = buildSnapshot(aggregate({ requestCount: 50, costMicros: 4_500_000 }), config);
    expect(snapshot).toEqual({
      yearMonth: '2024-01',
      requestsUsed: 50,
      costUsed: 4.5,
      requestsRemaining: 150,
      costRemaining: 5.5,
      maxRequests: 200,
      maxCost: 10,
      percentUsed: 45,
      statusLevel: 'ok',
    });
  });

  it('floors remaining headroom at zero', () => {
    const snapshot = buildSnapshot(aggregate({ requestCount: 240, costMicros: 0 }), config);
    expect(snapshot.requestsRemaining).toBe(0);
    expect(snapshot.percentUsed).toBe(120);
    expect(snapshot.statusLevel).toBe('exceeded');
  });

  it('is pure', () => {
    const record = aggregate({ requestCount: 10, costMicros: 500_000 });
    expect(buildSnapshot(record, config)).toEqual(buildSnapshot(record, config));
  });
});

describe('alertFor', () => {
  it('returns nothing while usage is ok', () => {
    const config = parseQuotaConfig({ maxRequestsPerMonth: 1000, maxCostPerMonth: 1000, costPerRequest: 0 });
    expect(alertFor(buildSnapshot(aggregate({ requestCount: 100 }), config))).toBeUndefined();
  });

  it('describes the warning tier', () => {
    const config = parseQuotaConfig({ maxRequestsPerMonth: 1000, maxCostPerMonth: 1000, costPerRequest: 0 });
    expect(alertFor(buildSnapshot(aggregate({ requestCount: 852 }), config))).toBe(
      'Monthly API budget 85% used for 2024-01.',
    );
  });

  it('describes the critical tier with the remaining requests', () => {
    const config = parseQuotaConfig({ maxRequestsPerMonth: 1000, maxCostPerMonth: 1000, costPerRequest: 0 });
    expect(alertFor(buildSnapshot(aggregate({ requestCount: 965 }), config))).toBe(
      'Monthly API budget 96% used for 2024-01: 35 requests remaining.',
    );
  });

  it('describes an exhausted budget', () => {
    const config = parseQuotaConfig({ maxRequestsPerMonth: 3, maxCostPerMonth: 0.03, costPerRequest: 0.01 });
    expect(alertFor(buildSnapshot(aggregate({ requestCount: 3, costMicros: 30_000 }), config))).toBe(
      'Monthly API budget exceeded for 2024-01: 3/3 requests, 0.03/0.03 cost used.',
    );
  });
});

// ── UsageReporter through MonthlyQuota ────────────────────────────────────────

describe('UsageReporter', () => {
  function makeQuota(start: string): {
    quota: MonthlyQuota;
    storage: MemoryQuotaStorage;
    setClock: (iso: string) => void;
  } {
    let now = new Date(start);
    const clock = (): Date => now;
    const storage = new MemoryQuotaStorage({ now: clock });
    const quota = new MonthlyQuota(
      { maxRequestsPerMonth: 100, maxCostPerMonth: 10, costPerRequest: 0.01 },
      storage,
      { clock },
    );
    return {
      quota,
      storage,
      setClock: (iso) => {
        now = new Date(iso);
      },
    };
  }

  describe('snapshot', () => {
    it('starts a new month at zero', async () => {
      const { quota } = makeQuota('2024-05-03T00:00:00Z');
      const snapshot = await quota.getSnapshot();
      expect(snapshot).toMatchObject({ yearMonth: '2024-05', requestsUsed: 0, costUsed: 0, statusLevel: 'ok' });
    });

    it('returns the same snapshot when nothing was written in between', async () => {
      const { quota } = makeQuota('2024-05-03T00:00:00Z');
      await quota.commit({ endpoint: 'search', outcome: 'allowed-success' });
      expect(await quota.getSnapshot()).toEqual(await quota.getSnapshot());
    });

    it('reports the alert for the current month', async () => {
      const { quota } = makeQuota('2024-05-03T00:00:00Z');
      await quota.commit({ endpoint: 'search', outcome: 'allowed-success', actualRequests: 90 });
      expect(await quota.getAlert()).toBe('Monthly API budget 90% used for 2024-05.');
    });
  });

  describe('history', () => {
    it('lists frozen months most recent first', async () => {
      const { quota, setClock } = makeQuota('2024-01-10T00:00:00Z');
      await quota.commit({ endpoint: 'search', outcome: 'allowed-success', actualRequests: 1 });
      setClock('2024-02-10T00:00:00Z');
      await quota.commit({ endpoint: 'search', outcome: 'allowed-success', actualRequests: 2 });
      setClock('2024-03-10T00:00:00Z');
      await quota.commit({ endpoint: 'search', outcome: 'allowed-success', actualRequests: 3 });
      setClock('2024-04-10T00:00:00Z');

      const history = await quota.getHistory(2);
      expect(history.map((month) => [month.yearMonth, month.requestCount])).toEqual([
        ['2024-03', 3],
        ['2024-02', 2],
      ]);
      expect(history.every((month) => month.state === 'frozen')).toBe(true);
      expect(await quota.getHistory(10)).toHaveLength(3);
    });

    it('returns an empty list for zero months', async () => {
      const { quota } = makeQuota('2024-01-10T00:00:00Z');
      expect(await quota.getHistory(0)).toEqual([]);
    });

    it('rejects a negative count', async () => {
      const { quota } = makeQuota('2024-01-10T00:00:00Z');
      await expect(quota.getHistory(-1)).rejects.toThrow(RangeError);
    });
  });

  describe('log', () => {
    it('does not read the store until iterated', async () => {
      const { quota, storage } = makeQuota('2024-01-10T00:00:00Z');
      await quota.commit({ endpoint: 'search', outcome: 'allowed-success' });
      const readLog = vi.spyOn(storage, 'readLog');

      const log = quota.getLog();
      expect(readLog).not.toHaveBeenCalled();

      for await (const entry of log) {
        expect(entry.sequence).toBe(1);
        break;
      }
      expect(readLog).toHaveBeenCalledTimes(1);
    });

    it('starts over on every iteration', async () => {
      const { quota } = makeQuota('2024-01-10T00:00:00Z');
      for (const endpoint of ['search', 'lookup', 'search']) {
        await quota.commit({ endpoint, outcome: 'allowed-success' });
      }

      const log = quota.getLog({ endpoint: 'search' });
      const first = (await log.toArray()).map((entry) => entry.sequence);
      const second = (await log.toArray()).map((entry) => entry.sequence);
      expect(first).toEqual([1, 3]);
      expect(second).toEqual([1, 3]);
    });

    it('walks every page in order', async () => {
      const { quota, storage } = makeQuota('2024-01-10T00:00:00Z');
      for (let i = 0; i < 5; i++) {
        await quota.commit({ endpoint: 'search', outcome: 'allowed-success' });
      }

      const entries = await new LogSequence(storage, {}, 2).toArray();
      expect(entries.map((entry) => entry.sequence)).toEqual([1, 2, 3, 4, 5]);
    });

    it('stops after limit entries', async () => {
      const { quota } = makeQuota('2024-01-10T00:00:00Z');
      for (let i = 0; i < 5; i++) {
        await quota.commit({ endpoint: 'search', outcome: 'allowed-success' });
      }
      const entries = await quota.getLog({ limit: 2 }).toArray();
      expect(entries.map((entry) => entry.sequence)).toEqual([1, 2]);
    });

    it('walks newest first across pages', async () => {
      const { quota, storage } = makeQuota('2024-01-10T00:00:00Z');
      for (let i = 0; i < 5; i++) {
        await quota.commit({ endpoint: 'search', outcome: 'allowed-success' });
      }

      const all = await new LogSequence(storage, { newestFirst: true }, 2).toArray();
      expect(all.map((entry) => entry.sequence)).toEqual([5, 4, 3, 2, 1]);
      const latest = await quota.getLog({ newestFirst: true, limit: 3 }).toArray();
      expect(latest.map((entry) => entry.sequence)).toEqual([5, 4, 3]);
    });

    it('filters by the month an entry is attributed to', async () => {
      const { quota, setClock } = makeQuota('2024-01-10T00:00:00Z');
      await quota.commit({ endpoint: 'search', outcome: 'allowed-success' });
      setClock('2024-02-10T00:00:00Z');
      await quota.commit({ endpoint: 'search', outcome: 'allowed-success' });

      const february = await quota.getLog({ yearMonth: '2024-02' }).toArray();
      expect(february.map((entry) => entry.sequence)).toEqual([2]);
    });

    it('rejects a malformed filter', () => {
      const { quota } = makeQuota('2024-01-10T00:00:00Z');
      expect(() => quota.getLog({ yearMonth: 'January' })).toThrow(ZodError);
    });
  });
});
