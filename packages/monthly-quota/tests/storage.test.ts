// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import type { QuotaStorage } from '../src/storage/interface.js';
import { MemoryQuotaStorage } from '../src/storage/memory.js';
import { SqliteQuotaStorage } from '../src/storage/sqlite.js';
import type { MonthKey, PendingLogEntry } from '../src/types.js';

// ── Helpers ───────────────────────────────────────────────────────────────────

const NOW = new Date('2024-02-10T08:00:00.000Z');
const clock = (): Date => NOW;

const JAN: MonthKey = { year: 2024, month: 1 };
const FEB: MonthKey = { year: 2024, month: 2 };
const MAR: MonthKey = { year: 2024, month: 3 };

function pending(overrides: Partial<PendingLogEntry> = {}): PendingLogEntry {
  return {
    timestamp: NOW.toISOString(),
    endpoint: 'search',
    operationTag: 'query',
    requests: 1,
    costMicros: 10_000,
    outcome: 'allowed-success',
    ...overrides,
  };
}

const backends: Array<[string, () => Promise<QuotaStorage>]> = [
  ['MemoryQuotaStorage', async () => new MemoryQuotaStorage({ now: clock })],
  [
    'SqliteQuotaStorage',
    async () => {
      const storage = new SqliteQuotaStorage({ database: new Database(':memory:'), now: clock });
      await storage.connect();
      return storage;
    },
  ],
];

// ── Contract ──────────────────────────────────────────────────────────────────

describe.each(backends)('%s', (_name, create) => {
  let storage: QuotaStorage;

  beforeEach(async () => {
    storage = await create();
  });

  afterEach(async () => {
    await storage.disconnect?.();
  });

  describe('activate', () => {
    it('creates an empty active month', async () => {
      const result = await storage.activate(JAN);
      expect(result.created).toBe(true);
      expect(result.frozen).toEqual([]);
      expect(result.active).toEqual({
        year: 2024,
        month: 1,
        requestCount: 0,
        costMicros: 0,
        state: 'active',
        createdAt: NOW.toISOString(),
      });
    });

    it('is idempotent', async () => {
      await storage.activate(JAN);
      const again = await storage.activate(JAN);
      expect(again.created).toBe(false);
      expect(again.frozen).toEqual([]);
      expect(again.active.state).toBe('active');
    });

    it('freezes the previous month when a later one becomes active', async () => {
      await storage.activate(JAN);
      await storage.atomicApply(JAN, { requests: 2, costMicros: 20_000 });
      const result = await storage.activate(FEB);

      expect(result.created).toBe(true);
      expect(result.frozen).toHaveLength(1);
      expect(result.frozen[0]).toMatchObject({
        year: 2024,
        month: 1,
        requestCount: 2,
        costMicros: 20_000,
        state: 'frozen',
        frozenAt: NOW.toISOString(),
      });
      expect((await storage.get(JAN))?.state).toBe('frozen');
      expect((await storage.get(FEB))?.state).toBe('active');
    });

    it('keeps a later active month when asked to activate an earlier one', async () => {
      await storage.activate(MAR);
      const result = await storage.activate(FEB);
      expect(result.created).toBe(false);
      expect(result.active).toMatchObject({ year: 2024, month: 3, state: 'active' });
      expect(await storage.get(FEB)).toBeUndefined();
    });
  });

  describe('atomicApply', () => {
    beforeEach(async () => {
      await storage.activate(JAN);
    });

    it('adds the delta to the month', async () => {
      const result = await storage.atomicApply(JAN, { requests: 3, costMicros: 30_000 });
      expect(result.applied).toBe(true);
      expect(result.aggregate.requestCount).toBe(3);
      expect(result.aggregate.costMicros).toBe(30_000);
    });

    it('allows usage exactly at the ceiling', async () => {
      const ceiling = { maxRequests: 3, maxCostMicros: 30_000 };
      const result = await storage.atomicApply(JAN, { requests: 3, costMicros: 30_000 }, { ceiling });
      expect(result.applied).toBe(true);
    });

    it('refuses usage above the request ceiling and leaves the month unchanged', async () => {
      const ceiling = { maxRequests: 3, maxCostMicros: 30_000 };
      await storage.atomicApply(JAN, { requests: 3, costMicros: 30_000 }, { ceiling });
      const result = await storage.atomicApply(JAN, { requests: 1, costMicros: 0 }, { ceiling });

      expect(result).toMatchObject({ applied: false, reason: 'requests' });
      expect(result.aggregate.requestCount).toBe(3);
      expect((await storage.get(JAN))?.requestCount).toBe(3);
    });

    it('refuses usage above the cost ceiling', async () => {
      const ceiling = { maxRequests: 10, maxCostMicros: 30_000 };
      const result = await storage.atomicApply(JAN, { requests: 1, costMicros: 30_001 }, { ceiling });
      expect(result).toMatchObject({ applied: false, reason: 'cost' });
    });

    it('checks requests before cost', async () => {
      const ceiling = { maxRequests: 10, maxCostMicros: 30_000 };
      const result = await storage.atomicApply(JAN, { requests: 11, costMicros: 99_999 }, { ceiling });
      expect(result).toMatchObject({ applied: false, reason: 'requests' });
    });

    it('floors the aggregate at zero', async () => {
      await storage.atomicApply(JAN, { requests: 1, costMicros: 5_000 });
      const result = await storage.atomicApply(JAN, { requests: -5, costMicros: -100_000 });
      expect(result.aggregate.requestCount).toBe(0);
      expect(result.aggregate.costMicros).toBe(0);
    });

    it('redirects a delta for a frozen month to the active month', async () => {
      await storage.atomicApply(JAN, { requests: 2, costMicros: 20_000 });
      await storage.activate(FEB);
      const result = await storage.atomicApply(JAN, { requests: 1, costMicros: 10_000 });

      expect(result.applied).toBe(true);
      if (!result.applied) return;
      expect(result.aggregate).toMatchObject({ year: 2024, month: 2, requestCount: 1, costMicros: 10_000 });
      expect(result.redirectedFrom).toEqual(JAN);
      expect((await storage.get(JAN))?.requestCount).toBe(2);
    });

    it('refuses a frozen month when redirects are disabled', async () => {
      await storage.activate(FEB);
      const result = await storage.atomicApply(JAN, { requests: -1, costMicros: 0 }, { allowRedirect: false });
      expect(result).toMatchObject({ applied: false, reason: 'frozen' });
      expect(result.aggregate).toMatchObject({ year: 2024, month: 1, state: 'frozen' });
    });

    it('creates a missing month on first write', async () => {
      const result = await storage.atomicApply(FEB, { requests: 1, costMicros: 0 });
      expect(result.aggregate).toMatchObject({ year: 2024, month: 2, requestCount: 1, state: 'active' });
      expect((await storage.get(JAN))?.state).toBe('frozen');
    });

    it('appends the log entry with an increasing sequence', async () => {
      const first = await storage.atomicApply(JAN, { requests: 1, costMicros: 10_000 }, { logEntry: pending() });
      const second = await storage.atomicApply(JAN, { requests: 1, costMicros: 10_000 }, {
        logEntry: pending({ endpoint: 'lookup', reservationId: 'res-1', notes: 'slow' }),
      });

      if (!first.applied || !second.applied) throw new Error('expected both writes to apply');
      expect(first.logEntry).toEqual({
        sequence: 1,
        timestamp: NOW.toISOString(),
        yearMonth: '2024-01',
        endpoint: 'search',
        operationTag: 'query',
        requests: 1,
        cost: 0.01,
        outcome: 'allowed-success',
      });
      expect(second.logEntry).toMatchObject({
        sequence: 2,
        endpoint: 'lookup',
        reservationId: 'res-1',
        notes: 'slow',
      });
    });

    it('keeps an explicit yearMonth on the log entry', async () => {
      await storage.activate(FEB);
      const result = await storage.atomicApply(JAN, { requests: 0, costMicros: 0 }, {
        logEntry: pending({ yearMonth: '2024-01' }),
      });
      if (!result.applied) throw new Error('expected the write to apply');
      expect(result.aggregate.month).toBe(2);
      expect(result.logEntry?.yearMonth).toBe('2024-01');
    });

    it('does not append a log entry when the ceiling refuses the delta', async () => {
      const ceiling = { maxRequests: 1, maxCostMicros: 1_000_000 };
      await storage.atomicApply(JAN, { requests: 2, costMicros: 0 }, { ceiling, logEntry: pending() });
      expect(await storage.readLog({ afterSequence: 0, pageSize: 10 })).toEqual([]);
    });
  });

  describe('listFrozen', () => {
    it('returns the most recent frozen months first', async () => {
      await storage.activate({ year: 2023, month: 11 });
      await storage.activate({ year: 2023, month: 12 });
      await storage.activate(JAN);
      await storage.activate(FEB);

      const frozen = await storage.listFrozen(2);
      expect(frozen.map((record) => [record.year, record.month])).toEqual([
        [2024, 1],
        [2023, 12],
      ]);
      expect(await storage.listFrozen(10)).toHaveLength(3);
    });
  });

  describe('readLog', () => {
    beforeEach(async () => {
      await storage.activate(JAN);
      for (const endpoint of ['a', 'b', 'a', 'c', 'a']) {
        await storage.atomicApply(JAN, { requests: 1, costMicros: 0 }, { logEntry: pending({ endpoint }) });
      }
    });

    it('pages in sequence order', async () => {
      const first = await storage.readLog({ afterSequence: 0, pageSize: 2 });
      const second = await storage.readLog({ afterSequence: 2, pageSize: 2 });
      expect(first.map((entry) => entry.sequence)).toEqual([1, 2]);
      expect(second.map((entry) => entry.sequence)).toEqual([3, 4]);
    });

    it('applies the filter before paging', async () => {
      const page = await storage.readLog({ afterSequence: 1, pageSize: 10, filter: { endpoint: 'a' } });
      expect(page.map((entry) => entry.sequence)).toEqual([3, 5]);
    });

    it('pages backwards from the latest entry', async () => {
      const first = await storage.readLog({ newestFirst: true, pageSize: 2 });
      const second = await storage.readLog({ newestFirst: true, beforeSequence: 4, pageSize: 2 });
      expect(first.map((entry) => entry.sequence)).toEqual([5, 4]);
      expect(second.map((entry) => entry.sequence)).toEqual([3, 2]);
    });

    it('applies the filter when paging backwards', async () => {
      const page = await storage.readLog({ newestFirst: true, beforeSequence: 5, pageSize: 10, filter: { endpoint: 'a' } });
      expect(page.map((entry) => entry.sequence)).toEqual([3, 1]);
    });

    it('filters by outcome', async () => {
      const page = await storage.readLog({ afterSequence: 0, pageSize: 10, filter: { outcome: 'denied' } });
      expect(page).toEqual([]);
    });
  });
});
