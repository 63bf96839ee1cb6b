// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { ActivationResult, ApplyOptions, ApplyResult, LogPageQuery, QuotaStorage } from './interface.js';
import type { AggregateRecord, MonthKey, QuotaDelta, RequestLogEntry } from '../types.js';
import { compareMonthKeys, formatMonthKey, fromMicros, sameMonth } from '../month.js';
import { matchesLogFilter, projectDelta } from './apply.js';

export interface MemoryQuotaStorageOptions {
  /** Clock used for `createdAt` / `frozenAt`. */
  now?: () => Date;
}

/**
 * In-process memory store: suitable for tests and throwaway processes.
 * All state is lost when the process exits. For durable enforcement across
 * restarts, use SqliteQuotaStorage.
 *
 * Every method body runs to completion without awaiting, so each call is
 * atomic with respect to other callers on the event loop.
 */
export class MemoryQuotaStorage implements QuotaStorage {
  readonly #months = new Map<string, AggregateRecord>(); // YYYY-MM -> record
  readonly #log: RequestLogEntry[] = [];
  readonly #now: () => Date;
  #sequence = 0;

  constructor(options: MemoryQuotaStorageOptions = {}) {
    this.#now = options.now ?? (() => new Date());
  }

  async get(key: MonthKey): Promise<AggregateRecord | undefined> {
    const record = this.#months.get(formatMonthKey(key));
    return record === undefined ? undefined : { ...record };
  }

  async atomicApply(key: MonthKey, delta: QuotaDelta, options: ApplyOptions = {}): Promise<ApplyResult> {
    const stored = this.#months.get(formatMonthKey(key));
    if (stored !== undefined && stored.state === 'frozen' && options.allowRedirect === false) {
      return { applied: false, aggregate: { ...stored }, reason: 'frozen' };
    }

    const target = this.#resolveTarget(key);
    const projection = projectDelta(target, delta, options.ceiling);

    if (!projection.ok) {
      return { applied: false, aggregate: { ...target }, reason: projection.limit };
    }

    const updated: AggregateRecord = {
      ...target,
      requestCount: projection.requestCount,
      costMicros: projection.costMicros,
    };
    this.#months.set(formatMonthKey(updated), updated);

    const redirectedFrom = sameMonth(target, key) ? undefined : key;
    let logEntry: RequestLogEntry | undefined;

    if (options.logEntry !== undefined) {
      const pending = options.logEntry;
      this.#sequence += 1;
      logEntry = {
        sequence: this.#sequence,
        timestamp: pending.timestamp,
        yearMonth: pending.yearMonth ?? formatMonthKey(updated),
        endpoint: pending.endpoint,
        operationTag: pending.operationTag,
        requests: pending.requests,
        cost: fromMicros(pending.costMicros),
        outcome: pending.outcome,
        ...(pending.reservationId !== undefined && { reservationId: pending.reservationId }),
        ...(pending.notes !== undefined && { notes: pending.notes }),
      };
      this.#log.push(logEntry);
    }

    return {
      applied: true,
      aggregate: { ...updated },
      ...(redirectedFrom !== undefined && { redirectedFrom }),
      ...(logEntry !== undefined && { logEntry: { ...logEntry } }),
    };
  }

  async activate(key: MonthKey): Promise<ActivationResult> {
    return this.#activate(key);
  }

  async listFrozen(limit: number): Promise<readonly AggregateRecord[]> {
    return Array.from(this.#months.values())
      .filter((record) => record.state === 'frozen')
      .sort((a, b) => compareMonthKeys(b, a))
      .slice(0, limit)
      .map((record) => ({ ...record }));
  }

  async readLog(query: LogPageQuery): Promise<readonly RequestLogEntry[]> {
    const page: RequestLogEntry[] = [];
    const entries = 'newestFirst' in query ? [...this.#log].reverse() : this.#log;
    for (const entry of entries) {
      if ('newestFirst' in query) {
        if (query.beforeSequence !== undefined && entry.sequence >= query.beforeSequence) continue;
      } else if (entry.sequence <= query.afterSequence) {
        continue;
      }
      if (!matchesLogFilter(entry, query.filter)) continue;
      page.push({ ...entry });
      if (page.length >= query.pageSize) break;
    }
    return page;
  }

  // ─── Private helpers ──────────────────────────────────────────────────────

  #activeRecord(): AggregateRecord | undefined {
    for (const record of this.#months.values()) {
      if (record.state === 'active') return record;
    }
    return undefined;
  }

  #activate(key: MonthKey): ActivationResult {
    const active = this.#activeRecord();

    if (active !== undefined && compareMonthKeys(active, key) >= 0) {
      return { active: { ...active }, frozen: [], created: false };
    }

    const id = formatMonthKey(key);
    if (this.#months.has(id)) {
      throw new Error(`Month ${id} is frozen and cannot become active again.`);
    }

    const timestamp = this.#now().toISOString();
    const frozen: AggregateRecord[] = [];

    for (const [monthId, record] of this.#months) {
      if (record.state === 'active' && compareMonthKeys(record, key) < 0) {
        const frozenRecord: AggregateRecord = { ...record, state: 'frozen', frozenAt: timestamp };
        this.#months.set(monthId, frozenRecord);
        frozen.push({ ...frozenRecord });
      }
    }

    const created: AggregateRecord = {
      year: key.year,
      month: key.month,
      requestCount: 0,
      costMicros: 0,
      state: 'active',
      createdAt: timestamp,
    };
    this.#months.set(id, created);
    return { active: { ...created }, frozen, created: true };
  }

  /** The record a delta for `key` lands on: itself, or the active month. */
  #resolveTarget(key: MonthKey): AggregateRecord {
    const record = this.#months.get(formatMonthKey(key));
    if (record !== undefined && record.state === 'active') return record;

    if (record === undefined) {
      return this.#activate(key).active;
    }

    const active = this.#activeRecord();
    if (active === undefined) {
      throw new Error(`Month ${formatMonthKey(key)} is frozen and no month is active.`);
    }
    return active;
  }
}
