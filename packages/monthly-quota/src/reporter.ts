// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { QuotaConfig } from './config.js';
import type { LogPageQuery, QuotaStorage } from './storage/interface.js';
import type { RolloverManager } from './rollover.js';
import type {
  AggregateRecord,
  LogFilter,
  MonthKey,
  MonthlyAggregate,
  RequestLogEntry,
  StatusLevel,
  UsageSnapshot,
} from './types.js';
import { LogFilterSchema } from './types.js';
import { withStorage } from './errors.js';
import { formatMonthKey, fromMicros, toMicros, toMonthlyAggregate } from './month.js';

/** Page size used when walking the request log. */
export const DEFAULT_LOG_PAGE_SIZE = 100;

type Thresholds = Pick<QuotaConfig, 'warningThreshold' | 'criticalThreshold'>;

/**
 * Map percent used to a status tier. Monotonic: a higher percentage never
 * yields a lower tier.
 */
export function statusLevelFor(percentUsed: number, thresholds: Thresholds): StatusLevel {
  if (percentUsed >= 100) return 'exceeded';
  if (percentUsed >= thresholds.criticalThreshold) return 'critical';
  if (percentUsed >= thresholds.warningThreshold) return 'warning';
  return 'ok';
}

/**
 * Derive a UsageSnapshot from an aggregate and the configured limits.
 * Pure: the same inputs always give the same snapshot.
 */
export function buildSnapshot(aggregate: AggregateRecord, config: QuotaConfig): UsageSnapshot {
  const maxCostMicros = toMicros(config.maxCostPerMonth);
  const requestPercent = (aggregate.requestCount * 100) / config.maxRequestsPerMonth;
  const costPercent = (aggregate.costMicros * 100) / maxCostMicros;
  const percentUsed = Math.max(requestPercent, costPercent);

  return {
    yearMonth: formatMonthKey(aggregate),
    requestsUsed: aggregate.requestCount,
    costUsed: fromMicros(aggregate.costMicros),
    requestsRemaining: Math.max(0, config.maxRequestsPerMonth - aggregate.requestCount),
    costRemaining: fromMicros(Math.max(0, maxCostMicros - aggregate.costMicros)),
    maxRequests: config.maxRequestsPerMonth,
    maxCost: config.maxCostPerMonth,
    percentUsed,
    statusLevel: statusLevelFor(percentUsed, config),
  };
}

/**
 * One-line alert for the snapshot's tier, or undefined while usage is `ok`.
 */
export function alertFor(snapshot: UsageSnapshot): string | undefined {
  const percent = Math.floor(snapshot.percentUsed);
  switch (snapshot.statusLevel) {
    case 'exceeded':
      return (
        `Monthly API budget exceeded for ${snapshot.yearMonth}: ` +
        `${snapshot.requestsUsed}/${snapshot.maxRequests} requests, ` +
        `${snapshot.costUsed}/${snapshot.maxCost} cost used.`
      );
    case 'critical':
      return (
        `Monthly API budget ${percent}% used for ${snapshot.yearMonth}: ` +
        `${snapshot.requestsRemaining} requests remaining.`
      );
    case 'warning':
      return `Monthly API budget ${percent}% used for ${snapshot.yearMonth}.`;
    case 'ok':
      return undefined;
  }
}

/** A zero-valued aggregate for a month the store has not created yet. */
export function emptyAggregate(key: MonthKey, createdAt: string): AggregateRecord {
  return { year: key.year, month: key.month, requestCount: 0, costMicros: 0, state: 'active', createdAt };
}

/**
 * Lazy view over the request log. Each iteration starts a fresh walk from
 * the first entry (or the latest one with `newestFirst`), fetching pages on
 * demand.
 */
export class LogSequence implements AsyncIterable<RequestLogEntry> {
  readonly #storage: QuotaStorage;
  readonly #filter: LogFilter;
  readonly #pageSize: number;

  constructor(storage: QuotaStorage, filter: LogFilter = {}, pageSize: number = DEFAULT_LOG_PAGE_SIZE) {
    this.#storage = storage;
    this.#filter = LogFilterSchema.parse(filter);
    this.#pageSize = pageSize;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<RequestLogEntry, void, undefined> {
    const { limit, newestFirst, ...filter } = this.#filter;
    let remaining = limit ?? Number.POSITIVE_INFINITY;
    let cursor: number | undefined;

    while (remaining > 0) {
      const pageSize = Math.min(this.#pageSize, remaining);
      const query: LogPageQuery = newestFirst === true
        ? { newestFirst: true, pageSize, filter, ...(cursor !== undefined && { beforeSequence: cursor }) }
        : { afterSequence: cursor ?? 0, pageSize, filter };
      const page = await withStorage('readLog', () => this.#storage.readLog(query));

      for (const entry of page) {
        yield entry;
        remaining -= 1;
      }

      const last = page.at(-1);
      if (last === undefined || page.length < pageSize) return;
      cursor = last.sequence;
    }
  }

  /** Drain the sequence into an array. */
  async toArray(): Promise<RequestLogEntry[]> {
    const entries: RequestLogEntry[] = [];
    for await (const entry of this) {
      entries.push(entry);
    }
    return entries;
  }
}

/**
 * UsageReporter: read-only statistics over the quota store.
 *
 * It never applies a delta. Reading the snapshot does pass through the
 * rollover manager, so the first read in a new month creates that month's
 * empty aggregate.
 */
export class UsageReporter {
  readonly #storage: QuotaStorage;
  readonly #config: QuotaConfig;
  readonly #rollover: RolloverManager;

  constructor(storage: QuotaStorage, config: QuotaConfig, rollover: RolloverManager) {
    this.#storage = storage;
    this.#config = config;
    this.#rollover = rollover;
  }

  async snapshot(): Promise<UsageSnapshot> {
    const key = await this.#rollover.ensureCurrent();
    const aggregate = await withStorage('get', () => this.#storage.get(key));
    return buildSnapshot(
      aggregate ?? emptyAggregate(key, this.#rollover.now().toISOString()),
      this.#config,
    );
  }

  /** The `monthsBack` most recent frozen months, most recent first. */
  async history(monthsBack: number): Promise<readonly MonthlyAggregate[]> {
    if (!Number.isInteger(monthsBack) || monthsBack < 0) {
      throw new RangeError(`monthsBack must be a non-negative integer, received ${String(monthsBack)}.`);
    }
    if (monthsBack === 0) return [];
    await this.#rollover.ensureCurrent();
    const records = await withStorage('listFrozen', () => this.#storage.listFrozen(monthsBack));
    return records.map(toMonthlyAggregate);
  }

  log(filter: LogFilter = {}): LogSequence {
    return new LogSequence(this.#storage, filter);
  }
}
