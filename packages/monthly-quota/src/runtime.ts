// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { QuotaConfig } from './config.js';
import type { QuotaEventEmitter } from './events.js';
import { EVENT_STATUS_CHANGE, EVENT_STORAGE_ERROR } from './events.js';
import type { ReservationLedger } from './reservations.js';
import type { RolloverManager } from './rollover.js';
import type { QuotaStorage } from './storage/interface.js';
import type { QuotaTracer } from './telemetry/otel.js';
import type { AggregateRecord, StatusLevel } from './types.js';
import { StorageError } from './errors.js';
import { formatMonthKey } from './month.js';
import { buildSnapshot } from './reporter.js';

/** Estimate the cost of `requests` calls. */
export type CostFunction = (requests: number) => number;

/**
 * Collaborators shared by the guard and the request logger. Built once by
 * MonthlyQuota and passed by reference; nothing here is module state.
 */
export interface QuotaRuntime {
  readonly storage: QuotaStorage;
  readonly config: QuotaConfig;
  readonly rollover: RolloverManager;
  readonly reservations: ReservationLedger;
  readonly events: QuotaEventEmitter;
  readonly tracer: QuotaTracer;
  readonly costOf: CostFunction;
  readonly status: StatusTracker;
}

/**
 * Watches aggregates as they are written and emits `quota:status-change`
 * whenever the tier of the month differs from the last one seen.
 */
export class StatusTracker {
  readonly #config: QuotaConfig;
  readonly #events: QuotaEventEmitter;
  #last: { yearMonth: string; level: StatusLevel } | undefined;

  constructor(config: QuotaConfig, events: QuotaEventEmitter) {
    this.#config = config;
    this.#events = events;
  }

  observe(aggregate: AggregateRecord): void {
    const snapshot = buildSnapshot(aggregate, this.#config);
    const yearMonth = formatMonthKey(aggregate);
    const previous = this.#last !== undefined && this.#last.yearMonth === yearMonth ? this.#last.level : 'ok';

    this.#last = { yearMonth, level: snapshot.statusLevel };
    if (previous !== snapshot.statusLevel) {
      this.#events.emit(EVENT_STATUS_CHANGE, {
        yearMonth,
        previous,
        current: snapshot.statusLevel,
        snapshot,
      });
    }
  }
}

/** Emit `quota:storage-error` for a StorageError; other errors are ignored. */
export function reportStorageError(events: QuotaEventEmitter, error: unknown, timestamp: Date): void {
  if (!(error instanceof StorageError)) return;
  events.emit(EVENT_STORAGE_ERROR, {
    operation: error.operation,
    message: error.message,
    timestamp: timestamp.toISOString(),
  });
}
