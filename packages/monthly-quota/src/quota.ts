// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { QuotaConfig, QuotaConfigInput } from './config.js';
import { parseQuotaConfig } from './config.js';
import type { CostFunction, QuotaRuntime } from './runtime.js';
import { StatusTracker } from './runtime.js';
import type { QuotaStorage } from './storage/interface.js';
import { SqliteQuotaStorage } from './storage/sqlite.js';
import type {
  CommitInput,
  Decision,
  LogFilter,
  MonthlyAggregate,
  RefundInput,
  RefundResult,
  RequestLogEntry,
  UsageSnapshot,
} from './types.js';
import { QuotaEventEmitter, EVENT_ROLLOVER } from './events.js';
import { QuotaGuard } from './guard.js';
import { formatMonthKey, toMonthlyAggregate } from './month.js';
import { LogSequence, UsageReporter, alertFor } from './reporter.js';
import { RequestLogger } from './request-logger.js';
import { ReservationLedger } from './reservations.js';
import { RolloverManager } from './rollover.js';
import { QuotaTracer } from './telemetry/otel.js';
import { withStorage } from './errors.js';

export interface MonthlyQuotaOptions {
  /** Source of "now". Defaults to the system clock. */
  clock?: () => Date;
  /** Cost of N requests when the caller gives no estimate. Defaults to N × costPerRequest. */
  costFunction?: CostFunction;
  tracer?: QuotaTracer;
  /** Share an emitter between several quotas. */
  events?: QuotaEventEmitter;
}

/**
 * MonthlyQuota: the public entry point.
 *
 * Composes the rollover manager, guard, request logger and reporter over a
 * single store. Call `connect()` once before first use.
 *
 * ```ts
 * const quota = new MonthlyQuota(
 *   { maxRequestsPerMonth: 20_000, maxCostPerMonth: 180, costPerRequest: 0.009 },
 *   new MemoryQuotaStorage(),
 * );
 * await quota.connect();
 *
 * const decision = await quota.checkAndReserve();
 * if (decision.allowed) {
 *   const response = await callSearchApi();
 *   await quota.commit({
 *     endpoint: 'search',
 *     outcome: response.ok ? 'allowed-success' : 'allowed-failure',
 *     reservation: decision.reservation,
 *   });
 * }
 * ```
 */
export class MonthlyQuota {
  readonly #config: QuotaConfig;
  readonly #storage: QuotaStorage;
  readonly #events: QuotaEventEmitter;
  readonly #rollover: RolloverManager;
  readonly #guard: QuotaGuard;
  readonly #logger: RequestLogger;
  readonly #reporter: UsageReporter;

  constructor(config: QuotaConfigInput, storage: QuotaStorage, options: MonthlyQuotaOptions = {}) {
    this.#config = parseQuotaConfig(config);
    this.#storage = storage;
    this.#events = options.events ?? new QuotaEventEmitter();

    const clock = options.clock ?? (() => new Date());
    const costPerRequest = this.#config.costPerRequest;

    this.#rollover = new RolloverManager(storage, {
      clock,
      onRollover: (result) => {
        this.#events.emit(EVENT_ROLLOVER, {
          activeMonth: formatMonthKey(result.active),
          frozen: result.frozen.map(toMonthlyAggregate),
          timestamp: clock().toISOString(),
        });
      },
    });

    const runtime: QuotaRuntime = {
      storage,
      config: this.#config,
      rollover: this.#rollover,
      reservations: new ReservationLedger(),
      events: this.#events,
      tracer: options.tracer ?? new QuotaTracer(),
      costOf: options.costFunction ?? ((requests) => requests * costPerRequest),
      status: new StatusTracker(this.#config, this.#events),
    };

    this.#guard = new QuotaGuard(runtime);
    this.#logger = new RequestLogger(runtime);
    this.#reporter = new UsageReporter(storage, this.#config, this.#rollover);
  }

  get config(): QuotaConfig {
    return this.#config;
  }

  get events(): QuotaEventEmitter {
    return this.#events;
  }

  // ─── Lifecycle ────────────────────────────────────────────────────────────

  async connect(): Promise<void> {
    const connect = this.#storage.connect?.bind(this.#storage);
    if (connect !== undefined) {
      await withStorage('connect', connect);
    }
    await this.#rollover.ensureCurrent();
  }

  async close(): Promise<void> {
    const disconnect = this.#storage.disconnect?.bind(this.#storage);
    if (disconnect !== undefined) {
      await withStorage('disconnect', disconnect);
    }
  }

  async isHealthy(): Promise<boolean> {
    const isHealthy = this.#storage.isHealthy?.bind(this.#storage);
    if (isHealthy === undefined) return true;
    try {
      return await isHealthy();
    } catch {
      return false;
    }
  }

  // ─── Operations ───────────────────────────────────────────────────────────

  /** Atomically check the month's limits and reserve capacity if they allow it. */
  checkAndReserve(estimatedRequests?: number, estimatedCost?: number): Promise<Decision> {
    return this.#guard.checkAndReserve(estimatedRequests, estimatedCost);
  }

  /** Record the outcome of an operation and reconcile its reservation. */
  commit(input: CommitInput): Promise<RequestLogEntry> {
    return this.#logger.commit(input);
  }

  /** Release reserved capacity for an operation that consumed nothing. */
  refund(input: RefundInput): Promise<RefundResult> {
    return this.#logger.refund(input);
  }

  getSnapshot(): Promise<UsageSnapshot> {
    return this.#reporter.snapshot();
  }

  getHistory(monthsBack: number): Promise<readonly MonthlyAggregate[]> {
    return this.#reporter.history(monthsBack);
  }

  getLog(filter?: LogFilter): LogSequence {
    return this.#reporter.log(filter);
  }

  /** Alert line for the current month, or undefined while usage is `ok`. */
  async getAlert(): Promise<string | undefined> {
    return alertFor(await this.#reporter.snapshot());
  }
}

/**
 * Open the SQLite store at `config.storageLocation`, connect, and return a
 * ready MonthlyQuota.
 */
export async function createMonthlyQuota(
  config: QuotaConfigInput,
  options: MonthlyQuotaOptions = {},
): Promise<MonthlyQuota> {
  const parsed = parseQuotaConfig(config);
  const storage = SqliteQuotaStorage.open(parsed.storageLocation, {
    ...(options.clock !== undefined && { now: options.clock }),
  });
  const quota = new MonthlyQuota(parsed, storage, options);
  await quota.connect();
  return quota;
}
