// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { QuotaRuntime } from './runtime.js';
import { reportStorageError } from './runtime.js';
import type { Decision, LimitKind, MonthKey, QuotaCeiling } from './types.js';
import { BudgetExceededError, StorageError, withStorage } from './errors.js';
import { EVENT_DECISION } from './events.js';
import { fromMicros, toMicros } from './month.js';
import { buildSnapshot } from './reporter.js';

/**
 * QuotaGuard: atomic allow/deny gate in front of the metered API.
 *
 * Design contract:
 *  - Check and reservation are ONE store operation. The ceiling travels into
 *    `atomicApply`, so two callers racing near the limit can never jointly
 *    overshoot it.
 *  - The boundary is allowed: projected usage equal to a limit passes,
 *    anything strictly above is denied. Requests are checked before cost.
 *  - A denial is a return value, not an exception.
 *  - When the store fails the guard denies with reason `storage`. It never
 *    allows on uncertainty.
 */
export class QuotaGuard {
  readonly #runtime: QuotaRuntime;
  readonly #ceiling: QuotaCeiling;

  constructor(runtime: QuotaRuntime) {
    this.#runtime = runtime;
    this.#ceiling = {
      maxRequests: runtime.config.maxRequestsPerMonth,
      maxCostMicros: toMicros(runtime.config.maxCostPerMonth),
    };
  }

  /**
   * Reserve `estimatedRequests` calls costing `estimatedCost` against the
   * current month.
   *
   * @param estimatedRequests - Defaults to 1.
   * @param estimatedCost     - Defaults to the configured cost of `estimatedRequests`.
   */
  async checkAndReserve(estimatedRequests = 1, estimatedCost?: number): Promise<Decision> {
    if (!Number.isInteger(estimatedRequests) || estimatedRequests < 0) {
      throw new RangeError(
        `estimatedRequests must be a non-negative integer, received ${String(estimatedRequests)}.`,
      );
    }
    const cost = estimatedCost ?? this.#runtime.costOf(estimatedRequests);
    if (!Number.isFinite(cost) || cost < 0) {
      throw new RangeError(`estimatedCost must be a non-negative finite number, received ${String(cost)}.`);
    }

    return this.#runtime.tracer.trace(
      'check_and_reserve',
      { 'quota.estimated_requests': estimatedRequests, 'quota.estimated_cost': cost },
      () => this.#decide(estimatedRequests, toMicros(cost)),
      (decision) => ({
        'quota.decision': decision.allowed ? 'allow' : 'deny',
        'quota.reason': decision.reason,
      }),
    );
  }

  async #decide(requests: number, costMicros: number): Promise<Decision> {
    const { storage, rollover, reservations, events, status } = this.#runtime;
    let decision: Decision;

    try {
      const key = await rollover.ensureCurrent();
      const result = await withStorage('atomicApply', () =>
        storage.atomicApply(key, { requests, costMicros }, { ceiling: this.#ceiling }),
      );

      const snapshot = buildSnapshot(result.aggregate, this.#runtime.config);
      if (result.applied) {
        status.observe(result.aggregate);
        const reservedIn: MonthKey = { year: result.aggregate.year, month: result.aggregate.month };
        decision = {
          allowed: true,
          reason: 'within_limits',
          snapshot,
          reservation: reservations.open(reservedIn, requests, costMicros, rollover.now()),
        };
      } else {
        const reason: LimitKind = result.reason === 'cost' ? 'cost' : 'requests';
        decision = { allowed: false, reason, snapshot };
        await this.#recordDenial(key, reason);
      }
    } catch (error) {
      if (!(error instanceof StorageError)) throw error;
      reportStorageError(events, error, rollover.now());
      decision = { allowed: false, reason: 'storage', snapshot: null, error };
    }

    events.emit(EVENT_DECISION, {
      allowed: decision.allowed,
      reason: decision.reason,
      estimatedRequests: requests,
      estimatedCost: fromMicros(costMicros),
      ...(decision.allowed && { reservationId: decision.reservation.id }),
      snapshot: decision.snapshot,
      timestamp: rollover.now().toISOString(),
    });

    return decision;
  }

  /**
   * Append a `denied` entry when configured to. A failure here is reported
   * but does not change the decision, which is already a denial.
   */
  async #recordDenial(key: MonthKey, reason: LimitKind): Promise<void> {
    const { storage, rollover, events, config } = this.#runtime;
    if (!config.recordDenials) return;

    try {
      await withStorage('atomicApply', () =>
        storage.atomicApply(key, { requests: 0, costMicros: 0 }, {
          logEntry: {
            timestamp: rollover.now().toISOString(),
            endpoint: 'quota-guard',
            operationTag: 'reservation',
            requests: 0,
            costMicros: 0,
            outcome: 'denied',
            notes: `monthly ${reason} limit reached`,
          },
        }),
      );
    } catch (error) {
      if (!(error instanceof StorageError)) throw error;
      reportStorageError(events, error, rollover.now());
    }
  }
}

/**
 * Throw for a denied decision, for callers that prefer exceptions.
 * Returns the decision narrowed to its allowed shape otherwise.
 */
export function assertAllowed(decision: Decision): Extract<Decision, { allowed: true }> {
  if (decision.allowed) return decision;
  if (decision.reason === 'storage') throw decision.error;
  throw new BudgetExceededError(decision.reason, decision.snapshot);
}
