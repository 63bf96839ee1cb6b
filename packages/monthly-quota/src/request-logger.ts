// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { QuotaRuntime } from './runtime.js';
import { reportStorageError } from './runtime.js';
import type {
  AggregateRecord,
  CommitInput,
  MonthKey,
  RefundInput,
  RefundResult,
  RequestLogEntry,
  Reservation,
} from './types.js';
import { CommitInputSchema, RefundInputSchema } from './types.js';
import { withStorage } from './errors.js';
import { EVENT_COMMIT, EVENT_REFUND } from './events.js';
import { formatMonthKey, fromMicros, toMicros, toMonthlyAggregate } from './month.js';
import { acceptsDeltas } from './rollover.js';

/**
 * RequestLogger: records what actually happened after the external call
 * and reconciles the aggregate with it.
 *
 *  - `commit()` appends exactly one immutable log entry. With a reservation
 *    only the difference between actual and reserved usage is applied, so
 *    the aggregate reflects true consumption rather than the estimate. The
 *    delta and the entry are written in one store transaction.
 *  - `refund()` releases reserved capacity. It is never automatic: a failed
 *    external call may still have cost something, and only the caller knows.
 */
export class RequestLogger {
  readonly #runtime: QuotaRuntime;

  constructor(runtime: QuotaRuntime) {
    this.#runtime = runtime;
  }

  async commit(raw: CommitInput): Promise<RequestLogEntry> {
    const input = CommitInputSchema.parse(raw);
    const { reservation } = input;
    const denied = input.outcome === 'denied';

    if (denied && ((input.actualRequests ?? 0) > 0 || (input.actualCost ?? 0) > 0)) {
      throw new RangeError('A denied operation cannot report requests or cost.');
    }

    const actualRequests = denied ? 0 : input.actualRequests ?? reservation?.requests ?? 1;
    const actualCost = denied ? 0 : input.actualCost ?? this.#defaultCost(actualRequests, reservation);

    return this.#runtime.tracer.trace(
      'commit',
      {
        'quota.endpoint': input.endpoint,
        'quota.outcome': input.outcome,
        'quota.actual_requests': actualRequests,
        'quota.actual_cost': actualCost,
        ...(reservation !== undefined && { 'quota.reservation_id': reservation.id }),
      },
      () => this.#exclusive(reservation, () => this.#commit({
        endpoint: input.endpoint,
        operationTag: input.operationTag,
        outcome: input.outcome,
        actualRequests,
        actualCostMicros: toMicros(actualCost),
        reservation,
        notes: input.notes,
      })),
      (entry) => ({ 'quota.sequence': entry.sequence }),
    );
  }

  async refund(raw: RefundInput): Promise<RefundResult> {
    const input = RefundInputSchema.parse(raw);

    return this.#runtime.tracer.trace(
      'refund',
      {
        'quota.requests': input.requests ?? 0,
        'quota.cost': input.cost ?? 0,
        ...(input.reservation !== undefined && { 'quota.reservation_id': input.reservation.id }),
      },
      () => {
        const { reservation } = input;
        return reservation !== undefined
          ? this.#exclusive(reservation, () => this.#refundReservation(reservation, input.requests, input.cost))
          : this.#refundCurrent(input.requests ?? 0, input.cost ?? 0);
      },
      (result) => ({ 'quota.refund_applied': result.applied }),
    );
  }

  // ─── Commit ───────────────────────────────────────────────────────────────

  async #commit(input: {
    endpoint: string;
    operationTag: string;
    outcome: RequestLogEntry['outcome'];
    actualRequests: number;
    actualCostMicros: number;
    reservation: Reservation | undefined;
    notes: string | undefined;
  }): Promise<RequestLogEntry> {
    const { storage, rollover, reservations, events, status } = this.#runtime;
    const { reservation } = input;
    const hold = reservation !== undefined ? reservations.settleable(reservation) : undefined;

    try {
      const currentKey = await rollover.ensureCurrent();
      const targetKey: MonthKey = hold?.key ?? currentKey;
      const deltaRequests = input.actualRequests - (hold?.requests ?? 0);
      const deltaCostMicros = input.actualCostMicros - (hold?.costMicros ?? 0);

      const result = await withStorage('atomicApply', () =>
        storage.atomicApply(
          targetKey,
          { requests: deltaRequests, costMicros: deltaCostMicros },
          {
            logEntry: {
              timestamp: rollover.now().toISOString(),
              ...(reservation !== undefined && { yearMonth: reservation.yearMonth }),
              endpoint: input.endpoint,
              operationTag: input.operationTag,
              requests: input.actualRequests,
              costMicros: input.actualCostMicros,
              outcome: input.outcome,
              ...(reservation !== undefined && { reservationId: reservation.id }),
              ...(input.notes !== undefined && { notes: input.notes }),
            },
          },
        ),
      );

      if (!result.applied || result.logEntry === undefined) {
        throw new Error(`Commit for ${input.endpoint} was not recorded.`);
      }

      if (reservation !== undefined && hold !== undefined) {
        reservations.settle(reservation.id, hold.key);
      }
      status.observe(result.aggregate);

      events.emit(EVENT_COMMIT, {
        entry: result.logEntry,
        deltaRequests,
        deltaCost: fromMicros(deltaCostMicros),
        ...(result.redirectedFrom !== undefined && { redirectedFrom: formatMonthKey(result.redirectedFrom) }),
      });
      return result.logEntry;
    } catch (error) {
      reportStorageError(events, error, rollover.now());
      throw error;
    }
  }

  #defaultCost(requests: number, reservation: Reservation | undefined): number {
    if (reservation !== undefined && reservation.requests === requests) {
      return reservation.cost;
    }
    return this.#runtime.costOf(requests);
  }

  // ─── Refund ───────────────────────────────────────────────────────────────

  async #refundReservation(
    reservation: Reservation,
    requests: number | undefined,
    cost: number | undefined,
  ): Promise<RefundResult> {
    const { storage, rollover, reservations } = this.#runtime;
    const hold = reservations.held(reservation);
    const releaseRequests = Math.min(requests ?? hold.requests, hold.requests);
    const releaseMicros = Math.min(cost !== undefined ? toMicros(cost) : hold.costMicros, hold.costMicros);

    if (releaseRequests === 0 && releaseMicros === 0) {
      return { applied: false, reason: 'nothing_reserved' };
    }

    await this.#apply(() => rollover.ensureCurrent(), 'activate');
    const lifecycle = await this.#apply(() => rollover.lifecycle(hold.key), 'get');
    if (lifecycle === undefined) {
      return { applied: false, reason: 'nothing_reserved' };
    }
    if (!acceptsDeltas(lifecycle)) {
      return { applied: false, reason: 'month_frozen' };
    }

    const result = await this.#apply(() =>
      storage.atomicApply(
        hold.key,
        { requests: -releaseRequests, costMicros: -releaseMicros },
        { allowRedirect: false },
      ),
    );
    if (!result.applied) {
      return { applied: false, reason: 'month_frozen' };
    }

    reservations.release(reservation, releaseRequests, releaseMicros);
    return this.#refunded(result.aggregate, releaseRequests, releaseMicros, reservation.id);
  }

  async #refundCurrent(requests: number, cost: number): Promise<RefundResult> {
    const { storage, rollover } = this.#runtime;
    const costMicros = toMicros(cost);
    if (requests === 0 && costMicros === 0) {
      return { applied: false, reason: 'nothing_reserved' };
    }

    const key = await this.#apply(() => rollover.ensureCurrent(), 'activate');
    const result = await this.#apply(() =>
      storage.atomicApply(key, { requests: -requests, costMicros: -costMicros }),
    );
    return this.#refunded(result.aggregate, requests, costMicros, undefined);
  }

  #refunded(
    aggregate: AggregateRecord,
    requests: number,
    costMicros: number,
    reservationId: string | undefined,
  ): RefundResult {
    const { events, rollover, status } = this.#runtime;
    status.observe(aggregate);

    events.emit(EVENT_REFUND, {
      yearMonth: formatMonthKey(aggregate),
      requests,
      cost: fromMicros(costMicros),
      ...(reservationId !== undefined && { reservationId }),
      timestamp: rollover.now().toISOString(),
    });

    return {
      applied: true,
      requests,
      cost: fromMicros(costMicros),
      aggregate: toMonthlyAggregate(aggregate),
    };
  }

  /** Commits and refunds of one reservation never interleave. */
  #exclusive<T>(reservation: Reservation | undefined, fn: () => Promise<T>): Promise<T> {
    return reservation !== undefined ? this.#runtime.reservations.exclusive(reservation.id, fn) : fn();
  }

  /** Run a store call, reporting a StorageError before re-throwing it. */
  async #apply<T>(fn: () => Promise<T>, operation = 'atomicApply'): Promise<T> {
    try {
      return await withStorage(operation, fn);
    } catch (error) {
      reportStorageError(this.#runtime.events, error, this.#runtime.rollover.now());
      throw error;
    }
  }
}
