// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { randomUUID } from 'crypto';
import type { MonthKey, Reservation } from './types.js';
import { ReservationError } from './errors.js';
import { compareMonthKeys, formatMonthKey, fromMicros, parseMonthKey, toMicros } from './month.js';

/** Capacity a reservation still holds against its month. */
export interface Hold {
  readonly key: MonthKey;
  readonly requests: number;
  readonly costMicros: number;
}

/**
 * ReservationLedger: in-process book of capacity reserved by the guard and
 * not yet settled by a commit.
 *
 * Holds live only in memory. The capacity itself is already in the stored
 * aggregate, so a crash between reserve and commit leaves it counted as
 * consumed with no log entry; nothing here tries to recover it.
 *
 * Bookkeeping for a month is dropped once a reservation is opened in a
 * later month. A reservation from a dropped month is then taken at face
 * value, like one issued before a restart.
 */
export class ReservationLedger {
  readonly #holds = new Map<string, Hold>();
  readonly #settled = new Map<string, MonthKey>();
  readonly #locks = new Map<string, Promise<void>>();
  #latest: MonthKey | undefined;

  open(key: MonthKey, requests: number, costMicros: number, createdAt: Date): Reservation {
    this.#advance(key);
    const reservation: Reservation = {
      id: randomUUID(),
      yearMonth: formatMonthKey(key),
      requests,
      cost: fromMicros(costMicros),
      createdAt: createdAt.toISOString(),
    };
    this.#holds.set(reservation.id, { key, requests, costMicros });
    return reservation;
  }

  /**
   * What `reservation` still holds. A reservation this process did not issue
   * (e.g. one made before a restart) is taken at face value.
   */
  held(reservation: Reservation): Hold {
    const settled = this.#settled.get(reservation.id);
    if (settled !== undefined) {
      return { key: settled, requests: 0, costMicros: 0 };
    }
    return this.#holds.get(reservation.id) ?? {
      key: parseMonthKey(reservation.yearMonth),
      requests: reservation.requests,
      costMicros: toMicros(reservation.cost),
    };
  }

  /**
   * Run `fn` with sole access to one reservation. Commits and refunds of the
   * same reservation run one after another, each seeing what the previous
   * one left.
   */
  async exclusive<T>(reservationId: string, fn: () => Promise<T>): Promise<T> {
    while (this.#locks.has(reservationId)) {
      await this.#locks.get(reservationId);
    }

    let unlock = (): void => undefined;
    this.#locks.set(reservationId, new Promise<void>((resolve) => {
      unlock = resolve;
    }));

    try {
      return await fn();
    } finally {
      this.#locks.delete(reservationId);
      unlock();
    }
  }

  /** The hold a commit settles. Throws ReservationError if already settled. */
  settleable(reservation: Reservation): Hold {
    if (this.#settled.has(reservation.id)) {
      throw new ReservationError(reservation.id);
    }
    return this.held(reservation);
  }

  settle(reservationId: string, key: MonthKey): void {
    this.#holds.delete(reservationId);
    this.#settled.set(reservationId, key);
  }

  /** Reduce what a reservation holds after part of it was refunded. */
  release(reservation: Reservation, requests: number, costMicros: number): void {
    if (this.#settled.has(reservation.id)) return;
    const hold = this.held(reservation);
    this.#holds.set(reservation.id, {
      key: hold.key,
      requests: Math.max(0, hold.requests - requests),
      costMicros: Math.max(0, hold.costMicros - costMicros),
    });
  }

  /** Reservations issued here and not yet settled. */
  get outstanding(): number {
    return this.#holds.size;
  }

  /** Settled reservations still remembered, so a second commit is refused. */
  get settled(): number {
    return this.#settled.size;
  }

  #advance(key: MonthKey): void {
    if (this.#latest !== undefined && compareMonthKeys(key, this.#latest) <= 0) return;
    this.#latest = key;

    for (const [id, hold] of this.#holds) {
      if (compareMonthKeys(hold.key, key) < 0) this.#holds.delete(id);
    }
    for (const [id, month] of this.#settled) {
      if (compareMonthKeys(month, key) < 0) this.#settled.delete(id);
    }
  }
}
