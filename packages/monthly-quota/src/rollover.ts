// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { ActivationResult, QuotaStorage } from './storage/interface.js';
import type { AggregateRecord, MonthKey } from './types.js';
import { withStorage } from './errors.js';
import { compareMonthKeys, monthKeyOf } from './month.js';

/**
 * Lifecycle of one calendar month's aggregate. The only transition is
 * `active → frozen`, taken when a later month becomes current.
 */
export type MonthLifecycle =
  | { readonly status: 'active'; readonly key: MonthKey }
  | { readonly status: 'frozen'; readonly key: MonthKey };

export function lifecycleOf(record: AggregateRecord): MonthLifecycle {
  const key: MonthKey = { year: record.year, month: record.month };
  return record.state === 'active' ? { status: 'active', key } : { status: 'frozen', key };
}

export function acceptsDeltas(lifecycle: MonthLifecycle): boolean {
  return lifecycle.status === 'active';
}

export interface RolloverManagerOptions {
  /** Source of "now". Month boundaries are taken in UTC. */
  clock?: () => Date;
  /** Called once for each activation that froze at least one month. */
  onRollover?: (result: ActivationResult) => void;
}

/**
 * RolloverManager keeps the store's active month in step with the calendar.
 *
 * Every access computes the current key. When it is later than the last
 * month seen as active, the store's `activate()` freezes the old month and
 * creates the new one in one transaction. Concurrent callers share a
 * single in-flight activation, and the store's insert-or-ignore settles
 * races with other processes; either way exactly one aggregate is created
 * per month and no caller ever sees the race.
 */
export class RolloverManager {
  readonly #storage: QuotaStorage;
  readonly #clock: () => Date;
  readonly #onRollover: ((result: ActivationResult) => void) | undefined;
  #active: MonthLifecycle | undefined;
  #pending: Promise<MonthKey> | undefined;

  constructor(storage: QuotaStorage, options: RolloverManagerOptions = {}) {
    this.#storage = storage;
    this.#clock = options.clock ?? (() => new Date());
    this.#onRollover = options.onRollover;
  }

  /** Calendar month of the clock, ignoring stored state. */
  calendarKey(): MonthKey {
    return monthKeyOf(this.#clock());
  }

  now(): Date {
    return this.#clock();
  }

  /**
   * Make sure the calendar month is active and return the active key.
   *
   * If the clock has moved backwards the newest month stays active and its
   * key is returned instead.
   */
  async ensureCurrent(): Promise<MonthKey> {
    const key = this.calendarKey();

    if (this.#active !== undefined && compareMonthKeys(this.#active.key, key) >= 0) {
      return this.#active.key;
    }

    if (this.#pending === undefined) {
      this.#pending = this.#activate(key).finally(() => {
        this.#pending = undefined;
      });
    }
    return this.#pending;
  }

  /** Lifecycle of a stored month, or undefined if it was never created. */
  async lifecycle(key: MonthKey): Promise<MonthLifecycle | undefined> {
    const record = await withStorage('get', () => this.#storage.get(key));
    return record === undefined ? undefined : lifecycleOf(record);
  }

  async #activate(key: MonthKey): Promise<MonthKey> {
    const result = await withStorage('activate', () => this.#storage.activate(key));
    this.#active = lifecycleOf(result.active);

    if (result.frozen.length > 0 && this.#onRollover !== undefined) {
      this.#onRollover(result);
    }
    return this.#active.key;
  }
}
