// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Quota event emitter
 *
 * `QuotaEventEmitter` is a typed publish-subscribe bus for quota lifecycle
 * events. The library never writes to the console; hosts subscribe here and
 * forward to whatever logger they run.
 *
 * ```ts
 * quota.events.on(EVENT_STATUS_CHANGE, (payload) => {
 *   logger.warn('quota tier changed', payload);
 * });
 * ```
 */

import type {
  DenialReason,
  MonthlyAggregate,
  RequestLogEntry,
  StatusLevel,
  UsageSnapshot,
} from './types.js';

// ---------------------------------------------------------------------------
// Event type constants
// ---------------------------------------------------------------------------

/** Emitted after every `checkAndReserve` (allow or deny). */
export const EVENT_DECISION = 'quota:decision' as const;

/** Emitted after a commit has been persisted. */
export const EVENT_COMMIT = 'quota:commit' as const;

/** Emitted after a refund has been applied. */
export const EVENT_REFUND = 'quota:refund' as const;

/** Emitted when a calendar month rolls over and older months freeze. */
export const EVENT_ROLLOVER = 'quota:rollover' as const;

/** Emitted when the current month's status tier changes. */
export const EVENT_STATUS_CHANGE = 'quota:status-change' as const;

/** Emitted whenever a store call fails. */
export const EVENT_STORAGE_ERROR = 'quota:storage-error' as const;

export type QuotaEventName =
  | typeof EVENT_DECISION
  | typeof EVENT_COMMIT
  | typeof EVENT_REFUND
  | typeof EVENT_ROLLOVER
  | typeof EVENT_STATUS_CHANGE
  | typeof EVENT_STORAGE_ERROR;

// ---------------------------------------------------------------------------
// Event payload interfaces
// ---------------------------------------------------------------------------

export interface QuotaDecisionEventPayload {
  readonly allowed: boolean;
  /** `within_limits` when allowed. */
  readonly reason: DenialReason | 'within_limits';
  readonly estimatedRequests: number;
  readonly estimatedCost: number;
  readonly reservationId?: string;
  readonly snapshot: UsageSnapshot | null;
  readonly timestamp: string;
}

export interface QuotaCommitEventPayload {
  readonly entry: RequestLogEntry;
  /** Requests applied on top of what was reserved (negative releases). */
  readonly deltaRequests: number;
  readonly deltaCost: number;
  /** Set when the delta landed on a later month than the reservation. */
  readonly redirectedFrom?: string;
}

export interface QuotaRefundEventPayload {
  readonly yearMonth: string;
  readonly requests: number;
  readonly cost: number;
  readonly reservationId?: string;
  readonly timestamp: string;
}

export interface QuotaRolloverEventPayload {
  readonly activeMonth: string;
  readonly frozen: readonly MonthlyAggregate[];
  readonly timestamp: string;
}

export interface QuotaStatusChangeEventPayload {
  readonly yearMonth: string;
  readonly previous: StatusLevel;
  readonly current: StatusLevel;
  readonly snapshot: UsageSnapshot;
}

export interface QuotaStorageErrorEventPayload {
  readonly operation: string;
  readonly message: string;
  readonly timestamp: string;
}

// ---------------------------------------------------------------------------
// Event payload map
// ---------------------------------------------------------------------------

export interface QuotaEventPayloadMap {
  [EVENT_DECISION]: QuotaDecisionEventPayload;
  [EVENT_COMMIT]: QuotaCommitEventPayload;
  [EVENT_REFUND]: QuotaRefundEventPayload;
  [EVENT_ROLLOVER]: QuotaRolloverEventPayload;
  [EVENT_STATUS_CHANGE]: QuotaStatusChangeEventPayload;
  [EVENT_STORAGE_ERROR]: QuotaStorageErrorEventPayload;
}

export type QuotaEventListener<E extends QuotaEventName> = (
  payload: QuotaEventPayloadMap[E],
) => void;

type AnyListener = (payload: never) => void;

// ---------------------------------------------------------------------------
// QuotaEventEmitter
// ---------------------------------------------------------------------------

/**
 * Typed publish-subscribe emitter. Listeners run synchronously in
 * registration order; once-listeners are removed before they are invoked.
 */
export class QuotaEventEmitter {
  /** Registered listeners per event, in registration order. */
  readonly #listeners: Map<QuotaEventName, Array<{ listener: AnyListener; once: boolean }>> = new Map();

  /**
   * Subscribe to every future `event`. Listeners run synchronously inside
   * the quota operation that emits, and an exception reaches its caller.
   *
   * @param event - One of the `EVENT_*` constants.
   * @returns `this`, for chaining.
   */
  on<E extends QuotaEventName>(event: E, listener: QuotaEventListener<E>): this {
    this.#addListener(event, listener, false);
    return this;
  }

  /**
   * Subscribe to the next `event` only. Useful for waiting on a rollover:
   *
   * ```typescript
   * quota.events.once(EVENT_ROLLOVER, ({ activeMonth }) => archive(activeMonth));
   * ```
   */
  once<E extends QuotaEventName>(event: E, listener: QuotaEventListener<E>): this {
    this.#addListener(event, listener, true);
    return this;
  }

  /**
   * Remove the first registration of `listener` for `event`. Unknown
   * listeners are ignored.
   */
  off<E extends QuotaEventName>(event: E, listener: QuotaEventListener<E>): this {
    const entries = this.#listeners.get(event);
    if (entries === undefined) return this;

    const index = entries.findIndex((entry) => entry.listener === listener);
    if (index !== -1) {
      entries.splice(index, 1);
    }
    if (entries.length === 0) {
      this.#listeners.delete(event);
    }
    return this;
  }

  /**
   * Invoke every listener for `event` with `payload`. Once-listeners are
   * dropped from the registry before any listener runs, so a listener that
   * emits the same event again does not reach them twice.
   *
   * @returns `true` if at least one listener was invoked.
   */
  emit<E extends QuotaEventName>(event: E, payload: QuotaEventPayloadMap[E]): boolean {
    const entries = this.#listeners.get(event);
    if (entries === undefined || entries.length === 0) return false;

    // Listeners added or removed during emission do not affect this call.
    const snapshot = [...entries];

    const remaining = entries.filter((entry) => !entry.once);
    if (remaining.length !== entries.length) {
      if (remaining.length === 0) {
        this.#listeners.delete(event);
      } else {
        this.#listeners.set(event, remaining);
      }
    }

    for (const { listener } of snapshot) {
      (listener as QuotaEventListener<E>)(payload);
    }

    return true;
  }

  /** Drop the listeners of `event`, or of every event when omitted. */
  removeAllListeners(event?: QuotaEventName): this {
    if (event !== undefined) {
      this.#listeners.delete(event);
    } else {
      this.#listeners.clear();
    }
    return this;
  }

  listenerCount(event: QuotaEventName): number {
    return this.#listeners.get(event)?.length ?? 0;
  }

  #addListener(event: QuotaEventName, listener: AnyListener, once: boolean): void {
    const existing = this.#listeners.get(event);
    if (existing !== undefined) {
      existing.push({ listener, once });
    } else {
      this.#listeners.set(event, [{ listener, once }]);
    }
  }
}
