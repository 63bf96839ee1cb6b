// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { LimitKind, UsageSnapshot } from './types.js';

/**
 * Base class for all monthly-quota errors.
 *
 * Every error includes a machine-readable `code` that calling code can
 * switch on without parsing human-readable messages.
 */
export class QuotaError extends Error {
  /** Machine-readable error code. Always a SCREAMING_SNAKE_CASE string. */
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'QuotaError';
    this.code = code;
    // Maintain proper prototype chain for instanceof checks.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when the budget configuration is missing or invalid.
 *
 * `details` carries one `path: message` entry per zod issue. Fatal at startup.
 */
export class ConfigurationError extends QuotaError {
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super('INVALID_CONFIG', `Quota configuration is invalid: ${details.join('; ')}`);
    this.name = 'ConfigurationError';
    this.details = details;
  }
}

/**
 * Raised by `assertAllowed()` for a denied decision.
 *
 * The guard itself never throws this: denials come back as a `Decision` so
 * the caller can show the remaining headroom. Retrying blindly will not help
 * until capacity is refunded or the month rolls over.
 */
export class BudgetExceededError extends QuotaError {
  /** Which monthly limit the projected usage would have crossed. */
  readonly limit: LimitKind;
  readonly snapshot: UsageSnapshot;

  constructor(limit: LimitKind, snapshot: UsageSnapshot) {
    const headroom = limit === 'requests'
      ? `${snapshot.requestsRemaining} of ${snapshot.maxRequests} requests remaining`
      : `${snapshot.costRemaining} of ${snapshot.maxCost} cost remaining`;
    super('BUDGET_EXCEEDED', `Monthly ${limit} budget exceeded for ${snapshot.yearMonth}: ${headroom}.`);
    this.name = 'BudgetExceededError';
    this.limit = limit;
    this.snapshot = snapshot;
  }
}

/**
 * The backing store could not be read or written. The operation that raised
 * it was not applied.
 */
export class StorageError extends QuotaError {
  /** Store operation that failed, e.g. `atomicApply`. */
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('STORAGE_UNAVAILABLE', `Quota storage failed during ${operation}: ${detail}`, { cause });
    this.name = 'StorageError';
    this.operation = operation;
  }
}

/** A reservation was settled more than once. */
export class ReservationError extends QuotaError {
  readonly reservationId: string;

  constructor(reservationId: string) {
    super('RESERVATION_SETTLED', `Reservation "${reservationId}" has already been committed.`);
    this.name = 'ReservationError';
    this.reservationId = reservationId;
  }
}

/**
 * Run a storage call, wrapping anything it throws in `StorageError`.
 * A `StorageError` thrown from inside is passed through unchanged.
 */
export async function withStorage<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof StorageError) throw error;
    throw new StorageError(operation, error);
  }
}
