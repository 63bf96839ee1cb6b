// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type {
  AggregateRecord,
  LimitKind,
  LogEntryFilter,
  MonthKey,
  PendingLogEntry,
  QuotaCeiling,
  QuotaDelta,
  RequestLogEntry,
} from '../types.js';

export interface ApplyOptions {
  /**
   * Apply the delta only if the post-update aggregate stays at or below
   * these values. Checked inside the same atomic step as the write.
   */
  readonly ceiling?: QuotaCeiling;
  /** Appended in the same transaction as the delta. */
  readonly logEntry?: PendingLogEntry;
  /**
   * When false, a delta aimed at a frozen month is refused instead of being
   * redirected to the active month. Defaults to true.
   */
  readonly allowRedirect?: boolean;
}

export type ApplyResult =
  | {
      readonly applied: true;
      /** Post-update aggregate of the month the delta landed on. */
      readonly aggregate: AggregateRecord;
      /** Set when `key` was frozen and the delta went to the active month. */
      readonly redirectedFrom?: MonthKey;
      readonly logEntry?: RequestLogEntry;
    }
  | {
      readonly applied: false;
      /** Aggregate the delta was checked against, unchanged. */
      readonly aggregate: AggregateRecord;
      readonly reason: LimitKind | 'frozen';
    };

export interface ActivationResult {
  /** The month that is active after the call. */
  readonly active: AggregateRecord;
  /** Months frozen by this call. Empty when nothing changed. */
  readonly frozen: readonly AggregateRecord[];
  readonly created: boolean;
}

/** Oldest first, entries with a sequence strictly greater than `afterSequence`. */
export interface ForwardLogPage {
  readonly afterSequence: number;
  readonly pageSize: number;
  readonly filter?: LogEntryFilter;
}

/**
 * Newest first, entries with a sequence strictly below `beforeSequence`.
 * Without `beforeSequence` the page starts at the latest entry.
 */
export interface BackwardLogPage {
  readonly newestFirst: true;
  readonly beforeSequence?: number;
  readonly pageSize: number;
  readonly filter?: LogEntryFilter;
}

export type LogPageQuery = ForwardLogPage | BackwardLogPage;

/**
 * Transactional persistence contract for the quota subsystem.
 *
 * `atomicApply` is the sole mutation point for aggregates. Implementations
 * must run the read, the ceiling check, the write and the optional log
 * append as one indivisible step, and must have made the result durable
 * before the returned promise resolves. A failure leaves nothing applied.
 */
export interface QuotaStorage {
  get(key: MonthKey): Promise<AggregateRecord | undefined>;

  atomicApply(key: MonthKey, delta: QuotaDelta, options?: ApplyOptions): Promise<ApplyResult>;

  /**
   * Make `key` the active month: freeze every older active month and create
   * `key` with zero usage if it does not exist. Idempotent. If a newer month
   * is already active it stays active.
   */
  activate(key: MonthKey): Promise<ActivationResult>;

  /** Most recent frozen months first. */
  listFrozen(limit: number): Promise<readonly AggregateRecord[]>;

  /** One page of the request log, in sequence order or reversed. */
  readLog(query: LogPageQuery): Promise<readonly RequestLogEntry[]>;

  /** Called once before first use. Creates tables, opens handles. */
  connect?(): Promise<void>;

  /** Called on shutdown. */
  disconnect?(): Promise<void>;

  /** Returns true if the backend is reachable. */
  isHealthy?(): Promise<boolean>;
}
