// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import type { StorageError } from './errors.js';

// ─── Month key ───────────────────────────────────────────────────────────────

export interface MonthKey {
  readonly year: number;
  /** Calendar month, 1–12. */
  readonly month: number;
}

// ─── Aggregates ──────────────────────────────────────────────────────────────

export const MonthStateSchema = z.enum(['active', 'frozen']);
export type MonthState = z.infer<typeof MonthStateSchema>;

/**
 * Aggregate row as the storage layer holds it. Cost is kept in integer
 * micro-units so limit comparisons are exact.
 */
export interface AggregateRecord extends MonthKey {
  readonly requestCount: number;
  readonly costMicros: number;
  readonly state: MonthState;
  readonly createdAt: string;
  readonly frozenAt?: string;
}

/** Public view of one calendar month's usage. */
export interface MonthlyAggregate extends MonthKey {
  /** `YYYY-MM` */
  readonly yearMonth: string;
  readonly requestCount: number;
  readonly costAccrued: number;
  readonly state: MonthState;
  readonly createdAt: string;
  readonly frozenAt?: string;
}

// ─── Deltas ──────────────────────────────────────────────────────────────────

export interface QuotaDelta {
  readonly requests: number;
  readonly costMicros: number;
}

export interface QuotaCeiling {
  readonly maxRequests: number;
  readonly maxCostMicros: number;
}

export const LimitKindSchema = z.enum(['requests', 'cost']);
export type LimitKind = z.infer<typeof LimitKindSchema>;

// ─── Request log ─────────────────────────────────────────────────────────────

export const OutcomeSchema = z.enum(['allowed-success', 'allowed-failure', 'denied']);
export type Outcome = z.infer<typeof OutcomeSchema>;

export interface RequestLogEntry {
  /** Insertion order; the definitive audit order. */
  readonly sequence: number;
  readonly timestamp: string;
  readonly yearMonth: string;
  readonly endpoint: string;
  readonly operationTag: string;
  readonly requests: number;
  readonly cost: number;
  readonly outcome: Outcome;
  readonly reservationId?: string;
  readonly notes?: string;
}

/** A log entry before the store has assigned its sequence number. */
export interface PendingLogEntry {
  readonly timestamp: string;
  /** Month the entry is attributed to. Defaults to the month the delta lands on. */
  readonly yearMonth?: string;
  readonly endpoint: string;
  readonly operationTag: string;
  readonly requests: number;
  readonly costMicros: number;
  readonly outcome: Outcome;
  readonly reservationId?: string;
  readonly notes?: string;
}

export const LogFilterSchema = z.object({
  endpoint: z.string().optional(),
  operationTag: z.string().optional(),
  outcome: OutcomeSchema.optional(),
  yearMonth: z.string().regex(/^\d{4}-\d{2}$/).optional(),
  /** Entries at or after this ISO 8601 timestamp. */
  since: z.string().optional(),
  /** Entries at or before this ISO 8601 timestamp. */
  until: z.string().optional(),
  limit: z.number().int().nonnegative().optional(),
  /** Walk the log from the most recent entry backwards. */
  newestFirst: z.boolean().optional(),
}).strict();
export type LogFilter = z.infer<typeof LogFilterSchema>;

/** The part of a LogFilter a store matches entries against. */
export type LogEntryFilter = Omit<LogFilter, 'limit' | 'newestFirst'>;

// ─── Reservations & decisions ────────────────────────────────────────────────

export interface Reservation {
  readonly id: string;
  readonly yearMonth: string;
  readonly requests: number;
  readonly cost: number;
  readonly createdAt: string;
}

export const StatusLevelSchema = z.enum(['ok', 'warning', 'critical', 'exceeded']);
export type StatusLevel = z.infer<typeof StatusLevelSchema>;

export interface UsageSnapshot {
  readonly yearMonth: string;
  readonly requestsUsed: number;
  readonly costUsed: number;
  readonly requestsRemaining: number;
  readonly costRemaining: number;
  readonly maxRequests: number;
  readonly maxCost: number;
  /** max(requests ratio, cost ratio) × 100, unrounded. */
  readonly percentUsed: number;
  readonly statusLevel: StatusLevel;
}

export type DenialReason = LimitKind | 'storage';

export type Decision =
  | {
      readonly allowed: true;
      readonly reason: 'within_limits';
      readonly snapshot: UsageSnapshot;
      readonly reservation: Reservation;
    }
  | {
      readonly allowed: false;
      readonly reason: LimitKind;
      readonly snapshot: UsageSnapshot;
    }
  | {
      readonly allowed: false;
      readonly reason: 'storage';
      readonly snapshot: null;
      readonly error: StorageError;
    };

// ─── Commit & refund ─────────────────────────────────────────────────────────

export const ReservationSchema = z.object({
  id: z.string().min(1),
  yearMonth: z.string().regex(/^\d{4}-\d{2}$/),
  requests: z.number().int().nonnegative(),
  cost: z.number().nonnegative(),
  createdAt: z.string(),
});

export const CommitInputSchema = z.object({
  actualRequests: z.number().int().nonnegative().optional(),
  actualCost: z.number().finite().nonnegative().optional(),
  endpoint: z.string().min(1),
  operationTag: z.string().default(''),
  outcome: OutcomeSchema,
  reservation: ReservationSchema.optional(),
  notes: z.string().optional(),
}).refine(
  (input) => input.outcome !== 'denied' || input.reservation === undefined,
  { message: 'A denied operation cannot settle a reservation', path: ['reservation'] },
);
export type CommitInput = z.input<typeof CommitInputSchema>;

export const RefundInputSchema = z.object({
  /** Omitted with a reservation: release everything still reserved. */
  requests: z.number().int().nonnegative().optional(),
  cost: z.number().finite().nonnegative().optional(),
  reservation: ReservationSchema.optional(),
});
export type RefundInput = z.input<typeof RefundInputSchema>;

export type RefundResult =
  | {
      readonly applied: true;
      readonly requests: number;
      readonly cost: number;
      readonly aggregate: MonthlyAggregate;
    }
  | {
      readonly applied: false;
      readonly reason: 'month_frozen' | 'nothing_reserved';
    };
