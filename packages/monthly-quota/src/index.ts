// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * @meterguard/monthly-quota: calendar-month request and cost budget for a
 * metered external API.
 *
 * Public API surface:
 *
 * Facade
 *   MonthlyQuota          checkAndReserve / commit / refund / snapshot / history / log
 *   createMonthlyQuota    open the SQLite store and connect
 *
 * Components (usable standalone through a QuotaRuntime)
 *   QuotaGuard            atomic allow/deny with reservation
 *   RequestLogger         commit and refund with reconciliation
 *   UsageReporter         snapshots, frozen-month history, lazy log walk
 *   RolloverManager       keeps the active month in step with the calendar
 *
 * Storage
 *   QuotaStorage, MemoryQuotaStorage, SqliteQuotaStorage
 *
 * Config, errors, events, telemetry, Hono adapter
 */

// ---------------------------------------------------------------------------
// Facade
// ---------------------------------------------------------------------------
export { MonthlyQuota, createMonthlyQuota } from './quota.js';
export type { MonthlyQuotaOptions } from './quota.js';

// ---------------------------------------------------------------------------
// Components
// ---------------------------------------------------------------------------
export { QuotaGuard, assertAllowed } from './guard.js';
export { RequestLogger } from './request-logger.js';
export {
  UsageReporter,
  LogSequence,
  buildSnapshot,
  statusLevelFor,
  alertFor,
  DEFAULT_LOG_PAGE_SIZE,
} from './reporter.js';
export { RolloverManager, lifecycleOf, acceptsDeltas } from './rollover.js';
export type { MonthLifecycle, RolloverManagerOptions } from './rollover.js';
export { ReservationLedger } from './reservations.js';
export type { Hold } from './reservations.js';
export { StatusTracker } from './runtime.js';
export type { QuotaRuntime, CostFunction } from './runtime.js';

// ---------------------------------------------------------------------------
// Months & money
// ---------------------------------------------------------------------------
export {
  monthKeyOf,
  formatMonthKey,
  parseMonthKey,
  compareMonthKeys,
  toMicros,
  fromMicros,
  MICROS_PER_UNIT,
} from './month.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------
export {
  MonthStateSchema,
  LimitKindSchema,
  OutcomeSchema,
  LogFilterSchema,
  StatusLevelSchema,
  ReservationSchema,
  CommitInputSchema,
  RefundInputSchema,
} from './types.js';
export type {
  MonthKey,
  MonthState,
  AggregateRecord,
  MonthlyAggregate,
  QuotaDelta,
  QuotaCeiling,
  LimitKind,
  Outcome,
  RequestLogEntry,
  PendingLogEntry,
  LogFilter,
  LogEntryFilter,
  Reservation,
  StatusLevel,
  UsageSnapshot,
  DenialReason,
  Decision,
  CommitInput,
  RefundInput,
  RefundResult,
} from './types.js';

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------
export {
  QuotaConfigSchema,
  parseQuotaConfig,
  loadQuotaConfigFromEnv,
  DEFAULT_MAX_REQUESTS_PER_MONTH,
  DEFAULT_MAX_COST_PER_MONTH,
  DEFAULT_COST_PER_REQUEST,
} from './config.js';
export type { QuotaConfig, QuotaConfigInput } from './config.js';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------
export {
  QuotaError,
  ConfigurationError,
  BudgetExceededError,
  StorageError,
  ReservationError,
} from './errors.js';

// ---------------------------------------------------------------------------
// Storage
// ---------------------------------------------------------------------------
export type {
  QuotaStorage,
  ApplyOptions,
  ApplyResult,
  ActivationResult,
  LogPageQuery,
  ForwardLogPage,
  BackwardLogPage,
} from './storage/interface.js';
export { MemoryQuotaStorage } from './storage/memory.js';
export type { MemoryQuotaStorageOptions } from './storage/memory.js';
export { SqliteQuotaStorage } from './storage/sqlite.js';
export type { SqliteQuotaStorageConfig } from './storage/sqlite.js';

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------
export {
  QuotaEventEmitter,
  EVENT_DECISION,
  EVENT_COMMIT,
  EVENT_REFUND,
  EVENT_ROLLOVER,
  EVENT_STATUS_CHANGE,
  EVENT_STORAGE_ERROR,
} from './events.js';
export type {
  QuotaEventName,
  QuotaEventPayloadMap,
  QuotaEventListener,
  QuotaDecisionEventPayload,
  QuotaCommitEventPayload,
  QuotaRefundEventPayload,
  QuotaRolloverEventPayload,
  QuotaStatusChangeEventPayload,
  QuotaStorageErrorEventPayload,
} from './events.js';

// ---------------------------------------------------------------------------
// Telemetry
// ---------------------------------------------------------------------------
export { QuotaTracer } from './telemetry/otel.js';
export type { QuotaTracerConfig } from './telemetry/otel.js';

// ---------------------------------------------------------------------------
// Hono
// ---------------------------------------------------------------------------
export { quotaHonoMiddleware, usageRoutes } from './integrations/hono-middleware.js';
export type { QuotaEnv, QuotaVariables, QuotaMiddlewareOptions } from './integrations/hono-middleware.js';
