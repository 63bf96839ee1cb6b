// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type {
  AggregateRecord,
  LimitKind,
  LogEntryFilter,
  QuotaCeiling,
  QuotaDelta,
  RequestLogEntry,
} from '../types.js';

export type Projection =
  | { readonly ok: true; readonly requestCount: number; readonly costMicros: number }
  | { readonly ok: false; readonly limit: LimitKind };

/**
 * Compute the post-delta values for an aggregate. Results are floored at
 * zero. With a ceiling, anything strictly above it is refused, requests
 * checked before cost.
 */
export function projectDelta(
  current: AggregateRecord,
  delta: QuotaDelta,
  ceiling?: QuotaCeiling,
): Projection {
  const requestCount = Math.max(0, current.requestCount + delta.requests);
  const costMicros = Math.max(0, current.costMicros + delta.costMicros);

  if (ceiling !== undefined) {
    if (requestCount > ceiling.maxRequests) return { ok: false, limit: 'requests' };
    if (costMicros > ceiling.maxCostMicros) return { ok: false, limit: 'cost' };
  }

  return { ok: true, requestCount, costMicros };
}

/** AND-combine every set field of the filter. */
export function matchesLogFilter(
  entry: RequestLogEntry,
  filter: LogEntryFilter | undefined,
): boolean {
  if (filter === undefined) return true;
  if (filter.endpoint !== undefined && entry.endpoint !== filter.endpoint) return false;
  if (filter.operationTag !== undefined && entry.operationTag !== filter.operationTag) return false;
  if (filter.outcome !== undefined && entry.outcome !== filter.outcome) return false;
  if (filter.yearMonth !== undefined && entry.yearMonth !== filter.yearMonth) return false;
  if (filter.since !== undefined && entry.timestamp < filter.since) return false;
  if (filter.until !== undefined && entry.timestamp > filter.until) return false;
  return true;
}
