// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Hono adapter for MonthlyQuota.
 *
 * ```ts
 * import { Hono } from 'hono';
 *
 * const app = new Hono();
 * app.use('/search/*', quotaHonoMiddleware(quota, { endpoint: 'search' }));
 * app.route('/', usageRoutes(quota));
 * ```
 */

import { Hono } from 'hono';
import type { Context, MiddlewareHandler } from 'hono';
import { createMiddleware } from 'hono/factory';
import { z } from 'zod';
import type { MonthlyQuota } from '../quota.js';
import type { Outcome, Reservation } from '../types.js';
import { StorageError } from '../errors.js';
import { alertFor } from '../reporter.js';

/** Context variables set by quotaHonoMiddleware. */
export type QuotaVariables = {
  quotaReservation: Reservation;
};

export type QuotaEnv = {
  Variables: QuotaVariables;
};

export interface QuotaMiddlewareOptions {
  /** Endpoint recorded in the log. Defaults to the request path. */
  endpoint?: string | ((c: Context) => string);
  operationTag?: string;
  /** Reservation size for this request. Defaults to one request at the configured cost. */
  estimate?: (c: Context) => { requests?: number; cost?: number };
}

/**
 * Gate a route behind the monthly quota.
 *
 * Denied requests never reach the handler: budget denials answer 429 with
 * the usage snapshot, storage failures 503. Allowed requests carry their
 * reservation in `c.get('quotaReservation')` and are committed after the
 * handler, `allowed-success` for 2xx/3xx and `allowed-failure` otherwise.
 */
export function quotaHonoMiddleware(
  quota: MonthlyQuota,
  options: QuotaMiddlewareOptions = {},
): MiddlewareHandler<QuotaEnv> {
  return createMiddleware<QuotaEnv>(async (c, next) => {
    const estimate = options.estimate?.(c) ?? {};
    const decision = await quota.checkAndReserve(estimate.requests, estimate.cost);

    if (!decision.allowed) {
      if (decision.reason === 'storage') {
        return c.json({ error: 'quota_unavailable', message: decision.error.message }, 503);
      }
      return c.json(
        { error: 'quota_exceeded', limit: decision.reason, snapshot: decision.snapshot },
        429,
      );
    }

    const { reservation } = decision;
    c.set('quotaReservation', reservation);

    const endpoint = typeof options.endpoint === 'function'
      ? options.endpoint(c)
      : options.endpoint ?? c.req.path;
    const settle = (outcome: Outcome, notes?: string) =>
      quota.commit({
        endpoint,
        operationTag: options.operationTag ?? c.req.method,
        outcome,
        reservation,
        ...(notes !== undefined && { notes }),
      });

    try {
      await next();
    } catch (error) {
      await settle('allowed-failure', error instanceof Error ? error.message : String(error));
      throw error;
    }

    if (c.error !== undefined) {
      await settle('allowed-failure', c.error.message);
    } else {
      await settle(c.res.status < 400 ? 'allowed-success' : 'allowed-failure');
    }
  });
}

const HistoryQuerySchema = z.object({
  months: z.coerce.number().int().nonnegative().max(120).default(12),
});

const LogQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(1000).default(100),
  order: z.enum(['newest', 'oldest']).default('newest'),
});

/**
 * Read-only usage endpoints:
 *
 *   GET /usage                    current month snapshot plus alert
 *   GET /usage/history?months=N   last N frozen months
 *   GET /usage/log?limit=N        latest N log entries, newest first
 *                                 (`order=oldest` for the first N)
 */
export function usageRoutes(quota: MonthlyQuota): Hono {
  const app = new Hono();

  app.get('/usage', async (c) => {
    const snapshot = await quota.getSnapshot();
    return c.json({ snapshot, alert: alertFor(snapshot) ?? null });
  });

  app.get('/usage/history', async (c) => {
    const query = HistoryQuerySchema.safeParse({ months: c.req.query('months') });
    if (!query.success) {
      return c.json({ error: 'invalid_query', message: query.error.issues[0]?.message ?? 'invalid months' }, 400);
    }
    return c.json({ months: await quota.getHistory(query.data.months) });
  });

  app.get('/usage/log', async (c) => {
    const query = LogQuerySchema.safeParse({ limit: c.req.query('limit'), order: c.req.query('order') });
    if (!query.success) {
      return c.json({ error: 'invalid_query', message: query.error.issues[0]?.message ?? 'invalid log query' }, 400);
    }
    const { limit, order } = query.data;
    return c.json({ entries: await quota.getLog({ limit, newestFirst: order === 'newest' }).toArray() });
  });

  app.onError((error, c) => {
    if (error instanceof StorageError) {
      return c.json({ error: 'quota_unavailable', message: error.message }, 503);
    }
    return c.json({ error: 'internal_error', message: error.message }, 500);
  });

  return app;
}
