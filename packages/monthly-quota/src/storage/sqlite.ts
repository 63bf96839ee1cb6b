// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import Database from 'better-sqlite3';
import type { ActivationResult, ApplyOptions, ApplyResult, LogPageQuery, QuotaStorage } from './interface.js';
import type {
  AggregateRecord,
  MonthKey,
  MonthState,
  Outcome,
  QuotaDelta,
  RequestLogEntry,
} from '../types.js';
import { MonthStateSchema, OutcomeSchema } from '../types.js';
import { compareMonthKeys, formatMonthKey, fromMicros, sameMonth } from '../month.js';
import { projectDelta } from './apply.js';

/** Configuration for the SQLite storage backend. */
export interface SqliteQuotaStorageConfig {
  /** An open better-sqlite3 database. */
  database: Database.Database;
  /** Table name prefix. Defaults to "quota_". */
  tablePrefix?: string;
  /** Clock used for `created_at` / `frozen_at`. */
  now?: () => Date;
}

interface MonthRow {
  year: number;
  month: number;
  request_count: number;
  cost_micros: number;
  state: string;
  created_at: string;
  frozen_at: string | null;
}

interface LogRow {
  sequence: number;
  timestamp: string;
  year_month: string;
  endpoint: string;
  operation_tag: string;
  requests: number;
  cost_micros: number;
  outcome: string;
  reservation_id: string | null;
  notes: string | null;
}

/**
 * SQLite-backed implementation of QuotaStorage.
 *
 * Every mutation runs inside a `BEGIN IMMEDIATE` transaction, so concurrent
 * callers in this process and other processes sharing the file are
 * serialized by SQLite's write lock. better-sqlite3 is synchronous: by the
 * time a method's promise resolves the transaction has committed.
 *
 * Table schema:
 *   {prefix}monthly_usage : one row per (year, month)
 *   {prefix}request_log   : append-only, one row per logged operation
 */
export class SqliteQuotaStorage implements QuotaStorage {
  readonly #db: Database.Database;
  readonly #prefix: string;
  readonly #now: () => Date;

  constructor(config: SqliteQuotaStorageConfig) {
    this.#db = config.database;
    this.#prefix = config.tablePrefix ?? 'quota_';
    this.#now = config.now ?? (() => new Date());
  }

  /**
   * Open (or create) the database file at `location` with a journal mode and
   * sync level under which a committed transaction survives a crash.
   */
  static open(location: string, options: Omit<SqliteQuotaStorageConfig, 'database'> = {}): SqliteQuotaStorage {
    const database = new Database(location);
    database.pragma('journal_mode = WAL');
    database.pragma('synchronous = FULL');
    database.pragma('busy_timeout = 5000');
    return new SqliteQuotaStorage({ ...options, database });
  }

  #table(name: string): string {
    return `${this.#prefix}${name}`;
  }

  // -------------------------------------------------------------------------
  // Aggregates
  // -------------------------------------------------------------------------

  async get(key: MonthKey): Promise<AggregateRecord | undefined> {
    return this.#getMonth(key);
  }

  async atomicApply(key: MonthKey, delta: QuotaDelta, options: ApplyOptions = {}): Promise<ApplyResult> {
    const apply = this.#db.transaction((): ApplyResult => {
      const stored = this.#getMonth(key);
      if (stored !== undefined && stored.state === 'frozen' && options.allowRedirect === false) {
        return { applied: false, aggregate: stored, reason: 'frozen' };
      }

      const target = this.#resolveTarget(key);
      const projection = projectDelta(target, delta, options.ceiling);

      if (!projection.ok) {
        return { applied: false, aggregate: target, reason: projection.limit };
      }

      this.#db.prepare(
        `UPDATE ${this.#table('monthly_usage')} SET request_count = ?, cost_micros = ? WHERE year = ? AND month = ?`,
      ).run(projection.requestCount, projection.costMicros, target.year, target.month);

      const aggregate: AggregateRecord = {
        ...target,
        requestCount: projection.requestCount,
        costMicros: projection.costMicros,
      };

      let logEntry: RequestLogEntry | undefined;
      if (options.logEntry !== undefined) {
        const pending = options.logEntry;
        const yearMonth = pending.yearMonth ?? formatMonthKey(aggregate);
        const info = this.#db.prepare(
          `INSERT INTO ${this.#table('request_log')} ` +
            '(timestamp, year_month, endpoint, operation_tag, requests, cost_micros, outcome, reservation_id, notes) ' +
            'VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)',
        ).run(
          pending.timestamp,
          yearMonth,
          pending.endpoint,
          pending.operationTag,
          pending.requests,
          pending.costMicros,
          pending.outcome,
          pending.reservationId ?? null,
          pending.notes ?? null,
        );
        logEntry = {
          sequence: Number(info.lastInsertRowid),
          timestamp: pending.timestamp,
          yearMonth,
          endpoint: pending.endpoint,
          operationTag: pending.operationTag,
          requests: pending.requests,
          cost: fromMicros(pending.costMicros),
          outcome: pending.outcome,
          ...(pending.reservationId !== undefined && { reservationId: pending.reservationId }),
          ...(pending.notes !== undefined && { notes: pending.notes }),
        };
      }

      return {
        applied: true,
        aggregate,
        ...(!sameMonth(target, key) && { redirectedFrom: key }),
        ...(logEntry !== undefined && { logEntry }),
      };
    });

    return apply.immediate();
  }

  async activate(key: MonthKey): Promise<ActivationResult> {
    const activate = this.#db.transaction((): ActivationResult => this.#activateInTransaction(key));
    return activate.immediate();
  }

  async listFrozen(limit: number): Promise<readonly AggregateRecord[]> {
    const rows = this.#db.prepare<[number], MonthRow>(
      `SELECT * FROM ${this.#table('monthly_usage')} WHERE state = 'frozen' ` +
        'ORDER BY year DESC, month DESC LIMIT ?',
    ).all(limit);
    return rows.map(toAggregateRecord);
  }

  // -------------------------------------------------------------------------
  // Request log
  // -------------------------------------------------------------------------

  async readLog(query: LogPageQuery): Promise<readonly RequestLogEntry[]> {
    const conditions: string[] = [];
    const params: Array<string | number> = [];
    const filter = query.filter;
    let order = 'ASC';

    if (!('newestFirst' in query)) {
      conditions.push('sequence > ?');
      params.push(query.afterSequence);
    } else {
      order = 'DESC';
      if (query.beforeSequence !== undefined) {
        conditions.push('sequence < ?');
        params.push(query.beforeSequence);
      }
    }

    if (filter?.endpoint !== undefined) {
      conditions.push('endpoint = ?');
      params.push(filter.endpoint);
    }
    if (filter?.operationTag !== undefined) {
      conditions.push('operation_tag = ?');
      params.push(filter.operationTag);
    }
    if (filter?.outcome !== undefined) {
      conditions.push('outcome = ?');
      params.push(filter.outcome);
    }
    if (filter?.yearMonth !== undefined) {
      conditions.push('year_month = ?');
      params.push(filter.yearMonth);
    }
    if (filter?.since !== undefined) {
      conditions.push('timestamp >= ?');
      params.push(filter.since);
    }
    if (filter?.until !== undefined) {
      conditions.push('timestamp <= ?');
      params.push(filter.until);
    }
    params.push(query.pageSize);

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')} ` : '';
    const rows = this.#db.prepare<Array<string | number>, LogRow>(
      `SELECT * FROM ${this.#table('request_log')} ${where}` +
        `ORDER BY sequence ${order} LIMIT ?`,
    ).all(...params);

    return rows.map(toLogEntry);
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async connect(): Promise<void> {
    const prefix = this.#prefix;

    this.#db.exec(`
      CREATE TABLE IF NOT EXISTS ${prefix}monthly_usage (
        year INTEGER NOT NULL,
        month INTEGER NOT NULL,
        request_count INTEGER NOT NULL DEFAULT 0,
        cost_micros INTEGER NOT NULL DEFAULT 0,
        state TEXT NOT NULL DEFAULT 'active',
        created_at TEXT NOT NULL,
        frozen_at TEXT,
        PRIMARY KEY (year, month)
      );
      CREATE INDEX IF NOT EXISTS idx_${prefix}monthly_usage_state ON ${prefix}monthly_usage(state);
      CREATE TABLE IF NOT EXISTS ${prefix}request_log (
        sequence INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp TEXT NOT NULL,
        year_month TEXT NOT NULL,
        endpoint TEXT NOT NULL,
        operation_tag TEXT NOT NULL,
        requests INTEGER NOT NULL,
        cost_micros INTEGER NOT NULL,
        outcome TEXT NOT NULL,
        reservation_id TEXT,
        notes TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_${prefix}request_log_month ON ${prefix}request_log(year_month);
    `);
  }

  async disconnect(): Promise<void> {
    this.#db.close();
  }

  async isHealthy(): Promise<boolean> {
    try {
      this.#db.prepare('SELECT 1').get();
      return true;
    } catch {
      return false;
    }
  }

  // -------------------------------------------------------------------------
  // Private helpers (call only inside a transaction)
  // -------------------------------------------------------------------------

  #getMonth(key: MonthKey): AggregateRecord | undefined {
    const row = this.#db.prepare<[number, number], MonthRow>(
      `SELECT * FROM ${this.#table('monthly_usage')} WHERE year = ? AND month = ?`,
    ).get(key.year, key.month);
    return row === undefined ? undefined : toAggregateRecord(row);
  }

  #getActive(): AggregateRecord | undefined {
    const row = this.#db.prepare<[], MonthRow>(
      `SELECT * FROM ${this.#table('monthly_usage')} WHERE state = 'active' ` +
        'ORDER BY year DESC, month DESC LIMIT 1',
    ).get();
    return row === undefined ? undefined : toAggregateRecord(row);
  }

  #activateInTransaction(key: MonthKey): ActivationResult {
    const active = this.#getActive();
    if (active !== undefined && compareMonthKeys(active, key) >= 0) {
      return { active, frozen: [], created: false };
    }

    if (this.#getMonth(key) !== undefined) {
      throw new Error(`Month ${formatMonthKey(key)} is frozen and cannot become active again.`);
    }

    const timestamp = this.#now().toISOString();
    const table = this.#table('monthly_usage');
    const ordinal = key.year * 12 + (key.month - 1);

    const stale = this.#db.prepare<[number], MonthRow>(
      `SELECT * FROM ${table} WHERE state = 'active' AND (year * 12 + month - 1) < ?`,
    ).all(ordinal);

    this.#db.prepare(
      `UPDATE ${table} SET state = 'frozen', frozen_at = ? WHERE state = 'active' AND (year * 12 + month - 1) < ?`,
    ).run(timestamp, ordinal);

    this.#db.prepare(
      `INSERT OR IGNORE INTO ${table} (year, month, request_count, cost_micros, state, created_at) ` +
        "VALUES (?, ?, 0, 0, 'active', ?)",
    ).run(key.year, key.month, timestamp);

    const created: AggregateRecord = {
      year: key.year,
      month: key.month,
      requestCount: 0,
      costMicros: 0,
      state: 'active',
      createdAt: timestamp,
    };

    return {
      active: created,
      frozen: stale.map((row) => ({ ...toAggregateRecord(row), state: 'frozen' as const, frozenAt: timestamp })),
      created: true,
    };
  }

  #resolveTarget(key: MonthKey): AggregateRecord {
    const record = this.#getMonth(key);
    if (record !== undefined && record.state === 'active') return record;

    if (record === undefined) {
      return this.#activateInTransaction(key).active;
    }

    const active = this.#getActive();
    if (active === undefined) {
      throw new Error(`Month ${formatMonthKey(key)} is frozen and no month is active.`);
    }
    return active;
  }
}

function toAggregateRecord(row: MonthRow): AggregateRecord {
  const state: MonthState = MonthStateSchema.parse(row.state);
  return {
    year: row.year,
    month: row.month,
    requestCount: row.request_count,
    costMicros: row.cost_micros,
    state,
    createdAt: row.created_at,
    ...(row.frozen_at !== null && { frozenAt: row.frozen_at }),
  };
}

function toLogEntry(row: LogRow): RequestLogEntry {
  const outcome: Outcome = OutcomeSchema.parse(row.outcome);
  return {
    sequence: row.sequence,
    timestamp: row.timestamp,
    yearMonth: row.year_month,
    endpoint: row.endpoint,
    operationTag: row.operation_tag,
    requests: row.requests,
    cost: fromMicros(row.cost_micros),
    outcome,
    ...(row.reservation_id !== null && { reservationId: row.reservation_id }),
    ...(row.notes !== null && { notes: row.notes }),
  };
}
