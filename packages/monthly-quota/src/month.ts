// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { AggregateRecord, MonthKey, MonthlyAggregate } from './types.js';

/** 1 currency unit = 1 000 000 micro-units. */
export const MICROS_PER_UNIT = 1_000_000;

export function toMicros(amount: number): number {
  return Math.round(amount * MICROS_PER_UNIT);
}

export function fromMicros(micros: number): number {
  return micros / MICROS_PER_UNIT;
}

/** Calendar month of `date`, in UTC. */
export function monthKeyOf(date: Date): MonthKey {
  return { year: date.getUTCFullYear(), month: date.getUTCMonth() + 1 };
}

/** Months since year 0; orders keys without string comparison. */
function monthOrdinal(key: MonthKey): number {
  return key.year * 12 + (key.month - 1);
}

export function compareMonthKeys(a: MonthKey, b: MonthKey): number {
  return monthOrdinal(a) - monthOrdinal(b);
}

export function sameMonth(a: MonthKey, b: MonthKey): boolean {
  return a.year === b.year && a.month === b.month;
}

export function formatMonthKey(key: MonthKey): string {
  return `${key.year}-${String(key.month).padStart(2, '0')}`;
}

export function parseMonthKey(yearMonth: string): MonthKey {
  const match = /^(\d{4})-(\d{2})$/.exec(yearMonth);
  if (match === null) {
    throw new RangeError(`Invalid month key "${yearMonth}", expected YYYY-MM.`);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  if (month < 1 || month > 12) {
    throw new RangeError(`Invalid month ${month} in "${yearMonth}".`);
  }
  return { year, month };
}

export function toMonthlyAggregate(record: AggregateRecord): MonthlyAggregate {
  return {
    year: record.year,
    month: record.month,
    yearMonth: formatMonthKey(record),
    requestCount: record.requestCount,
    costAccrued: fromMicros(record.costMicros),
    state: record.state,
    createdAt: record.createdAt,
    ...(record.frozenAt !== undefined && { frozenAt: record.frozenAt }),
  };
}
