// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * basic-quota.ts
 *
 * The reserve / call / commit loop against a small monthly budget:
 *   1. Create a quota over an in-memory store.
 *   2. Reserve before each external call.
 *   3. Commit the actual outcome, or refund when nothing was consumed.
 *   4. Print the snapshot and alert at the end.
 *
 * Run with:  npx tsx packages/monthly-quota/examples/basic-quota.ts
 */

import {
  EVENT_STATUS_CHANGE,
  MemoryQuotaStorage,
  MonthlyQuota,
} from '../src/index.js';

// ─── Setup ────────────────────────────────────────────────────────────────────

const quota = new MonthlyQuota(
  { maxRequestsPerMonth: 5, maxCostPerMonth: 0.05, costPerRequest: 0.009 },
  new MemoryQuotaStorage(),
);
await quota.connect();

quota.events.on(EVENT_STATUS_CHANGE, ({ yearMonth, previous, current }) => {
  console.log(`  [${yearMonth}] status ${previous} -> ${current}`);
});

// ─── Simulate a sequence of search calls ──────────────────────────────────────

const upstream = ['ok', 'ok', 'timeout', 'ok', 'ok', 'ok', 'ok'] as const;

for (const [index, result] of upstream.entries()) {
  const call = index + 1;
  const decision = await quota.checkAndReserve();

  if (!decision.allowed) {
    console.log(`Call ${call}: DENIED  reason=${decision.reason}`);
    continue;
  }

  if (result === 'timeout') {
    // The provider never received the request.
    await quota.refund({ reservation: decision.reservation });
    console.log(`Call ${call}: REFUNDED`);
    continue;
  }

  const entry = await quota.commit({
    endpoint: 'search',
    operationTag: 'web',
    outcome: 'allowed-success',
    reservation: decision.reservation,
  });
  console.log(`Call ${call}: COMMITTED seq=${entry.sequence} cost=${entry.cost.toFixed(4)}`);
}

// ─── Final snapshot ───────────────────────────────────────────────────────────

const snapshot = await quota.getSnapshot();

console.log('\n── Usage summary ─────────────────────────────────────');
console.log(`  Month     : ${snapshot.yearMonth}`);
console.log(`  Requests  : ${snapshot.requestsUsed} / ${snapshot.maxRequests}`);
console.log(`  Cost      : ${snapshot.costUsed.toFixed(4)} / ${snapshot.maxCost.toFixed(4)}`);
console.log(`  Used      : ${snapshot.percentUsed.toFixed(1)}%  (${snapshot.statusLevel})`);
console.log(`  Alert     : ${(await quota.getAlert()) ?? 'none'}`);

await quota.close();
