/**
 * Billing roll-up: folds already-fetched billing rows into the per-resource
 * cost map the auditors consume, and into a per-service breakdown.
 */

import type { CostByResource, CostByService } from "./types.js";

export type BillingRow = {
  resourceId?: string | null;
  service?: string;
  cost: number;
  /** Credits are negative amounts and reduce the net cost. */
  credits?: number;
};

function netAmount(row: BillingRow): number | undefined {
  if (!Number.isFinite(row.cost)) return undefined;
  const credits = row.credits !== undefined && Number.isFinite(row.credits) ? row.credits : 0;
  return row.cost + credits;
}

function sumBy(rows: readonly BillingRow[], keyOf: (row: BillingRow) => string | undefined): Map<string, number> {
  const totals = new Map<string, number>();
  for (const row of rows) {
    const key = keyOf(row)?.trim();
    const amount = netAmount(row);
    if (!key || amount === undefined) continue;
    totals.set(key, (totals.get(key) ?? 0) + amount);
  }
  return totals;
}

/** Net cost per resource id, ids ascending. Negative totals are dropped. */
export function rollUpCosts(rows: readonly BillingRow[]): CostByResource {
  const totals = sumBy(rows, (row) => row.resourceId ?? undefined);

  const costs: Record<string, number> = {};
  for (const [id, total] of [...totals.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    if (total >= 0) costs[id] = total;
  }
  return costs;
}

/**
 * Net cost per billing service, highest first (ties by name). Rows without a
 * service and services whose credits exceed their cost are left out.
 */
export function rollUpServiceCosts(rows: readonly BillingRow[]): CostByService {
  const totals = sumBy(rows, (row) => row.service);

  const costs: Record<string, number> = {};
  const ranked = [...totals.entries()].sort(([a, ca], [b, cb]) => cb - ca || (a < b ? -1 : a > b ? 1 : 0));
  for (const [service, total] of ranked) {
    if (total >= 0) costs[service] = total;
  }
  return costs;
}
