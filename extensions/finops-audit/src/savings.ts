/**
 * FinOps Audit — Savings Calculator
 *
 * Every figure is bounded to [0, monthlyCost]; without a known cost the
 * finding is informational and saves 0.
 */

import type { AuditConfig } from "./config.js";
import type { RuleSignal } from "./rules/shared.js";
import type { ResourceMetric } from "./types.js";

/**
 * Smallest tier that still covers `peakUtilization × current × headroom` and
 * is below the current allocation.
 */
export function rightsizingTarget(
  current: number,
  peakUtilization: number,
  headroomFactor: number,
  tiers: readonly number[],
): number | undefined {
  const required = peakUtilization * current * headroomFactor;
  return tiers.find((tier) => tier >= required && tier < current);
}

function clamp(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) return min;
  return Math.min(max, Math.max(min, value));
}

function oversizedSavings(signal: RuleSignal, metric: ResourceMetric, config: AuditConfig, cost: number): number {
  if (!signal.sizing) return 0;
  const { allocation, average, peak } = signal.sizing;
  const current = metric.allocated[allocation];
  const utilization = metric.utilization[peak] ?? metric.utilization[average];
  if (current === undefined || utilization === undefined) return 0;

  const target = rightsizingTarget(current, utilization, config.headroomFactor, config.rightsizingTiers[allocation]);
  if (target === undefined) return 0;
  return cost * (1 - target / current);
}

function storageClassSavings(signal: RuleSignal, config: AuditConfig, cost: number): number {
  if (!signal.storageTransition) return 0;
  const currentRatio = config.storageClassPriceRatios[signal.storageTransition.from];
  const targetRatio = config.storageClassPriceRatios[signal.storageTransition.to];
  if (currentRatio === undefined || targetRatio === undefined) return 0;
  return cost * (1 - targetRatio / currentRatio);
}

export function computeSavings(signal: RuleSignal, metric: ResourceMetric, config: AuditConfig): number {
  const cost = metric.monthlyCost;
  if (cost === undefined) return 0;

  let savings: number;
  switch (signal.classification) {
    case "idle":
    case "unused":
      savings = cost;
      break;
    case "oversized":
      savings = oversizedSavings(signal, metric, config, cost);
      break;
    case "storage_class_mismatch":
      savings = storageClassSavings(signal, config, cost);
      break;
    case "reservation_opportunity":
      savings = cost * config.committedUseDiscountRate;
      break;
    case "undersized":
    case "cold_start_heavy":
      savings = 0;
      break;
    default: {
      const unhandled: never = signal.classification;
      throw new Error(`Unhandled classification: ${String(unhandled)}`);
    }
  }

  return clamp(savings, 0, cost);
}
