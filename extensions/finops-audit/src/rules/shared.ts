/**
 * FinOps Audit — Rule Contract
 *
 * Rules are small pure functions over a canonical ResourceMetric. The shared
 * runner owns the cross-rule invariants: insufficient data skips one rule
 * only, and a classification is emitted at most once per resource.
 */

import type { AuditConfig } from "../config.js";
import { InsufficientDataError } from "../errors.js";
import { rightsizingTarget } from "../savings.js";
import type {
  FindingClassification,
  FindingSeverity,
  RatioMetric,
  ResourceMetric,
  UtilizationMetric,
} from "../types.js";

// =============================================================================
// Types
// =============================================================================

/** Allocations that have a configured tier ladder. */
export type TieredAllocation = "vcpu" | "memory_mb";

export type SizingBasis = {
  allocation: TieredAllocation;
  average: RatioMetric;
  peak: RatioMetric;
};

/** One rule's verdict, before savings are attached. */
export type RuleSignal = {
  classification: FindingClassification;
  severity: FindingSeverity;
  evidence: Record<string, number>;
  recommendation: string;
  /** Present on oversized signals. */
  sizing?: SizingBasis;
  /** Present on storage class signals. */
  storageTransition?: { from: string; to: string };
};

export type RuleHooks = {
  onSkip?: (rule: string, error: InsufficientDataError) => void;
};

export type Rule = {
  name: string;
  /** `emitted` holds the classifications earlier rules produced for this resource. */
  evaluate(
    metric: ResourceMetric,
    config: AuditConfig,
    emitted: ReadonlySet<FindingClassification>,
  ): RuleSignal | undefined;
};

export type RuleEvaluator = (metric: ResourceMetric, config: AuditConfig, hooks?: RuleHooks) => RuleSignal[];

// =============================================================================
// Runner
// =============================================================================

export function runRules(
  rules: readonly Rule[],
  metric: ResourceMetric,
  config: AuditConfig,
  hooks?: RuleHooks,
): RuleSignal[] {
  const signals: RuleSignal[] = [];
  const emitted = new Set<FindingClassification>();

  for (const rule of rules) {
    let signal: RuleSignal | undefined;
    try {
      signal = rule.evaluate(metric, config, emitted);
    } catch (error) {
      if (error instanceof InsufficientDataError) {
        hooks?.onSkip?.(rule.name, error);
        continue;
      }
      throw error;
    }

    if (!signal || emitted.has(signal.classification)) continue;
    emitted.add(signal.classification);
    signals.push(signal);
  }

  return signals;
}

export function createEvaluator(rules: readonly Rule[]): RuleEvaluator {
  return (metric, config, hooks) => runRules(rules, metric, config, hooks);
}

// =============================================================================
// Metric Access
// =============================================================================

export function requireUtilization(metric: ResourceMetric, key: UtilizationMetric): number {
  const value = metric.utilization[key];
  if (value === undefined) throw new InsufficientDataError(metric.resourceId, key);
  return value;
}

export function requireAllocation(metric: ResourceMetric, key: TieredAllocation): number {
  const value = metric.allocated[key];
  if (value === undefined) throw new InsufficientDataError(metric.resourceId, key);
  return value;
}

export function requireAttribute(metric: ResourceMetric, key: string): string {
  const value = metric.attributes[key];
  if (value === undefined) throw new InsufficientDataError(metric.resourceId, key);
  return value;
}

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

// =============================================================================
// Shared Rules
// =============================================================================

const STOPPED_STATES = new Set(["STOPPED", "TERMINATED", "SUSPENDED"]);

/**
 * Idle: the activity metric is at or below `idleThreshold`. A stopped
 * resource is idle regardless of metrics.
 */
export function idleRule(activity: UtilizationMetric, describe: (value: number) => string): Rule {
  return {
    name: "idle",
    evaluate(metric, config) {
      const state = metric.attributes.state;
      if (state !== undefined && STOPPED_STATES.has(state)) {
        return {
          classification: "idle",
          severity: "high",
          evidence: {},
          recommendation: `Resource is ${state.toLowerCase()} but still incurs charges; delete it or release what it holds`,
        };
      }

      const value = requireUtilization(metric, activity);
      if (value > config.idleThreshold) return undefined;

      return {
        classification: "idle",
        severity: value === 0 ? "high" : "medium",
        evidence: { [activity]: value },
        recommendation: describe(value),
      };
    },
  };
}

/**
 * Oversized below `oversizedThreshold`, undersized above `utilizationThreshold`.
 * Not evaluated for a resource already classified idle.
 */
export function sizingRule(basis: SizingBasis, unit: string): Rule {
  return {
    name: "sizing",
    evaluate(metric, config, emitted) {
      if (emitted.has("idle")) return undefined;

      const value = requireUtilization(metric, basis.average);

      if (value > config.utilizationThreshold) {
        return {
          classification: "undersized",
          severity: "high",
          evidence: { [basis.average]: value },
          recommendation: `Sustained utilization of ${formatPercent(value)} risks throttling; increase ${unit}`,
        };
      }

      if (value >= config.oversizedThreshold) return undefined;

      const current = requireAllocation(metric, basis.allocation);
      const peak = metric.utilization[basis.peak];
      const deviation = (config.oversizedThreshold - value) / config.oversizedThreshold;
      const target = rightsizingTarget(
        current,
        peak ?? value,
        config.headroomFactor,
        config.rightsizingTiers[basis.allocation],
      );

      return {
        classification: "oversized",
        severity: deviation >= 0.5 ? "high" : deviation >= 0.25 ? "medium" : "low",
        evidence: {
          [basis.average]: value,
          ...(peak !== undefined ? { [basis.peak]: peak } : {}),
          [basis.allocation]: current,
        },
        recommendation:
          target !== undefined
            ? `Downsize from ${current} to ${target} ${unit}`
            : `Average utilization is ${formatPercent(value)}; no smaller ${unit} tier covers peak demand`,
        sizing: basis,
      };
    },
  };
}

/** Reservation: steady uptime on on-demand pricing. */
export function reservationRule(): Rule {
  return {
    name: "reservation",
    evaluate(metric, config, emitted) {
      if (emitted.has("idle")) return undefined;

      const uptime = requireUtilization(metric, "uptime_ratio");
      const threshold = config.utilizationThreshold;
      if (uptime < threshold) return undefined;
      if (requireAttribute(metric, "pricing_model") !== "on_demand") return undefined;

      const margin = threshold < 1 ? (uptime - threshold) / (1 - threshold) : 1;

      return {
        classification: "reservation_opportunity",
        severity: margin >= 0.5 ? "medium" : "low",
        evidence: { uptime_ratio: uptime },
        recommendation: `Running ${formatPercent(uptime)} of the period on on-demand pricing; consider a committed-use discount`,
      };
    },
  };
}

/** Unused: nothing attached to or referencing the resource. */
export function unusedRule(describe: string): Rule {
  return {
    name: "unused",
    evaluate(metric) {
      const attachments = requireUtilization(metric, "attachment_count");
      if (attachments !== 0) return undefined;
      return {
        classification: "unused",
        severity: "medium",
        evidence: { attachment_count: 0 },
        recommendation: describe,
      };
    },
  };
}
