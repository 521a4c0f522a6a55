/**
 * FinOps Audit — Aggregator
 *
 * Merges per-kind results into the dashboard summary. The output order is a
 * total order over findings, so it never depends on which auditor finished
 * first.
 */

import { getAuditLogger, type AuditLogger } from "./logger.js";
import { deepFreeze } from "./pool.js";
import {
  RESOURCE_KINDS,
  SEVERITY_RANK,
  type AuditResult,
  type DashboardAuditSummary,
  type Finding,
  type ResourceKind,
} from "./types.js";

export type AggregateOptions = {
  logger?: AuditLogger;
  now?: () => Date;
};

const KIND_RANK = new Map<ResourceKind, number>(RESOURCE_KINDS.map((kind, index) => [kind, index]));

function kindRank(kind: ResourceKind): number {
  return KIND_RANK.get(kind) ?? RESOURCE_KINDS.length;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Savings desc, severity desc, resourceId asc, classification asc, kind order.
 */
export function compareFindings(a: Finding, b: Finding): number {
  return (
    b.potentialMonthlySavings - a.potentialMonthlySavings ||
    SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] ||
    compareText(a.resourceId, b.resourceId) ||
    compareText(a.classification, b.classification) ||
    kindRank(a.kind) - kindRank(b.kind)
  );
}

/** True when `candidate` should replace `kept` for the same (resource, classification). */
function outranks(candidate: Finding, kept: Finding): boolean {
  if (candidate.potentialMonthlySavings !== kept.potentialMonthlySavings) {
    return candidate.potentialMonthlySavings > kept.potentialMonthlySavings;
  }
  if (candidate.severity !== kept.severity) {
    return SEVERITY_RANK[candidate.severity] > SEVERITY_RANK[kept.severity];
  }
  return kindRank(candidate.kind) < kindRank(kept.kind);
}

export function aggregate(results: readonly AuditResult[], options: AggregateOptions = {}): DashboardAuditSummary {
  const log = (options.logger ?? getAuditLogger()).child("aggregator");

  // Last write wins per kind. Copied so that freezing leaves the caller's results alone.
  const latest = new Map<ResourceKind, AuditResult>();
  for (const result of results) {
    latest.set(result.kind, structuredClone(result));
  }

  const byKind: Partial<Record<ResourceKind, AuditResult>> = {};
  const ordered: AuditResult[] = [];
  for (const kind of RESOURCE_KINDS) {
    const result = latest.get(kind);
    if (result) {
      byKind[kind] = result;
      ordered.push(result);
    }
  }

  const unique = new Map<string, Finding>();
  for (const finding of ordered.flatMap((r) => r.findings)) {
    const key = `${finding.resourceId}\u0000${finding.classification}`;
    const kept = unique.get(key);
    if (!kept) {
      unique.set(key, finding);
      continue;
    }
    const winner = outranks(finding, kept) ? finding : kept;
    log.warn("Duplicate finding dropped", {
      resourceId: finding.resourceId,
      classification: finding.classification,
      keptKind: winner.kind,
      droppedKind: winner === finding ? kept.kind : finding.kind,
    });
    unique.set(key, winner);
  }

  const allFindings = [...unique.values()].sort(compareFindings);
  const totalPotentialMonthlySavings = allFindings.reduce((sum, f) => sum + f.potentialMonthlySavings, 0);
  const degraded = ordered.some((r) => r.errors.length > 0);

  log.info("Audit summary built", {
    kinds: ordered.length,
    findings: allFindings.length,
    totalPotentialMonthlySavings,
    degraded,
  });

  return deepFreeze({
    byKind,
    allFindings,
    totalPotentialMonthlySavings,
    generatedAt: (options.now ?? (() => new Date()))().toISOString(),
    degraded,
  });
}
