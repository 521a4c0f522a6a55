/**
 * FinOps Audit — Per-kind Auditor
 *
 * Walks one kind's resources in input order: normalize, evaluate, attach
 * savings. A failing resource becomes an `errors` entry and the batch goes on.
 */

import type { AuditConfig } from "./config.js";
import { formatErrorMessage } from "./errors.js";
import { getAuditLogger, type AuditLogger } from "./logger.js";
import { normalizeResource, type NormalizeOutcome } from "./normalizer.js";
import { deepFreeze, yieldToEventLoop } from "./pool.js";
import { ruleEvaluators, type RuleEvaluator } from "./rules/index.js";
import { computeSavings } from "./savings.js";
import type { AuditIssue, AuditResult, CostByResource, Finding, RawResource, ResourceKind } from "./types.js";

export type AuditKindOptions = {
  signal?: AbortSignal;
  logger?: AuditLogger;
  /** Replaces the built-in rules for this kind. */
  evaluator?: RuleEvaluator;
};

export type KindAuditor = (
  kind: ResourceKind,
  resources: readonly RawResource[],
  costByResource: CostByResource,
  config: AuditConfig,
  options?: AuditKindOptions,
) => Promise<AuditResult>;

export const auditKind: KindAuditor = async (kind, resources, costByResource, config, options = {}) => {
  const log = (options.logger ?? getAuditLogger()).child(`auditor/${kind}`);
  const evaluate = options.evaluator ?? ruleEvaluators[kind];

  const findings: Finding[] = [];
  const errors: AuditIssue[] = [];
  let untaggedCount = 0;
  let idleCount = 0;
  let oversizedCount = 0;

  for (const [index, raw] of resources.entries()) {
    if (index > 0) await yieldToEventLoop();
    options.signal?.throwIfAborted();

    let id: string | undefined;
    let outcome: NormalizeOutcome;
    try {
      id = raw.resourceId?.trim() || undefined;
      outcome = normalizeResource(raw, {
        defaultKind: kind,
        monthlyCost: id ? costByResource[id] : undefined,
      });
    } catch (error) {
      const reason = formatErrorMessage(error);
      errors.push({ resourceId: id, reason });
      log.warn("Normalization failed", { resourceId: id, error: reason });
      continue;
    }

    if (!outcome.ok) {
      errors.push({ resourceId: outcome.error.resourceId, reason: outcome.error.message });
      log.warn("Skipping resource that failed normalization", {
        resourceId: outcome.error.resourceId,
        missingFields: outcome.error.missingFields,
      });
      continue;
    }

    let metric = outcome.metric;
    if (metric.kind !== kind) {
      log.debug("Auditing resource under its list's kind", { resourceId: metric.resourceId, declared: metric.kind });
      metric = { ...metric, kind };
    }

    const resourceLog = log.withContext({ kind, resourceId: metric.resourceId });
    let resourceFindings: Finding[];
    try {
      resourceFindings = evaluate(metric, config, {
        onSkip: (rule, error) => resourceLog.debug(`Rule ${rule} skipped`, { metric: error.metric }),
      }).map((signal) => ({
        resourceId: metric.resourceId,
        kind,
        region: metric.region,
        classification: signal.classification,
        severity: signal.severity,
        recommendation: signal.recommendation,
        potentialMonthlySavings: computeSavings(signal, metric, config),
        evidence: signal.evidence,
      }));
    } catch (error) {
      const reason = formatErrorMessage(error);
      errors.push({ resourceId: metric.resourceId, reason });
      resourceLog.warn("Rule evaluation failed", { error: reason });
      continue;
    }

    if (Object.keys(metric.labels).length === 0) untaggedCount++;
    if (resourceFindings.some((f) => f.classification === "idle" || f.classification === "unused")) idleCount++;
    if (resourceFindings.some((f) => f.classification === "oversized")) oversizedCount++;
    findings.push(...resourceFindings);
  }

  const potentialMonthlySavings = findings.reduce((sum, f) => sum + f.potentialMonthlySavings, 0);

  log.debug("Kind audited", {
    totalCount: resources.length,
    findings: findings.length,
    errors: errors.length,
  });

  return deepFreeze({
    kind,
    totalCount: resources.length,
    findings,
    potentialMonthlySavings,
    errors,
    untaggedCount,
    idleCount,
    oversizedCount,
  });
};
