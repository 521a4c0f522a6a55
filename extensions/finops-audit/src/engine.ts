/**
 * FinOps Audit — Entry Point
 *
 * Validates configuration, fans the per-kind auditors out over a bounded pool,
 * enforces the deadline, and hands every kind's result to the aggregator.
 */

import { aggregate } from "./aggregator.js";
import { auditKind, type KindAuditor } from "./auditor.js";
import { resolveAuditConfig, type AuditConfig } from "./config.js";
import { AuditTimeoutError, formatErrorMessage } from "./errors.js";
import { getAuditLogger, type AuditLogger } from "./logger.js";
import { processPooled } from "./pool.js";
import {
  RESOURCE_KINDS,
  type AuditResult,
  type CostByResource,
  type DashboardAuditSummary,
  type ResourceKind,
  type ResourcesByKind,
} from "./types.js";

export type AuditAllOptions = {
  /** Kinds unfinished after this many milliseconds are reported as `timed_out`. */
  deadlineMs?: number;
  /** Caller cancellation; unfinished kinds are reported as `cancelled`. */
  signal?: AbortSignal;
  logger?: AuditLogger;
  now?: () => Date;
  /** Per-kind auditor overrides. */
  auditors?: Partial<Record<ResourceKind, KindAuditor>>;
};

type StopReason = "timed_out" | "cancelled";

function issueOnlyResult(kind: ResourceKind, reason: string): AuditResult {
  return {
    kind,
    totalCount: 0,
    findings: [],
    potentialMonthlySavings: 0,
    errors: [{ reason }],
    untaggedCount: 0,
    idleCount: 0,
    oversizedCount: 0,
  };
}

/**
 * Audit every kind present in `resourcesByKind`.
 *
 * @throws ConfigurationError before any auditor runs when `config` is invalid.
 */
export async function auditAll(
  resourcesByKind: ResourcesByKind,
  costByResource: CostByResource,
  config?: unknown,
  options: AuditAllOptions = {},
): Promise<DashboardAuditSummary> {
  const resolved: AuditConfig = resolveAuditConfig(config);
  const logger = options.logger ?? getAuditLogger();
  const log = logger.child("engine");

  const kinds = RESOURCE_KINDS.filter((kind) => resourcesByKind[kind] !== undefined);
  const concurrency = resolved.concurrencyLimit ?? Math.max(1, kinds.length);

  log.info("Audit started", {
    kinds,
    resources: kinds.reduce((sum, kind) => sum + (resourcesByKind[kind]?.length ?? 0), 0),
    concurrency,
    deadlineMs: options.deadlineMs,
  });

  const controller = new AbortController();
  const completed = new Map<ResourceKind, AuditResult>();
  let stopped: StopReason | undefined;

  const runKind = async (kind: ResourceKind): Promise<void> => {
    const auditor = options.auditors?.[kind] ?? auditKind;
    let result: AuditResult;
    try {
      result = await auditor(kind, resourcesByKind[kind] ?? [], costByResource, resolved, {
        signal: controller.signal,
        logger,
      });
    } catch (error) {
      if (stopped) return;
      const message = formatErrorMessage(error);
      log.warn("Auditor failed", { kind, error: message });
      result = issueOnlyResult(kind, `auditor_failed: ${message}`);
    }
    if (!stopped) completed.set(kind, result);
  };

  let timer: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;
  const interrupted = new Promise<StopReason>((resolve) => {
    if (options.deadlineMs !== undefined) {
      timer = setTimeout(() => resolve("timed_out"), options.deadlineMs);
    }
    if (options.signal) {
      onAbort = () => resolve("cancelled");
      if (options.signal.aborted) onAbort();
      else options.signal.addEventListener("abort", onAbort, { once: true });
    }
  });

  const work = processPooled(kinds, runKind, concurrency, controller.signal).then(() => undefined);

  try {
    stopped = await Promise.race([work, interrupted]);
  } finally {
    if (timer) clearTimeout(timer);
    if (onAbort) options.signal?.removeEventListener("abort", onAbort);
  }

  if (stopped) {
    const pending = kinds.filter((kind) => !completed.has(kind));
    const reason =
      stopped === "timed_out" ? new AuditTimeoutError(options.deadlineMs ?? 0, pending) : new Error("Audit cancelled");
    controller.abort(reason);
    if (pending.length > 0) log.warn(formatErrorMessage(reason), { kinds: pending });
  }

  const results = kinds.map((kind) => completed.get(kind) ?? issueOnlyResult(kind, stopped ?? "timed_out"));
  const summary = aggregate(results, { logger, now: options.now });

  log.info("Audit finished", {
    findings: summary.allFindings.length,
    totalPotentialMonthlySavings: summary.totalPotentialMonthlySavings,
    degraded: summary.degraded,
  });

  return summary;
}
