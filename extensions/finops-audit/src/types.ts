/**
 * FinOps Audit — Shared Types
 *
 * Canonical resource, finding and result shapes used by every stage of the
 * audit pipeline (normalizer → rules → savings → auditor → aggregator).
 */

// =============================================================================
// Resource Kinds
// =============================================================================

export type ResourceKind = "compute" | "serverless" | "database" | "storage" | "static_ip";

/** Canonical kind order. Used wherever a deterministic kind order is needed. */
export const RESOURCE_KINDS: readonly ResourceKind[] = [
  "compute",
  "serverless",
  "database",
  "storage",
  "static_ip",
];

// =============================================================================
// Findings
// =============================================================================

export type FindingClassification =
  | "idle"
  | "oversized"
  | "undersized"
  | "cold_start_heavy"
  | "unused"
  | "storage_class_mismatch"
  | "reservation_opportunity";

export type FindingSeverity = "low" | "medium" | "high";

export const SEVERITY_RANK: Record<FindingSeverity, number> = {
  low: 0,
  medium: 1,
  high: 2,
};

/** A single detected optimization opportunity on one resource. */
export type Finding = {
  readonly resourceId: string;
  readonly kind: ResourceKind;
  readonly region: string;
  readonly classification: FindingClassification;
  readonly severity: FindingSeverity;
  readonly recommendation: string;
  readonly potentialMonthlySavings: number;
  /** Metric values that triggered the classification. */
  readonly evidence: Readonly<Record<string, number>>;
};

// =============================================================================
// Metrics
// =============================================================================

/** Canonical utilization keys. Ratio-valued keys are always within [0, 1]. */
export const RATIO_METRICS = [
  "cpu_avg",
  "cpu_peak",
  "memory_avg",
  "memory_peak",
  "uptime_ratio",
  "cold_start_ratio",
  "access_ratio",
  "storage_used_ratio",
] as const;

export type RatioMetric = (typeof RATIO_METRICS)[number];

export const RATE_METRICS = ["request_rate", "connections_avg", "attachment_count"] as const;

export type RateMetric = (typeof RATE_METRICS)[number];

export const UTILIZATION_METRICS = [...RATIO_METRICS, ...RATE_METRICS] as const;

export type UtilizationMetric = (typeof UTILIZATION_METRICS)[number];

export const ALLOCATION_KEYS = ["vcpu", "memory_mb", "storage_gb"] as const;

export type AllocationKey = (typeof ALLOCATION_KEYS)[number];

/** Canonical, provider-independent view of one audited resource. */
export type ResourceMetric = {
  readonly resourceId: string;
  readonly kind: ResourceKind;
  readonly region: string;
  /** Absent keys mean "not measured", never zero usage. */
  readonly utilization: Readonly<Partial<Record<UtilizationMetric, number>>>;
  readonly allocated: Readonly<Partial<Record<AllocationKey, number>>>;
  /** Attributed cost for the period. Absent when unknown. */
  readonly monthlyCost?: number;
  /** Categorical facts such as `state`, `pricing_model`, `storage_class`. */
  readonly attributes: Readonly<Record<string, string>>;
  readonly labels: Readonly<Record<string, string>>;
};

/**
 * A resource as supplied by an upstream fetcher. Field names inside `samples`,
 * `series` and `attributes` are provider-specific; the normalizer maps them.
 */
export type RawResource = {
  resourceId?: string;
  kind?: string;
  region?: string;
  zone?: string;
  labels?: Record<string, string>;
  samples?: Record<string, number | null | undefined>;
  series?: Record<string, number[]>;
  attributes?: Record<string, string | number | boolean | null | undefined>;
};

// =============================================================================
// Results
// =============================================================================

export type AuditIssue = {
  readonly resourceId?: string;
  readonly reason: string;
};

/** One kind's complete audit. */
export type AuditResult = {
  readonly kind: ResourceKind;
  /** Number of input resources, regardless of how many succeeded. */
  readonly totalCount: number;
  readonly findings: readonly Finding[];
  readonly potentialMonthlySavings: number;
  readonly errors: readonly AuditIssue[];
  readonly untaggedCount: number;
  readonly idleCount: number;
  readonly oversizedCount: number;
};

/** Final merged artifact handed to presentation layers. */
export type DashboardAuditSummary = {
  readonly byKind: Readonly<Partial<Record<ResourceKind, AuditResult>>>;
  readonly allFindings: readonly Finding[];
  readonly totalPotentialMonthlySavings: number;
  readonly generatedAt: string;
  readonly degraded: boolean;
};

export type ResourcesByKind = Partial<Record<ResourceKind, readonly RawResource[]>>;

export type CostByResource = Readonly<Record<string, number>>;

/** Net billed cost per billing service, highest first. */
export type CostByService = Readonly<Record<string, number>>;
