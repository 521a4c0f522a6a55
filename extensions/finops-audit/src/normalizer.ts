/**
 * FinOps Audit — Metric Normalizer
 *
 * Maps a provider-shaped raw resource onto the canonical ResourceMetric.
 * Field aliases and unit conversions live in the tables below; anything the
 * tables cannot resolve is left absent rather than zero-filled.
 */

import { NormalizationError } from "./errors.js";
import type {
  AllocationKey,
  RatioMetric,
  RawResource,
  ResourceKind,
  ResourceMetric,
  UtilizationMetric,
} from "./types.js";
import { ALLOCATION_KEYS, RATIO_METRICS, RESOURCE_KINDS, UTILIZATION_METRICS } from "./types.js";

// =============================================================================
// Mapping Tables
// =============================================================================

const BYTES_PER_GIB = 1024 ** 3;
const SECONDS_PER_30_DAYS = 30 * 24 * 60 * 60;
const PERCENT = 0.01;

type FieldSource = { field: string; scale: number };

const RATIO_KEYS = new Set<UtilizationMetric>(RATIO_METRICS);

/** Scalar sample aliases, first match wins. */
const UTILIZATION_FIELDS: Record<UtilizationMetric, FieldSource[]> = {
  cpu_avg: [
    { field: "cpu_avg", scale: 1 },
    { field: "cpu_utilization", scale: 1 },
    { field: "cpu_utilization_percent", scale: PERCENT },
    { field: "avg_cpu_utilization", scale: PERCENT },
  ],
  cpu_peak: [
    { field: "cpu_peak", scale: 1 },
    { field: "cpu_max", scale: 1 },
    { field: "cpu_peak_percent", scale: PERCENT },
  ],
  memory_avg: [
    { field: "memory_avg", scale: 1 },
    { field: "memory_utilization", scale: 1 },
    { field: "memory_utilization_percent", scale: PERCENT },
    { field: "avg_memory_utilization", scale: PERCENT },
  ],
  memory_peak: [
    { field: "memory_peak", scale: 1 },
    { field: "memory_peak_percent", scale: PERCENT },
  ],
  uptime_ratio: [
    { field: "uptime_ratio", scale: 1 },
    { field: "uptime_percent", scale: PERCENT },
  ],
  cold_start_ratio: [{ field: "cold_start_ratio", scale: 1 }],
  access_ratio: [{ field: "access_ratio", scale: 1 }],
  storage_used_ratio: [{ field: "storage_used_ratio", scale: 1 }],
  request_rate: [
    { field: "request_rate", scale: 1 },
    { field: "requests_per_second", scale: 1 },
    { field: "requests_per_minute", scale: 1 / 60 },
  ],
  connections_avg: [
    { field: "connections_avg", scale: 1 },
    { field: "avg_connections", scale: 1 },
    { field: "avg_connections_30d", scale: 1 },
  ],
  attachment_count: [
    { field: "attachment_count", scale: 1 },
    { field: "users_count", scale: 1 },
  ],
};

const ALLOCATION_FIELDS: Record<AllocationKey, FieldSource[]> = {
  vcpu: [
    { field: "vcpu", scale: 1 },
    { field: "vcpu_count", scale: 1 },
    { field: "guest_cpus", scale: 1 },
    { field: "cpu_limit", scale: 1 },
  ],
  memory_mb: [
    { field: "memory_mb", scale: 1 },
    { field: "memory_limit_mb", scale: 1 },
  ],
  storage_gb: [
    { field: "storage_gb", scale: 1 },
    { field: "size_gb", scale: 1 },
    { field: "disk_size_gb", scale: 1 },
    { field: "size_bytes", scale: 1 / BYTES_PER_GIB },
  ],
};

/** Time series contribute their mean and maximum. */
const SERIES_FIELDS: Record<string, { avg: RatioMetric; peak: RatioMetric; scale: number }> = {
  cpu_utilization: { avg: "cpu_avg", peak: "cpu_peak", scale: 1 },
  cpu_utilization_percent: { avg: "cpu_avg", peak: "cpu_peak", scale: PERCENT },
  memory_utilization: { avg: "memory_avg", peak: "memory_peak", scale: 1 },
  memory_utilization_percent: { avg: "memory_avg", peak: "memory_peak", scale: PERCENT },
};

const KIND_ALIASES: Record<string, ResourceKind> = {
  compute_instance: "compute",
  compute_engine: "compute",
  instance: "compute",
  vm: "compute",
  cloud_run: "serverless",
  cloud_function: "serverless",
  cloud_functions: "serverless",
  function: "serverless",
  cloud_sql: "database",
  sql_instance: "database",
  persistent_disk: "storage",
  disk: "storage",
  bucket: "storage",
  static_ip_address: "static_ip",
  address: "static_ip",
};

// =============================================================================
// Helpers
// =============================================================================

export type NormalizeOutcome =
  | { ok: true; metric: ResourceMetric }
  | { ok: false; error: NormalizationError };

export type NormalizeOptions = {
  /** Kind to assume when the raw resource does not name one. */
  defaultKind?: ResourceKind;
  monthlyCost?: number;
};

function isUsableNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/** Resolve a kind name or provider alias, case-insensitively. */
export function parseResourceKind(value: string | undefined): ResourceKind | undefined {
  const key = nonEmpty(value)?.toLowerCase().replace(/[\s-]+/g, "_");
  if (!key) return undefined;
  const direct = RESOURCE_KINDS.find((kind) => kind === key);
  return direct ?? KIND_ALIASES[key];
}

/** `us-central1-a` → `us-central1`. */
export function zoneToRegion(zone: string): string {
  return zone.replace(/-[a-z]$/, "");
}

/**
 * Parse a memory size string (`512Mi`, `2Gi`, `1G`, `256M`) into megabytes.
 */
export function parseMemoryString(value: string): number | undefined {
  const match = value.trim().toUpperCase().match(/^(\d+(?:\.\d+)?)\s*(KI|MI|GI|K|M|G)?B?$/);
  if (!match) return undefined;
  const amount = Number(match[1]);
  switch (match[2]) {
    case "KI":
    case "K":
      return amount / 1024;
    case "GI":
    case "G":
      return amount * 1024;
    default:
      return amount;
  }
}

function pick(samples: Map<string, number>, sources: FieldSource[]): number | undefined {
  for (const source of sources) {
    const value = samples.get(source.field);
    if (value !== undefined) return value * source.scale;
  }
  return undefined;
}

function cleanSamples(raw: RawResource): Map<string, number> {
  const samples = new Map<string, number>();
  for (const [name, value] of Object.entries(raw.samples ?? {})) {
    if (isUsableNumber(value)) samples.set(name, value);
  }
  return samples;
}

function ratio(numerator: number | undefined, denominator: number | undefined): number | undefined {
  if (numerator === undefined || denominator === undefined || denominator <= 0) return undefined;
  return numerator / denominator;
}

// =============================================================================
// Normalization
// =============================================================================

function normalizeAllocation(raw: RawResource, samples: Map<string, number>): Partial<Record<AllocationKey, number>> {
  const allocated: Partial<Record<AllocationKey, number>> = {};

  for (const key of ALLOCATION_KEYS) {
    const value = pick(samples, ALLOCATION_FIELDS[key]);
    if (value !== undefined && value > 0) allocated[key] = value;
  }

  const memoryLimit = raw.attributes?.memory_limit;
  if (allocated.memory_mb === undefined && typeof memoryLimit === "string") {
    const mb = parseMemoryString(memoryLimit);
    if (mb !== undefined && mb > 0) allocated.memory_mb = mb;
  }

  return allocated;
}

function normalizeUtilization(
  raw: RawResource,
  samples: Map<string, number>,
  allocated: Partial<Record<AllocationKey, number>>,
): Partial<Record<UtilizationMetric, number>> {
  const utilization: Partial<Record<UtilizationMetric, number>> = {};

  for (const metric of UTILIZATION_METRICS) {
    const value = pick(samples, UTILIZATION_FIELDS[metric]);
    if (value !== undefined) utilization[metric] = value;
  }

  for (const [name, values] of Object.entries(raw.series ?? {})) {
    const mapping = SERIES_FIELDS[name];
    const points = values.filter(isUsableNumber);
    if (!mapping || points.length === 0) continue;
    const mean = points.reduce((sum, v) => sum + v, 0) / points.length;
    const peak = points.reduce((max, v) => (v > max ? v : max), points[0]);
    utilization[mapping.avg] ??= mean * mapping.scale;
    utilization[mapping.peak] ??= peak * mapping.scale;
  }

  // Derived metrics, only where no direct sample exists.
  const requestCount = samples.get("request_count");
  const count30d = samples.get("request_count_30d") ?? samples.get("invocations_30d");

  utilization.request_rate ??=
    ratio(requestCount, samples.get("window_seconds")) ?? ratio(count30d, SECONDS_PER_30_DAYS);

  utilization.memory_avg ??= ratio(samples.get("avg_memory_usage_mb"), allocated.memory_mb);

  utilization.cold_start_ratio ??= ratio(samples.get("cold_start_count"), requestCount ?? count30d);

  utilization.access_ratio ??= ratio(samples.get("objects_accessed"), samples.get("object_count"));

  const storageBytes = allocated.storage_gb !== undefined ? allocated.storage_gb * BYTES_PER_GIB : undefined;
  utilization.storage_used_ratio ??= ratio(samples.get("storage_used_bytes"), storageBytes);

  const inUse = raw.attributes?.in_use;
  if (utilization.attachment_count === undefined && typeof inUse === "boolean") {
    utilization.attachment_count = inUse ? 1 : 0;
  }

  for (const metric of UTILIZATION_METRICS) {
    const value = utilization[metric];
    if (value === undefined) {
      delete utilization[metric];
    } else if (RATIO_KEYS.has(metric)) {
      utilization[metric] = Math.min(1, Math.max(0, value));
    }
  }

  return utilization;
}

function normalizeAttributes(raw: RawResource): Record<string, string> {
  const attributes: Record<string, string> = {};

  for (const [name, value] of Object.entries(raw.attributes ?? {})) {
    if (typeof value === "string" && value.trim()) attributes[name] = value.trim();
    else if (typeof value === "number" && Number.isFinite(value)) attributes[name] = String(value);
  }

  if (attributes.state) attributes.state = attributes.state.toUpperCase();
  if (attributes.storage_class) attributes.storage_class = attributes.storage_class.toUpperCase();
  const preemptible = raw.attributes?.preemptible;
  if (attributes.pricing_model) {
    attributes.pricing_model = attributes.pricing_model.toLowerCase().replace(/[\s-]+/g, "_");
  } else if (typeof preemptible === "boolean") {
    attributes.pricing_model = preemptible ? "spot" : "on_demand";
  }

  return attributes;
}

/**
 * Normalize one raw resource. Missing identity fields fail this resource only.
 */
export function normalizeResource(raw: RawResource, options: NormalizeOptions = {}): NormalizeOutcome {
  const resourceId = nonEmpty(raw.resourceId);
  const kind = raw.kind !== undefined ? parseResourceKind(raw.kind) : options.defaultKind;
  const zone = nonEmpty(raw.zone);
  const region = nonEmpty(raw.region) ?? (zone ? zoneToRegion(zone) : undefined);

  const missingFields: string[] = [];
  if (!resourceId) missingFields.push("resourceId");
  if (!kind) missingFields.push("kind");
  if (!region) missingFields.push("region");

  if (!resourceId || !kind || !region) {
    return { ok: false, error: new NormalizationError(resourceId, missingFields) };
  }

  const samples = cleanSamples(raw);
  const allocated = normalizeAllocation(raw, samples);
  const utilization = normalizeUtilization(raw, samples, allocated);

  const metric: ResourceMetric = {
    resourceId,
    kind,
    region,
    utilization,
    allocated,
    ...(isUsableNumber(options.monthlyCost) ? { monthlyCost: options.monthlyCost } : {}),
    attributes: normalizeAttributes(raw),
    labels: { ...raw.labels },
  };

  return { ok: true, metric };
}
